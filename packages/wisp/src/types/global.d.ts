/**
 * Global type declarations for wisp runtime state.
 */

import type { TypeRegistryStore } from '../registry/type-registry.js';

declare global {
  /**
   * Process-wide type registry.
   *
   * Lives on globalThis so that a package bundled twice still agrees on the
   * identity of every declared class.
   */
  var __WISP_TYPE_REGISTRY__: TypeRegistryStore | undefined;
}

export {};
