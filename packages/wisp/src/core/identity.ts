/**
 * Stable per-object identity, standing in for a raw address.
 *
 * Handles cache the identity of their subject when issued so that hashing
 * and ordering keep working after the subject is gone.
 */
declare const ADDRESS_BRAND: unique symbol;

export type Address = number & { readonly [ADDRESS_BRAND]: true };

/** Identity of nothing; what reset and empty handles hash to. */
export const NULL_ADDRESS = 0 as Address;

let _addressCounter = 0;

const addresses = new WeakMap<object, Address>();

/**
 * Return the identity of `target`, assigning the next one on first use.
 *
 * Identities start at 1 and are never reused within a process.
 */
export function addressOf(target: object): Address {
  let address = addresses.get(target);
  if (address === undefined) {
    address = ++_addressCounter as Address;
    addresses.set(target, address);
  }
  return address;
}
