/**
 * Handle Resolution Benchmark
 *
 * Measures the cost of the resolve() hot path and of handle bookkeeping.
 *
 * Scenarios:
 * 1. Baseline: direct property access on the subject
 * 2. resolve() with checked affinity
 * 3. resolve() with permissive affinity
 * 4. resolve() on a revoked handle
 * 5. issue() + reset()
 * 6. invalidate() with outstanding handles
 * 7. erase() + recover()
 * 8. HandleSet add/has over 1000 subjects
 */

import { Bench } from 'tinybench';
import { HandleSet } from '../src/core/handle-set.js';
import { SelfOwned, Shared } from '../src/core/ownership.js';
import { SubjectMixin } from '../src/core/subject.js';
import { typeTag } from '../src/core/type-tag.js';

// ==================== Setup ====================

class CheckedSession extends SubjectMixin(SelfOwned, {
  label: 'CheckedSession',
  config: { affinity: 'checked', onViolation: 'throw' },
}) {
  value = 'session';

  private constructor() {
    super();
  }

  static create(): Shared<CheckedSession> {
    return Shared.adopt(new CheckedSession());
  }
}

class FastSession extends SubjectMixin(SelfOwned, {
  label: 'FastSession',
  config: { affinity: 'permissive', onViolation: 'throw' },
}) {
  value = 'session';

  private constructor() {
    super();
  }

  static create(): Shared<FastSession> {
    return Shared.adopt(new FastSession());
  }
}

const CheckedTag = typeTag(CheckedSession, { extends: CheckedSession.subjectTag });
const FastTag = typeTag(FastSession, { extends: FastSession.subjectTag });

const checked = CheckedSession.create();
const fast = FastSession.create();
const checkedHandle = checked.value.issueAs(CheckedTag);
const fastHandle = fast.value.issueAs(FastTag);

const revokedOwner = FastSession.create();
const revokedHandle = revokedOwner.value.issueAs(FastTag);
revokedOwner.value.invalidateWeakHandles();

const population = Array.from({ length: 1000 }, () => FastSession.create());

// ==================== Benchmark ====================

const bench = new Bench({
  name: 'Handle Resolution Performance',
  time: 1000,
  iterations: 10,
  warmupIterations: 5,
});

bench.add('baseline: direct access', () => {
  if (fast.value.value !== 'session') throw new Error('Invalid');
});

bench.add('resolve: checked affinity', () => {
  if (checkedHandle.resolve()?.value !== 'session') throw new Error('Invalid');
});

bench.add('resolve: permissive affinity', () => {
  if (fastHandle.resolve()?.value !== 'session') throw new Error('Invalid');
});

bench.add('resolve: revoked handle', () => {
  if (revokedHandle.resolve() !== undefined) throw new Error('Invalid');
});

bench.add('issue + reset', () => {
  const handle = fast.value.issueAs(FastTag);
  handle.reset();
});

bench.add('invalidate: 100 outstanding handles', () => {
  const handles = Array.from({ length: 100 }, () => fast.value.issueAs(FastTag));
  fast.value.invalidateWeakHandles();
  if (handles[0]?.resolve() !== undefined) throw new Error('Invalid');
});

bench.add('erase + recover', () => {
  const recovered = fastHandle.erase().recover(FastTag);
  if (recovered.resolve() !== fast.value) throw new Error('Invalid');
});

bench.add('HandleSet: add + has x1000', () => {
  const set = new HandleSet();
  for (const owner of population) set.add(owner.value.asWeakHandle());
  for (const owner of population) {
    if (!set.has(owner.value.asWeakHandle())) throw new Error('Invalid');
  }
  set.clear();
});

// ==================== Run Benchmark ====================

await bench.run();

console.log('\n' + '='.repeat(80));
console.log('Handle Resolution Performance Results');
console.log('='.repeat(80) + '\n');

console.table(
  bench.tasks.map((task) => ({
    'Test Case': task.name,
    'ops/sec': task.result?.period
      ? `${(1000 / task.result.period).toLocaleString('en-US', { maximumFractionDigits: 0 })}`
      : 'N/A',
    'avg (ms)': task.result?.period ? task.result.period.toFixed(4) : 'N/A',
    hz: task.result?.hz ? task.result.hz.toFixed(2) : 'N/A',
  }))
);

const baseline = bench.tasks.find((t) => t.name === 'baseline: direct access');
const checkedTask = bench.tasks.find((t) => t.name === 'resolve: checked affinity');
const permissiveTask = bench.tasks.find((t) => t.name === 'resolve: permissive affinity');

if (baseline?.result?.period && checkedTask?.result?.period && permissiveTask?.result?.period) {
  const checkedCost = ((checkedTask.result.period - baseline.result.period) * 1000000).toFixed(2);
  const permissiveCost = ((permissiveTask.result.period - baseline.result.period) * 1000000).toFixed(2);
  console.log(`\nresolve() overhead: ${checkedCost}ns checked, ${permissiveCost}ns permissive`);
}
