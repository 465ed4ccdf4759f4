import { describe, expect, it } from 'vitest';

import { Sequence } from '../src/core/sequence.js';

describe('Sequence', () => {
  it('defaults to the thread main sequence', () => {
    const main = Sequence.current();

    expect(main).toBe(Sequence.main());
    expect(main.label).toMatch(/^thread-\d+$/);
    expect(main.isCurrent).toBe(true);
  });

  it('labels unnamed sequences by id', () => {
    const a = new Sequence();
    const b = new Sequence('jobs');

    expect(b.id).toBe(a.id + 1);
    expect(a.label).toBe(`sequence-${a.id}`);
    expect(b.label).toBe('jobs');
    expect(String(b)).toBe('jobs');
  });

  it('makes a sequence current inside run()', () => {
    const jobs = new Sequence('jobs');

    const result = jobs.run(() => {
      expect(Sequence.current()).toBe(jobs);
      expect(jobs.isCurrent).toBe(true);
      return 42;
    });

    expect(result).toBe(42);
    expect(jobs.isCurrent).toBe(false);
    expect(Sequence.current()).toBe(Sequence.main());
  });

  it('restores the outer sequence after a nested run()', () => {
    const outer = new Sequence('outer');
    const inner = new Sequence('inner');
    const seen: string[] = [];

    outer.run(() => {
      seen.push(Sequence.current().label);
      inner.run(() => seen.push(Sequence.current().label));
      seen.push(Sequence.current().label);
    });

    expect(seen).toEqual(['outer', 'inner', 'outer']);
  });

  it('stays current across await', async () => {
    const worker = new Sequence('worker');

    const label = await worker.run(async () => {
      await new Promise((resolve) => setTimeout(resolve, 1));
      return Sequence.current().label;
    });

    expect(label).toBe('worker');
  });

  it('keeps concurrent runs apart', async () => {
    const a = new Sequence('a');
    const b = new Sequence('b');
    const tick = () => new Promise((resolve) => setTimeout(resolve, 1));

    const [fromA, fromB] = await Promise.all([
      a.run(async () => {
        await tick();
        return Sequence.current();
      }),
      b.run(async () => {
        await tick();
        return Sequence.current();
      }),
    ]);

    expect(fromA).toBe(a);
    expect(fromB).toBe(b);
  });
});
