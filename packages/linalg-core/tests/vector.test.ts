import { describe, it, expect } from 'vitest';
import { add, dot, scale, sub } from '../src/vector';
import { SeededRandom } from './utils/random';

describe('add', () => {
  it('adds elementwise', () => {
    expect(add([1, 2, 3], [4, 5, 6])).toEqual({ ok: true, value: [5, 7, 9] });
    expect(add([1, 2, 3, 4, 5], [5, 4, 3, 2, 1])).toEqual({ ok: true, value: [6, 6, 6, 6, 6] });
  });

  it('accepts two empty vectors', () => {
    expect(add([], [])).toEqual({ ok: true, value: [] });
  });

  it('reports both lengths on mismatch', () => {
    expect(add([1, 2, 3], [1, 2])).toEqual({
      ok: false,
      error: {
        kind: 'ShapeMismatch',
        op: 'add',
        reason: 'length',
        expected: 3,
        actual: 2,
        message: 'add: dimension mismatch 3 vs 2',
      },
    });
  });

  it('fails instead of wrapping past the int32 range', () => {
    expect(add([0, 2147483647], [0, 1])).toEqual({
      ok: false,
      error: {
        kind: 'Overflow',
        op: 'add',
        width: 'int32',
        index: 1,
        value: 2147483648,
        message: 'add: 2147483648 at index 1 is outside the int32 range',
      },
    });
  });

  it('widens the range under int53', () => {
    expect(add([2147483647], [1], { width: 'int53' })).toEqual({ ok: true, value: [2147483648] });
  });

  it('rejects non-integer elements', () => {
    const r = add([1, 0.5], [1, 1]);
    expect(r.ok).toBe(false);
    if (!r.ok) {
      expect(r.error).toMatchObject({ kind: 'InvalidElement', operand: 'a', index: [1], value: 0.5 });
      expect(r.error.message).toBe('add: a[1] = 0.5 is not a representable integer');
    }
  });

  it('rejects elements outside the width', () => {
    const r = add([1], [2147483648]);
    expect(r.ok).toBe(false);
    if (!r.ok) expect(r.error).toMatchObject({ kind: 'InvalidElement', operand: 'b', index: [0] });
  });

  it('checks shapes before elements', () => {
    const r = add([NaN], [1, 2]);
    expect(r.ok).toBe(false);
    if (!r.ok) expect(r.error.kind).toBe('ShapeMismatch');
  });

  it('leaves its inputs untouched', () => {
    const a = [1, 2, 3];
    const b = [4, 5, 6];
    const r = add(a, b);
    expect(a).toEqual([1, 2, 3]);
    expect(b).toEqual([4, 5, 6]);
    if (r.ok) expect(r.value).not.toBe(a);
  });
});

describe('sub', () => {
  it('subtracts elementwise', () => {
    expect(sub([1, 2, 3], [4, 5, 6])).toEqual({ ok: true, value: [-3, -3, -3] });
    expect(sub([1, 2], [5, 4])).toEqual({ ok: true, value: [-4, -2] });
  });

  it('uses the same mismatch policy as add', () => {
    const r = sub([1, 2], [1, 2, 3]);
    expect(r.ok).toBe(false);
    if (!r.ok) expect(r.error).toMatchObject({ kind: 'ShapeMismatch', op: 'sub', expected: 2, actual: 3 });
  });

  it('fails below the int32 minimum', () => {
    const r = sub([-2147483648], [1]);
    expect(r.ok).toBe(false);
    if (!r.ok) expect(r.error).toMatchObject({ kind: 'Overflow', index: 0, value: -2147483649 });
  });
});

describe('scale', () => {
  it('multiplies every element', () => {
    expect(scale([1, 2, 3], 2)).toEqual({ ok: true, value: [2, 4, 6] });
    expect(scale([1, 2, 3, 4, 5], 5)).toEqual({ ok: true, value: [5, 10, 15, 20, 25] });
  });

  it('gives plain zeros for k = 0', () => {
    expect(scale([-1, 0, 3], 0)).toEqual({ ok: true, value: [0, 0, 0] });
  });

  it('names the overflowing index', () => {
    expect(scale([1, 1073741824], 2)).toEqual({
      ok: false,
      error: {
        kind: 'Overflow',
        op: 'scale',
        width: 'int32',
        index: 1,
        value: 2147483648,
        message: 'scale: 2147483648 at index 1 is outside the int32 range',
      },
    });
  });

  it('rejects a fractional scalar', () => {
    const r = scale([1, 2], 1.5);
    expect(r.ok).toBe(false);
    if (!r.ok) {
      expect(r.error).toMatchObject({ kind: 'InvalidElement', operand: 'k', index: [], value: 1.5 });
      expect(r.error.message).toBe('scale: k = 1.5 is not a representable integer');
    }
  });

  it('detects overflow beyond 2^53 under int53', () => {
    const r = scale([Number.MAX_SAFE_INTEGER], 2, { width: 'int53' });
    expect(r.ok).toBe(false);
    if (!r.ok) expect(r.error).toMatchObject({ kind: 'Overflow', width: 'int53', index: 0 });
  });
});

describe('dot', () => {
  it('sums products', () => {
    expect(dot([1, 2, 3], [4, 5, 6])).toEqual({ ok: true, value: 32 });
    expect(dot([], [])).toEqual({ ok: true, value: 0 });
  });

  it('fails on a partial sum even when the total would fit', () => {
    const r = dot([2147483647, 1, -1], [1, 1, 1]);
    expect(r.ok).toBe(false);
    if (!r.ok) expect(r.error).toMatchObject({ kind: 'Overflow', op: 'dot', index: 0, value: 2147483648 });
  });
});

describe('vector properties', () => {
  const rng = new SeededRandom(20240601);
  const cases = Array.from({ length: 25 }, (_, i) => {
    const n = i % 6;
    return { a: rng.vector(n), b: rng.vector(n) };
  });

  it('add is commutative', () => {
    for (const { a, b } of cases) {
      expect(add(a, b)).toEqual(add(b, a));
    }
  });

  it('sub undoes add', () => {
    for (const { a, b } of cases) {
      const d = sub(a, b);
      expect(d.ok).toBe(true);
      if (d.ok) expect(add(d.value, b)).toEqual({ ok: true, value: a });
    }
  });

  it('scale by 1 is the identity and by 0 gives zeros', () => {
    for (const { a } of cases) {
      expect(scale(a, 1)).toEqual({ ok: true, value: a });
      expect(scale(a, 0)).toEqual({ ok: true, value: a.map(() => 0) });
    }
  });
});
