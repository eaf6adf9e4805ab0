import { describe, it, expect } from 'vitest';
import { BruteForceVectorIndex } from '../../../src/services/vector/BruteForceVectorIndex.js';
import {
  DimensionMismatchError,
  DuplicateFragmentError,
  EmptyIndexError,
  InvalidConfigurationError,
} from '../../../src/utils/errors.js';
import type { NewVectorIndexEntry } from '../../../src/services/vector/VectorIndex.interface.js';

const entry = (id: string, embedding: number[], sourceMetadata: Record<string, string> = {}): NewVectorIndexEntry => ({
  id,
  embedding,
  payload: { id, text: `text of ${id}`, sourceMetadata },
});

describe('BruteForceVectorIndex', () => {
  it('rejects a non-positive or fractional dimension', () => {
    expect(() => new BruteForceVectorIndex(0)).toThrow(InvalidConfigurationError);
    expect(() => new BruteForceVectorIndex(1.5)).toThrow(InvalidConfigurationError);
  });

  it('finds an inserted vector at distance zero', () => {
    const index = new BruteForceVectorIndex(3, 'l2');
    index.insert([entry('x', [1, 0, 0]), entry('y', [0, 1, 0]), entry('z', [0, 0, 1])]);

    const [best] = index.query([0, 1, 0], 1);

    expect(best.fragment.id).toBe('y');
    expect(best.distance).toBe(0);
  });

  it('orders results by ascending distance', () => {
    const index = new BruteForceVectorIndex(2, 'l2');
    index.insert([entry('origin', [0, 0]), entry('far', [3, 4]), entry('near', [1, 0])]);

    const results = index.query([0, 0], 3);

    expect(results.map(r => r.fragment.id)).toEqual(['origin', 'near', 'far']);
    expect(results.map(r => r.distance)).toEqual([0, 1, 25]);
  });

  it('ranks by negated dot product under the dot metric', () => {
    const index = new BruteForceVectorIndex(2, 'dot');
    index.insert([entry('one', [1, 0]), entry('two', [2, 0]), entry('opposite', [-1, 0])]);

    const results = index.query([1, 0], 3);

    expect(results.map(r => r.fragment.id)).toEqual(['two', 'one', 'opposite']);
    expect(results.map(r => r.distance)).toEqual([-2, -1, 1]);
  });

  it('ranks by cosine distance and scores a zero vector as 1', () => {
    const index = new BruteForceVectorIndex(2);
    index.insert([entry('zero', [0, 0]), entry('same', [5, 0]), entry('side', [0, 2])]);

    const results = index.query([1, 0], 3);

    expect(results.map(r => r.fragment.id)).toEqual(['same', 'zero', 'side']);
    expect(results.map(r => r.distance)).toEqual([0, 1, 1]);
  });

  it('returns min(k, size) results', () => {
    const index = new BruteForceVectorIndex(2, 'l2');
    index.insert([entry('a', [0, 0]), entry('b', [1, 1]), entry('c', [2, 2])]);

    expect(index.query([0, 0], 10)).toHaveLength(3);
    expect(index.query([0, 0], 2)).toHaveLength(2);
  });

  it('breaks ties by insertion order', () => {
    const index = new BruteForceVectorIndex(2, 'l2');
    index.insert([entry('first', [1, 1]), entry('second', [1, 1])]);
    index.insert([entry('closer', [0, 0]), entry('third', [1, 1])]);

    expect(index.query([0, 0], 3).map(r => r.fragment.id)).toEqual(['closer', 'first', 'second']);
    expect(index.query([0, 0], 4).map(r => r.fragment.id)).toEqual(['closer', 'first', 'second', 'third']);
  });

  it('returns a non-integer vector first at distance 0 and ties parallel vectors by insertion order', () => {
    const index = new BruteForceVectorIndex(3);
    index.insert([entry('scaled', [2.2, 4.6, 1.4]), entry('other', [0.3, 0.7, 0.11]), entry('self', [1.1, 2.3, 0.7])]);

    const results = index.query([1.1, 2.3, 0.7], 2);

    expect(results.map(r => r.fragment.id)).toEqual(['scaled', 'self']);
    expect(results.map(r => r.distance)).toEqual([0, 0]);
  });

  it('rejects a query of the wrong dimension even when empty', () => {
    const index = new BruteForceVectorIndex(384);

    const error = (() => {
      try {
        index.query([0.1, 0.2, 0.3], 5);
      } catch (e) {
        return e;
      }
    })();

    expect(error).toBeInstanceOf(DimensionMismatchError);
    expect(error).toMatchObject({ expected: 384, actual: 3 });
  });

  it('raises EmptyIndexError when nothing is indexed', () => {
    const index = new BruteForceVectorIndex(2);

    expect(() => index.query([1, 0], 5)).toThrow(EmptyIndexError);
  });

  it('rejects a non-positive k', () => {
    const index = new BruteForceVectorIndex(2);
    index.insert([entry('a', [1, 0])]);

    expect(() => index.query([1, 0], 0)).toThrow(InvalidConfigurationError);
  });

  it('inserts nothing when any entry in the batch is invalid', () => {
    const index = new BruteForceVectorIndex(2);

    expect(() => index.insert([entry('ok', [1, 0]), entry('bad', [1, 0, 0])])).toThrow(DimensionMismatchError);
    expect(() => index.insert([entry('ok', [1, 0]), entry('nan', [Number.NaN, 0])])).toThrow(InvalidConfigurationError);
    expect(index.size).toBe(0);
  });

  it('rejects duplicate ids within a batch and across batches', () => {
    const index = new BruteForceVectorIndex(2);
    index.insert([entry('a', [1, 0])]);

    expect(() => index.insert([entry('b', [0, 1]), entry('a', [1, 1])])).toThrow(DuplicateFragmentError);
    expect(() => index.insert([entry('c', [0, 1]), entry('c', [1, 1])])).toThrow(DuplicateFragmentError);
    expect(index.size).toBe(1);
  });

  it('generates ids when none are supplied', () => {
    const index = new BruteForceVectorIndex(2);

    const ids = index.insert([
      { embedding: [1, 0], payload: { id: 'ignored', text: 'one', sourceMetadata: {} } },
      { embedding: [0, 1], payload: { id: 'ignored', text: 'two', sourceMetadata: {} } },
    ]);

    expect(ids).toHaveLength(2);
    expect(ids[0]).toMatch(/^frag-/);
    expect(ids[0]).not.toBe(ids[1]);
    expect(index.get(ids[1])?.payload).toMatchObject({ id: ids[1], text: 'two' });
  });

  it('stores frozen copies that later mutation of the input cannot reach', () => {
    const index = new BruteForceVectorIndex(2, 'l2');
    const vector = [1, 0];
    const metadata: Record<string, string> = { source: 'a.txt' };
    index.insert([entry('a', vector, metadata)]);

    vector[0] = 99;
    metadata.source = 'changed.txt';

    const stored = index.get('a');
    expect(stored?.embedding).toEqual([1, 0]);
    expect(stored?.payload.embedding).toEqual([1, 0]);
    expect(stored?.payload.sourceMetadata).toEqual({ source: 'a.txt' });
    expect(Object.isFrozen(stored?.payload)).toBe(true);
    expect(index.query([1, 0], 1)[0].distance).toBe(0);
  });

  it('lists entries in insertion order', () => {
    const index = new BruteForceVectorIndex(2);
    index.insert([entry('a', [1, 0]), entry('b', [0, 1])]);
    index.insert([entry('c', [1, 1])]);

    expect(index.entries().map(e => e.id)).toEqual(['a', 'b', 'c']);
    expect(index.get('missing')).toBeUndefined();
  });
});
