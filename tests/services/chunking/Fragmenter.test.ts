import { describe, it, expect } from 'vitest';
import { Fragmenter, normalizeText } from '../../../src/services/chunking/Fragmenter.js';
import { InvalidConfigurationError } from '../../../src/utils/errors.js';
import type { Fragment } from '../../../src/services/chunking/types.js';

const reconstruct = (fragments: Fragment[], overlap: number): string =>
  fragments.map((fragment, i) => (i === 0 ? fragment.text : Array.from(fragment.text).slice(overlap).join(''))).join('');

describe('Fragmenter', () => {
  const fragmenter = new Fragmenter();

  it('walks a segment with overlapping windows', () => {
    const fragments = fragmenter.split(
      [{ text: 'abcdefghijklmnopqrstuvwxyz', sourceMetadata: { source: 'alphabet.txt' } }],
      { chunkSize: 10, chunkOverlap: 3 }
    );

    expect(fragments.map(f => f.text)).toEqual(['abcdefghij', 'hijklmnopq', 'opqrstuvwx', 'vwxyz']);
    expect(fragments.map(f => f.sourceMetadata.fragmentOffset)).toEqual(['0', '7', '14', '21']);
    expect(fragments.map(f => f.sourceMetadata.fragmentIndex)).toEqual(['0', '1', '2', '3']);
  });

  it('rebuilds the normalized text from its fragments for any valid size and overlap', () => {
    const text = 'The quick brown fox jumps over the lazy dog near the river bank.';

    for (let chunkSize = 1; chunkSize <= 12; chunkSize++) {
      for (let chunkOverlap = 0; chunkOverlap < chunkSize; chunkOverlap++) {
        const fragments = fragmenter.split([{ text, sourceMetadata: {} }], { chunkSize, chunkOverlap });

        expect(reconstruct(fragments, chunkOverlap)).toBe(text);
        expect(fragments.every(f => Array.from(f.text).length <= chunkSize)).toBe(true);
      }
    }
  });

  it('keeps a segment shorter than chunkSize as a single fragment', () => {
    const fragments = fragmenter.split([{ text: 'Alice works at Acme.', sourceMetadata: { row: '1' } }], {
      chunkSize: 100,
      chunkOverlap: 10,
    });

    expect(fragments).toHaveLength(1);
    expect(fragments[0].text).toBe('Alice works at Acme.');
  });

  it('keeps a segment shorter than the overlap as a single fragment', () => {
    const fragments = fragmenter.split([{ text: 'abc', sourceMetadata: {} }], { chunkSize: 10, chunkOverlap: 5 });

    expect(fragments.map(f => f.text)).toEqual(['abc']);
  });

  it('produces disjoint fragments when overlap is zero', () => {
    const fragments = fragmenter.split([{ text: 'aaaabbbbcc', sourceMetadata: {} }], {
      chunkSize: 4,
      chunkOverlap: 0,
    });

    expect(fragments.map(f => f.text)).toEqual(['aaaa', 'bbbb', 'cc']);
  });

  it('never splits a surrogate pair', () => {
    const fragments = fragmenter.split([{ text: '😀😀😀', sourceMetadata: {} }], { chunkSize: 2, chunkOverlap: 0 });

    expect(fragments.map(f => f.text)).toEqual(['😀😀', '😀']);
  });

  it('collapses whitespace and control characters before splitting', () => {
    const [fragment] = fragmenter.split([{ text: '  Name:\tAlice\t\tRole:\n  Engineer\u0007', sourceMetadata: {} }], {
      chunkSize: 100,
      chunkOverlap: 0,
    });

    expect(fragment.text).toBe('Name: Alice Role: Engineer');
  });

  it('skips segments with no text', () => {
    const fragments = fragmenter.split(
      [
        { text: ' \n\t ', sourceMetadata: { page: '1' } },
        { text: 'content', sourceMetadata: { page: '2' } },
      ],
      { chunkSize: 10, chunkOverlap: 0 }
    );

    expect(fragments).toHaveLength(1);
    expect(fragments[0].sourceMetadata.page).toBe('2');
  });

  it('copies source metadata onto every fragment and freezes it', () => {
    const fragments = fragmenter.split([{ text: 'abcdef', sourceMetadata: { source: 'people.csv', row: '3' } }], {
      chunkSize: 4,
      chunkOverlap: 2,
    });

    expect(fragments[1].sourceMetadata).toEqual({
      source: 'people.csv',
      row: '3',
      fragmentOffset: '2',
      fragmentIndex: '1',
    });
    expect(Object.isFrozen(fragments[1])).toBe(true);
    expect(Object.isFrozen(fragments[1].sourceMetadata)).toBe(true);
  });

  it('assigns distinct ids and repeats the same texts for the same input', () => {
    const segments = [{ text: 'one two three four five six', sourceMetadata: {} }];
    const first = fragmenter.split(segments, { chunkSize: 8, chunkOverlap: 2 });
    const second = fragmenter.split(segments, { chunkSize: 8, chunkOverlap: 2 });

    expect(second.map(f => f.text)).toEqual(first.map(f => f.text));
    expect(new Set([...first, ...second].map(f => f.id)).size).toBe(first.length * 2);
    expect(first[0].id).toMatch(/^frag-/);
  });

  it.each([
    { chunkSize: 10, chunkOverlap: 10 },
    { chunkSize: 10, chunkOverlap: 12 },
    { chunkSize: 0, chunkOverlap: 0 },
    { chunkSize: 10, chunkOverlap: -1 },
    { chunkSize: 2.5, chunkOverlap: 0 },
  ])('rejects chunkSize $chunkSize with overlap $chunkOverlap', options => {
    expect(() => fragmenter.split([{ text: 'text', sourceMetadata: {} }], options)).toThrow(InvalidConfigurationError);
  });
});

describe('normalizeText', () => {
  it('trims and collapses runs to one space', () => {
    expect(normalizeText('\r\n a \u0000\u0001 b\f')).toBe('a b');
  });
});
