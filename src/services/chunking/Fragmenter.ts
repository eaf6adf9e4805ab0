import { logger } from '../../utils/logger.js';
import { generateId } from '../../utils/uuid.js';
import { InvalidConfigurationError } from '../../utils/errors.js';
import { CharacterMeasure, type TextMeasure } from './TextMeasure.js';
import type { Fragment, FragmenterOptions, RawSegment } from './types.js';

const WHITESPACE_OR_CONTROL = /[\s\p{Cc}]+/gu;

export const normalizeText = (text: string): string =>
  text.replace(WHITESPACE_OR_CONTROL, ' ').trim();

export function validateFragmenterOptions({ chunkSize, chunkOverlap }: FragmenterOptions): void {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new InvalidConfigurationError('chunkSize must be a positive integer', { chunkSize });
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0) {
    throw new InvalidConfigurationError('chunkOverlap must be a non-negative integer', { chunkOverlap });
  }
  if (chunkOverlap >= chunkSize) {
    throw new InvalidConfigurationError('chunkOverlap must be smaller than chunkSize', {
      chunkSize,
      chunkOverlap,
    });
  }
}

/**
 * Splits raw segments into overlapping fixed-size fragments.
 *
 * Each segment is normalized, then walked with a window of `chunkSize` units
 * that advances by `chunkSize - chunkOverlap`. The last window ends at the end
 * of the text, so a segment no longer than `chunkSize` becomes one fragment.
 * Fragments carry the segment metadata plus `fragmentOffset` and
 * `fragmentIndex`.
 */
export class Fragmenter {
  constructor(private measure: TextMeasure = new CharacterMeasure()) {}

  get unit(): TextMeasure['unit'] {
    return this.measure.unit;
  }

  split(segments: readonly RawSegment[], options: FragmenterOptions): Fragment[] {
    validateFragmenterOptions(options);

    const fragments: Fragment[] = [];
    for (const segment of segments) {
      fragments.push(...this.splitSegment(segment, options));
    }

    logger.debug(
      {
        segments: segments.length,
        fragments: fragments.length,
        chunkSize: options.chunkSize,
        chunkOverlap: options.chunkOverlap,
        unit: this.measure.unit,
      },
      'Fragmented segments'
    );

    return fragments;
  }

  private splitSegment(segment: RawSegment, { chunkSize, chunkOverlap }: FragmenterOptions): Fragment[] {
    const normalized = normalizeText(segment.text);
    if (normalized.length === 0) {
      logger.warn({ sourceMetadata: segment.sourceMetadata }, 'Empty segment text, skipping');
      return [];
    }

    const text = this.measure.measure(normalized);
    const step = chunkSize - chunkOverlap;
    const fragments: Fragment[] = [];

    for (let start = 0; ; start += step) {
      const end = Math.min(start + chunkSize, text.length);
      fragments.push(
        Object.freeze({
          id: generateId('frag'),
          text: text.slice(start, end),
          sourceMetadata: Object.freeze({
            ...segment.sourceMetadata,
            fragmentOffset: String(start),
            fragmentIndex: String(fragments.length),
          }),
        })
      );
      if (end >= text.length) break;
    }

    return fragments;
  }
}
