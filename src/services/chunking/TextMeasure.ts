import { get_encoding, type Tiktoken, type TiktokenEncoding } from 'tiktoken';
import type { TextUnit } from './types.js';

/** Text split into addressable units; offsets and lengths are in those units. */
export interface MeasuredText {
  readonly length: number;
  slice(start: number, end: number): string;
}

export interface TextMeasure {
  readonly unit: TextUnit;
  measure(text: string): MeasuredText;
  count(text: string): number;
  dispose(): void;
}

/** Counts Unicode code points, so surrogate pairs are never split. */
export class CharacterMeasure implements TextMeasure {
  readonly unit = 'characters' as const;

  measure(text: string): MeasuredText {
    const codePoints = Array.from(text);
    return {
      length: codePoints.length,
      slice: (start, end) => codePoints.slice(start, end).join(''),
    };
  }

  count(text: string): number {
    return Array.from(text).length;
  }

  dispose(): void {}
}

/** Byte length of the UTF-8 sequence a lead byte starts. */
const sequenceLength = (lead: number): number => {
  if (lead < 0x80) return 1;
  if (lead >= 0xf0) return 4;
  if (lead >= 0xe0) return 3;
  return 2;
};

const endsOnCharacterBoundary = (bytes: readonly number[]): boolean => {
  let i = 0;
  while (i < bytes.length) i += sequenceLength(bytes[i]);
  return i === bytes.length;
};

/**
 * Counts cl100k tokens. A token that ends inside a multi-byte character is
 * merged with the tokens that complete it, so every unit decodes to whole
 * characters and any slice rebuilds the original text.
 */
export class TokenMeasure implements TextMeasure {
  readonly unit = 'tokens' as const;
  private encoder: Tiktoken;
  private decoder = new TextDecoder();

  constructor(encoding: TiktokenEncoding = 'cl100k_base') {
    this.encoder = get_encoding(encoding);
  }

  measure(text: string): MeasuredText {
    const units = this.units(text);
    return {
      length: units.length,
      slice: (start, end) => units.slice(start, end).join(''),
    };
  }

  count(text: string): number {
    return this.units(text).length;
  }

  dispose(): void {
    this.encoder.free();
  }

  private units(text: string): string[] {
    const units: string[] = [];
    let pending: number[] = [];

    for (const token of this.encoder.encode(text)) {
      pending.push(...this.encoder.decode_single_token_bytes(token));
      if (endsOnCharacterBoundary(pending)) {
        units.push(this.decoder.decode(Uint8Array.from(pending)));
        pending = [];
      }
    }
    if (pending.length > 0) {
      units.push(this.decoder.decode(Uint8Array.from(pending)));
    }

    return units;
  }
}

export const createTextMeasure = (unit: TextUnit): TextMeasure =>
  unit === 'tokens' ? new TokenMeasure() : new CharacterMeasure();
