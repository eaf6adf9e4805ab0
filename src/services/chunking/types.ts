export type SourceMetadata = Readonly<Record<string, string>>;

/** One unit emitted by a document loader: a CSV row, a PDF page, a text file. */
export interface RawSegment {
  readonly text: string;
  readonly sourceMetadata: SourceMetadata;
}

export interface Fragment {
  readonly id: string;
  readonly text: string;
  readonly sourceMetadata: SourceMetadata;
  readonly embedding?: readonly number[];
}

export type TextUnit = 'characters' | 'tokens';

export interface FragmenterOptions {
  chunkSize: number;
  chunkOverlap: number;
}
