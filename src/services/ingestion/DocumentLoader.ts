import { readFile } from 'fs/promises';
import { basename, extname } from 'path';
import * as XLSX from 'xlsx';
import pdfParse from 'pdf-parse/lib/pdf-parse.js';
import { logger } from '../../utils/logger.js';
import { DocumentUnreadableError } from '../../utils/errors.js';
import type { RawSegment } from '../chunking/types.js';

export type DocumentSource =
  | { filePath: string; fileName?: string }
  | { buffer: Buffer; fileName: string };

const PAGE_BREAK = '\f';

/**
 * Sheet row of a `sheet_to_json` object, counted from the header row as 0.
 * Blank rows are left out of the output but still counted here.
 */
const sheetRowNumber = (row: Record<string, unknown>, fallback: number): number => {
  const rowNum = row.__rowNum__;
  return typeof rowNum === 'number' ? rowNum : fallback;
};

/**
 * Turns a document into ordered raw segments: one per spreadsheet row, one
 * per PDF page, one per form-feed separated page of a text file.
 */
export class DocumentLoader {
  async load(source: DocumentSource): Promise<RawSegment[]> {
    const fileName = 'buffer' in source ? source.fileName : source.fileName ?? basename(source.filePath);

    let buffer: Buffer;
    if ('buffer' in source) {
      buffer = source.buffer;
    } else {
      try {
        buffer = await readFile(source.filePath);
      } catch (error) {
        logger.error({ error, filePath: source.filePath }, 'Failed to read document');
        throw new DocumentUnreadableError(`Cannot read document: ${fileName}`, error);
      }
    }

    const segments = await this.parse(buffer, fileName);
    logger.info({ fileName, segments: segments.length, size: buffer.length }, 'Loaded document');
    return segments;
  }

  private async parse(buffer: Buffer, fileName: string): Promise<RawSegment[]> {
    switch (extname(fileName).toLowerCase()) {
      case '.csv':
      case '.xlsx':
      case '.xls':
        return this.parseSpreadsheet(buffer, fileName);
      case '.pdf':
        return this.parsePdf(buffer, fileName);
      default:
        return this.parseText(buffer, fileName);
    }
  }

  private parseSpreadsheet(buffer: Buffer, fileName: string): RawSegment[] {
    try {
      const workbook = extname(fileName).toLowerCase() === '.csv'
        ? XLSX.read(buffer.toString('utf-8'), { type: 'string', raw: true })
        : XLSX.read(buffer, { type: 'buffer' });

      const segments: RawSegment[] = [];
      for (const sheetName of workbook.SheetNames) {
        const rows = XLSX.utils.sheet_to_json<Record<string, unknown>>(workbook.Sheets[sheetName], {
          defval: '',
          raw: false,
        });

        rows.forEach((row, rowIndex) => {
          const lines = Object.entries(row)
            .map(([column, value]) => [column, String(value).trim()] as const)
            .filter(([, value]) => value.length > 0)
            .map(([column, value]) => `${column}: ${value}`);

          if (lines.length === 0) return;

          segments.push({
            text: lines.join('\n'),
            sourceMetadata: { source: fileName, sheet: sheetName, row: String(sheetRowNumber(row, rowIndex + 1)) },
          });
        });
      }

      logger.debug({ fileName, sheetCount: workbook.SheetNames.length, rows: segments.length }, 'Parsed spreadsheet');
      return segments;
    } catch (error) {
      logger.error({ error, fileName }, 'Spreadsheet processing failed');
      throw new DocumentUnreadableError(`Failed to parse spreadsheet: ${fileName}`, error);
    }
  }

  private async parsePdf(buffer: Buffer, fileName: string): Promise<RawSegment[]> {
    const pages: string[] = [];

    try {
      const result = await pdfParse(buffer, {
        pagerender: async pageData => {
          const content = await pageData.getTextContent({ normalizeWhitespace: false });
          const text = content.items.map(item => item.str ?? '').join(' ');
          pages.push(text);
          return text;
        },
      });

      logger.debug({ fileName, pageCount: result.numpages }, 'Parsed PDF');
    } catch (error) {
      logger.error({ error, fileName }, 'PDF processing failed');
      throw new DocumentUnreadableError(`Failed to parse PDF: ${fileName}`, error);
    }

    return this.toPageSegments(pages, fileName);
  }

  private parseText(buffer: Buffer, fileName: string): RawSegment[] {
    const content = buffer.toString('utf-8');
    if (content.includes('\u0000')) {
      throw new DocumentUnreadableError(`Binary content in text document: ${fileName}`);
    }
    return this.toPageSegments(content.split(PAGE_BREAK), fileName);
  }

  private toPageSegments(pages: string[], fileName: string): RawSegment[] {
    const segments: RawSegment[] = [];
    pages.forEach((text, pageIndex) => {
      if (text.trim().length === 0) {
        logger.debug({ fileName, page: pageIndex + 1 }, 'Skipping empty page');
        return;
      }
      segments.push({ text, sourceMetadata: { source: fileName, page: String(pageIndex + 1) } });
    });
    return segments;
  }
}
