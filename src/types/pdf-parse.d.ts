declare module 'pdf-parse/lib/pdf-parse.js' {
  interface PdfTextItem {
    str?: string;
  }

  interface PdfPageData {
    getTextContent(options?: {
      normalizeWhitespace?: boolean;
      disableCombineTextItems?: boolean;
    }): Promise<{ items: PdfTextItem[] }>;
  }

  interface PdfParseOptions {
    pagerender?: (pageData: PdfPageData) => Promise<string> | string;
    max?: number;
  }

  interface PdfParseResult {
    numpages: number;
    numrender: number;
    text: string;
  }

  function pdfParse(dataBuffer: Buffer, options?: PdfParseOptions): Promise<PdfParseResult>;
  export default pdfParse;
}
