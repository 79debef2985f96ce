/**
 * Document Parser Service
 *
 * Converts the reference documents into plain text for retrieval.
 * The reference set is normally PDF, but Markdown and plain text files are
 * accepted too, so that a document can be replaced by an edited text export.
 */

import { promises as fs } from 'fs';

export type DocumentFormat = 'markdown' | 'text' | 'pdf';

/**
 * Result of parsing a document.
 */
export interface ParseResult {
  content: string;
  metadata: {
    title?: string;
    pageCount?: number;
  };
}

/**
 * Interface for format-specific parsers.
 */
export interface DocumentParser {
  parse(input: Buffer): Promise<ParseResult>;
}

/**
 * Conversion collaborator consumed by the DocumentStore:
 * any backend that yields normalized text for a document path.
 */
export interface DocumentConverter {
  convert(path: string): Promise<string>;
}

/**
 * Collapses runs of blank lines so that paragraphs stay separated by exactly
 * one blank line, which is what keyword retrieval splits on.
 */
function normalizeText(text: string): string {
  return text
    .replace(/\r\n/g, '\n')
    .replace(/[ \t]+\n/g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

export class MarkdownParser implements DocumentParser {
  async parse(input: Buffer): Promise<ParseResult> {
    const text = input.toString('utf-8');

    const titleMatch = text.match(/^#\s+(.+)$/m);
    const title = titleMatch && titleMatch[1] ? titleMatch[1].trim() : undefined;

    const content = normalizeText(
      text
        // Keep alt text of images, drop the link
        .replace(/!\[([^\]]*)\]\([^)]+\)/g, '$1')
        .replace(/^[-*_]{3,}\s*$/gm, '')
    );

    return { content, metadata: { title } };
  }
}

export class PlainTextParser implements DocumentParser {
  async parse(input: Buffer): Promise<ParseResult> {
    const text = input.toString('utf-8');
    const firstLine = text.split('\n').find((line) => line.trim());

    return {
      content: normalizeText(text),
      metadata: { title: firstLine ? firstLine.trim() : undefined },
    };
  }
}

/**
 * Parses PDF documents using the pdf-parse library.
 * Scanned PDFs without a text layer come out empty; the store treats that as
 * a conversion failure.
 */
export class PdfParser implements DocumentParser {
  async parse(input: Buffer): Promise<ParseResult> {
    try {
      // Loaded lazily: the package reads a fixture at import time when it
      // believes it is the main module.
      const pdfParse = await import('pdf-parse');
      const pdf = await pdfParse.default(input);

      return {
        content: normalizeText(pdf.text),
        metadata: {
          pageCount: pdf.numpages,
          title: typeof pdf.info?.Title === 'string' ? pdf.info.Title : undefined,
        },
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      throw new Error(`Failed to parse PDF: ${message}. The file may be corrupted, password-protected, or contain only scanned images.`);
    }
  }
}

const parsers: Record<DocumentFormat, DocumentParser> = {
  markdown: new MarkdownParser(),
  text: new PlainTextParser(),
  pdf: new PdfParser(),
};

export function getParser(format: DocumentFormat): DocumentParser {
  return parsers[format];
}

/**
 * Detects document format from filename extension.
 * Returns undefined if the extension is not supported.
 */
export function detectDocumentFormat(filename: string): DocumentFormat | undefined {
  const ext = filename.toLowerCase().split('.').pop();

  switch (ext) {
    case 'md':
    case 'markdown':
      return 'markdown';
    case 'txt':
      return 'text';
    case 'pdf':
      return 'pdf';
    default:
      return undefined;
  }
}

/**
 * Reads a file from disk and runs the parser matching its extension.
 */
export class FileDocumentConverter implements DocumentConverter {
  async convert(path: string): Promise<string> {
    const format = detectDocumentFormat(path);
    if (!format) {
      throw new Error(`Unsupported document format: ${path}. Supported formats: .pdf, .md, .txt`);
    }

    const buffer = await fs.readFile(path);
    const result = await getParser(format).parse(buffer);

    if (result.content.length === 0) {
      throw new Error(`No text could be extracted from ${path}`);
    }
    return result.content;
  }
}

export function createDocumentConverter(): DocumentConverter {
  return new FileDocumentConverter();
}
