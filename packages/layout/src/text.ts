import type { DocumentParser, ParsedDocument } from './types.js';

/**
 * Parser for documents that are already plain text
 */
export function createPlainTextParser(): DocumentParser {
  return {
    async parse(data: Buffer): Promise<ParsedDocument> {
      const content = data.toString('utf-8').replace(/\r\n/g, '\n');
      const paragraphs = content
        .split(/\n\s*\n/)
        .map((paragraph) => paragraph.trim())
        .filter((paragraph) => paragraph.length > 0);
      const lineCount = content.length === 0 ? 0 : content.split('\n').length;

      return {
        content,
        pages: [{ pageNumber: 1, lineCount }],
        paragraphs,
        raw: { content, paragraphs },
      };
    },
  };
}
