import { Injectable } from '@nestjs/common';
import { TextDecoder } from 'util';
import {
  ExtractionError,
  UnsupportedFormatError,
} from '../../common/errors/quiz.errors';

/**
 * Turns an uploaded document into plain text. Binary formats (docx, pdf)
 * are handled by an external service bound to this token.
 */
export abstract class TextExtractor {
  abstract extract(content: Buffer, format: string): Promise<string>;
}

@Injectable()
export class PlainTextExtractor extends TextExtractor {
  private static readonly FORMATS = new Set(['txt', 'text', 'md', 'markdown']);

  // eslint-disable-next-line @typescript-eslint/require-await
  async extract(content: Buffer, format: string): Promise<string> {
    const tag = format.trim().toLowerCase().replace(/^\./, '');
    if (!PlainTextExtractor.FORMATS.has(tag)) {
      throw new UnsupportedFormatError(format);
    }

    try {
      return new TextDecoder('utf-8', { fatal: true }).decode(content);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ExtractionError(reason);
    }
  }
}
