import { Injectable, Logger } from '@nestjs/common';
import * as mammoth from 'mammoth';
import * as officeParser from 'officeparser';
import { ParseError } from '../common/errors';
import { sourceTypeFor, type ParsedDocument } from './document.types';

/**
 * Turns raw bytes into plain text plus structural hints for the chunker.
 * DOCX goes through mammoth, PDF through officeparser; text formats must be valid UTF-8.
 */
@Injectable()
export class DocumentParser {
  private readonly logger = new Logger(DocumentParser.name);

  async parse(documentId: string, bytes: Buffer, contentType: string): Promise<ParsedDocument> {
    const sourceType = sourceTypeFor(contentType);
    if (!sourceType) {
      throw new ParseError(`Unsupported content type: ${contentType}`, documentId);
    }

    switch (sourceType) {
      case 'text':
      case 'markdown':
        return { text: this.decodeUtf8(documentId, bytes), hints: { sourceType } };

      case 'docx': {
        const result = await this.extract(documentId, 'docx', () =>
          mammoth.extractRawText({ buffer: bytes }),
        );
        return { text: result.value, hints: { sourceType } };
      }

      case 'pdf': {
        const text = await this.extract(documentId, 'pdf', () =>
          officeParser.parseOfficeAsync(bytes),
        );
        return { text, hints: { sourceType } };
      }
    }
  }

  private decodeUtf8(documentId: string, bytes: Buffer) {
    try {
      const text = new TextDecoder('utf-8', { fatal: true }).decode(bytes);
      // strip a BOM so offsets start at the first visible character
      return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
    } catch (err) {
      throw new ParseError('Document is not valid UTF-8 text', documentId, err);
    }
  }

  private async extract<T>(documentId: string, kind: string, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (err) {
      this.logger.warn(`Failed to extract ${kind} document ${documentId}: ${String(err)}`);
      throw new ParseError(`Corrupt or unreadable ${kind} document`, documentId, err);
    }
  }
}
