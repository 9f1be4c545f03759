import { readFile } from 'fs/promises';
import * as path from 'path';
import pdfParse from 'pdf-parse';
import mammoth from 'mammoth';
import { DocumentHint, DocumentSource, ExtractionResult } from '../types';
import { DocumentNotFoundError, UnreadableDocumentError, errorCode, errorMessage } from '../utils/errors';

const WORDS_PER_PAGE = 500;

type DocumentFormat = 'pdf' | 'docx' | 'text';

export class TextExtractionService implements DocumentSource {
  async extract(filePath: string, hint: DocumentHint = {}): Promise<ExtractionResult> {
    const filename = hint.filename || path.basename(filePath);
    const format = this.detectFormat(filename, hint.mimetype);
    const buffer = await this.readDocument(filePath);

    switch (format) {
      case 'pdf':
        return this.extractFromPDF(buffer, filename);
      case 'docx':
        return this.extractFromDOCX(buffer, filename);
      case 'text':
        return this.extractFromText(buffer);
    }
  }

  async extractText(filePath: string, hint?: DocumentHint): Promise<string> {
    const result = await this.extract(filePath, hint);
    return result.text;
  }

  async extractPageCount(filePath: string, hint?: DocumentHint): Promise<number> {
    const result = await this.extract(filePath, hint);
    return result.pages;
  }

  private detectFormat(filename: string, mimetype?: string): DocumentFormat {
    const lower = filename.toLowerCase();
    if (mimetype === 'application/pdf' || lower.endsWith('.pdf')) {
      return 'pdf';
    }
    if (
      mimetype === 'application/vnd.openxmlformats-officedocument.wordprocessingml.document' ||
      mimetype === 'application/msword' ||
      lower.endsWith('.docx') ||
      lower.endsWith('.doc')
    ) {
      return 'docx';
    }
    if (mimetype === 'text/plain' || lower.endsWith('.txt')) {
      return 'text';
    }
    throw new UnreadableDocumentError(`Unsupported file type: ${mimetype || path.extname(filename) || filename}`);
  }

  private async readDocument(filePath: string): Promise<Buffer> {
    try {
      return await readFile(filePath);
    } catch (error) {
      const code = errorCode(error);
      if (code === 'ENOENT' || code === 'ENOTDIR') {
        throw new DocumentNotFoundError(filePath);
      }
      throw new UnreadableDocumentError(`Failed to read ${filePath}: ${errorMessage(error)}`, error);
    }
  }

  private async extractFromPDF(buffer: Buffer, filename: string): Promise<ExtractionResult> {
    try {
      const data = await pdfParse(buffer);
      return {
        text: data.text.trim(),
        pages: data.numpages
      };
    } catch (error) {
      throw new UnreadableDocumentError(`Failed to extract text from PDF ${filename}: ${errorMessage(error)}`, error);
    }
  }

  private async extractFromDOCX(buffer: Buffer, filename: string): Promise<ExtractionResult> {
    try {
      const result = await mammoth.extractRawText({ buffer });
      return {
        text: result.value.trim(),
        pages: this.estimatePages(result.value)
      };
    } catch (error) {
      throw new UnreadableDocumentError(`Failed to extract text from DOCX ${filename}: ${errorMessage(error)}`, error);
    }
  }

  private extractFromText(buffer: Buffer): ExtractionResult {
    const text = buffer.toString('utf-8');
    return {
      text,
      pages: this.estimatePages(text)
    };
  }

  private estimatePages(text: string): number {
    const wordCount = text.split(/\s+/).filter(Boolean).length;
    return Math.max(1, Math.ceil(wordCount / WORDS_PER_PAGE));
  }
}
