/**
 * Normalizes extracted text before chunking: line endings, runs of blank
 * lines, repeated spaces, and bare page-number lines left by PDF extraction.
 */
export class TextCleaningService {
  cleanText(text: string): string {
    let cleaned = text;

    cleaned = cleaned.replace(/\r\n/g, '\n');
    cleaned = cleaned.replace(/\r/g, '\n');
    cleaned = cleaned.replace(/\u0000/g, '');
    cleaned = cleaned.replace(/[ \t]+/g, ' ');
    cleaned = cleaned.replace(/^ +| +$/gm, '');

    cleaned = cleaned.replace(/^Page\s+\d+\s+of\s+\d+$/gim, '');
    cleaned = cleaned.replace(/^\d+\s*\/\s*\d+$/gm, '');
    cleaned = cleaned.replace(/^-\s*\d+\s*-$/gm, '');

    cleaned = cleaned.replace(/\n{3,}/g, '\n\n');
    cleaned = cleaned.trim();

    return cleaned;
  }
}
