import { ChunkingConfig, validateChunking } from '../utils/config';

// A sentence or line break is only used when it falls past this share of the window
const BREAK_THRESHOLD = 0.7;

export class ChunkingService {
  private chunkSize: number;
  private chunkOverlap: number;

  constructor(config: ChunkingConfig = { chunkSize: 1000, chunkOverlap: 200 }) {
    validateChunking(config.chunkSize, config.chunkOverlap);
    this.chunkSize = config.chunkSize;
    this.chunkOverlap = config.chunkOverlap;
  }

  /**
   * Splits text into overlapping windows of at most `chunkSize` characters,
   * preferring to end a window on the last `.` or newline inside it.
   * Consecutive chunks share `chunkOverlap` characters before trimming.
   */
  chunk(text: string, chunkSize: number = this.chunkSize, chunkOverlap: number = this.chunkOverlap): string[] {
    validateChunking(chunkSize, chunkOverlap);
    if (text.length === 0) {
      return [];
    }

    const chunks: string[] = [];
    let startIndex = 0;

    while (startIndex < text.length) {
      let endIndex = Math.min(startIndex + chunkSize, text.length);

      if (endIndex < text.length) {
        const window = text.substring(startIndex, endIndex);
        const breakPoint = Math.max(window.lastIndexOf('.'), window.lastIndexOf('\n'));
        if (breakPoint > chunkSize * BREAK_THRESHOLD) {
          endIndex = startIndex + breakPoint + 1;
        }
      }

      const chunkText = text.substring(startIndex, endIndex).trim();
      if (chunkText.length > 0) {
        chunks.push(chunkText);
      }

      if (endIndex >= text.length) {
        break;
      }
      startIndex = Math.max(startIndex + 1, endIndex - chunkOverlap);
    }

    return chunks;
  }
}
