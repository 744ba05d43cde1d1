/**
 * Text Chunker
 *
 * Splits loaded documents into overlapping chunks by recursive separator
 * splitting: paragraphs first, then lines, then words, then characters.
 */

import * as crypto from 'crypto';
import { ConfigurationError } from '../errors.js';
import type { Chunk, Document } from './types.js';

/**
 * Configuration for the chunker.
 */
export interface ChunkerConfig {
  /** Maximum chunk length in characters */
  chunkSize: number;
  /** Characters repeated from the end of one chunk at the start of the next */
  chunkOverlap: number;
  /** Separators from coarsest to finest; '' means character slicing */
  separators: string[];
}

/**
 * Default chunker configuration.
 */
export const DEFAULT_CHUNKER_CONFIG: ChunkerConfig = {
  chunkSize: 1000,
  chunkOverlap: 200,
  separators: ['\n\n', '\n', ' ', ''],
};

/**
 * Recursive separator chunker for plain text documents.
 */
export class TextChunker {
  private config: ChunkerConfig;

  constructor(config: Partial<ChunkerConfig> = {}) {
    this.config = { ...DEFAULT_CHUNKER_CONFIG, ...config };
    validateChunkerConfig(this.config);
  }

  getConfig(): Readonly<ChunkerConfig> {
    return this.config;
  }

  /**
   * Split documents into chunks, preserving document order and metadata.
   */
  split(documents: Document[]): Chunk[] {
    const chunks: Chunk[] = [];

    for (const document of documents) {
      const texts = this.splitText(document.content);

      texts.forEach(({ text, start }, chunkIndex) => {
        chunks.push({
          id: this.generateId(document.metadata.source, chunkIndex, text),
          content: text,
          metadata: {
            ...document.metadata,
            chunkIndex,
            startIndex: start,
          },
        });
      });
    }

    return chunks;
  }

  /**
   * Split a single text into chunk strings with their start offsets.
   */
  splitText(text: string): Array<{ text: string; start: number }> {
    if (text.length === 0) return [];

    const pieceLimit = this.config.chunkSize - this.config.chunkOverlap;
    const pieces = this.splitRecursive(text, this.config.separators, pieceLimit);
    return this.mergePieces(pieces);
  }

  /**
   * Break text into pieces no longer than `limit`, trying each separator in
   * turn. Concatenating the pieces yields the input unchanged.
   */
  private splitRecursive(text: string, separators: string[], limit: number): string[] {
    if (charLength(text) <= limit) return [text];

    const index = separators.findIndex((sep) => sep === '' || text.includes(sep));
    const separator = index === -1 ? '' : separators[index];
    const remaining = index === -1 ? [] : separators.slice(index + 1);

    if (separator === '') {
      return this.hardSlice(text, limit);
    }

    const pieces: string[] = [];
    for (const part of splitKeepingSeparator(text, separator)) {
      if (charLength(part) <= limit) {
        pieces.push(part);
      } else if (remaining.length > 0) {
        pieces.push(...this.splitRecursive(part, remaining, limit));
      } else {
        pieces.push(...this.hardSlice(part, limit));
      }
    }
    return pieces;
  }

  /**
   * Terminal fallback: fixed-width character slices.
   */
  private hardSlice(text: string, limit: number): string[] {
    const chars = Array.from(text);
    const slices: string[] = [];
    for (let i = 0; i < chars.length; i += limit) {
      slices.push(chars.slice(i, i + limit).join(''));
    }
    return slices;
  }

  /**
   * Greedily merge pieces into chunks. Each emitted chunk seeds the next with
   * its last `chunkOverlap` characters.
   */
  private mergePieces(pieces: string[]): Array<{ text: string; start: number }> {
    const { chunkSize, chunkOverlap } = this.config;
    const chunks: Array<{ text: string; start: number }> = [];

    let current = '';
    let currentLength = 0;
    let currentStart = 0;
    let hasNewText = false;

    for (const piece of pieces) {
      const pieceLength = charLength(piece);
      if (hasNewText && currentLength + pieceLength > chunkSize) {
        chunks.push({ text: current, start: currentStart });
        const carried = chunkOverlap > 0 ? Array.from(current).slice(-chunkOverlap) : [];
        currentStart += currentLength - carried.length;
        current = carried.join('');
        currentLength = carried.length;
        hasNewText = false;
      }
      current += piece;
      currentLength += pieceLength;
      hasNewText = true;
    }

    if (hasNewText) {
      chunks.push({ text: current, start: currentStart });
    }

    return chunks.filter((chunk) => chunk.text.trim().length > 0);
  }

  /**
   * Generate a unique chunk ID.
   */
  private generateId(source: string, chunkIndex: number, content: string): string {
    return crypto
      .createHash('md5')
      .update(`${source}:${chunkIndex}:${content}`)
      .digest('hex')
      .slice(0, 16);
  }
}

/**
 * Length in code points, so astral characters count once and are never cut.
 */
export function charLength(text: string): number {
  return Array.from(text).length;
}

/**
 * Split on a literal separator, keeping it at the start of the following part.
 */
export function splitKeepingSeparator(text: string, separator: string): string[] {
  const [first, ...rest] = text.split(separator);
  return [first, ...rest.map((part) => separator + part)].filter((part) => part.length > 0);
}

/**
 * Validate chunk sizing. Throws ConfigurationError when the sizes cannot
 * produce bounded, overlapping chunks.
 */
export function validateChunkerConfig(config: Pick<ChunkerConfig, 'chunkSize' | 'chunkOverlap' | 'separators'>): void {
  const { chunkSize, chunkOverlap, separators } = config;

  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new ConfigurationError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0) {
    throw new ConfigurationError(`chunkOverlap must be a non-negative integer, got ${chunkOverlap}`);
  }
  if (chunkOverlap >= chunkSize) {
    throw new ConfigurationError(
      `chunkOverlap (${chunkOverlap}) must be smaller than chunkSize (${chunkSize})`
    );
  }
  if (separators.length === 0) {
    throw new ConfigurationError('At least one separator is required');
  }
}
