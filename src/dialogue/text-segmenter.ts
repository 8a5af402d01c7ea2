import { Injectable } from '@nestjs/common';

const SENTENCE_TERMINATOR = /([。！？.!?])/;

interface Piece {
  start: number;
  end: number;
}

/**
 * Bounds text to a backend's request size. Sentences are packed greedily, left to right;
 * a sentence that alone exceeds the limit is cut into limit-sized slices first.
 *
 * Whitespace is trimmed only where a chunk meets a boundary between two sentences, so text
 * without terminators comes back as `ceil(length / maxLength)` slices that join to the input.
 */
@Injectable()
export class TextSegmenter {
  segment(text: string, maxLength: number): string[] {
    if (!Number.isInteger(maxLength) || maxLength < 1) {
      throw new RangeError(`maxLength must be a positive integer, got ${maxLength}`);
    }
    if (text.length <= maxLength) {
      return [text];
    }

    const sentences = this.splitSentences(text);
    const boundaries = new Set(sentences.slice(1).map((sentence) => sentence.start));

    const chunks: Piece[] = [];
    let current: Piece | undefined;
    for (const piece of sentences.flatMap((sentence) => this.hardSplit(sentence, maxLength))) {
      if (current && current.end - current.start + piece.end - piece.start > maxLength) {
        chunks.push(current);
        current = piece;
      } else {
        current = { start: current ? current.start : piece.start, end: piece.end };
      }
    }
    if (current) {
      chunks.push(current);
    }

    const result: string[] = [];
    for (const chunk of chunks) {
      let value = text.slice(chunk.start, chunk.end);
      if (boundaries.has(chunk.start)) {
        value = value.trimStart();
      }
      if (boundaries.has(chunk.end)) {
        value = value.trimEnd();
      }
      // only a boundary trim can empty a chunk
      if (value) {
        result.push(value);
      }
    }
    return result;
  }

  private splitSentences(text: string): Piece[] {
    const parts = text.split(SENTENCE_TERMINATOR);
    const sentences: Piece[] = [];
    let offset = 0;
    for (let i = 0; i < parts.length; i += 2) {
      const length = parts[i].length + (parts[i + 1] ?? '').length;
      if (length) {
        sentences.push({ start: offset, end: offset + length });
        offset += length;
      }
    }
    return sentences;
  }

  private hardSplit(sentence: Piece, maxLength: number): Piece[] {
    const slices: Piece[] = [];
    for (let start = sentence.start; start < sentence.end; start += maxLength) {
      slices.push({ start, end: Math.min(start + maxLength, sentence.end) });
    }
    return slices;
  }
}
