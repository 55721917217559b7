/**
 * Character sources the lexer pulls from.
 */

/**
 * Returned by `read()` once the source is exhausted, and on every read after.
 */
export const END_OF_INPUT = "";

/**
 * A source of characters, read one at a time.
 */
export interface CharSource {
  read(): string;
}

/**
 * Reads the characters of a string.
 */
export class StringSource implements CharSource {
  private characters: string[];
  private index = 0;

  constructor(input: string) {
    this.characters = [...input]; // Handle Unicode properly
  }

  read(): string {
    if (this.index >= this.characters.length) {
      return END_OF_INPUT;
    }
    return this.characters[this.index++];
  }
}

/**
 * Reads characters from a sequence of chunks, pulling the next chunk only
 * when the current one is used up. Empty chunks are skipped.
 */
export class ChunkSource implements CharSource {
  private chunks: Iterator<string>;
  private current: string[] = [];
  private index = 0;
  private done = false;
  /** A high surrogate held back from the end of the previous chunk */
  private pending = "";

  constructor(chunks: Iterable<string>) {
    this.chunks = chunks[Symbol.iterator]();
  }

  read(): string {
    while (this.index >= this.current.length) {
      if (this.done) {
        return END_OF_INPUT;
      }
      const next = this.chunks.next();
      let text: string;
      if (next.done) {
        this.done = true;
        text = this.pending;
        this.pending = "";
      } else {
        text = this.pending + next.value;
        this.pending = "";
        if (endsWithHighSurrogate(text)) {
          this.pending = text.slice(-1);
          text = text.slice(0, -1);
        }
      }
      this.current = [...text];
      this.index = 0;
    }
    return this.current[this.index++];
  }
}

function endsWithHighSurrogate(text: string): boolean {
  const last = text.charCodeAt(text.length - 1);
  return last >= 0xd800 && last <= 0xdbff;
}
