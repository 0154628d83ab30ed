/**
 * Synthetic request payloads. Deterministic for a given seed.
 */

import type { RequestBatch } from './types.js';

const ALPHABET = 'abcdefghijklmnopqrstuvwxyz';

/**
 * Small seeded PRNG (mulberry32). Each instance owns its own state.
 */
export class SeededRandom {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  /** Float in [0, 1) */
  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /** Integer in [min, max], both inclusive */
  int(min: number, max: number): number {
    return min + Math.floor(this.next() * (max - min + 1));
  }
}

export class TextGenerator {
  constructor(private random: SeededRandom) {}

  /**
   * Roughly `numTokens` tokens: one word-like token of 3-8 letters per token
   */
  generate(numTokens: number): string {
    const wordsNeeded = Math.max(1, Math.floor(numTokens));
    const words: string[] = [];

    for (let i = 0; i < wordsNeeded; i++) {
      const length = this.random.int(3, 8);
      let word = '';
      for (let j = 0; j < length; j++) {
        word += ALPHABET[this.random.int(0, ALPHABET.length - 1)];
      }
      words.push(word);
    }

    return words.join(' ');
  }

  generateBatches(numRequests: number, batchSize: number, chunkSize: number): RequestBatch[] {
    return Array.from({ length: numRequests }, () =>
      Array.from({ length: batchSize }, () => this.generate(chunkSize))
    );
  }
}
