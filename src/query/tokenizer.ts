/**
 * Token counting for packing retrieved context into prompts.
 */
import { get_encoding, type Tiktoken } from 'tiktoken';

export interface TokenCounter {
  count(text: string): number;
  /** Split text into pieces of at most `maxTokens` tokens. */
  split(text: string, maxTokens: number): string[];
}

/**
 * Counts tokens with the cl100k_base encoding.
 */
export class TiktokenCounter implements TokenCounter {
  private encoder: Tiktoken | null = null;
  private readonly decoder = new TextDecoder();

  private get encoding(): Tiktoken {
    if (this.encoder === null) {
      this.encoder = get_encoding('cl100k_base');
    }
    return this.encoder;
  }

  count(text: string): number {
    return this.encoding.encode(text).length;
  }

  split(text: string, maxTokens: number): string[] {
    const tokens = this.encoding.encode(text);
    if (tokens.length <= maxTokens) {
      return [text];
    }

    const pieces: string[] = [];
    for (let start = 0; start < tokens.length; start += maxTokens) {
      pieces.push(this.decoder.decode(this.encoding.decode(tokens.slice(start, start + maxTokens))));
    }
    return pieces;
  }

  /**
   * Release the WASM-backed encoder.
   */
  free(): void {
    this.encoder?.free();
    this.encoder = null;
  }
}

/**
 * Greedily pack texts into as few groups as fit `budget` tokens each.
 * A single text larger than the budget is split first.
 */
export function packTexts(
  texts: string[],
  budget: number,
  counter: TokenCounter,
  separator: string = '\n\n'
): string[] {
  const separatorTokens = counter.count(separator);
  const packs: string[] = [];
  let current: string[] = [];
  let currentTokens = 0;

  for (const text of texts.flatMap((t) => counter.split(t, budget))) {
    const tokens = counter.count(text);
    const joinCost = current.length > 0 ? separatorTokens : 0;

    if (current.length > 0 && currentTokens + joinCost + tokens > budget) {
      packs.push(current.join(separator));
      current = [];
      currentTokens = 0;
    }

    currentTokens += (current.length > 0 ? separatorTokens : 0) + tokens;
    current.push(text);
  }

  if (current.length > 0) {
    packs.push(current.join(separator));
  }

  return packs;
}
