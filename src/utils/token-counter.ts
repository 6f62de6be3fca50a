/**
 * Token counter utility
 * Heuristic: 1 token ≈ 4 characters, plus one.
 * Precise: cl100k_base byte-pair encoding, when enabled and loadable.
 */

import { getEncoding } from 'js-tiktoken';

export interface TokenEstimator {
  readonly mode: string;
  estimate(text: string | null | undefined): number;
  /**
   * Largest character length whose estimate is guaranteed to be <= tokens.
   * The budget enforcer truncates against this instead of retrying.
   */
  maxCharsFor(tokens: number): number;
}

export interface Tokenizer {
  encode(text: string, allowedSpecial?: string[] | 'all'): number[];
}

export class TokenCounter {
  private static readonly CHARS_PER_TOKEN = 4;
  // A UTF-16 code unit is at most 3 UTF-8 bytes and a BPE token covers at least one byte
  private static readonly MAX_TOKENS_PER_CODE_UNIT = 3;

  /**
   * Estimate tokens for a text string: floor(len / 4) + 1, empty text is 0
   */
  static countText(text: string | null | undefined): number {
    if (!text) {
      return 0;
    }
    return Math.floor(text.length / this.CHARS_PER_TOKEN) + 1;
  }

  static maxCharsFor(tokens: number): number {
    if (!Number.isFinite(tokens) || tokens <= 0) {
      return 0;
    }
    return Math.floor(tokens) * this.CHARS_PER_TOKEN - 1;
  }

  static readonly heuristic: TokenEstimator = {
    mode: 'heuristic',
    estimate: text => TokenCounter.countText(text),
    maxCharsFor: tokens => TokenCounter.maxCharsFor(tokens)
  };

  /**
   * Exact counts from a tokenizer; the character bound assumes the worst case
   */
  static precise(tokenizer: Tokenizer): TokenEstimator {
    return {
      mode: 'precise_cl100k_base',
      estimate: text => (text ? tokenizer.encode(text, 'all').length : 0),
      maxCharsFor: tokens => {
        if (!Number.isFinite(tokens) || tokens <= 0) {
          return 0;
        }
        return Math.floor(tokens / TokenCounter.MAX_TOKENS_PER_CODE_UNIT);
      }
    };
  }
}

/**
 * Pick the estimator for the configured mode. A tokenizer that fails to load
 * leaves the heuristic in place, reported as `heuristic_fallback`.
 */
export function createTokenEstimator(
  precise: boolean,
  loadTokenizer: () => Tokenizer = () => getEncoding('cl100k_base')
): TokenEstimator {
  if (!precise) {
    return TokenCounter.heuristic;
  }
  try {
    return TokenCounter.precise(loadTokenizer());
  } catch (error) {
    console.warn(`Precise token estimator unavailable, using heuristic: ${error instanceof Error ? error.message : String(error)}`);
    return { ...TokenCounter.heuristic, mode: 'heuristic_fallback' };
  }
}
