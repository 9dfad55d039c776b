import type { ChunkerConfig } from '../config.js';

export type SizeTierName = 'tiny' | 'small' | 'medium' | 'large';

export interface SizeTier {
  readonly name: SizeTierName;
  /** Inclusive lower bound on content length. */
  readonly minChars: number;
  /** Exclusive upper bound; `Infinity` for the last tier. */
  readonly maxChars: number;
  /** Target fragment size, or `null` when the content is never split. */
  readonly chunkSize: number | null;
  readonly chunkOverlap: number;
}

export function buildSizeTiers(config: ChunkerConfig): readonly SizeTier[] {
  const tiers: SizeTier[] = [
    { name: 'tiny', minChars: 0, maxChars: config.tinyMaxChars, chunkSize: null, chunkOverlap: 0 },
    { name: 'small', minChars: config.tinyMaxChars, maxChars: config.smallMaxChars, chunkSize: config.chunkSizeSmall, chunkOverlap: 0 },
    { name: 'medium', minChars: config.smallMaxChars, maxChars: config.mediumMaxChars, chunkSize: config.chunkSizeMedium, chunkOverlap: 0 },
    { name: 'large', minChars: config.mediumMaxChars, maxChars: Infinity, chunkSize: config.chunkSizeLarge, chunkOverlap: 0 },
  ];
  return Object.freeze(tiers.map(t => Object.freeze(t)));
}

export function selectSizeTier(length: number, tiers: readonly SizeTier[]): SizeTier | undefined {
  return tiers.find(t => length >= t.minChars && length < t.maxChars);
}
