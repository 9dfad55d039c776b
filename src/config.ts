import { z } from 'zod';
import { ConfigError } from './errors.js';

const FALSY_FLAGS = new Set(['false', '0', 'no', 'off']);

const flag = (fallback: boolean) => z.preprocess(
  (val) => typeof val === 'string' ? !FALSY_FLAGS.has(val.trim().toLowerCase()) : val,
  z.boolean().default(fallback),
);

const configSchema = z.object({
  dynamicSizing: flag(true),
  structuralLanguage: z.string().trim().toLowerCase().min(1).default('java'),
  tinyMaxChars: z.coerce.number().int().min(0).default(500),
  smallMaxChars: z.coerce.number().int().min(1).default(2000),
  mediumMaxChars: z.coerce.number().int().min(1).default(10_000),
  chunkSizeSmall: z.coerce.number().int().min(1).default(1000),
  chunkSizeMedium: z.coerce.number().int().min(1).default(1500),
  chunkSizeLarge: z.coerce.number().int().min(1).default(2000),
  collapseRatio: z.coerce.number().min(1).default(1.2),
}).superRefine((cfg, ctx) => {
  if (!(cfg.tinyMaxChars < cfg.smallMaxChars && cfg.smallMaxChars < cfg.mediumMaxChars)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['smallMaxChars'],
      message: 'tier thresholds must be strictly ascending (tiny < small < medium)',
    });
  }
});

export type ChunkerConfig = Readonly<z.infer<typeof configSchema>>;

export const DEFAULT_CHUNKER_CONFIG: ChunkerConfig = Object.freeze(configSchema.parse({}));

let cachedConfig: ChunkerConfig | null = null;

export function parseConfig(raw: Record<string, unknown>): ChunkerConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(i => `  ${i.path.join('.')}: ${i.message}`).join('\n');
    throw new ConfigError(`Invalid configuration:\n${issues}`);
  }
  return Object.freeze(result.data);
}

export function loadConfig(): ChunkerConfig {
  const raw = {
    dynamicSizing: process.env.CHUNK_DYNAMIC_SIZING,
    structuralLanguage: process.env.CHUNK_STRUCTURAL_LANGUAGE || undefined,
    tinyMaxChars: process.env.CHUNK_TINY_MAX_CHARS,
    smallMaxChars: process.env.CHUNK_SMALL_MAX_CHARS,
    mediumMaxChars: process.env.CHUNK_MEDIUM_MAX_CHARS,
    chunkSizeSmall: process.env.CHUNK_SIZE_SMALL,
    chunkSizeMedium: process.env.CHUNK_SIZE_MEDIUM,
    chunkSizeLarge: process.env.CHUNK_SIZE_LARGE,
    collapseRatio: process.env.CHUNK_COLLAPSE_RATIO,
  };

  cachedConfig = parseConfig(raw);
  return cachedConfig;
}

export function getConfig(): ChunkerConfig {
  if (!cachedConfig) {
    return loadConfig();
  }
  return cachedConfig;
}
