import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { ConfigError } from '../errors.js';
import type { FileRecord } from '../splitter/types.js';

// Each entry is either an extension (leading dot) or an exact file name.
const languageTableSchema = z.record(z.string(), z.array(z.string().min(1)));

type LanguageTable = z.infer<typeof languageTableSchema>;

let cachedTable: LanguageTable | null = null;

function languageTable(): LanguageTable {
  if (cachedTable) return cachedTable;
  const file = new URL('../../data/languages.json', import.meta.url);
  const result = languageTableSchema.safeParse(JSON.parse(fs.readFileSync(file, 'utf-8')));
  if (!result.success) {
    throw new ConfigError(`Invalid language table at ${file.pathname}: ${result.error.message}`);
  }
  cachedTable = result.data;
  return cachedTable;
}

/** Language tag for a repo-relative path, or `'unknown'`. First table entry wins. */
export function detectLanguage(filePath: string): string {
  const lowerPath = filePath.toLowerCase();
  const lowerName = path.posix.basename(filePath).toLowerCase();

  for (const [language, patterns] of Object.entries(languageTable())) {
    for (const pattern of patterns) {
      const matched = pattern.startsWith('.')
        ? lowerPath.endsWith(pattern.toLowerCase())
        : lowerName === pattern.toLowerCase();
      if (matched) return language;
    }
  }
  return 'unknown';
}

/** Dot-prefixed files and anything under a dot-prefixed directory. */
export function isHiddenPath(filePath: string): boolean {
  return filePath.startsWith('.') || filePath.includes('/.');
}

export function toFileRecord(
  filePath: string,
  content: string,
  language: string = detectLanguage(filePath),
): FileRecord {
  return Object.freeze({
    path: filePath,
    content,
    language,
    size: Buffer.byteLength(content, 'utf-8'),
  });
}
