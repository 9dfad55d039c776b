import path from 'node:path';

export const CODE_CATEGORY = 'CODE';

/**
 * Category used to partition indexed documents: `'CODE'` for any recognised
 * language, otherwise the lowercase extension with its leading dot (the whole
 * file name, dot-prefixed, when it has no extension).
 */
export function fileCategory(filePath: string, language: string): string {
  if (language !== 'unknown') return CODE_CATEGORY;

  const name = path.posix.basename(filePath).toLowerCase();
  const dot = name.lastIndexOf('.');
  return dot === -1 ? `.${name}` : name.slice(dot);
}
