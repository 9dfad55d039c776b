export interface SymbolContext {
  className?: string;
  functionName?: string;
}

export type LanguageFamily = 'python' | 'ecmascript' | 'jvm' | 'go' | 'rust' | 'c' | 'unrecognized';

type KnownFamily = Exclude<LanguageFamily, 'unrecognized'>;

interface PatternSet {
  classPattern?: RegExp;
  functionPattern?: RegExp;
}

const FAMILY_BY_LANGUAGE: Record<string, KnownFamily> = {
  python: 'python',
  javascript: 'ecmascript',
  typescript: 'ecmascript',
  tsx: 'ecmascript',
  java: 'jvm',
  kotlin: 'jvm',
  c_sharp: 'jvm',
  csharp: 'jvm',
  go: 'go',
  rust: 'rust',
  c: 'c',
  cpp: 'c',
};

// All patterns are line-anchored and global so matchAll can skip past a
// denied keyword to the next candidate.
const PATTERNS: Record<KnownFamily, PatternSet> = {
  python: {
    classPattern: /^class\s+(\w+)/gm,
    functionPattern: /^(?:async\s+)?def\s+(\w+)/gm,
  },
  ecmascript: {
    classPattern: /^(?:export\s+)?class\s+(\w+)/gm,
    functionPattern: /^(?:export\s+)?(?:async\s+)?function\s+(\w+)/gm,
  },
  jvm: {
    classPattern:
      /^(?:public\s+|private\s+|protected\s+)?(?:abstract\s+|final\s+|static\s+)?(?:class|interface|enum)\s+(\w+)/gm,
    functionPattern:
      /^\s*(?:public|private|protected)\s+(?:static\s+)?(?:final\s+)?(?:synchronized\s+)?(?:[\w<>[\],\s]+\s+)?(\w+)\s*\(/gm,
  },
  go: {
    functionPattern: /^func\s+(?:\(\w+\s+\*?\w+\)\s+)?(\w+)/gm,
  },
  rust: {
    classPattern: /^(?:pub\s+)?struct\s+(\w+)/gm,
    functionPattern: /^(?:pub\s+)?fn\s+(\w+)/gm,
  },
  c: {
    classPattern: /^(?:class|struct)\s+(\w+)/gm,
    functionPattern: /^(?:\w+\s+)+(\w+)\s*\([^)]*\)\s*\{/gm,
  },
};

// Control-flow words that can sit where a declaration name is expected.
const KEYWORD_DENYLIST = new Set([
  'return', 'if', 'else', 'for', 'while', 'do', 'switch', 'case',
  'try', 'catch', 'finally', 'throw', 'new', 'sizeof',
]);

export function resolveLanguageFamily(language: string): LanguageFamily {
  return FAMILY_BY_LANGUAGE[language.toLowerCase()] ?? 'unrecognized';
}

function firstIdentifier(text: string, pattern: RegExp | undefined): string | undefined {
  if (!pattern) return undefined;
  for (const match of text.matchAll(pattern)) {
    const name = match[1];
    if (name && !KEYWORD_DENYLIST.has(name)) return name;
  }
  return undefined;
}

/**
 * Best-effort enclosing class and function names for a fragment. Fields that
 * cannot be detected are left out.
 */
export function extractSymbolContext(text: string, language: string): SymbolContext {
  const family = resolveLanguageFamily(language);
  if (family === 'unrecognized') return {};

  const { classPattern, functionPattern } = PATTERNS[family];
  const context: SymbolContext = {};

  try {
    const className = firstIdentifier(text, classPattern);
    const functionName = firstIdentifier(text, functionPattern);
    if (className) context.className = className;
    if (functionName) context.functionName = functionName;
  } catch (err) {
    console.warn(`Symbol extraction failed (${language}): ${err}`);
    return {};
  }

  return context;
}
