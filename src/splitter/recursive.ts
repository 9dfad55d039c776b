import {
  RecursiveCharacterTextSplitter,
  type SupportedTextSplitterLanguage,
} from '@langchain/textsplitters';
import type { GenericSplitter, GenericSplitOptions } from './types.js';

// Declared language -> LangChain separator set. Languages missing here fall
// back to the language-agnostic hierarchy (blank line, newline, space, char).
const SEPARATOR_LANGUAGES: Record<string, SupportedTextSplitterLanguage> = {
  python: 'python',
  java: 'java',
  javascript: 'js',
  typescript: 'js',
  tsx: 'js',
  go: 'go',
  cpp: 'cpp',
  c: 'cpp',
  html: 'html',
  php: 'php',
  ruby: 'ruby',
  rust: 'rust',
  scala: 'scala',
  swift: 'swift',
  markdown: 'markdown',
  rst: 'rst',
  proto: 'proto',
  sol: 'sol',
  latex: 'latex',
};

export function separatorLanguage(language: string): SupportedTextSplitterLanguage | undefined {
  return SEPARATOR_LANGUAGES[language.toLowerCase()];
}

export function separatorLanguages(): string[] {
  return Object.keys(SEPARATOR_LANGUAGES);
}

export class RecursiveSplitter implements GenericSplitter {
  async split(text: string, options: GenericSplitOptions): Promise<string[]> {
    const params = { chunkSize: options.chunkSize, chunkOverlap: options.chunkOverlap };
    const lang = options.language ? separatorLanguage(options.language) : undefined;

    const splitter = lang
      ? RecursiveCharacterTextSplitter.fromLanguage(lang, params)
      : new RecursiveCharacterTextSplitter(params);

    return splitter.splitText(text);
  }
}
