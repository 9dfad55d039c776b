import { findMatchingBrace } from './brace-matcher.js';
import {
  countMemberSignatures,
  findDeclarationStart,
  findFirstMemberStart,
  findNextMember,
} from './structural-boundaries.js';

const MIN_MEMBER_SIGNATURES = 2;

/**
 * Splits a Java-like source file into a header fragment (package, imports,
 * type declaration, fields) followed by one fragment per method. Comments and
 * blank lines between two methods travel with the method that follows them.
 *
 * Fragments are contiguous slices of the input with trailing whitespace
 * trimmed, so joining them back with the trimmed whitespace restores the file.
 */
export class MethodSplitter {
  constructor(private readonly structuralLanguage: string = 'java') {}

  /**
   * Whether method splitting is worth attempting: the language matches, a type
   * declaration exists and at least two member signatures are present.
   */
  isApplicable(content: string, language: string): boolean {
    if (language.toLowerCase() !== this.structuralLanguage) return false;
    if (findDeclarationStart(content) === -1) return false;
    return countMemberSignatures(content) >= MIN_MEMBER_SIGNATURES;
  }

  split(content: string): string[] {
    const declarationStart = findDeclarationStart(content);
    if (declarationStart === -1) return [content];

    const headerEnd = findFirstMemberStart(content, declarationStart);
    if (headerEnd === -1) return [content];

    const fragments = [content.slice(0, headerEnd).trimEnd()];
    let fragmentStart = headerEnd;
    let lastFragmentStart = 0;
    let consumedAll = false;

    while (fragmentStart < content.length) {
      const member = findNextMember(content, fragmentStart);
      if (!member) break;

      const close = findMatchingBrace(content, member.braceIndex);
      if (close === -1) {
        // Unbalanced body: everything left becomes the last fragment.
        const rest = content.slice(fragmentStart).trimEnd();
        if (rest.trim()) {
          fragments.push(rest);
          lastFragmentStart = fragmentStart;
        }
        consumedAll = true;
        break;
      }

      const fragment = content.slice(fragmentStart, close + 1).trimEnd();
      if (fragment.trim()) {
        fragments.push(fragment);
        lastFragmentStart = fragmentStart;
      }
      fragmentStart = close + 1;
    }

    if (fragments.length <= 1) return [content];

    // Whatever follows the last method (the type's closing brace, trailing
    // members the signature pattern misses) stays attached to it.
    if (!consumedAll && content.slice(fragmentStart).trim()) {
      fragments[fragments.length - 1] = content.slice(lastFragmentStart).trimEnd();
    }

    return fragments;
  }
}
