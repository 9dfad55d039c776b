// Line-anchored signature patterns for Java-like sources. These only locate
// boundaries; members without an access modifier (package-private methods,
// most constructors) are not recognised.

const DECLARATION =
  /^\s*(?:public\s+|private\s+|protected\s+)?(?:abstract\s+|final\s+|static\s+)?(?:class|interface|enum|record)\s+\w+/m;

const MEMBER_SIGNATURE =
  /^\s*(?:public|private|protected)\s+(?:static\s+)?(?:final\s+)?(?:synchronized\s+)?[\w<>[\],\s]+\s+\w+\s*\([^)]*\)\s*(?:throws\s+[\w\s,]+)?\s*\{/m;

// Signature head only (no body brace required), used for the applicability count.
const MEMBER_HEAD =
  /^\s*(?:public|private|protected)\s+(?:static\s+)?[\w<>[\],\s]+\s+\w+\s*\(/gm;

export interface MemberMatch {
  /** Absolute offset where the match starts (may include leading blank lines). */
  start: number;
  /** Absolute offset of the body's opening `{`. */
  braceIndex: number;
}

/** Offset of the first class/interface/enum/record declaration, or -1. */
export function findDeclarationStart(text: string): number {
  const match = DECLARATION.exec(text);
  return match ? match.index : -1;
}

/**
 * Next member signature at or after `fromOffset`. The search runs on the
 * remainder of the text, so `fromOffset` itself counts as a line start.
 */
export function findNextMember(text: string, fromOffset: number): MemberMatch | undefined {
  const match = MEMBER_SIGNATURE.exec(text.slice(fromOffset));
  if (!match) return undefined;
  const start = fromOffset + match.index;
  return { start, braceIndex: start + match[0].length - 1 };
}

export function findFirstMemberStart(text: string, fromOffset: number): number {
  return findNextMember(text, fromOffset)?.start ?? -1;
}

export function countMemberSignatures(text: string): number {
  return text.match(MEMBER_HEAD)?.length ?? 0;
}
