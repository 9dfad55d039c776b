export const CALCULATOR_JAVA = [
  'package com.example;',
  '',
  'import java.util.List;',
  '',
  'public class Calculator {',
  '    private int total;',
  '',
  '    /** Adds a value. */',
  '    public void add(int value) {',
  '        if (value > 0) {',
  '            total += value;',
  '        }',
  '    }',
  '',
  '    // Returns the running total.',
  '    public int getTotal() {',
  '        return total;',
  '    }',
  '}',
  '',
].join('\n');

export const GREETER_JAVA = [
  'public class Greeter {',
  '    public String greet() {',
  '        return "hi";',
  '    }',
  '}',
  '',
].join('\n');

/**
 * Checks that `fragments` are consecutive slices of `original` where only
 * whitespace was dropped between and after them.
 */
export function isLosslessSplit(original: string, fragments: string[]): boolean {
  let cursor = 0;
  for (const fragment of fragments) {
    const at = original.indexOf(fragment, cursor);
    if (at === -1 || original.slice(cursor, at).trim() !== '') return false;
    cursor = at + fragment.length;
  }
  return original.slice(cursor).trim() === '';
}
