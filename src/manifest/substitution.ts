/**
 * Helpers for Compose variable substitution (`$VAR`, `${VAR}`, `${VAR:-default}`).
 *
 * The linter never resolves a substitution. These helpers only locate them so
 * that separators written inside `${...}` are not mistaken for field separators.
 */

import type { UnresolvedValue } from './types';

const SUBSTITUTION_START = /(?:^|[^$])\$(?:\{|[A-Za-z_])/;

/**
 * True when the text references a variable; `$$` escapes do not count
 */
export function containsSubstitution(text: string): boolean {
  return SUBSTITUTION_START.test(text);
}

/**
 * Wrap text that references a variable as an unresolved value
 */
export function unresolved(expression: string): UnresolvedValue {
  return { expression };
}

export function isUnresolved(value: object): value is UnresolvedValue {
  return 'expression' in value;
}

/**
 * Positions of `separator` that sit outside every `${...}` group
 */
function separatorPositions(text: string, separator: string): number[] {
  const positions: number[] = [];
  let depth = 0;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];
    if (char === '$' && text[i + 1] === '$') {
      i++;
    } else if (char === '$' && text[i + 1] === '{') {
      depth++;
      i++;
    } else if (char === '}' && depth > 0) {
      depth--;
    } else if (char === separator && depth === 0) {
      positions.push(i);
    }
  }
  return positions;
}

/**
 * Split on `separator`, leaving separators inside `${...}` in place
 *
 * @example
 * splitOutsideSubstitutions('${DATA:-/srv/db}:/data:rw', ':')
 * // ['${DATA:-/srv/db}', '/data', 'rw']
 */
export function splitOutsideSubstitutions(text: string, separator: string): string[] {
  const parts: string[] = [];
  let start = 0;
  for (const position of separatorPositions(text, separator)) {
    parts.push(text.slice(start, position));
    start = position + 1;
  }
  parts.push(text.slice(start));
  return parts;
}

export function indexOutsideSubstitutions(text: string, separator: string): number {
  return separatorPositions(text, separator)[0] ?? -1;
}

export function lastIndexOutsideSubstitutions(text: string, separator: string): number {
  return separatorPositions(text, separator).at(-1) ?? -1;
}
