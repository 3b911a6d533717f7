/**
 * @module frontend/dfa/char-class
 *
 * Input alphabet of the lexer automaton. Transitions are keyed by these
 * classes rather than by raw characters.
 */

export const CHAR_CLASSES = [
  'letter',
  'exponent',
  'digit',
  'underscore',
  'whitespace',
  'quote',
  'lbrace',
  'rbrace',
  'lparen',
  'rparen',
  'lbracket',
  'rbracket',
  'star',
  'slash',
  'colon',
  'equals',
  'less',
  'greater',
  'dot',
  'plus',
  'minus',
  'semicolon',
  'comma',
  'other',
] as const;

export type CharClass = (typeof CHAR_CLASSES)[number];

/** Edge keys that match by fallback rather than by class */
export const WILDCARDS = ['any', 'anyExceptNewline'] as const;

export type Wildcard = (typeof WILDCARDS)[number];

const PUNCTUATION: Readonly<Record<string, CharClass>> = {
  "'": 'quote',
  '{': 'lbrace',
  '}': 'rbrace',
  '(': 'lparen',
  ')': 'rparen',
  '[': 'lbracket',
  ']': 'rbracket',
  '*': 'star',
  '/': 'slash',
  ':': 'colon',
  '=': 'equals',
  '<': 'less',
  '>': 'greater',
  '.': 'dot',
  '+': 'plus',
  '-': 'minus',
  ';': 'semicolon',
  ',': 'comma',
  _: 'underscore',
};

export function isCharClass(name: string): name is CharClass {
  return CHAR_CLASSES.some(cls => cls === name);
}

export function isWildcard(name: string): name is Wildcard {
  return WILDCARDS.some(w => w === name);
}

export function isNewline(ch: string): boolean {
  return ch === '\n' || ch === '\r';
}

/**
 * Class of a single UTF-16 code unit. Only ASCII letters count as letters;
 * `e` and `E` are `exponent` so numbers can branch on them.
 */
export function classify(ch: string): CharClass {
  if (ch === 'e' || ch === 'E') return 'exponent';
  if ((ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z')) return 'letter';
  if (ch >= '0' && ch <= '9') return 'digit';
  if (ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r' || ch === '\f' || ch === '\v') {
    return 'whitespace';
  }
  return Object.hasOwn(PUNCTUATION, ch) ? PUNCTUATION[ch] : 'other';
}
