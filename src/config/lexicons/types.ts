/**
 * @module config/lexicons/types
 *
 * Lexicon types: one lexicon is one natural-language "skin" of the keyword
 * set. The compiler core only sees {@link SemanticTokenKind} values.
 */

import { SemanticTokenKind } from '../token-kind.js';

/**
 * Keyword spellings of one natural language.
 */
export interface Lexicon {
  /** Unique identifier (e.g. 'en', 'id') */
  readonly id: string;

  /** Human-readable language name */
  readonly name: string;

  /**
   * Keyword spellings. A keyword may have several spellings in one language;
   * the first one is the preferred form used in messages.
   */
  readonly keywords: Readonly<Record<SemanticTokenKind, readonly string[]>>;
}

export interface LexiconValidationResult {
  readonly valid: boolean;
  readonly errors: readonly string[];
  readonly warnings: readonly string[];
}

/**
 * Lower-cased keyword spelling -> keyword tag.
 */
export type KeywordIndex = ReadonlyMap<string, SemanticTokenKind>;

const IDENTIFIER_SHAPE = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function isIdentifierShaped(word: string): boolean {
  return IDENTIFIER_SHAPE.test(word);
}

/**
 * Build a keyword index covering every spelling of every given lexicon.
 *
 * @throws Error when two lexicons give the same spelling to different keywords
 */
export function buildKeywordIndex(lexicons: Iterable<Lexicon>): KeywordIndex {
  const index = new Map<string, SemanticTokenKind>();
  const owners = new Map<string, string>();
  for (const lexicon of lexicons) {
    for (const [kind, spellings] of keywordEntries(lexicon)) {
      for (const spelling of spellings) {
        const lower = spelling.toLowerCase();
        const existing = index.get(lower);
        if (existing !== undefined && existing !== kind) {
          throw new Error(
            `Keyword '${lower}' maps to ${existing} in lexicon '${owners.get(lower)}' and to ${kind} in lexicon '${lexicon.id}'`
          );
        }
        index.set(lower, kind);
        owners.set(lower, lexicon.id);
      }
    }
  }
  return index;
}

/**
 * Look up the keyword tag of a word in one lexicon (case-insensitive).
 */
export function findSemanticTokenKind(lexicon: Lexicon, word: string): SemanticTokenKind | undefined {
  const lower = word.toLowerCase();
  for (const [kind, spellings] of keywordEntries(lexicon)) {
    if (spellings.some(spelling => spelling.toLowerCase() === lower)) {
      return kind;
    }
  }
  return undefined;
}

/**
 * Preferred spelling of a keyword in the given lexicon.
 */
export function spellingOf(lexicon: Lexicon, kind: SemanticTokenKind): string {
  return lexicon.keywords[kind][0] ?? kind.toLowerCase();
}

export function keywordEntries(lexicon: Lexicon): Array<[SemanticTokenKind, readonly string[]]> {
  return Object.values(SemanticTokenKind).map(kind => [kind, lexicon.keywords[kind] ?? []]);
}
