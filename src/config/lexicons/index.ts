/**
 * @module config/lexicons
 *
 * Lexicon entry point.
 *
 * ```typescript
 * import { defaultKeywordIndex } from './config/lexicons/index.js';
 *
 * defaultKeywordIndex().get('mulai'); // SemanticTokenKind.BEGIN
 * ```
 */

import { LexiconRegistry as Registry } from './registry.js';
import { buildKeywordIndex } from './types.js';
import type { KeywordIndex } from './types.js';
import { EN as EnglishLexicon } from './en.js';
import { ID as IndonesianLexicon } from './id.js';

export type { Lexicon, LexiconValidationResult, KeywordIndex } from './types.js';

export {
  buildKeywordIndex,
  findSemanticTokenKind,
  isIdentifierShaped,
  spellingOf,
} from './types.js';

export { LexiconRegistry } from './registry.js';
export type { ILexiconRegistry } from './registry.js';

export { EN } from './en.js';
export { ID } from './id.js';

export {
  SemanticTokenKind,
  getAllSemanticTokenKinds,
  isSemanticTokenKind,
  SEMANTIC_TOKEN_CATEGORIES,
} from '../token-kind.js';

/**
 * Register the built-in lexicons. Idempotent.
 */
export function initializeDefaultLexicons(): void {
  if (!Registry.has('en')) {
    Registry.register(EnglishLexicon);
  }
  if (!Registry.has('id')) {
    Registry.register(IndonesianLexicon);
  }
}

let defaultIndex: KeywordIndex | null = null;

/**
 * Keyword index over every registered lexicon, built on first use and shared
 * by all lexer runs afterwards.
 */
export function defaultKeywordIndex(): KeywordIndex {
  if (defaultIndex === null) {
    initializeDefaultLexicons();
    defaultIndex = buildKeywordIndex(Registry.all());
  }
  return defaultIndex;
}
