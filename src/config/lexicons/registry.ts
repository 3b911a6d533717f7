/**
 * @module config/lexicons/registry
 *
 * Registry of the lexicons the lexer recognises.
 *
 * ```typescript
 * import { LexiconRegistry } from './registry.js';
 *
 * const indonesian = LexiconRegistry.get('id');
 * ```
 */

import type { Lexicon, LexiconValidationResult } from './types.js';
import { isIdentifierShaped, keywordEntries } from './types.js';
import { getAllSemanticTokenKinds } from '../token-kind.js';
import { createLogger } from '../../utils/logger.js';

export interface ILexiconRegistry {
  register(lexicon: Lexicon): void;
  get(id: string): Lexicon | undefined;
  list(): string[];
  has(id: string): boolean;
  /** Every registered lexicon, in registration order */
  all(): Lexicon[];
  validate(lexicon: Lexicon): LexiconValidationResult;
}

const logger = createLogger('lexicons');

class LexiconRegistryImpl implements ILexiconRegistry {
  private lexicons = new Map<string, Lexicon>();

  /**
   * @throws Error if the lexicon fails validation
   */
  register(lexicon: Lexicon): void {
    const validation = this.validate(lexicon);
    if (!validation.valid) {
      throw new Error(`Invalid lexicon '${lexicon.id}': ${validation.errors.join(', ')}`);
    }

    if (validation.warnings.length > 0) {
      logger.warn(`Lexicon '${lexicon.id}' registered with warnings`, {
        warnings: validation.warnings,
      });
    }

    this.lexicons.set(lexicon.id, lexicon);
  }

  get(id: string): Lexicon | undefined {
    return this.lexicons.get(id);
  }

  list(): string[] {
    return Array.from(this.lexicons.keys());
  }

  has(id: string): boolean {
    return this.lexicons.has(id);
  }

  all(): Lexicon[] {
    return Array.from(this.lexicons.values());
  }

  validate(lexicon: Lexicon): LexiconValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (!lexicon.id || !/^[a-z]{2}(-[A-Z]{2})?$/.test(lexicon.id)) {
      warnings.push(`ID '${lexicon.id}' does not follow BCP 47 format (e.g., 'en', 'id')`);
    }

    if (!lexicon.name || lexicon.name.trim() === '') {
      errors.push('Name is required');
    }

    const missing: string[] = [];
    for (const kind of getAllSemanticTokenKinds()) {
      const spellings = lexicon.keywords[kind];
      if (spellings === undefined || spellings.length === 0) {
        missing.push(kind);
      }
    }
    if (missing.length > 0) {
      errors.push(`Missing keywords for: ${missing.join(', ')}`);
    }

    // Spellings must lex as identifiers, otherwise the DFA never produces them
    const seen = new Map<string, string>();
    for (const [kind, spellings] of keywordEntries(lexicon)) {
      for (const spelling of spellings) {
        if (!isIdentifierShaped(spelling)) {
          errors.push(`Keyword '${spelling}' for ${kind} is not a valid identifier`);
          continue;
        }
        const lower = spelling.toLowerCase();
        const owner = seen.get(lower);
        if (owner !== undefined && owner !== kind) {
          errors.push(`Duplicate keyword '${lower}' used by: ${owner}, ${kind}`);
        } else if (owner === kind) {
          warnings.push(`Keyword '${lower}' listed twice for ${kind}`);
        }
        seen.set(lower, kind);
      }
    }

    return {
      valid: errors.length === 0,
      errors,
      warnings,
    };
  }
}

export const LexiconRegistry: ILexiconRegistry = new LexiconRegistryImpl();
