/**
 * @module config/lexicons/en
 *
 * English keyword spellings (classic Pascal-S).
 */

import { SemanticTokenKind } from '../token-kind.js';
import type { Lexicon } from './types.js';

export const EN: Lexicon = {
  id: 'en',
  name: 'English',

  keywords: {
    [SemanticTokenKind.PROGRAM]: ['program'],
    [SemanticTokenKind.VAR]: ['var'],
    [SemanticTokenKind.CONST]: ['const'],
    [SemanticTokenKind.TYPE]: ['type'],
    [SemanticTokenKind.PROCEDURE]: ['procedure'],
    [SemanticTokenKind.FUNCTION]: ['function'],

    [SemanticTokenKind.BEGIN]: ['begin'],
    [SemanticTokenKind.END]: ['end'],
    [SemanticTokenKind.IF]: ['if'],
    [SemanticTokenKind.THEN]: ['then'],
    [SemanticTokenKind.ELSE]: ['else'],
    [SemanticTokenKind.WHILE]: ['while'],
    [SemanticTokenKind.DO]: ['do'],
    [SemanticTokenKind.FOR]: ['for'],
    [SemanticTokenKind.TO]: ['to'],
    [SemanticTokenKind.DOWNTO]: ['downto'],

    [SemanticTokenKind.ARRAY]: ['array'],
    [SemanticTokenKind.OF]: ['of'],

    [SemanticTokenKind.AND]: ['and'],
    [SemanticTokenKind.OR]: ['or'],
    [SemanticTokenKind.NOT]: ['not'],
    [SemanticTokenKind.DIV]: ['div'],
    [SemanticTokenKind.MOD]: ['mod'],

    [SemanticTokenKind.INTEGER_TYPE]: ['integer'],
    [SemanticTokenKind.REAL_TYPE]: ['real'],
    [SemanticTokenKind.BOOLEAN_TYPE]: ['boolean'],
    [SemanticTokenKind.CHAR_TYPE]: ['char'],
    [SemanticTokenKind.TRUE]: ['true'],
    [SemanticTokenKind.FALSE]: ['false'],
  },
};
