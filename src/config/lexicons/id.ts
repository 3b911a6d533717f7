/**
 * @module config/lexicons/id
 *
 * Indonesian keyword spellings. Built-in type names and `program`/`mod` are
 * shared with English; the lexicons are merged into one keyword index, so a
 * shared spelling simply maps to the same tag twice.
 */

import { SemanticTokenKind } from '../token-kind.js';
import type { Lexicon } from './types.js';

export const ID: Lexicon = {
  id: 'id',
  name: 'Bahasa Indonesia',

  keywords: {
    [SemanticTokenKind.PROGRAM]: ['program'],
    [SemanticTokenKind.VAR]: ['variabel'],
    [SemanticTokenKind.CONST]: ['konstanta'],
    [SemanticTokenKind.TYPE]: ['tipe'],
    [SemanticTokenKind.PROCEDURE]: ['prosedur'],
    [SemanticTokenKind.FUNCTION]: ['fungsi'],

    [SemanticTokenKind.BEGIN]: ['mulai'],
    [SemanticTokenKind.END]: ['selesai'],
    [SemanticTokenKind.IF]: ['jika'],
    [SemanticTokenKind.THEN]: ['maka'],
    [SemanticTokenKind.ELSE]: ['selain_itu'],
    [SemanticTokenKind.WHILE]: ['selama'],
    [SemanticTokenKind.DO]: ['lakukan'],
    [SemanticTokenKind.FOR]: ['untuk'],
    [SemanticTokenKind.TO]: ['ke'],
    [SemanticTokenKind.DOWNTO]: ['turun_ke'],

    [SemanticTokenKind.ARRAY]: ['larik'],
    [SemanticTokenKind.OF]: ['dari'],

    [SemanticTokenKind.AND]: ['dan'],
    [SemanticTokenKind.OR]: ['atau'],
    [SemanticTokenKind.NOT]: ['tidak'],
    [SemanticTokenKind.DIV]: ['bagi'],
    [SemanticTokenKind.MOD]: ['mod'],

    [SemanticTokenKind.INTEGER_TYPE]: ['integer'],
    [SemanticTokenKind.REAL_TYPE]: ['real'],
    [SemanticTokenKind.BOOLEAN_TYPE]: ['boolean'],
    [SemanticTokenKind.CHAR_TYPE]: ['char'],
    [SemanticTokenKind.TRUE]: ['benar'],
    [SemanticTokenKind.FALSE]: ['salah'],
  },
};
