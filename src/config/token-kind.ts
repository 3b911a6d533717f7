/**
 * @module config/token-kind
 *
 * Language-neutral keyword tags. Every lexicon maps its spellings onto these
 * values, so `begin` and `mulai` both lex to {@link SemanticTokenKind.BEGIN}.
 */

export enum SemanticTokenKind {
  // ============================================================
  // Program structure and declarations
  // ============================================================

  /** "program" */
  PROGRAM = 'PROGRAM',

  /** "var" / "variabel" */
  VAR = 'VAR',

  /** "const" / "konstanta" */
  CONST = 'CONST',

  /** "type" / "tipe" */
  TYPE = 'TYPE',

  /** "procedure" / "prosedur" */
  PROCEDURE = 'PROCEDURE',

  /** "function" / "fungsi" */
  FUNCTION = 'FUNCTION',

  // ============================================================
  // Blocks and control flow
  // ============================================================

  /** "begin" / "mulai" */
  BEGIN = 'BEGIN',

  /** "end" / "selesai" */
  END = 'END',

  /** "if" / "jika" */
  IF = 'IF',

  /** "then" / "maka" */
  THEN = 'THEN',

  /** "else" / "selain_itu" */
  ELSE = 'ELSE',

  /** "while" / "selama" */
  WHILE = 'WHILE',

  /** "do" / "lakukan" */
  DO = 'DO',

  /** "for" / "untuk" */
  FOR = 'FOR',

  /** "to" / "ke" */
  TO = 'TO',

  /** "downto" / "turun_ke" */
  DOWNTO = 'DOWNTO',

  // ============================================================
  // Type constructors
  // ============================================================

  /** "array" / "larik" */
  ARRAY = 'ARRAY',

  /** "of" / "dari" */
  OF = 'OF',

  // ============================================================
  // Word operators
  // ============================================================

  /** "and" / "dan" */
  AND = 'AND',

  /** "or" / "atau" */
  OR = 'OR',

  /** "not" / "tidak" */
  NOT = 'NOT',

  /** "div" / "bagi" */
  DIV = 'DIV',

  /** "mod" */
  MOD = 'MOD',

  // ============================================================
  // Built-in types and literals
  // ============================================================

  INTEGER_TYPE = 'INTEGER_TYPE',
  REAL_TYPE = 'REAL_TYPE',
  BOOLEAN_TYPE = 'BOOLEAN_TYPE',
  CHAR_TYPE = 'CHAR_TYPE',

  /** "true" / "benar" */
  TRUE = 'TRUE',

  /** "false" / "salah" */
  FALSE = 'FALSE',
}

export function getAllSemanticTokenKinds(): SemanticTokenKind[] {
  return Object.values(SemanticTokenKind);
}

export function isSemanticTokenKind(value: string): value is SemanticTokenKind {
  return (Object.values(SemanticTokenKind) as string[]).includes(value);
}

/**
 * Keyword groups, used by the parser's resynchronisation stop sets and by
 * lexicon documentation.
 */
export const SEMANTIC_TOKEN_CATEGORIES = {
  declaration: [
    SemanticTokenKind.PROGRAM,
    SemanticTokenKind.VAR,
    SemanticTokenKind.CONST,
    SemanticTokenKind.TYPE,
    SemanticTokenKind.PROCEDURE,
    SemanticTokenKind.FUNCTION,
  ],
  control: [
    SemanticTokenKind.BEGIN,
    SemanticTokenKind.END,
    SemanticTokenKind.IF,
    SemanticTokenKind.THEN,
    SemanticTokenKind.ELSE,
    SemanticTokenKind.WHILE,
    SemanticTokenKind.DO,
    SemanticTokenKind.FOR,
    SemanticTokenKind.TO,
    SemanticTokenKind.DOWNTO,
  ],
  typeConstruct: [SemanticTokenKind.ARRAY, SemanticTokenKind.OF],
  operator: [
    SemanticTokenKind.AND,
    SemanticTokenKind.OR,
    SemanticTokenKind.NOT,
    SemanticTokenKind.DIV,
    SemanticTokenKind.MOD,
  ],
  primitiveType: [
    SemanticTokenKind.INTEGER_TYPE,
    SemanticTokenKind.REAL_TYPE,
    SemanticTokenKind.BOOLEAN_TYPE,
    SemanticTokenKind.CHAR_TYPE,
  ],
  literal: [SemanticTokenKind.TRUE, SemanticTokenKind.FALSE],
} as const satisfies Record<string, readonly SemanticTokenKind[]>;
