/**
 * @module pascals-frontend
 *
 * Lexer and parser for a bilingual (English / Indonesian) Pascal-S dialect.
 *
 * ```
 * source → lex → Token[] → parse → Program + diagnostics
 * ```
 *
 * @example
 * ```typescript
 * import { lex, parse, formatTree } from 'pascals-frontend';
 *
 * const tokens = lex('program halo; mulai writeln(\'hai\') selesai.');
 * const { ast, diagnostics } = parse(tokens);
 * if (ast) console.log(formatTree(ast));
 * ```
 */

// Pipeline
export { tokenize, lex, lexDiagnostics } from './frontend/lexer.js';
export type { LexerOptions, TokenStream } from './frontend/lexer.js';
export { parse } from './parser.js';
export type { ParseResult } from './parser.js';
export { compile, allDiagnostics } from './frontend/pipeline.js';
export type { CompileResult } from './frontend/pipeline.js';

// Lexer automaton
export { CharStream } from './frontend/char-stream.js';
export { runDfa } from './frontend/dfa/engine.js';
export { compileDfaRules, loadDfaTable, defaultDfaTable, DfaRuleError } from './frontend/dfa/rules.js';
export type { DfaTable } from './frontend/dfa/rules.js';

// Tokens and tree
export { TokenKind, isKeyword, isOperator, isDelimiter, describeToken } from './frontend/tokens.js';
export { Node, DefaultAstVisitor, formatTree } from './ast/index.js';
export type { AstVisitor } from './ast/index.js';

// Keywords
export {
  SemanticTokenKind,
  LexiconRegistry,
  EN,
  ID,
  buildKeywordIndex,
  defaultKeywordIndex,
  initializeDefaultLexicons,
} from './config/lexicons/index.js';
export type { Lexicon, KeywordIndex } from './config/lexicons/index.js';

// Diagnostics
export {
  DiagnosticSeverity,
  DiagnosticCode,
  formatDiagnostic,
  hasErrors,
} from './diagnostics/index.js';
export type { Diagnostic, SyntaxError } from './diagnostics/index.js';

export type * from './types.js';
