/**
 * @module ast
 *
 * Syntax tree constructors, traversal and printing.
 */

export { Node } from './ast.js';
export { DefaultAstVisitor } from './ast_visitor.js';
export type { AstVisitor } from './ast_visitor.js';
export { formatTree, nodeLabel, childrenOf } from './printer.js';
