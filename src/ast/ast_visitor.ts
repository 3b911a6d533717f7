import type {
  Block,
  Declaration,
  Expression,
  ParamGroup,
  Program,
  Statement,
  TypeNode,
} from '../types.js';

/**
 * Read-only syntax tree visitor.
 *
 * - Entry points: visitProgram / visitDeclaration / visitBlock / visitStatement / visitExpression
 * - The default implementation recurses depth-first; subclasses override a
 *   visit method and call super to keep descending.
 */
export interface AstVisitor<Ctx, R = void> {
  visitProgram(p: Program, ctx: Ctx): R;
  visitDeclaration(d: Declaration, ctx: Ctx): R;
  visitBlock(b: Block, ctx: Ctx): R;
  visitStatement(s: Statement, ctx: Ctx): R;
  visitExpression(e: Expression, ctx: Ctx): R;
  visitType?(t: TypeNode, ctx: Ctx): R;
}

export class DefaultAstVisitor<Ctx> implements AstVisitor<Ctx, void> {
  visitProgram(p: Program, ctx: Ctx): void {
    for (const d of p.decls) this.visitDeclaration(d, ctx);
    this.visitBlock(p.body, ctx);
  }

  visitDeclaration(d: Declaration, ctx: Ctx): void {
    switch (d.kind) {
      case 'VarDecl':
      case 'TypeDecl':
        this.visitType(d.type, ctx);
        return;
      case 'ConstDecl':
        this.visitExpression(d.value, ctx);
        return;
      case 'ProcedureDecl':
        for (const p of d.params) this.visitParamGroup(p, ctx);
        for (const inner of d.decls) this.visitDeclaration(inner, ctx);
        this.visitBlock(d.body, ctx);
        return;
      case 'FunctionDecl':
        for (const p of d.params) this.visitParamGroup(p, ctx);
        this.visitType(d.returnType, ctx);
        for (const inner of d.decls) this.visitDeclaration(inner, ctx);
        this.visitBlock(d.body, ctx);
        return;
    }
  }

  visitParamGroup(p: ParamGroup, ctx: Ctx): void {
    this.visitType(p.type, ctx);
  }

  visitType(t: TypeNode, ctx: Ctx): void {
    switch (t.kind) {
      case 'SimpleType':
      case 'NamedType':
        return;
      case 'SubrangeType':
        this.visitExpression(t.lo, ctx);
        this.visitExpression(t.hi, ctx);
        return;
      case 'ArrayType':
        this.visitType(t.range, ctx);
        this.visitType(t.element, ctx);
        return;
    }
  }

  visitBlock(b: Block, ctx: Ctx): void {
    for (const s of b.statements) this.visitStatement(s, ctx);
  }

  visitStatement(s: Statement, ctx: Ctx): void {
    switch (s.kind) {
      case 'CompoundStmt':
        for (const inner of s.statements) this.visitStatement(inner, ctx);
        return;
      case 'Assignment':
        this.visitExpression(s.target, ctx);
        this.visitExpression(s.value, ctx);
        return;
      case 'IfStmt':
        this.visitExpression(s.condition, ctx);
        this.visitStatement(s.then, ctx);
        if (s.else) this.visitStatement(s.else, ctx);
        return;
      case 'WhileStmt':
        this.visitExpression(s.condition, ctx);
        this.visitStatement(s.body, ctx);
        return;
      case 'ForStmt':
        this.visitExpression(s.from, ctx);
        this.visitExpression(s.to, ctx);
        this.visitStatement(s.body, ctx);
        return;
      case 'ProcedureCall':
        for (const a of s.args) this.visitExpression(a, ctx);
        return;
      case 'EmptyStmt':
        return;
    }
  }

  visitExpression(e: Expression, ctx: Ctx): void {
    switch (e.kind) {
      case 'BinaryOp':
        this.visitExpression(e.left, ctx);
        this.visitExpression(e.right, ctx);
        return;
      case 'UnaryOp':
        this.visitExpression(e.operand, ctx);
        return;
      case 'VarRef':
        if (e.index) this.visitExpression(e.index, ctx);
        return;
      case 'FunctionCall':
        for (const a of e.args) this.visitExpression(a, ctx);
        return;
      case 'Literal':
      case 'InvalidExpr':
        return;
    }
  }
}
