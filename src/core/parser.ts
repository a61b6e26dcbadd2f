// src/core/parser.ts
//
// Quill Parser
// ------------
// Recursive descent over tokens pulled one at a time, from a Lexer or from an
// already-lexed token list.
//
// - One current token (single look-ahead), consumed via advance().
// - Binary operators are a chain of left-associative precedence levels,
//   lowest first: equality, comparison, term, factor, primary.
// - The first error throws a ParseError; there is no recovery and no partial tree.
//
// Exports:
//   - parseSource(source, options?): Program
//   - parseTokens(tokens): Program
//   - Parser class (advanced usage)

import type {
  BinaryOperator,
  Block,
  Expression,
  FunctionDecl,
  LetDecl,
  If,
  Param,
  Position,
  Program,
  Range,
  Return,
  Statement,
  VarType,
} from "./ast";
import { lookupVarType, node } from "./ast";
import { Lexer, TokenKind, TYPE_TOKEN_KINDS, isCharToken, isStringToken } from "./lexer";
import type { LexerOptions, Token } from "./lexer";
import { ParseError } from "../diagnostics/errors";

/* =========================================================
   Public helpers
   ========================================================= */

/** Anything the parser can pull tokens from. Lexer satisfies it. */
export type TokenSource = {
  nextToken(): Token;
};

export function parseSource(source: string, options?: LexerOptions): Program {
  return new Parser(new Lexer(source, options)).parseProgram();
}

/** Parse a token list produced by tokenize(); it must end with EOF. */
export function parseTokens(tokens: readonly Token[]): Program {
  return new Parser(tokenStream(tokens)).parseProgram();
}

function tokenStream(tokens: readonly Token[]): TokenSource {
  const last = tokens.length > 0 ? tokens[tokens.length - 1] : undefined;
  if (last === undefined || last.kind !== TokenKind.EOF) {
    throw new Error("token list must end with EOF");
  }

  let i = 0;
  return {
    // Past the end, keep returning EOF like the lexer does.
    nextToken: () => (i < tokens.length ? tokens[i++] : last),
  };
}

/* =========================================================
   Precedence levels
   ========================================================= */

type Level = {
  operators: ReadonlyMap<TokenKind, BinaryOperator>;
  next: () => Expression;
};

const EQUALITY_OPS: ReadonlyMap<TokenKind, BinaryOperator> = new Map([
  [TokenKind.ASSIGN, "="],
  [TokenKind.EQ, "=="],
  [TokenKind.NEQ, "!="],
]);

const COMPARISON_OPS: ReadonlyMap<TokenKind, BinaryOperator> = new Map([
  [TokenKind.LT, "<"],
  [TokenKind.LTE, "<="],
  [TokenKind.GT, ">"],
  [TokenKind.GTE, ">="],
]);

const TERM_OPS: ReadonlyMap<TokenKind, BinaryOperator> = new Map([
  [TokenKind.PLUS, "+"],
  [TokenKind.MINUS, "-"],
]);

const FACTOR_OPS: ReadonlyMap<TokenKind, BinaryOperator> = new Map([
  [TokenKind.STAR, "*"],
  [TokenKind.SLASH, "/"],
]);

const INT64_MAX = 2n ** 63n - 1n;

/* =========================================================
   Parser
   ========================================================= */

export class Parser {
  private readonly tokens: TokenSource;
  private current: Token;
  private previous: Token;

  constructor(tokens: TokenSource) {
    this.tokens = tokens;
    this.current = tokens.nextToken();
    this.previous = this.current;
  }

  /* =========================================================
     Top-level
     ========================================================= */

  public parseProgram(): Program {
    const start = this.startOf(this.current);
    const functions: FunctionDecl[] = [];

    while (!this.check(TokenKind.EOF)) {
      functions.push(this.parseFunction());
    }

    return node<Program>({
      kind: "Program",
      range: this.span(start, this.current.end),
      functions,
    });
  }

  private parseFunction(): FunctionDecl {
    const fnTok = this.expect(TokenKind.KW_FN, "`fn`");
    const name = this.expectIdentifier("function name");

    this.expect(TokenKind.LPAREN, "`(`");
    const params: Param[] = [];
    if (!this.check(TokenKind.RPAREN)) {
      do {
        params.push(this.parseParam());
      } while (this.match(TokenKind.COMMA));
    }
    this.expect(TokenKind.RPAREN, "`)`");

    this.expect(TokenKind.ARROW, "`->`");
    const returnType = this.parseType("return type");
    const body = this.parseBlock();

    return node<FunctionDecl>({
      kind: "Function",
      range: this.rangeFrom(fnTok),
      name: name.lexeme,
      returnType,
      params,
      body,
    });
  }

  private parseParam(): Param {
    const nameTok = this.expectIdentifier("parameter name");
    this.expect(TokenKind.COLON, "`:`");
    const varType = this.parseType("parameter type");
    return Object.freeze({ name: nameTok.lexeme, varType, range: this.rangeFrom(nameTok) });
  }

  /* =========================================================
     Types
     ========================================================= */

  private parseType(what: string): VarType {
    const tok = this.current;

    if (TYPE_TOKEN_KINDS.has(tok.kind) || tok.kind === TokenKind.IDENTIFIER) {
      const varType = lookupVarType(tok.lexeme);
      if (!varType) throw this.errorAt(tok, `unknown type: ${tok.lexeme}`);
      this.advance();
      return varType;
    }

    throw this.errorAt(tok, `expected ${what}`);
  }

  /* =========================================================
     Statements
     ========================================================= */

  private parseBlock(): Block {
    const open = this.expect(TokenKind.LBRACE, "`{`");
    const statements = this.parseStatementsUntilBrace();

    return node<Block>({
      kind: "Block",
      range: this.rangeFrom(open),
      statements,
    });
  }

  /** `{` already consumed; consumes the closing `}`. */
  private parseStatementsUntilBrace(): Statement[] {
    const statements: Statement[] = [];

    while (!this.check(TokenKind.RBRACE) && !this.check(TokenKind.EOF)) {
      statements.push(this.parseStatement());
    }

    this.expect(TokenKind.RBRACE, "`}`");
    return statements;
  }

  private parseStatement(): Statement {
    const startTok = this.current;
    let stmt: Statement;

    if (this.match(TokenKind.KW_LET)) stmt = this.parseLetDecl(startTok);
    else if (this.match(TokenKind.KW_IF)) stmt = this.parseIfStatement(startTok);
    else if (this.match(TokenKind.KW_RETURN)) stmt = this.parseReturnStatement(startTok);
    else {
      const expression = this.parseExpression();
      const range = this.span(expression.range.start, expression.range.end);
      stmt = node({ kind: "ExpressionStatement", range, expression });
    }

    // The last statement of a block may omit its terminator.
    if (!this.check(TokenKind.RBRACE)) {
      this.expect(TokenKind.SEMICOLON, "`;` after statement");
    }

    return stmt;
  }

  private parseLetDecl(kwTok: Token): LetDecl {
    const nameTok = this.expectIdentifier("variable name");
    this.expect(TokenKind.COLON, "`:`");
    const varType = this.parseType("type name");

    const init = this.match(TokenKind.ASSIGN) ? this.parseExpression() : null;

    return node<LetDecl>({
      kind: "LetDecl",
      range: this.rangeFrom(kwTok),
      name: nameTok.lexeme,
      varType,
      init,
    });
  }

  private parseIfStatement(kwTok: Token): If {
    // No parentheses: the condition runs up to the block's `{`.
    const condition = this.parseExpression();
    const thenBranch = this.parseBlock().statements;

    let elseBranch: readonly Statement[] | null = null;
    if (this.match(TokenKind.KW_ELSE)) {
      elseBranch = this.parseBlock().statements;
    }

    return node<If>({
      kind: "If",
      range: this.rangeFrom(kwTok),
      condition,
      thenBranch,
      elseBranch,
    });
  }

  private parseReturnStatement(kwTok: Token): Return {
    const value = this.parseExpression();
    return node<Return>({ kind: "Return", range: this.rangeFrom(kwTok), value });
  }

  /* =========================================================
     Expressions (left-associative precedence chain)
     ========================================================= */

  private parseExpression(): Expression {
    return this.parseEquality();
  }

  private parseEquality(): Expression {
    return this.parseLeftAssoc({ operators: EQUALITY_OPS, next: () => this.parseComparison() });
  }

  private parseComparison(): Expression {
    return this.parseLeftAssoc({ operators: COMPARISON_OPS, next: () => this.parseTerm() });
  }

  private parseTerm(): Expression {
    return this.parseLeftAssoc({ operators: TERM_OPS, next: () => this.parseFactor() });
  }

  private parseFactor(): Expression {
    return this.parseLeftAssoc({ operators: FACTOR_OPS, next: () => this.parsePrimary() });
  }

  private parseLeftAssoc(level: Level): Expression {
    let left = level.next();

    while (true) {
      const op = level.operators.get(this.current.kind);
      if (op === undefined) return left;

      this.advance();
      const right = level.next();

      left = node({
        kind: "Binary",
        range: this.span(left.range.start, right.range.end),
        op,
        left,
        right,
      });
    }
  }

  private parsePrimary(): Expression {
    const tok = this.current;
    const range = this.rangeOf(tok);

    switch (tok.kind) {
      case TokenKind.INTEGER: {
        const value = BigInt(tok.lexeme);
        if (value > INT64_MAX) throw this.errorAt(tok, "integer literal out of range");
        this.advance();
        return node({ kind: "IntLiteral", range, value });
      }

      case TokenKind.FLOAT:
        this.advance();
        return node({ kind: "FloatLiteral", range, value: Number(tok.lexeme) });

      case TokenKind.STRING:
        this.advance();
        return node({ kind: "StringLiteral", range, value: isStringToken(tok) ? tok.value : tok.lexeme });

      case TokenKind.CHAR: {
        const value = isCharToken(tok) ? tok.value : "";
        if (value.length === 0) throw this.errorAt(tok, "empty char literal");
        this.advance();
        return node({ kind: "CharLiteral", range, value });
      }

      case TokenKind.BOOL:
        this.advance();
        return node({ kind: "BoolLiteral", range, value: tok.lexeme === "true" });

      case TokenKind.IDENTIFIER:
        return this.parseCallOrVariable();

      case TokenKind.LPAREN: {
        this.advance();
        const expr = this.parseExpression();
        this.expect(TokenKind.RPAREN, "`)`");
        return expr;
      }

      case TokenKind.TYPE_VOID:
        this.advance();
        return node({ kind: "VoidLiteral", range });

      default:
        throw this.errorAt(tok, "unexpected token in expression");
    }
  }

  private parseCallOrVariable(): Expression {
    const nameTok = this.advance();

    if (!this.match(TokenKind.LPAREN)) {
      return node({ kind: "Variable", range: this.rangeOf(nameTok), name: nameTok.lexeme });
    }

    const args: Expression[] = [];
    if (!this.check(TokenKind.RPAREN)) {
      do {
        args.push(this.parseExpression());
      } while (this.match(TokenKind.COMMA));
    }
    this.expect(TokenKind.RPAREN, "`)`");

    return node({ kind: "Call", range: this.rangeFrom(nameTok), callee: nameTok.lexeme, args });
  }

  /* =========================================================
     Token plumbing
     ========================================================= */

  /** Consume the current token and return it. */
  private advance(): Token {
    this.previous = this.current;
    this.current = this.tokens.nextToken();
    return this.previous;
  }

  private check(kind: TokenKind): boolean {
    return this.current.kind === kind;
  }

  private match(kind: TokenKind): boolean {
    if (!this.check(kind)) return false;
    this.advance();
    return true;
  }

  private expect(kind: TokenKind, description: string): Token {
    if (this.check(kind)) return this.advance();
    throw this.errorAt(this.current, `expected ${description}`);
  }

  private expectIdentifier(what: string): Token {
    if (this.check(TokenKind.IDENTIFIER)) return this.advance();
    throw this.errorAt(this.current, `expected ${what}`);
  }

  private errorAt(tok: Token, message: string): ParseError {
    return new ParseError(message, tok.line, tok.col);
  }

  /* =========================================================
     Ranges
     ========================================================= */

  private startOf(tok: Token): Position {
    return Object.freeze({ line: tok.line, column: tok.col });
  }

  private rangeOf(tok: Token): Range {
    return this.span(this.startOf(tok), tok.end);
  }

  /** From `first` to the end of the last consumed token. */
  private rangeFrom(first: Token): Range {
    return this.span(this.startOf(first), this.previous.end);
  }

  // Fresh frozen copies: no two nodes (or a node and a token) share a position.
  private span(start: Position, end: Position): Range {
    return Object.freeze({
      start: Object.freeze({ line: start.line, column: start.column }),
      end: Object.freeze({ line: end.line, column: end.column }),
    });
  }
}
