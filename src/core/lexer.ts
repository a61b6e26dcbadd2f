// src/core/lexer.ts
//
// Quill Lexer (Tokenizer)
// -----------------------
// Pull-based scanner: the parser asks for one token at a time via nextToken().
//
// Syntax covered:
// - Comments: // line, /* block */
// - Identifiers: [A-Za-z_][A-Za-z0-9_]*
// - Keywords: fn let if else return
// - Type names: Int Float String Char Bool Void
// - Booleans: true false
// - Numbers: 123, 12.34 (no sign, exponent, separators or radix prefixes)
// - Strings: "..." with escapes \n \t \\ \"
// - Chars: 'c' with the string escapes plus \'
// - Operators: : -> = == != <= >= < > + - * / ! += -= *= /=
// - Punctuation: ( ) { } ; ,
//
// Notes:
// - Whitespace and comments are always skipped.
// - The first malformed input throws a LexError; there is no error token.
// - Columns advance to the next tab stop on '\t', so they are visual columns.

import { LexError } from "../diagnostics/errors";
import { DEFAULT_TAB_SIZE, nextTabStop } from "../diagnostics/format";
import type { Position } from "./ast";

/* =========================================================
   Token Kinds
   ========================================================= */

export enum TokenKind {
  EOF = "EOF",

  // Keywords
  KW_FN = "KW_FN",
  KW_LET = "KW_LET",
  KW_IF = "KW_IF",
  KW_ELSE = "KW_ELSE",
  KW_RETURN = "KW_RETURN",

  // Literals
  IDENTIFIER = "IDENTIFIER",
  INTEGER = "INTEGER",
  FLOAT = "FLOAT",
  STRING = "STRING",
  CHAR = "CHAR",
  BOOL = "BOOL",

  // Primitive type names
  TYPE_INT = "TYPE_INT",
  TYPE_FLOAT = "TYPE_FLOAT",
  TYPE_STRING = "TYPE_STRING",
  TYPE_CHAR = "TYPE_CHAR",
  TYPE_BOOL = "TYPE_BOOL",
  TYPE_VOID = "TYPE_VOID",

  // Operators
  COLON = "COLON", // :
  ARROW = "ARROW", // ->
  ASSIGN = "ASSIGN", // =
  EQ = "EQ", // ==
  NEQ = "NEQ", // !=
  LTE = "LTE", // <=
  GTE = "GTE", // >=
  LT = "LT",
  GT = "GT",
  PLUS = "PLUS",
  MINUS = "MINUS",
  STAR = "STAR",
  SLASH = "SLASH",
  BANG = "BANG", // !
  PLUS_ASSIGN = "PLUS_ASSIGN", // +=
  MINUS_ASSIGN = "MINUS_ASSIGN", // -=
  STAR_ASSIGN = "STAR_ASSIGN", // *=
  SLASH_ASSIGN = "SLASH_ASSIGN", // /=

  // Punctuation
  LPAREN = "LPAREN",
  RPAREN = "RPAREN",
  LBRACE = "LBRACE",
  RBRACE = "RBRACE",
  SEMICOLON = "SEMICOLON",
  COMMA = "COMMA",
}

export const TYPE_TOKEN_KINDS: ReadonlySet<TokenKind> = new Set([
  TokenKind.TYPE_INT,
  TokenKind.TYPE_FLOAT,
  TokenKind.TYPE_STRING,
  TokenKind.TYPE_CHAR,
  TokenKind.TYPE_BOOL,
  TokenKind.TYPE_VOID,
]);

/* =========================================================
   Token Types
   ========================================================= */

export type TokenBase = {
  readonly kind: TokenKind;
  /** Exact source text of the token (quotes and escapes included). */
  readonly lexeme: string;
  readonly line: number;
  readonly col: number;
  /** Position just past the last character. */
  readonly end: Position;
};

export type StringToken = TokenBase & {
  readonly kind: TokenKind.STRING;
  readonly value: string; // unescaped
};

export type CharToken = TokenBase & {
  readonly kind: TokenKind.CHAR;
  readonly value: string; // unescaped, "" for ''
};

export type Token = TokenBase | StringToken | CharToken;

export function isStringToken(t: Token): t is StringToken {
  return t.kind === TokenKind.STRING && "value" in t;
}

export function isCharToken(t: Token): t is CharToken {
  return t.kind === TokenKind.CHAR && "value" in t;
}

/* =========================================================
   Lexer Options
   ========================================================= */

export type LexerOptions = {
  /** Tab stop width used for column tracking and caret rendering. Default: 4 */
  tabSize?: number;
};

export const DEFAULT_LEXER_OPTIONS: Required<LexerOptions> = {
  tabSize: DEFAULT_TAB_SIZE,
};

type Cursor = {
  i: number; // offset
  line: number; // 1-based
  col: number; // 1-based, visual
};

/* =========================================================
   Core Lexer
   ========================================================= */

export class Lexer {
  private readonly src: string;
  private readonly opts: Required<LexerOptions>;

  private i = 0;
  private line = 1;
  private col = 1;

  constructor(source: string, options?: LexerOptions) {
    this.src = source;
    this.opts = { tabSize: options?.tabSize ?? DEFAULT_LEXER_OPTIONS.tabSize };
  }

  /** Consume and return the next token. After end of input, keeps returning EOF. */
  public nextToken(): Token {
    this.skipWhitespaceAndComments();

    const start = this.position();
    if (this.isEOF()) return this.emit(TokenKind.EOF, start);

    const c = this.peek();

    if (c === '"') return this.lexString();
    if (c === "'") return this.lexChar();
    if (isDigit(c)) return this.lexNumber();
    if (isIdentStart(c)) return this.lexIdentifierOrKeyword();

    const op = this.lexOperatorOrPunct();
    if (op) return op;

    throw this.errorAt(`unexpected character '${printable(c)}'`, start);
  }

  /** Return the next token without consuming it. */
  public peekToken(): Token {
    const saved = this.position();
    try {
      return this.nextToken();
    } finally {
      this.restore(saved);
    }
  }

  /* =========================================================
     Basics
     ========================================================= */

  private isEOF(): boolean {
    return this.i >= this.src.length;
  }

  private peek(ahead = 0): string {
    const idx = this.i + ahead;
    if (idx < 0 || idx >= this.src.length) return "\0";
    return this.src[idx];
  }

  private advance(): string {
    const c = this.peek();
    this.i++;

    if (c === "\n") {
      this.line++;
      this.col = 1;
    } else if (c === "\t") {
      this.col = nextTabStop(this.col - 1, this.opts.tabSize) + 1;
    } else {
      this.col++;
    }

    return c;
  }

  private match(expected: string): boolean {
    if (this.isEOF() || this.peek() !== expected) return false;
    this.advance();
    return true;
  }

  private position(): Cursor {
    return { i: this.i, line: this.line, col: this.col };
  }

  private restore(c: Cursor): void {
    this.i = c.i;
    this.line = c.line;
    this.col = c.col;
  }

  private emit(kind: TokenKind, start: Cursor): TokenBase {
    return Object.freeze({
      kind,
      lexeme: this.src.slice(start.i, this.i),
      line: start.line,
      col: start.col,
      end: Object.freeze({ line: this.line, column: this.col }),
    });
  }

  private errorAt(message: string, at: Cursor): LexError {
    return new LexError(message, at.line, at.col, this.lineText(at.i), this.opts.tabSize);
  }

  /** Text of the line containing `offset`, without its newline. */
  private lineText(offset: number): string {
    let start = Math.min(offset, this.src.length);
    while (start > 0 && this.src[start - 1] !== "\n") start--;
    let end = start;
    while (end < this.src.length && this.src[end] !== "\n") end++;
    return this.src.slice(start, end).replace(/\r$/, "");
  }

  /* =========================================================
     Trivia
     ========================================================= */

  private skipWhitespaceAndComments(): void {
    while (!this.isEOF()) {
      const c = this.peek();

      if (c === " " || c === "\t" || c === "\n" || c === "\r") {
        this.advance();
        continue;
      }

      if (c === "/" && this.peek(1) === "/") {
        while (!this.isEOF() && this.peek() !== "\n") this.advance();
        continue;
      }

      if (c === "/" && this.peek(1) === "*") {
        this.skipBlockComment();
        continue;
      }

      return;
    }
  }

  private skipBlockComment(): void {
    // consume "/*"
    this.advance();
    this.advance();

    while (!this.isEOF()) {
      if (this.peek() === "*" && this.peek(1) === "/") {
        this.advance();
        this.advance();
        return;
      }
      this.advance();
    }

    throw this.errorAt("unterminated block comment", this.position());
  }

  /* =========================================================
     Strings / Chars
     ========================================================= */

  private lexString(): StringToken {
    const start = this.position();
    this.advance(); // opening quote

    let value = "";

    while (!this.isEOF()) {
      const c = this.peek();

      if (c === '"') {
        this.advance();
        const tok: StringToken = { ...this.emit(TokenKind.STRING, start), kind: TokenKind.STRING, value };
        return Object.freeze(tok);
      }

      if (c === "\\") {
        value += this.readEscape(false);
        continue;
      }

      value += this.advance();
    }

    throw this.errorAt("unterminated string", start);
  }

  private lexChar(): CharToken {
    const start = this.position();
    this.advance(); // opening quote

    let value = "";

    while (!this.isEOF() && this.peek() !== "\n") {
      const c = this.peek();

      if (c === "'") {
        if ([...value].length > 1) throw this.errorAt("char literal too long", start);
        this.advance();
        const tok: CharToken = { ...this.emit(TokenKind.CHAR, start), kind: TokenKind.CHAR, value };
        return Object.freeze(tok);
      }

      value += c === "\\" ? this.readEscape(true) : this.advance();
    }

    throw this.errorAt("unterminated char literal", start);
  }

  /** Consume a backslash escape and return the character it denotes. */
  private readEscape(inChar: boolean): string {
    const at = this.position();
    this.advance(); // backslash

    // input ends inside the literal; the caller reports it as unterminated
    if (this.isEOF()) return "";

    const decoded = decodeEscape(this.peek(), inChar);
    if (decoded === null) {
      throw this.errorAt("invalid escape sequence", at);
    }

    this.advance();
    return decoded;
  }

  /* =========================================================
     Numbers
     ========================================================= */

  private lexNumber(): TokenBase {
    const start = this.position();

    while (isDigit(this.peek())) this.advance();

    if (this.peek() === "." && isDigit(this.peek(1))) {
      this.advance(); // dot
      while (isDigit(this.peek())) this.advance();
      return this.emit(TokenKind.FLOAT, start);
    }

    return this.emit(TokenKind.INTEGER, start);
  }

  /* =========================================================
     Identifiers / Keywords
     ========================================================= */

  private lexIdentifierOrKeyword(): TokenBase {
    const start = this.position();

    this.advance();
    while (isIdentPart(this.peek())) this.advance();

    const text = this.src.slice(start.i, this.i);
    return this.emit(wordKind(text), start);
  }

  /* =========================================================
     Operators / punctuation
     ========================================================= */

  private lexOperatorOrPunct(): TokenBase | null {
    const start = this.position();
    const c = this.peek();

    const single = PUNCT_KINDS[c];
    if (single) {
      this.advance();
      return this.emit(single, start);
    }

    const rule = OPERATOR_RULES[c];
    if (!rule) return null;

    this.advance();
    for (const [next, kind] of rule.longer) {
      if (this.match(next)) return this.emit(kind, start);
    }
    return this.emit(rule.kind, start);
  }
}

/* =========================================================
   Public helpers
   ========================================================= */

/** Pull every token, EOF included. */
export function tokenize(source: string, options?: LexerOptions): Token[] {
  const lexer = new Lexer(source, options);
  const out: Token[] = [];

  while (true) {
    const tok = lexer.nextToken();
    out.push(tok);
    if (tok.kind === TokenKind.EOF) return out;
  }
}

/* =========================================================
   Tables
   ========================================================= */

const PUNCT_KINDS: Readonly<Record<string, TokenKind | undefined>> = {
  "(": TokenKind.LPAREN,
  ")": TokenKind.RPAREN,
  "{": TokenKind.LBRACE,
  "}": TokenKind.RBRACE,
  ";": TokenKind.SEMICOLON,
  ",": TokenKind.COMMA,
  ":": TokenKind.COLON,
};

type OperatorRule = {
  kind: TokenKind;
  // second characters, tried in order (maximal munch)
  longer: ReadonlyArray<readonly [string, TokenKind]>;
};

const OPERATOR_RULES: Readonly<Record<string, OperatorRule | undefined>> = {
  "-": {
    kind: TokenKind.MINUS,
    longer: [
      [">", TokenKind.ARROW],
      ["=", TokenKind.MINUS_ASSIGN],
    ],
  },
  "+": { kind: TokenKind.PLUS, longer: [["=", TokenKind.PLUS_ASSIGN]] },
  "*": { kind: TokenKind.STAR, longer: [["=", TokenKind.STAR_ASSIGN]] },
  "/": { kind: TokenKind.SLASH, longer: [["=", TokenKind.SLASH_ASSIGN]] },
  "=": { kind: TokenKind.ASSIGN, longer: [["=", TokenKind.EQ]] },
  "!": { kind: TokenKind.BANG, longer: [["=", TokenKind.NEQ]] },
  "<": { kind: TokenKind.LT, longer: [["=", TokenKind.LTE]] },
  ">": { kind: TokenKind.GT, longer: [["=", TokenKind.GTE]] },
};

function wordKind(text: string): TokenKind {
  switch (text) {
    case "fn":
      return TokenKind.KW_FN;
    case "let":
      return TokenKind.KW_LET;
    case "if":
      return TokenKind.KW_IF;
    case "else":
      return TokenKind.KW_ELSE;
    case "return":
      return TokenKind.KW_RETURN;

    case "Int":
      return TokenKind.TYPE_INT;
    case "Float":
      return TokenKind.TYPE_FLOAT;
    case "String":
      return TokenKind.TYPE_STRING;
    case "Char":
      return TokenKind.TYPE_CHAR;
    case "Bool":
      return TokenKind.TYPE_BOOL;
    case "Void":
      return TokenKind.TYPE_VOID;

    case "true":
    case "false":
      return TokenKind.BOOL;

    default:
      return TokenKind.IDENTIFIER;
  }
}

/* =========================================================
   Character utilities
   ========================================================= */

function isDigit(c: string): boolean {
  return c >= "0" && c <= "9";
}

function isIdentStart(c: string): boolean {
  return (c >= "a" && c <= "z") || (c >= "A" && c <= "Z") || c === "_";
}

function isIdentPart(c: string): boolean {
  return isIdentStart(c) || isDigit(c);
}

function decodeEscape(c: string, inChar: boolean): string | null {
  switch (c) {
    case "n":
      return "\n";
    case "t":
      return "\t";
    case "\\":
      return "\\";
    case '"':
      return '"';
    case "'":
      return inChar ? "'" : null;
    default:
      return null;
  }
}

function printable(c: string): string {
  if (c === "\t") return "\\t";
  if (c === "\0") return "\\0";
  return c;
}
