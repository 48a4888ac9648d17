/**
 * modelspec — Scanner
 *
 * Matches one token of a requested kind at a cursor. The grammar is
 * context-sensitive about what a token may be (`12` is a name in one place
 * and an integer in another), so the parser asks for a specific kind rather
 * than pulling a fixed token stream. The scanner never owns the cursor:
 * every call is a peek, and the caller decides whether to advance.
 */

/** Fixed keywords and punctuation. */
export const LITERALS = [
  'SNPs',
  'g(',
  'factor(',
  'pow(',
  'ln(',
  'log10(',
  'as',
  '|',
  '~',
  '+',
  '*',
  ',',
  '=',
  '[',
  ']',
  ')',
] as const;

export type Literal = (typeof LITERALS)[number];

export type TokenKind = Literal | 'name' | 'integer' | 'eof';

export interface Token {
  kind: TokenKind;
  text: string;
  /** Offset of the first character, after any skipped whitespace. */
  start: number;
  end: number;
}

const WHITESPACE = /\s*/y;
const NAME = /[A-Za-z0-9_:]+/y;
const INTEGER = /[0-9]+/y;
const NAME_CHAR = /^[A-Za-z0-9_:]$/;

export function isNameChar(ch: string | undefined): boolean {
  return ch !== undefined && NAME_CHAR.test(ch);
}

/** Word-like literals must not run into a following name character. */
function needsNameGuard(literal: Literal): boolean {
  return isNameChar(literal[literal.length - 1]);
}

/** Human-readable form of a token kind, as used in error messages. */
export function describeKind(kind: TokenKind): string {
  switch (kind) {
    case 'name':
      return 'name';
    case 'integer':
      return 'integer';
    case 'eof':
      return 'end of input';
    default:
      return `'${kind}'`;
  }
}

export class Scanner {
  constructor(readonly input: string) {}

  /** Offset of the next non-whitespace character at or after `pos`. */
  skipWhitespace(pos: number): number {
    WHITESPACE.lastIndex = pos;
    WHITESPACE.exec(this.input);
    return WHITESPACE.lastIndex;
  }

  /** Match a token of `kind` at `pos`, or return null without side effects. */
  scan(pos: number, kind: TokenKind): Token | null {
    const start = this.skipWhitespace(pos);

    switch (kind) {
      case 'eof':
        return start >= this.input.length ? { kind, text: '', start, end: start } : null;
      case 'name':
        return this.scanPattern(NAME, start, kind);
      case 'integer':
        return this.scanPattern(INTEGER, start, kind);
      default:
        return this.scanLiteral(kind, start);
    }
  }

  /**
   * Describe the text at `pos` for an error message: a quoted run of name
   * characters, a single quoted character, or "end of input".
   */
  describeAt(pos: number): string {
    const start = this.skipWhitespace(pos);
    if (start >= this.input.length) {
      return describeKind('eof');
    }
    const word = this.scanPattern(NAME, start, 'name');
    return `'${word === null ? this.input[start] : word.text}'`;
  }

  private scanPattern(pattern: RegExp, start: number, kind: TokenKind): Token | null {
    pattern.lastIndex = start;
    const m = pattern.exec(this.input);
    if (m === null) {
      return null;
    }
    return { kind, text: m[0], start, end: start + m[0].length };
  }

  private scanLiteral(literal: Literal, start: number): Token | null {
    if (!this.input.startsWith(literal, start)) {
      return null;
    }
    const end = start + literal.length;
    if (needsNameGuard(literal) && isNameChar(this.input[end])) {
      return null;
    }
    return { kind: literal, text: literal, start, end };
  }
}
