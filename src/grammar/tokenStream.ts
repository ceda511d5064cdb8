import type { Identifier, QualifiedName } from './ast';
import type { Token } from './tokenizer';

export class ParseError extends Error {
  constructor(message: string, readonly position: number) {
    super(message);
    this.name = 'ParseError';
  }
}

/** Cursor over the comment-free tokens of one statement, with access to the statement's source text. */
export class TokenStream {
  private index = 0;

  constructor(private readonly tokens: Token[], readonly source: string) {}

  get done(): boolean {
    return this.index >= this.tokens.length;
  }

  get position(): number {
    return this.peek()?.start ?? this.source.length;
  }

  peek(offset = 0): Token | undefined {
    return this.tokens[this.index + offset];
  }

  next(): Token {
    const token = this.tokens[this.index];
    if (!token) {
      throw new ParseError('Unexpected end of statement', this.source.length);
    }
    this.index++;
    return token;
  }

  isWord(word: string, offset = 0): boolean {
    const token = this.peek(offset);
    return token?.type === 'word' && token.value.toUpperCase() === word;
  }

  isWords(...words: string[]): boolean {
    return words.every((word, offset) => this.isWord(word, offset));
  }

  /** Consumes the keyword sequence when every word matches, case-insensitively. */
  matchWords(...words: string[]): boolean {
    if (!this.isWords(...words)) return false;
    this.index += words.length;
    return true;
  }

  expectWords(...words: string[]): void {
    if (!this.matchWords(...words)) {
      throw this.error(`Expected ${words.join(' ')}`);
    }
  }

  isPunct(value: string, offset = 0): boolean {
    const token = this.peek(offset);
    return token?.type === 'punct' && token.value === value;
  }

  matchPunct(value: string): boolean {
    if (!this.isPunct(value)) return false;
    this.index++;
    return true;
  }

  expectPunct(value: string): Token {
    if (!this.isPunct(value)) {
      throw this.error(`Expected '${value}'`);
    }
    return this.next();
  }

  isOperator(value: string, offset = 0): boolean {
    const token = this.peek(offset);
    return token?.type === 'operator' && token.value === value;
  }

  matchOperator(value: string): boolean {
    if (!this.isOperator(value)) return false;
    this.index++;
    return true;
  }

  expectString(): string {
    const token = this.peek();
    if (token?.type !== 'string') {
      throw this.error('Expected a string literal');
    }
    this.index++;
    return token.value;
  }

  parseIdentifier(): Identifier {
    const token = this.peek();
    if (token?.type === 'word') {
      this.index++;
      return { name: token.value, quoted: false };
    }
    if (token?.type === 'quoted_identifier') {
      this.index++;
      return { name: token.value, quoted: true };
    }
    throw this.error('Expected an identifier');
  }

  parseQualifiedName(): QualifiedName {
    const parts = [this.parseIdentifier()];
    while (this.matchPunct('.')) {
      parts.push(this.parseIdentifier());
    }
    return { parts };
  }

  /** `( ident, ident, ... )` */
  parseIdentifierList(): Identifier[] {
    this.expectPunct('(');
    const identifiers = [this.parseIdentifier()];
    while (this.matchPunct(',')) {
      identifiers.push(this.parseIdentifier());
    }
    this.expectPunct(')');
    return identifiers;
  }

  /** Consumes a parenthesized group and returns the source text between the outer parentheses. */
  readParenthesized(): string {
    const open = this.expectPunct('(');
    let depth = 1;
    while (depth > 0) {
      const token = this.next();
      if (token.type !== 'punct') continue;
      if (token.value === '(') depth++;
      if (token.value === ')') depth--;
      if (depth === 0) {
        return this.source.slice(open.end, token.start).trim();
      }
    }
    throw this.error('Unbalanced parentheses');
  }

  /**
   * Reads an expression up to a depth-0 `,` or `)`, or a depth-0 word in `stopWords`.
   * The first token is always taken, so `DEFAULT NULL` reads `NULL`.
   */
  readExpression(stopWords: ReadonlySet<string> = new Set()): string {
    const first = this.peek();
    if (!first || this.isPunct(',') || this.isPunct(')')) {
      throw this.error('Expected an expression');
    }

    let depth = 0;
    let last = first;
    let taken = 0;
    for (let token = this.peek(); token; token = this.peek()) {
      if (depth === 0 && taken > 0) {
        if (token.type === 'punct' && (token.value === ',' || token.value === ')')) break;
        if (token.type === 'word' && stopWords.has(token.value.toUpperCase())) break;
      }
      if (token.type === 'punct' && token.value === '(') depth++;
      if (token.type === 'punct' && token.value === ')') depth--;
      last = this.next();
      taken++;
    }

    if (depth !== 0) {
      throw this.error('Unbalanced parentheses in expression');
    }
    return this.source.slice(first.start, last.end);
  }

  /** Source text from the current token to the end of the statement; consumes everything. */
  readRest(): string {
    const first = this.peek();
    if (!first) {
      throw this.error('Expected more input');
    }
    const last = this.tokens[this.tokens.length - 1];
    this.index = this.tokens.length;
    return this.source.slice(first.start, last.end);
  }

  error(message: string): ParseError {
    const token = this.peek();
    const near = token ? ` near '${this.source.slice(token.start, token.end)}'` : ' at end of statement';
    return new ParseError(`${message}${near}`, this.position);
  }
}
