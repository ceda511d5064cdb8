import type { DialectSettings } from './dialects';

export type TokenType = 'word' | 'quoted_identifier' | 'string' | 'number' | 'punct' | 'operator' | 'comment';

export interface Token {
  type: TokenType;
  // Unescaped content for strings and quoted identifiers, raw text otherwise
  value: string;
  start: number;
  end: number;
}

export class TokenizeError extends Error {
  constructor(message: string, readonly position: number) {
    super(`${message} at offset ${position}`);
    this.name = 'TokenizeError';
  }
}

const PUNCTUATION = new Set(['(', ')', ',', ';', '.']);
const MULTI_CHAR_OPERATORS = ['<=', '>=', '<>', '!=', '||', '::', '=>', '->'];
const BACKSLASH_SEQUENCES: Record<string, string> = { n: '\n', t: '\t', r: '\r', '0': '\0' };

const isWordStart = (char: string) => /[A-Za-z_\u0080-\uffff]/.test(char);
const isWordPart = (char: string) => /[A-Za-z0-9_$#\u0080-\uffff]/.test(char);
const isDigit = (char: string) => char >= '0' && char <= '9';

export function tokenize(sql: string, settings: DialectSettings): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < sql.length) {
    const char = sql[i];
    const nextChar = sql[i + 1] ?? '';
    const start = i;

    if (/\s/.test(char)) {
      i++;
      continue;
    }

    const lineComment = settings.lineComments.find(prefix => sql.startsWith(prefix, i));
    if (lineComment) {
      const newline = sql.indexOf('\n', i);
      i = newline === -1 ? sql.length : newline;
      tokens.push({ type: 'comment', value: sql.slice(start, i).trimEnd(), start, end: i });
      continue;
    }

    if (char === '/' && nextChar === '*') {
      const close = sql.indexOf('*/', i + 2);
      if (close === -1) {
        throw new TokenizeError('Unterminated block comment', start);
      }
      i = close + 2;
      tokens.push({ type: 'comment', value: sql.slice(start, i), start, end: i });
      continue;
    }

    if (char === "'") {
      const { value, end } = readQuoted(sql, i, "'", settings.backslashEscapes);
      tokens.push({ type: 'string', value, start, end });
      i = end;
      continue;
    }

    if (settings.dollarQuotedStrings && char === '$' && nextChar === '$') {
      const close = sql.indexOf('$$', i + 2);
      if (close === -1) {
        throw new TokenizeError('Unterminated dollar-quoted string', start);
      }
      i = close + 2;
      tokens.push({ type: 'string', value: sql.slice(start + 2, close), start, end: i });
      continue;
    }

    const quote = settings.identifierQuotes.find(([open]) => open === char);
    if (quote) {
      const { value, end } = readQuoted(sql, i, quote[1], false);
      tokens.push({ type: 'quoted_identifier', value, start, end });
      i = end;
      continue;
    }

    if (isDigit(char) || (char === '.' && isDigit(nextChar))) {
      i = readNumber(sql, i);
      tokens.push({ type: 'number', value: sql.slice(start, i), start, end: i });
      continue;
    }

    if (isWordStart(char)) {
      while (i < sql.length && isWordPart(sql[i])) i++;
      tokens.push({ type: 'word', value: sql.slice(start, i), start, end: i });
      continue;
    }

    if (PUNCTUATION.has(char)) {
      tokens.push({ type: 'punct', value: char, start, end: i + 1 });
      i++;
      continue;
    }

    const operator = MULTI_CHAR_OPERATORS.find(op => sql.startsWith(op, i)) ?? char;
    i += operator.length;
    tokens.push({ type: 'operator', value: operator, start, end: i });
  }

  return tokens;
}

function readQuoted(sql: string, start: number, close: string, backslashEscapes: boolean): { value: string; end: number } {
  let value = '';
  let i = start + 1;

  while (i < sql.length) {
    const char = sql[i];

    if (backslashEscapes && char === '\\' && i + 1 < sql.length) {
      const escaped = sql[i + 1];
      value += BACKSLASH_SEQUENCES[escaped] ?? escaped;
      i += 2;
      continue;
    }

    if (char === close) {
      // Doubled closing quote is an escaped quote
      if (sql[i + 1] === close) {
        value += close;
        i += 2;
        continue;
      }
      return { value, end: i + 1 };
    }

    value += char;
    i++;
  }

  throw new TokenizeError(`Unterminated quoted text starting with ${sql[start]}`, start);
}

function readNumber(sql: string, start: number): number {
  let i = start;
  while (i < sql.length && isDigit(sql[i])) i++;
  if (sql[i] === '.') {
    i++;
    while (i < sql.length && isDigit(sql[i])) i++;
  }
  if ((sql[i] === 'e' || sql[i] === 'E') && /^[+-]?\d/.test(sql.slice(i + 1, i + 3))) {
    i += sql[i + 1] === '+' || sql[i + 1] === '-' ? 2 : 1;
    while (i < sql.length && isDigit(sql[i])) i++;
  }
  return i;
}
