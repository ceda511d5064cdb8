import { Parser } from 'node-sql-parser';
import type { ParsedStatement, StatementNode } from '../grammar/ast';
import { isCreateTable, parseCreateTable } from '../grammar/ddlParser';
import type { Dialect } from '../grammar/dialects';
import { tokenize, type Token } from '../grammar/tokenizer';
import { ParseError, TokenStream } from '../grammar/tokenStream';
import { errorMessage } from '../lib/logger';

export interface ParseOptions {
  // 'ignore' turns statements the grammar rejects into opaque nodes; 'raise' rethrows
  errorLevel?: 'ignore' | 'raise';
}

interface Segment {
  tokens: Token[];
  leadingComments: Token[];
}

export class SQLParser {
  private readonly parser = new Parser();
  private readonly options: Required<ParseOptions>;

  constructor(readonly dialect: Dialect, options: ParseOptions = {}) {
    this.options = {
      errorLevel: 'ignore',
      ...options
    };
  }

  /**
   * Splits a script into statements and parses each one.
   * Throws TokenizeError when the script itself cannot be tokenized (unterminated quote or comment).
   */
  public parse(content: string): ParsedStatement[] {
    const tokens = tokenize(content, this.dialect.settings);
    const statements: ParsedStatement[] = [];

    let line = 1;
    let lineOffset = 0;
    for (const segment of this.splitStatements(tokens)) {
      const first = segment.tokens[0];
      const last = segment.tokens[segment.tokens.length - 1];

      for (; lineOffset < first.start; lineOffset++) {
        if (content[lineOffset] === '\n') line++;
      }

      const textWithoutComments = joinTokens(segment.tokens, content);
      statements.push({
        node: this.parseTokens(segment.tokens, content, textWithoutComments),
        text: content.slice(first.start, last.end),
        textWithoutComments,
        leadingComments: segment.leadingComments.map(comment => comment.value),
        span: { start: first.start, end: last.end },
        lineNumber: line
      });
    }

    return statements;
  }

  /** Parses a single statement given as text; used when re-parsing repaired SQL. */
  public parseStatement(sql: string): StatementNode {
    const tokens = tokenize(sql, this.dialect.settings).filter(token => token.type !== 'comment');
    const end = tokens.length > 0 && isTerminator(tokens[tokens.length - 1]) ? tokens.length - 1 : tokens.length;
    const statementTokens = tokens.slice(0, end);
    return this.parseTokens(statementTokens, sql, joinTokens(statementTokens, sql));
  }

  private splitStatements(tokens: Token[]): Segment[] {
    const segments: Segment[] = [];
    let current: Segment = { tokens: [], leadingComments: [] };
    let depth = 0;

    for (const token of tokens) {
      if (token.type === 'comment') {
        if (current.tokens.length === 0) current.leadingComments.push(token);
        continue;
      }

      if (token.type === 'punct' && token.value === '(') depth++;
      if (token.type === 'punct' && token.value === ')') depth = Math.max(0, depth - 1);

      if (isTerminator(token) && depth === 0) {
        if (current.tokens.length > 0) segments.push(current);
        current = { tokens: [], leadingComments: [] };
        continue;
      }

      current.tokens.push(token);
    }

    if (current.tokens.length > 0) {
      segments.push(current);
    }
    return segments;
  }

  private parseTokens(tokens: Token[], source: string, sql: string): StatementNode {
    const stream = new TokenStream(tokens, source);

    if (isCreateTable(stream)) {
      try {
        return parseCreateTable(stream, this.dialect);
      } catch (error) {
        if (this.options.errorLevel === 'raise' || !(error instanceof ParseError)) {
          throw error;
        }
        return { kind: 'opaque', reason: error.message };
      }
    }

    return this.parseGeneric(sql);
  }

  private parseGeneric(sql: string): StatementNode {
    const database = this.dialect.settings.parserDatabase;
    if (!database) {
      return { kind: 'opaque', reason: `No general-purpose grammar for dialect ${this.dialect.name}` };
    }

    try {
      const result = this.parser.astify(sql, { database });
      const ast = Array.isArray(result) ? result[0] : result;
      if (!ast) {
        return { kind: 'opaque', reason: 'Statement produced no syntax tree' };
      }
      const statementType = 'type' in ast && typeof ast.type === 'string' ? ast.type : 'unknown';
      return { kind: 'generic', statementType, ast };
    } catch (error) {
      if (this.options.errorLevel === 'raise') {
        throw error;
      }
      return { kind: 'opaque', reason: errorMessage(error) };
    }
  }
}

function isTerminator(token: Token): boolean {
  return token.type === 'punct' && token.value === ';';
}

/** Statement text rebuilt from its tokens: comments dropped, whitespace runs collapsed to one space. */
function joinTokens(tokens: Token[], source: string): string {
  let sql = '';
  let previousEnd = -1;
  for (const token of tokens) {
    if (previousEnd !== -1 && token.start > previousEnd) sql += ' ';
    sql += source.slice(token.start, token.end);
    previousEnd = token.end;
  }
  return sql;
}
