import type { CreateTableStatement, ParsedStatement, StatementNode } from '../grammar/ast';
import type { Dialect } from '../grammar/dialects';
import { CREATE_TABLE_PREFIX, stripUnparseableClauses } from '../grammar/extensions';
import { createLogger, errorMessage } from '../lib/logger';
import type { ConversionLogEntry, StatementConversion } from '../types/sql';
import { formatSQL } from './formatter';
import type { ManualReviewCollector } from './manualReview';
import type { SQLParser } from './parser';
import { describeCreatedObject, detectStatementIssues } from './reviewDetectors';
import type { DDLTransformer } from './transformers/ddlTransformer';
import { transpileSQL } from './transpiler';

const logger = createLogger('router');

function statementType(node: StatementNode): string {
  switch (node.kind) {
    case 'create_table':
      return 'create_table';
    case 'generic':
      return node.statementType;
    case 'opaque':
      return 'unparsed';
  }
}

// Comments written above a statement stay above its first converted statement
function withLeadingComments(result: StatementConversion, comments: string[]): StatementConversion {
  if (comments.length === 0 || result.statements.length === 0) return result;
  const [first, ...rest] = result.statements;
  return { ...result, statements: [`${comments.join('\n')}\n${first}`, ...rest] };
}

/**
 * Sends each parsed statement to the rewriter that handles its kind.
 * CREATE TABLE goes to the DDL rewriter; everything else is transpiled into the target dialect
 * and re-printed with its formatter.
 */
export class StatementRouter {
  constructor(
    private readonly parser: SQLParser,
    private readonly ddl: DDLTransformer,
    private readonly targetDialect: Dialect,
    private readonly review: ManualReviewCollector | null = null
  ) {}

  route(statement: ParsedStatement, fileName: string): StatementConversion {
    this.detectIssues(statement, fileName);
    return withLeadingComments(this.dispatch(statement, fileName), statement.leadingComments);
  }

  private dispatch(statement: ParsedStatement, fileName: string): StatementConversion {
    const context = { fileName, lineNumber: statement.lineNumber, sql: statement.text };
    const { node } = statement;

    if (node.kind === 'create_table') {
      return this.ddl.transform(node, context);
    }

    if (node.kind === 'opaque' && CREATE_TABLE_PREFIX.test(statement.textWithoutComments)) {
      const recovered = this.recover(statement.textWithoutComments, fileName);
      if (recovered) {
        const result = this.ddl.transform(recovered.node, context);
        return { ...result, logs: [recovered.log, ...result.logs] };
      }
    }

    return this.fallback(statement, fileName);
  }

  private recover(
    sql: string,
    fileName: string
  ): { node: CreateTableStatement; log: ConversionLogEntry } | null {
    const repaired = stripUnparseableClauses(sql);
    if (repaired === null) return null;

    try {
      const node = this.parser.parseStatement(repaired);
      if (node.kind !== 'create_table') return null;
      logger.debug(`Recovered CREATE TABLE in ${fileName} after removing unparseable clauses`);
      return {
        node,
        log: { action: 'recovery_reparse', details: 'Re-parsed CREATE TABLE after removing unparseable clauses.', file: fileName }
      };
    } catch (error) {
      logger.warn(`Recovery reparse failed in ${fileName}: ${errorMessage(error)}`);
      return null;
    }
  }

  private fallback(statement: ParsedStatement, fileName: string): StatementConversion {
    const type = statementType(statement.node);
    let translated = statement.textWithoutComments;
    let details = `Used basic transpiler for statement type: ${type}`;
    try {
      translated = transpileSQL(statement.textWithoutComments, this.parser.dialect, this.targetDialect);
    } catch (error) {
      logger.warn(`Could not transpile ${type} statement in ${fileName}, keeping source text: ${errorMessage(error)}`);
      details = `Could not transpile statement type ${type}, kept the source text: ${errorMessage(error)}`;
    }

    let sql: string;
    try {
      sql = formatSQL(translated, this.targetDialect);
    } catch (error) {
      logger.warn(`Could not re-print ${type} statement in ${fileName}: ${errorMessage(error)}`);
      sql = translated;
    }

    return {
      statements: [sql],
      logs: [{ action: 'transpile_fallback', details, file: fileName }],
      failed: false
    };
  }

  private detectIssues(statement: ParsedStatement, fileName: string): void {
    if (!this.review) return;

    const issues = detectStatementIssues(statement.textWithoutComments);
    if (issues.length === 0) return;

    const created = describeCreatedObject(statement.textWithoutComments);
    for (const issue of issues) {
      this.review.record({
        file: fileName,
        objectName: created?.name ?? 'statement',
        objectType: created?.type,
        issueType: issue.issueType,
        severity: issue.severity,
        message: issue.description,
        suggestedAction: issue.suggestedAction,
        lineNumber: statement.lineNumber
      });
    }
  }
}
