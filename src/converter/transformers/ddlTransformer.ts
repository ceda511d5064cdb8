import { isColumn, type ColumnDefinition, type CreateTableStatement, type DataType, type TableProperty } from '../../grammar/ast';
import { parseDataTypeText } from '../../grammar/ddlParser';
import type { Dialect } from '../../grammar/dialects';
import { CLAUSE_KEYWORDS, SqlPrinter } from '../../grammar/printer';
import { createLogger, errorMessage } from '../../lib/logger';
import {
  applyOutputAliases,
  COMPLEX_SOURCE_TYPES,
  lookupTypeName,
  normalizeTypeName,
  resolveTypeKey
} from '../../mappings/dataTypes';
import type { RuleSet } from '../../rules/ruleSet';
import type { ConversionAction, ConversionLogEntry, StatementConversion } from '../../types/sql';
import type { ManualReviewCollector } from '../manualReview';
import { REVIEW_ISSUES, type ReviewIssue } from '../reviewDetectors';

const logger = createLogger('ddl');

const TIMESTAMP_ZONE_PRECISION = /TIMESTAMP WITH (LOCAL )?TIME ZONE\((\d+)\)/g;

export interface DDLContext {
  fileName: string;
  // Source text of the statement, quoted in error output
  sql: string;
  lineNumber?: number;
}

interface ExtractedComments {
  table: string | null;
  columns: Array<{ column: string; text: string }>;
}

type Log = (action: ConversionAction, details: string) => void;

export class TypeConversionError extends Error {
  constructor(readonly sourceType: string, readonly targetType: string, reason: string) {
    super(`Cannot convert ${sourceType} to ${targetType}: ${reason}`);
    this.name = 'TypeConversionError';
  }
}

/** Comment lines standing in for a statement that could not be converted. */
export function errorMarker(message: string, sql: string): string {
  return `Error handling statement: ${message}. SQL: ${sql}`
    .split('\n')
    .map((line, index) => (index === 0 ? `-- ERROR: ${line}` : `-- ${line}`))
    .join('\n');
}

function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (placeholder, key: string) => values[key] ?? placeholder);
}

function escapeLiteral(text: string): string {
  return text.replace(/'/g, "''");
}

/**
 * Rewrites one CREATE TABLE tree for the target dialect. Steps run in a fixed order:
 * types, virtual columns, clause removal, property removal, comment extraction,
 * CREATE OR REPLACE normalization, rendering, then text cleanup.
 */
export class DDLTransformer {
  private readonly printer: SqlPrinter;
  private readonly sourcePrinter: SqlPrinter;

  constructor(
    private readonly rules: RuleSet,
    sourceDialect: Dialect,
    private readonly targetDialect: Dialect,
    private readonly review: ManualReviewCollector | null = null
  ) {
    this.printer = new SqlPrinter(targetDialect);
    this.sourcePrinter = new SqlPrinter(sourceDialect);
  }

  transform(statement: CreateTableStatement, context: DDLContext): StatementConversion {
    const logs: ConversionLogEntry[] = [];
    const log: Log = (action, details) => logs.push({ action, details, file: context.fileName });
    const { behaviors } = this.rules;

    try {
      const tableName = this.printer.qualifiedName(statement.name);

      this.convertDataTypes(statement, tableName, context, log);
      if (behaviors.virtualColumnConversion.enabled) {
        this.convertVirtualColumns(statement, tableName, log);
      }
      if (behaviors.clauseRemoval.enabled) {
        this.removeClauses(statement, tableName, log);
      }
      if (behaviors.withPropertyRemoval.enabled) {
        this.removeProperties(statement, tableName, context, log);
      }
      const comments = this.extractComments(statement, tableName, log);

      if (statement.replace) {
        statement.replace = false;
        log('remove_replace', `Changed 'CREATE OR REPLACE' to 'CREATE' for '${tableName}'.`);
      }

      const createSql = this.cleanup(this.printer.createTable(statement, { pretty: true }));
      return {
        statements: [createSql, ...this.commentStatements(tableName, comments, log)],
        logs,
        failed: false
      };
    } catch (error) {
      const message = errorMessage(error);
      logger.error(`Failed to convert CREATE TABLE in ${context.fileName}: ${message}`);
      log('error', `Error handling statement: ${message}. SQL: ${context.sql}`);
      return { statements: [errorMarker(message, context.sql)], logs, failed: true };
    }
  }

  private columns(statement: CreateTableStatement): ColumnDefinition[] {
    return statement.elements.filter(isColumn);
  }

  private convertDataTypes(statement: CreateTableStatement, tableName: string, context: DDLContext, log: Log): void {
    for (const column of this.columns(statement)) {
      const { dataType } = column;
      if (!dataType) continue;

      const columnName = this.printer.identifier(column.name);
      if (COMPLEX_SOURCE_TYPES.has(dataType.name)) {
        this.flag(REVIEW_ISSUES.Complex_data_types, context, tableName, `Column ${columnName} uses ${dataType.name}`);
      }

      try {
        const converted = this.convertDataType(dataType, columnName, log);
        if (converted) {
          column.dataType = converted;
        }
      } catch (error) {
        logger.warn(`Keeping type ${this.sourcePrinter.dataType(dataType)} of ${tableName}.${columnName}: ${errorMessage(error)}`);
        log('error', `Column ${tableName}.${columnName}: ${errorMessage(error)}`);
      }
    }
  }

  /** Target type for one column, or null when the type map has no entry for it. */
  convertDataType(dataType: DataType, columnName: string, log: Log): DataType | null {
    const key = resolveTypeKey(this.rules.typeMap, dataType.name);
    if (key === undefined) return null;

    let target = this.rules.typeMap.get(key) ?? dataType.name;
    let carriedArgs = dataType.args;

    const rule = lookupTypeName(this.rules.dynamicRules, dataType.name);
    const size = dataType.args.length > 0 ? parseSize(dataType.args[0]) : null;
    if (rule && size !== null) {
      if (size > rule.maxSize) {
        if (rule.overflowType) {
          log(
            'dynamic_type_overflow',
            `Column ${columnName}: ${dataType.name}(${size}) exceeds ${rule.maxSize}, using ${rule.overflowType}.`
          );
          target = rule.overflowType;
        } else {
          log('dynamic_type_overflow', `Column ${columnName}: ${dataType.name}(${size}) exceeds ${rule.maxSize}, dropping the size.`);
        }
        carriedArgs = [];
      } else if (rule.template) {
        target = fillTemplate(rule.template, { size: String(size) });
      }
    }

    let converted: DataType;
    try {
      converted = parseDataTypeText(target, this.targetDialect);
    } catch (error) {
      throw new TypeConversionError(dataType.name, target, errorMessage(error));
    }
    if (this.rules.paramlessTargets.has(normalizeTypeName(converted.name))) {
      converted.args = [];
    } else if (carriedArgs.length > 0) {
      converted.args = [...carriedArgs];
    }
    return converted;
  }

  private convertVirtualColumns(statement: CreateTableStatement, tableName: string, log: Log): void {
    for (const column of this.columns(statement)) {
      if (column.constraints.some(constraint => constraint.body.kind === 'identity')) continue;

      for (const constraint of column.constraints) {
        const { body } = constraint;
        if (body.kind !== 'computed') continue;

        // Oracle expects the virtual definition ahead of inline constraints
        column.constraints = [
          { name: constraint.name, body: { kind: 'computed', expression: body.expression, syntax: 'generated', storage: 'VIRTUAL' } },
          ...column.constraints.filter(other => other !== constraint)
        ];
        log('virtual_column', `Converted computed column ${tableName}.${this.printer.identifier(column.name)} to GENERATED ALWAYS AS (...) VIRTUAL.`);
        break;
      }
    }
  }

  private removeClauses(statement: CreateTableStatement, tableName: string, log: Log): void {
    const configured = this.rules.behaviors.clauseRemoval.clauses;
    statement.clauses = statement.clauses.filter(clause => {
      const keyword = CLAUSE_KEYWORDS[clause.kind];
      // An empty list removes every clustering/partitioning clause
      if (configured.length > 0 && !configured.includes(keyword)) return true;
      log('clause_removed', `Removed ${keyword} clause from '${tableName}'.`);
      return false;
    });
  }

  private removeProperties(statement: CreateTableStatement, tableName: string, context: DDLContext, log: Log): void {
    this.removeColumnProperties(statement, tableName, context, log);
    if (!statement.properties) return;

    const kept: TableProperty[] = [];
    for (const property of statement.properties) {
      const reason = this.removalReason(property);
      if (!reason) {
        kept.push(property);
        continue;
      }
      log('property_removed', `Removed ${reason} from '${tableName}'.`);
      if (property.body.kind === 'row_access_policy') {
        const policy = this.sourcePrinter.qualifiedName(property.body.policy);
        this.flag(REVIEW_ISSUES.Row_access_policy_removed, context, tableName, `Row access policy ${policy} was removed`);
      }
    }
    statement.properties = kept.length > 0 ? kept : null;
  }

  private removeColumnProperties(statement: CreateTableStatement, tableName: string, context: DDLContext, log: Log): void {
    for (const column of this.columns(statement)) {
      const columnName = `${tableName}.${this.printer.identifier(column.name)}`;
      column.constraints = column.constraints.filter(({ body }) => {
        if (body.kind !== 'extension') return true;

        const { property } = body;
        if (property.kind === 'masking_policy') {
          const policy = this.sourcePrinter.qualifiedName(property.policy);
          log('property_removed', `Removed masking policy ${policy} from column '${columnName}'.`);
          this.flag(REVIEW_ISSUES.Masking_policy_removed, context, tableName, `Masking policy ${policy} on ${columnName} was removed`);
        } else if (property.kind === 'tags') {
          log('property_removed', `Removed tag list from column '${columnName}'.`);
        } else {
          log('property_removed', `Removed row access policy from column '${columnName}'.`);
        }
        return false;
      });
    }
  }

  private removalReason(property: TableProperty): string | null {
    const { body } = property;
    const configured = this.rules.behaviors.withPropertyRemoval.properties;

    if (body.kind === 'row_access_policy') {
      return `row access policy ${this.sourcePrinter.qualifiedName(body.policy)}`;
    }
    if (body.kind === 'tags') {
      return 'tag list';
    }
    if (body.kind === 'key_value' && configured.includes(body.key)) {
      return `property ${body.key}`;
    }
    if (body.kind === 'flag' && configured.includes(body.keyword)) {
      return `property ${body.keyword}`;
    }

    // Substring match on the rendered property; it can also hit unrelated text containing TAG
    const rendered = this.sourcePrinter.property(property);
    if (rendered.toUpperCase().includes('TAG')) {
      logger.warn(`Removing property by TAG substring match: ${rendered}`);
      return `property ${rendered}`;
    }
    return null;
  }

  private extractComments(statement: CreateTableStatement, tableName: string, log: Log): ExtractedComments {
    const comments: ExtractedComments = { table: null, columns: [] };

    if (statement.properties) {
      const remaining: TableProperty[] = [];
      for (const property of statement.properties) {
        if (property.body.kind === 'comment') {
          comments.table ??= property.body.text;
        } else {
          remaining.push(property);
        }
      }
      statement.properties = remaining.length > 0 ? remaining : null;
    }

    for (const column of this.columns(statement)) {
      const texts: string[] = [];
      column.constraints = column.constraints.filter(constraint => {
        if (constraint.body.kind !== 'comment') return true;
        texts.push(constraint.body.text);
        return false;
      });
      if (texts.length > 0) {
        comments.columns.push({ column: this.printer.identifier(column.name), text: texts[0] });
      }
    }

    const count = comments.columns.length + (comments.table === null ? 0 : 1);
    if (count > 0) {
      log('comment_extracted', `Extracted ${count} comment(s) from '${tableName}'.`);
    }
    return comments;
  }

  private commentStatements(tableName: string, comments: ExtractedComments, log: Log): string[] {
    const { commentConversion } = this.rules.behaviors;
    const count = comments.columns.length + (comments.table === null ? 0 : 1);
    if (count === 0) return [];

    if (!commentConversion.enabled) {
      log('comments_dropped', `Comment conversion is disabled; ${count} comment(s) on '${tableName}' were not converted.`);
      return [];
    }

    const statements: string[] = [];
    if (comments.table !== null) {
      statements.push(
        fillTemplate(commentConversion.tableTemplate, {
          table_name: tableName,
          comment_text: escapeLiteral(comments.table)
        })
      );
    }
    for (const { column, text } of comments.columns) {
      statements.push(
        fillTemplate(commentConversion.columnTemplate, {
          table_name: tableName,
          column_name: column,
          comment_text: escapeLiteral(text)
        })
      );
    }
    return statements;
  }

  private cleanup(sql: string): string {
    const { clauseRemoval } = this.rules.behaviors;
    let result = sql;

    if (clauseRemoval.clauses.length > 0) {
      result = result
        .split('\n')
        .filter(line => !clauseRemoval.clauses.some(keyword => line.toUpperCase().includes(keyword)))
        .join('\n');
    }

    result = applyOutputAliases(result, this.rules.outputAliases);
    return result.replace(
      TIMESTAMP_ZONE_PRECISION,
      (_match, local: string | undefined, precision: string) => `TIMESTAMP(${precision}) WITH ${local ?? ''}TIME ZONE`
    );
  }

  private flag(issue: ReviewIssue, context: DDLContext, tableName: string, message: string): void {
    this.review?.record({
      file: context.fileName,
      objectName: tableName,
      objectType: 'TABLE',
      issueType: issue.issueType,
      severity: issue.severity,
      message: `${message}. ${issue.description}.`,
      suggestedAction: issue.suggestedAction,
      lineNumber: context.lineNumber
    });
  }
}

function parseSize(arg: string): number | null {
  const match = arg.match(/^\s*(\d+)/);
  return match ? Number(match[1]) : null;
}
