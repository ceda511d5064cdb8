import type {
  ColumnConstraint,
  ColumnConstraintBody,
  CreateTableStatement,
  DataType,
  ExtensionProperty,
  Identifier,
  IdentityOptions,
  QualifiedName,
  TableClause,
  TableConstraint,
  TableConstraintBody,
  TableElement,
  TableProperty
} from './ast';
import { extensionPrintRules, type Dialect } from './dialects';

export const CLAUSE_KEYWORDS: Record<TableClause['kind'], string> = {
  cluster_by: 'CLUSTER BY',
  partition_by: 'PARTITION BY'
};

export interface PrintOptions {
  // One table element per line, clauses and properties on their own lines
  pretty?: boolean;
}

export class SqlPrinter {
  constructor(readonly dialect: Dialect) {}

  createTable(statement: CreateTableStatement, options: PrintOptions = {}): string {
    const header = [
      'CREATE',
      statement.replace ? 'OR REPLACE' : '',
      ...statement.modifiers,
      'TABLE',
      statement.ifNotExists ? 'IF NOT EXISTS' : '',
      this.qualifiedName(statement.name)
    ]
      .filter(Boolean)
      .join(' ');

    const elements = statement.elements.map(element => this.element(element));
    let sql = header;
    if (elements.length > 0) {
      sql += options.pretty ? ` (\n  ${elements.join(',\n  ')}\n)` : ` (${elements.join(', ')})`;
    }

    const trailing = [
      ...statement.clauses.map(clause => this.clause(clause)),
      ...(statement.properties ?? []).map(property => this.property(property))
    ];
    if (statement.asQuery) {
      trailing.push(`AS ${statement.asQuery}`);
    }
    for (const part of trailing) {
      sql += options.pretty ? `\n${part}` : ` ${part}`;
    }
    return sql;
  }

  dataType(dataType: DataType): string {
    return dataType.args.length > 0 ? `${dataType.name}(${dataType.args.join(', ')})` : dataType.name;
  }

  identifier(identifier: Identifier): string {
    return identifier.quoted ? this.dialect.quoteIdentifier(identifier.name) : identifier.name;
  }

  qualifiedName(name: QualifiedName): string {
    return name.parts.map(part => this.identifier(part)).join('.');
  }

  string(value: string): string {
    let escaped = value.replace(/'/g, "''");
    if (this.dialect.settings.backslashEscapes) {
      escaped = escaped.replace(/\\/g, '\\\\');
    }
    return `'${escaped}'`;
  }

  private identifierList(identifiers: Identifier[]): string {
    return `(${identifiers.map(identifier => this.identifier(identifier)).join(', ')})`;
  }

  private element(element: TableElement): string {
    if (element.kind === 'table_constraint') {
      return this.tableConstraint(element);
    }
    return [
      this.identifier(element.name),
      element.dataType ? this.dataType(element.dataType) : '',
      ...element.constraints.map(constraint => this.columnConstraint(constraint))
    ]
      .filter(Boolean)
      .join(' ');
  }

  private columnConstraint(constraint: ColumnConstraint): string {
    const body = this.columnConstraintBody(constraint.body);
    return constraint.name ? `CONSTRAINT ${this.identifier(constraint.name)} ${body}` : body;
  }

  private columnConstraintBody(body: ColumnConstraintBody): string {
    switch (body.kind) {
      case 'not_null':
        return 'NOT NULL';
      case 'null':
        return 'NULL';
      case 'default':
        return `DEFAULT ${body.expression}`;
      case 'primary_key':
        return 'PRIMARY KEY';
      case 'unique':
        return 'UNIQUE';
      case 'references':
        return body.columns.length > 0
          ? `REFERENCES ${this.qualifiedName(body.table)} ${this.identifierList(body.columns)}`
          : `REFERENCES ${this.qualifiedName(body.table)}`;
      case 'check':
        return `CHECK (${body.expression})`;
      case 'comment':
        return `COMMENT ${this.string(body.text)}`;
      case 'collate':
        return `COLLATE ${body.collation}`;
      case 'computed':
        if (body.syntax === 'as') {
          return `AS (${body.expression})`;
        }
        return body.storage
          ? `GENERATED ALWAYS AS (${body.expression}) ${body.storage}`
          : `GENERATED ALWAYS AS (${body.expression})`;
      case 'identity':
        return this.identity(body);
      case 'extension': {
        const sql = this.extension(body.property);
        return body.withKeyword ? `WITH ${sql}` : sql;
      }
    }
  }

  private identity(options: IdentityOptions): string {
    const { start, increment } = options;
    switch (this.dialect.settings.identityStyle) {
      case 'generated': {
        const sequence = [start ? `START WITH ${start}` : '', increment ? `INCREMENT BY ${increment}` : '']
          .filter(Boolean)
          .join(' ');
        const head = `GENERATED ${options.always ? 'ALWAYS' : 'BY DEFAULT'} AS IDENTITY`;
        return sequence ? `${head} (${sequence})` : head;
      }
      case 'identity':
        return start || increment ? `IDENTITY(${start ?? '1'}, ${increment ?? '1'})` : 'IDENTITY';
      case 'sqlserver':
        return `IDENTITY(${start ?? '1'}, ${increment ?? '1'})`;
      case 'auto_increment':
        return 'AUTO_INCREMENT';
    }
  }

  private tableConstraint(constraint: TableConstraint): string {
    return [
      constraint.name ? `CONSTRAINT ${this.identifier(constraint.name)}` : '',
      this.tableConstraintBody(constraint.body),
      ...constraint.options
    ]
      .filter(Boolean)
      .join(' ');
  }

  private tableConstraintBody(body: TableConstraintBody): string {
    switch (body.kind) {
      case 'primary_key':
        return `PRIMARY KEY ${this.identifierList(body.columns)}`;
      case 'unique':
        return `UNIQUE ${this.identifierList(body.columns)}`;
      case 'foreign_key': {
        const sql = `FOREIGN KEY ${this.identifierList(body.columns)} REFERENCES ${this.qualifiedName(body.table)}`;
        return body.referencedColumns.length > 0 ? `${sql} ${this.identifierList(body.referencedColumns)}` : sql;
      }
      case 'check':
        return `CHECK (${body.expression})`;
    }
  }

  private clause(clause: TableClause): string {
    return `${CLAUSE_KEYWORDS[clause.kind]} (${clause.expressions.join(', ')})`;
  }

  property(property: TableProperty): string {
    const { body } = property;
    let sql: string;
    switch (body.kind) {
      case 'comment':
        sql = `COMMENT = ${this.string(body.text)}`;
        break;
      case 'key_value':
        sql = `${body.key} = ${body.value}`;
        break;
      case 'flag':
        sql = body.keyword;
        break;
      default:
        sql = this.extension(body);
    }
    return property.withKeyword ? `WITH ${sql}` : sql;
  }

  private extension(property: ExtensionProperty): string {
    const rule = this.dialect.printRules.get(property.kind) ?? extensionPrintRules.get(property.kind);
    if (!rule) {
      throw new Error(`No print rule registered for property '${property.kind}'`);
    }
    return rule(property, this);
  }
}
