import { describe, expect, it } from 'vitest';
import { ManualReviewCollector } from '../converter/manualReview';
import { SQLParser } from '../converter/parser';
import { DDLTransformer, errorMarker } from '../converter/transformers/ddlTransformer';
import type { CreateTableStatement } from '../grammar/ast';
import { createDialect } from '../grammar/dialects';
import { registerGrammarExtensions } from '../grammar/extensions';
import { createRuleSet, type RuleSet } from '../rules/ruleSet';

const snowflake = createDialect('snowflake');
registerGrammarExtensions(snowflake);
const oracle = createDialect('oracle');
const parser = new SQLParser(snowflake);

const NTZ_TYPES = {
  default: { VARCHARNTZ: 'VARCHAR2' },
  dynamic_rules: { VARCHARNTZ: { max_size: 4000, overflow_type: 'CLOB', template: 'VARCHAR2({size})' } },
  paramless_targets: ['CLOB']
};

function table(sql: string): CreateTableStatement {
  const node = parser.parseStatement(sql);
  if (node.kind !== 'create_table') {
    throw new Error(`Expected CREATE TABLE, got ${node.kind}`);
  }
  return node;
}

function transform(sql: string, rules: RuleSet, review: ManualReviewCollector | null = null) {
  return new DDLTransformer(rules, snowflake, oracle, review).transform(table(sql), { fileName: 'orders.sql', sql, lineNumber: 3 });
}

describe('DDLTransformer', () => {
  describe('data types', () => {
    it('converts an oversized column to the overflow type and moves its comment out', () => {
      const rules = createRuleSet({ comment_conversion: { enabled: true } }, NTZ_TYPES);

      const result = transform("CREATE TABLE T (A VARCHAR_NTZ(5000) COMMENT 'desc')", rules);

      expect(result.failed).toBe(false);
      expect(result.statements).toEqual(['CREATE TABLE T (\n  A CLOB\n)', "COMMENT ON COLUMN T.A IS 'desc'"]);
      expect(result.logs).toEqual([
        { action: 'dynamic_type_overflow', details: 'Column A: VARCHAR_NTZ(5000) exceeds 4000, using CLOB.', file: 'orders.sql' },
        { action: 'comment_extracted', details: "Extracted 1 comment(s) from 'T'.", file: 'orders.sql' }
      ]);
    });

    it('uses the sized template at the threshold', () => {
      const result = transform('CREATE TABLE T (A VARCHAR_NTZ(4000))', createRuleSet({}, NTZ_TYPES));
      expect(result.statements).toEqual(['CREATE TABLE T (\n  A VARCHAR2(4000)\n)']);
      expect(result.logs).toEqual([]);
    });

    it('drops arguments from paramless targets and carries them otherwise', () => {
      const rules = createRuleSet(
        {},
        { default: { FLOAT: 'BINARY_DOUBLE', NUMBER: 'NUMBER', INT: 'NUMBER(38)' }, paramless_targets: ['binary_double'] }
      );

      const result = transform('CREATE TABLE t (x FLOAT(53), y NUMBER(10, 2), z INT)', rules);

      expect(result.statements).toEqual(['CREATE TABLE t (\n  x BINARY_DOUBLE,\n  y NUMBER(10, 2),\n  z NUMBER(38)\n)']);
    });

    it('is a no-op on types that are already in target form', () => {
      const rules = createRuleSet({}, { default: { VARCHAR: 'VARCHAR2', NUMBER: 'NUMBER' } });

      const [first] = transform('CREATE TABLE t (a VARCHAR(10), b NUMBER(5))', rules).statements;
      const [second] = transform(first, rules).statements;

      expect(first).toBe('CREATE TABLE t (\n  a VARCHAR2(10),\n  b NUMBER(5)\n)');
      expect(second).toBe(first);
    });

    it('keeps a column type whose target cannot be parsed and converts the rest', () => {
      const rules = createRuleSet({}, { default: { INT: 'NUMBER 38', VARCHAR: 'VARCHAR2' } });

      const result = transform('CREATE TABLE t (a INT, b VARCHAR(5))', rules);

      expect(result.failed).toBe(false);
      expect(result.statements).toEqual(['CREATE TABLE t (\n  a INT,\n  b VARCHAR2(5)\n)']);
      expect(result.logs).toEqual([
        {
          action: 'error',
          details: "Column t.a: Cannot convert INT to NUMBER 38: Unexpected text after type NUMBER near '38'",
          file: 'orders.sql'
        }
      ]);
    });

    it('drops an oversized length when the rule names no overflow type', () => {
      const rules = createRuleSet({}, { default: { VARCHAR: 'VARCHAR2' }, dynamic_rules: { VARCHAR: { max_size: 4000 } } });

      const result = transform('CREATE TABLE t (a VARCHAR(5000), b VARCHAR(20))', rules);

      expect(result.statements).toEqual(['CREATE TABLE t (\n  a VARCHAR2,\n  b VARCHAR2(20)\n)']);
      expect(result.logs).toEqual([
        { action: 'dynamic_type_overflow', details: 'Column a: VARCHAR(5000) exceeds 4000, dropping the size.', file: 'orders.sql' }
      ]);
    });

    it('moves a zone qualifier behind the precision', () => {
      const rules = createRuleSet(
        {},
        { default: { TIMESTAMP_TZ: 'TIMESTAMP WITH TIME ZONE', TIMESTAMP_LTZ: 'TIMESTAMP WITH LOCAL TIME ZONE' } }
      );

      const result = transform('CREATE TABLE t (a TIMESTAMP_TZ(6), b TIMESTAMP_LTZ(3), c TIMESTAMP_TZ)', rules);

      expect(result.statements).toEqual([
        'CREATE TABLE t (\n  a TIMESTAMP(6) WITH TIME ZONE,\n  b TIMESTAMP(3) WITH LOCAL TIME ZONE,\n  c TIMESTAMP WITH TIME ZONE\n)'
      ]);
    });

    it('applies output aliases before reordering the precision', () => {
      const rules = createRuleSet({}, { output_aliases: { TIMESTAMP_TZ: 'TIMESTAMP WITH TIME ZONE' } });

      const result = transform('CREATE TABLE t (a TIMESTAMP_TZ(6))', rules);

      expect(result.statements).toEqual(['CREATE TABLE t (\n  a TIMESTAMP(6) WITH TIME ZONE\n)']);
    });

    it('flags semi-structured columns for review', () => {
      const review = new ManualReviewCollector('20240501_100000', () => new Date('2024-05-01T10:00:00.000Z'));

      transform('CREATE TABLE t (payload VARIANT)', createRuleSet({}, { default: { VARIANT: 'CLOB' } }), review);

      expect(review.getItems()).toEqual([
        {
          timestamp: '2024-05-01T10:00:00.000Z',
          file_path: 'orders.sql',
          object_name: 't',
          object_type: 'TABLE',
          issue_type: 'Complex_data_types',
          severity: 'INFO',
          message: 'Column payload uses VARIANT. Column uses a semi-structured or spatial type.',
          suggested_action: 'Confirm the mapped target type preserves the stored values, e.g. JSON text in a CLOB',
          line_number: 3,
          status: 'PENDING_REVIEW'
        }
      ]);
    });
  });

  describe('virtual columns', () => {
    it('rewrites computed columns and leaves identity columns alone', () => {
      const rules = createRuleSet({ virtual_column_conversion: { enabled: true } }, {});

      const result = transform(
        'CREATE TABLE t (a NUMBER, b NUMBER NOT NULL AS (a * 2), c NUMBER GENERATED ALWAYS AS IDENTITY)',
        rules
      );

      expect(result.statements).toEqual([
        'CREATE TABLE t (\n  a NUMBER,\n  b NUMBER GENERATED ALWAYS AS (a * 2) VIRTUAL NOT NULL,\n  c NUMBER GENERATED ALWAYS AS IDENTITY\n)'
      ]);
      expect(result.logs.map(entry => entry.details)).toEqual([
        'Converted computed column t.b to GENERATED ALWAYS AS (...) VIRTUAL.'
      ]);
    });

    it('keeps the source syntax while the conversion is disabled', () => {
      const result = transform('CREATE TABLE t (a NUMBER, b NUMBER AS (a * 2))', createRuleSet({}, {}));
      expect(result.statements).toEqual(['CREATE TABLE t (\n  a NUMBER,\n  b NUMBER AS (a * 2)\n)']);
    });
  });

  describe('clause removal', () => {
    const sql = 'CREATE TABLE t (a INT) CLUSTER BY (a) PARTITION BY (a)';

    it('removes only the configured clauses', () => {
      const rules = createRuleSet({ clause_removal: { enabled: true, clauses: ['CLUSTER BY'] } }, {});

      const result = transform(sql, rules);

      expect(result.statements).toEqual(['CREATE TABLE t (\n  a INT\n)\nPARTITION BY (a)']);
      expect(result.logs).toEqual([{ action: 'clause_removed', details: "Removed CLUSTER BY clause from 't'.", file: 'orders.sql' }]);
    });

    it('removes every clause when no clause is configured', () => {
      const result = transform(sql, createRuleSet({ clause_removal: { enabled: true } }, {}));

      expect(result.statements).toEqual(['CREATE TABLE t (\n  a INT\n)']);
      expect(result.logs.map(entry => entry.details)).toEqual([
        "Removed CLUSTER BY clause from 't'.",
        "Removed PARTITION BY clause from 't'."
      ]);
    });
  });

  it('drops lines naming a configured clause while clause removal is disabled', () => {
    const rules = createRuleSet({ clause_removal: { enabled: false, clauses: ['CLUSTER BY'] } }, {});

    const result = transform('CREATE TABLE t (a INT) CLUSTER BY (a)', rules);

    expect(result.statements).toEqual(['CREATE TABLE t (\n  a INT\n)']);
    expect(result.logs).toEqual([]);
  });

  describe('property removal', () => {
    const rules = createRuleSet({ with_property_removal: { enabled: true, properties: ['data_retention_time_in_days'] } }, {});

    it('drops configured, policy and tag properties', () => {
      const review = new ManualReviewCollector('20240501_100000');

      const result = transform(
        "CREATE OR REPLACE TABLE t (a INT) WITH ROW ACCESS POLICY gov.rap ON (a) DATA_RETENTION_TIME_IN_DAYS = 1 WITH TAG (cost_center = 'x') CHANGE_TRACKING = TRUE",
        rules,
        review
      );

      expect(result.statements).toEqual(['CREATE TABLE t (\n  a INT\n)\nCHANGE_TRACKING = TRUE']);
      expect(result.logs.map(entry => [entry.action, entry.details])).toEqual([
        ['property_removed', "Removed row access policy gov.rap from 't'."],
        ['property_removed', "Removed property DATA_RETENTION_TIME_IN_DAYS from 't'."],
        ['property_removed', "Removed tag list from 't'."],
        ['remove_replace', "Changed 'CREATE OR REPLACE' to 'CREATE' for 't'."]
      ]);
      expect(review.getItems().map(item => [item.issue_type, item.severity, item.message])).toEqual([
        [
          'Row_access_policy_removed',
          'WARNING',
          'Row access policy gov.rap was removed. Row access policy was removed from the table definition.'
        ]
      ]);
    });

    it('strips column tags and masking policies and converts the column types', () => {
      const review = new ManualReviewCollector('20240501_100000');
      const columnRules = createRuleSet(
        { with_property_removal: { enabled: true } },
        {
          default: { VARCHAR: 'VARCHAR2', TIMESTAMP_NTZ: 'TIMESTAMP' },
          dynamic_rules: { VARCHAR: { max_size: 4000, overflow_type: 'CLOB' } },
          paramless_targets: ['CLOB']
        }
      );

      const result = transform(
        "CREATE TABLE t (a VARCHAR(5000) WITH TAG (pii = 'y'), b TIMESTAMP_NTZ WITH MASKING POLICY gov.mask_ts)",
        columnRules,
        review
      );

      expect(result.statements).toEqual(['CREATE TABLE t (\n  a CLOB,\n  b TIMESTAMP\n)']);
      expect(result.logs.map(entry => [entry.action, entry.details])).toEqual([
        ['dynamic_type_overflow', 'Column a: VARCHAR(5000) exceeds 4000, using CLOB.'],
        ['property_removed', "Removed tag list from column 't.a'."],
        ['property_removed', "Removed masking policy gov.mask_ts from column 't.b'."]
      ]);
      expect(review.getItems().map(item => [item.issue_type, item.severity, item.message])).toEqual([
        [
          'Masking_policy_removed',
          'WARNING',
          'Masking policy gov.mask_ts on t.b was removed. Column masking policy was removed from the table definition.'
        ]
      ]);
    });

    it('drops any property whose text contains TAG and removes the emptied list', () => {
      const result = transform('CREATE TABLE t (a INT) STAGE_FILE_FORMAT = (TYPE = CSV)', rules);

      expect(result.statements).toEqual(['CREATE TABLE t (\n  a INT\n)']);
      expect(result.logs.map(entry => entry.details)).toEqual(["Removed property STAGE_FILE_FORMAT = (TYPE = CSV) from 't'."]);
    });
  });

  describe('comments', () => {
    const sql =
      "CREATE TABLE sales.orders (id NUMBER COMMENT 'Order''s id', note VARCHAR(10) COMMENT 'Customer''s note') COMMENT = 'Tom''s orders'";

    it('emits one COMMENT statement per extracted comment with quotes escaped', () => {
      const result = transform(sql, createRuleSet({ comment_conversion: { enabled: true } }, {}));

      expect(result.statements).toEqual([
        'CREATE TABLE sales.orders (\n  id NUMBER,\n  note VARCHAR(10)\n)',
        "COMMENT ON TABLE sales.orders IS 'Tom''s orders'",
        "COMMENT ON COLUMN sales.orders.id IS 'Order''s id'",
        "COMMENT ON COLUMN sales.orders.note IS 'Customer''s note'"
      ]);
      expect(result.logs.map(entry => entry.details)).toEqual(["Extracted 3 comment(s) from 'sales.orders'."]);
    });

    it('uses the configured templates', () => {
      const rules = createRuleSet(
        { comment_conversion: { enabled: true, target_column_template: '/* {column_name} */ {comment_text}' } },
        {}
      );
      const result = transform("CREATE TABLE t (a INT COMMENT 'x')", rules);
      expect(result.statements[1]).toBe('/* a */ x');
    });

    it('drops the comments and says so while conversion is disabled', () => {
      const result = transform(sql, createRuleSet({}, {}));

      expect(result.statements).toEqual(['CREATE TABLE sales.orders (\n  id NUMBER,\n  note VARCHAR(10)\n)']);
      expect(result.logs.map(entry => entry.action)).toEqual(['comment_extracted', 'comments_dropped']);
      expect(result.logs[1].details).toBe(
        "Comment conversion is disabled; 3 comment(s) on 'sales.orders' were not converted."
      );
    });
  });

  it('turns an unexpected failure into a commented error marker', () => {
    class FailingAliases extends Map<string, string> {
      override keys(): never {
        throw new Error('boom');
      }
    }
    const rules = { ...createRuleSet({}, {}), outputAliases: new FailingAliases([['INT', 'INTEGER']]) };
    const sql = 'CREATE TABLE t (\n  a INT\n)';

    const result = new DDLTransformer(rules, snowflake, oracle).transform(table(sql), { fileName: 'orders.sql', sql });

    expect(result.failed).toBe(true);
    expect(result.statements).toEqual(['-- ERROR: Error handling statement: boom. SQL: CREATE TABLE t (\n--   a INT\n-- )']);
    expect(result.logs).toEqual([
      { action: 'error', details: `Error handling statement: boom. SQL: ${sql}`, file: 'orders.sql' }
    ]);
  });
});

describe('errorMarker', () => {
  it('comments out every line', () => {
    expect(errorMarker('bad', 'SELECT\n1')).toBe('-- ERROR: Error handling statement: bad. SQL: SELECT\n-- 1');
  });
});
