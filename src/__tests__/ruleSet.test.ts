import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DDL_RULES_CATEGORY, loadRuleDocument, ruleDocumentPath } from '../rules/configLoader';
import { createRuleSet, emptyRuleSet, loadRuleSet } from '../rules/ruleSet';
import { DEFAULT_COLUMN_COMMENT_TEMPLATE, DEFAULT_TABLE_COMMENT_TEMPLATE } from '../rules/schemas';

describe('createRuleSet', () => {
  it('is inert without documents', () => {
    const rules = emptyRuleSet();

    expect(rules.behaviors).toEqual({
      virtualColumnConversion: { enabled: false },
      clauseRemoval: { enabled: false, clauses: [] },
      withPropertyRemoval: { enabled: false, properties: [] },
      commentConversion: {
        enabled: false,
        tableTemplate: DEFAULT_TABLE_COMMENT_TEMPLATE,
        columnTemplate: DEFAULT_COLUMN_COMMENT_TEMPLATE
      },
      statementSkipping: { enabled: false, patterns: [] },
      stripProceduralBlocks: { enabled: false }
    });
    expect(rules.typeMap.size).toBe(0);
    expect(rules.dynamicRules.size).toBe(0);
    expect(rules.paramlessTargets.size).toBe(0);
    expect(rules.skipPatterns).toEqual([]);
  });

  it('normalizes clause and property names', () => {
    const rules = createRuleSet(
      {
        clause_removal: { enabled: true, clauses: ['cluster   by'] },
        with_property_removal: { enabled: true, properties: ['change_tracking'] }
      },
      {}
    );
    expect(rules.behaviors.clauseRemoval.clauses).toEqual(['CLUSTER BY']);
    expect(rules.behaviors.withPropertyRemoval.properties).toEqual(['CHANGE_TRACKING']);
  });

  it('accepts the boolean form of strip_procedural_blocks', () => {
    expect(createRuleSet({ strip_procedural_blocks: true }, {}).behaviors.stripProceduralBlocks).toEqual({ enabled: true });
  });

  it('falls back to defaults when a document fails validation', () => {
    const rules = createRuleSet({ clause_removal: { enabled: 'yes' } }, { paramless_targets: 'CLOB' });
    expect(rules.behaviors.clauseRemoval.enabled).toBe(false);
    expect(rules.paramlessTargets.size).toBe(0);
  });

  it('compiles skip patterns case-insensitively and drops invalid ones', () => {
    const rules = createRuleSet({ statement_skipping: { enabled: true, patterns: ['^use\\b', '(['] } }, {});
    expect(rules.skipPatterns).toHaveLength(1);
    expect(rules.skipPatterns[0].test('USE WAREHOUSE wh')).toBe(true);
  });

  it('ignores skip patterns while skipping is disabled', () => {
    expect(createRuleSet({ statement_skipping: { enabled: false, patterns: ['^USE'] } }, {}).skipPatterns).toEqual([]);
  });

  it('merges the requested version override over the default type map', () => {
    const dataTypes = {
      default: { INT: 'NUMBER(38)', VARIANT: 'CLOB' },
      version_overrides: { '21c': { default: { VARIANT: 'JSON' } } }
    };

    const versioned = createRuleSet({}, dataTypes, { targetVersion: '21c' });
    expect(versioned.typeMap.get('VARIANT')).toBe('JSON');
    expect(versioned.typeMap.get('INT')).toBe('NUMBER(38)');

    expect(createRuleSet({}, dataTypes, { targetVersion: '99' }).typeMap.get('VARIANT')).toBe('CLOB');
  });

  it('defaults the dynamic rule threshold', () => {
    const rules = createRuleSet({}, { dynamic_rules: { varchar: { overflow_type: 'CLOB' } } });
    expect(rules.dynamicRules.get('VARCHAR')).toEqual({ maxSize: 4000, overflowType: 'CLOB', template: undefined });
  });
});

describe('configuration loading', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'rules-'));
  });

  afterEach(async () => {
    await fs.remove(root);
  });

  const request = (fileName: string) => ({
    sourceDialect: 'Snowflake',
    targetDialect: 'ORACLE',
    category: DDL_RULES_CATEGORY,
    fileName,
    configRoot: root
  });

  const ruleFile = (fileName: string) => path.join(root, 'snowflake_oracle', DDL_RULES_CATEGORY, fileName);

  it('builds a lower-cased pair path', () => {
    expect(ruleDocumentPath(request('data_types.json'))).toBe(ruleFile('data_types.json'));
  });

  it('returns an empty document for a missing file', async () => {
    expect(await loadRuleDocument(request('missing.json'))).toEqual({});
  });

  it('returns an empty document for malformed or non-object JSON', async () => {
    await fs.outputFile(ruleFile('broken.json'), '{ "default": ');
    await fs.outputFile(ruleFile('list.json'), '[1, 2]');

    expect(await loadRuleDocument(request('broken.json'))).toEqual({});
    expect(await loadRuleDocument(request('list.json'))).toEqual({});
  });

  it('loads a full rule set from disk', async () => {
    await fs.outputJson(ruleFile('dialect_behaviors.json'), { virtual_column_conversion: { enabled: true } });
    await fs.outputJson(ruleFile('data_types.json'), { default: { VARCHAR_NTZ: 'VARCHAR2' }, paramless_targets: ['clob'] });

    const rules = await loadRuleSet({ sourceDialect: 'snowflake', targetDialect: 'oracle', configRoot: root });

    expect(rules.behaviors.virtualColumnConversion.enabled).toBe(true);
    expect(rules.typeMap.get('VARCHARNTZ')).toBe('VARCHAR2');
    expect([...rules.paramlessTargets]).toEqual(['CLOB']);
  });
});
