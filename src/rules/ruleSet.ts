import type { z, ZodError, ZodTypeAny } from 'zod';
import { createLogger, errorMessage } from '../lib/logger';
import { buildTypeNameMap, normalizeTypeName, type TypeNameMap } from '../mappings/dataTypes';
import { DDL_RULES_CATEGORY, loadRuleDocument } from './configLoader';
import {
  DataTypesSchema,
  DialectBehaviorsSchema,
  type DataTypesDocument,
  type DialectBehaviorsDocument
} from './schemas';

const logger = createLogger('rule-set');

export const BEHAVIORS_FILE = 'dialect_behaviors.json';
export const DATA_TYPES_FILE = 'data_types.json';

export interface BehaviorConfig {
  virtualColumnConversion: { enabled: boolean };
  clauseRemoval: { enabled: boolean; clauses: string[] };
  withPropertyRemoval: { enabled: boolean; properties: string[] };
  commentConversion: { enabled: boolean; tableTemplate: string; columnTemplate: string };
  statementSkipping: { enabled: boolean; patterns: string[] };
  stripProceduralBlocks: { enabled: boolean };
}

export interface DynamicRule {
  maxSize: number;
  overflowType?: string;
  template?: string;
}

export interface RuleSet {
  behaviors: BehaviorConfig;
  typeMap: TypeNameMap<string>;
  dynamicRules: TypeNameMap<DynamicRule>;
  paramlessTargets: Set<string>;
  outputAliases: TypeNameMap<string>;
  skipPatterns: RegExp[];
}

export interface RuleSetOptions {
  targetVersion?: string;
}

export interface RuleSetRequest extends RuleSetOptions {
  sourceDialect: string;
  targetDialect: string;
  configRoot?: string;
}

function describeIssues(error: ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`).join('; ');
}

function validate<S extends ZodTypeAny>(schema: S, document: unknown, label: string): z.output<S> {
  const result = schema.safeParse(document);
  if (result.success) {
    return result.data;
  }
  logger.error(`Invalid ${label}, falling back to empty rules: ${describeIssues(result.error)}`);
  return schema.parse({});
}

function toBehaviorConfig(document: DialectBehaviorsDocument): BehaviorConfig {
  return {
    virtualColumnConversion: { enabled: document.virtual_column_conversion.enabled },
    clauseRemoval: {
      enabled: document.clause_removal.enabled,
      clauses: document.clause_removal.clauses.map(normalizeTypeName)
    },
    withPropertyRemoval: {
      enabled: document.with_property_removal.enabled,
      properties: document.with_property_removal.properties.map(normalizeTypeName)
    },
    commentConversion: {
      enabled: document.comment_conversion.enabled,
      tableTemplate: document.comment_conversion.target_table_template,
      columnTemplate: document.comment_conversion.target_column_template
    },
    statementSkipping: {
      enabled: document.statement_skipping.enabled,
      patterns: document.statement_skipping.patterns
    },
    stripProceduralBlocks: { enabled: document.strip_procedural_blocks.enabled }
  };
}

function compileSkipPatterns(behaviors: BehaviorConfig): RegExp[] {
  if (!behaviors.statementSkipping.enabled) return [];

  const patterns: RegExp[] = [];
  for (const source of behaviors.statementSkipping.patterns) {
    try {
      patterns.push(new RegExp(source, 'i'));
    } catch (error) {
      logger.error(`Ignoring invalid skip pattern ${JSON.stringify(source)}: ${errorMessage(error)}`);
    }
  }
  return patterns;
}

function typeMapFor(document: DataTypesDocument, targetVersion: string | undefined): TypeNameMap<string> {
  if (!targetVersion) {
    return buildTypeNameMap(document.default);
  }
  const override = document.version_overrides[targetVersion];
  if (!override) {
    logger.warn(`No type overrides for target version ${targetVersion}; using default type map`);
    return buildTypeNameMap(document.default);
  }
  return buildTypeNameMap(document.default, override.default);
}

/** Builds the typed rule set from raw JSON documents. Invalid documents degrade to empty ones. */
export function createRuleSet(behaviorsDocument: unknown, dataTypesDocument: unknown, options: RuleSetOptions = {}): RuleSet {
  const behaviors = toBehaviorConfig(validate(DialectBehaviorsSchema, behaviorsDocument, BEHAVIORS_FILE));
  const dataTypes = validate(DataTypesSchema, dataTypesDocument, DATA_TYPES_FILE);

  const dynamicRules: Record<string, DynamicRule> = {};
  for (const [typeName, rule] of Object.entries(dataTypes.dynamic_rules)) {
    dynamicRules[typeName] = {
      maxSize: rule.max_size,
      overflowType: rule.overflow_type,
      template: rule.template
    };
  }

  return {
    behaviors,
    typeMap: typeMapFor(dataTypes, options.targetVersion),
    dynamicRules: buildTypeNameMap(dynamicRules),
    paramlessTargets: new Set(dataTypes.paramless_targets.map(normalizeTypeName)),
    outputAliases: buildTypeNameMap(dataTypes.output_aliases),
    skipPatterns: compileSkipPatterns(behaviors)
  };
}

export function emptyRuleSet(): RuleSet {
  return createRuleSet({}, {});
}

export async function loadRuleSet(request: RuleSetRequest): Promise<RuleSet> {
  const base = {
    sourceDialect: request.sourceDialect,
    targetDialect: request.targetDialect,
    category: DDL_RULES_CATEGORY,
    configRoot: request.configRoot
  };
  const [behaviors, dataTypes] = await Promise.all([
    loadRuleDocument({ ...base, fileName: BEHAVIORS_FILE }),
    loadRuleDocument({ ...base, fileName: DATA_TYPES_FILE })
  ]);
  return createRuleSet(behaviors, dataTypes, { targetVersion: request.targetVersion });
}
