import { z } from 'zod';

export const DEFAULT_TABLE_COMMENT_TEMPLATE = "COMMENT ON TABLE {table_name} IS '{comment_text}'";
export const DEFAULT_COLUMN_COMMENT_TEMPLATE = "COMMENT ON COLUMN {table_name}.{column_name} IS '{comment_text}'";
const DEFAULT_DYNAMIC_MAX_SIZE = 4000;

const ToggleSchema = z.object({
  enabled: z.boolean().default(false)
});

export const DialectBehaviorsSchema = z.object({
  virtual_column_conversion: ToggleSchema.default({}),
  clause_removal: ToggleSchema.extend({
    clauses: z.array(z.string()).default([])
  }).default({}),
  with_property_removal: ToggleSchema.extend({
    properties: z.array(z.string()).default([])
  }).default({}),
  comment_conversion: ToggleSchema.extend({
    target_table_template: z.string().default(DEFAULT_TABLE_COMMENT_TEMPLATE),
    target_column_template: z.string().default(DEFAULT_COLUMN_COMMENT_TEMPLATE)
  }).default({}),
  statement_skipping: ToggleSchema.extend({
    patterns: z.array(z.string()).default([])
  }).default({}),
  strip_procedural_blocks: z
    .union([z.boolean(), ToggleSchema])
    .default(false)
    .transform(value => (typeof value === 'boolean' ? { enabled: value } : value))
});

const TypeMapSchema = z.record(z.string());

const DynamicRuleSchema = z.object({
  max_size: z.number().int().positive().default(DEFAULT_DYNAMIC_MAX_SIZE),
  overflow_type: z.string().optional(),
  template: z.string().optional()
});

export const DataTypesSchema = z.object({
  default: TypeMapSchema.default({}),
  version_overrides: z.record(z.object({ default: TypeMapSchema.default({}) })).default({}),
  dynamic_rules: z.record(DynamicRuleSchema).default({}),
  paramless_targets: z.array(z.string()).default([]),
  output_aliases: TypeMapSchema.default({})
});

export type DialectBehaviorsDocument = z.infer<typeof DialectBehaviorsSchema>;
export type DataTypesDocument = z.infer<typeof DataTypesSchema>;
