export { convert, ConversionOrchestrator, joinStatements, runTimestamp, SUMMARY_FILE } from './converter';
export type { OrchestratorSettings } from './converter';
export { buildCleanupScript, collectCreatedObjects, CLEANUP_SCRIPT_FILE } from './converter/cleanupScript';
export { ManualReviewCollector } from './converter/manualReview';
export type { ManualReviewReport, ReviewRecord } from './converter/manualReview';
export { SQLParser } from './converter/parser';
export { StatementRouter } from './converter/statementRouter';
export { transpileSQL, TranspileError } from './converter/transpiler';
export { DDLTransformer, TypeConversionError, errorMarker } from './converter/transformers/ddlTransformer';
export type { DDLContext } from './converter/transformers/ddlTransformer';
export { createDialect, getDialect, resolveDialectName, DIALECT_NAMES, UnsupportedDialectError } from './grammar/dialects';
export type { Dialect, DialectName } from './grammar/dialects';
export { registerGrammarExtensions, stripUnparseableClauses } from './grammar/extensions';
export { TokenizeError } from './grammar/tokenizer';
export { ParseError } from './grammar/tokenStream';
export type * from './grammar/ast';
export { loadRuleDocument, ruleDocumentPath, DDL_RULES_CATEGORY } from './rules/configLoader';
export { createRuleSet, emptyRuleSet, loadRuleSet } from './rules/ruleSet';
export type { BehaviorConfig, DynamicRule, RuleSet } from './rules/ruleSet';
export type * from './types/sql';
