import fs from 'fs-extra';
import path from 'path';
import { config } from '../config';
import { createLogger, errorMessage } from '../lib/logger';

const logger = createLogger('config-loader');

export const DDL_RULES_CATEGORY = 'ddl_conversion_rules';

export interface RuleDocumentRequest {
  sourceDialect: string;
  targetDialect: string;
  category: string;
  fileName: string;
  configRoot?: string;
}

export type RuleDocument = Record<string, unknown>;

function isRuleDocument(value: unknown): value is RuleDocument {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** `<root>/<source>_<target>/<category>/<fileName>`, or null when no root is configured. */
export function ruleDocumentPath(request: RuleDocumentRequest): string | null {
  const root = request.configRoot ?? config.conversionConfigRoot;
  if (!root) return null;
  const pair = `${request.sourceDialect.toLowerCase()}_${request.targetDialect.toLowerCase()}`;
  return path.join(root, pair, request.category, request.fileName);
}

/**
 * Loads one JSON rule document. Never throws: a missing file is expected and yields `{}`,
 * unreadable or malformed documents are logged and also yield `{}`.
 */
export async function loadRuleDocument(request: RuleDocumentRequest): Promise<RuleDocument> {
  const filePath = ruleDocumentPath(request);
  if (!filePath) {
    logger.error('No conversion config root configured; continuing without rules');
    return {};
  }

  try {
    if (!(await fs.pathExists(filePath))) {
      logger.info(`Rule file not found, using empty rules: ${filePath}`);
      return {};
    }

    const document: unknown = await fs.readJson(filePath);
    if (!isRuleDocument(document)) {
      logger.error(`Rule file ${filePath} must contain a JSON object`);
      return {};
    }
    return document;
  } catch (error) {
    logger.error(`Failed to load rule file ${filePath}: ${errorMessage(error)}`);
    return {};
  }
}
