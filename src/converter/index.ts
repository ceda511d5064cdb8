import fs from 'fs-extra';
import path from 'path';
import { config } from '../config';
import type { ParsedStatement } from '../grammar/ast';
import { getDialect, UnsupportedDialectError, type Dialect } from '../grammar/dialects';
import { registerGrammarExtensions } from '../grammar/extensions';
import { createLogger, errorMessage } from '../lib/logger';
import { loadRuleSet, type RuleSet } from '../rules/ruleSet';
import type {
  ConversionLogEntry,
  ConversionOptions,
  ConversionStatistics,
  FileResult,
  RunResult,
  RunSummary
} from '../types/sql';
import { buildCleanupScript, CLEANUP_SCRIPT_FILE } from './cleanupScript';
import { ManualReviewCollector } from './manualReview';
import { SQLParser } from './parser';
import { normalizeSource, stripProceduralBlocks } from './preprocess';
import { StatementRouter } from './statementRouter';
import { DDLTransformer } from './transformers/ddlTransformer';

const logger = createLogger('orchestrator');

export const SUMMARY_FILE = 'conversion_summary.json';
export const NO_INPUT_MESSAGE = 'No SQL files found in the source directory.';

export interface OrchestratorSettings {
  sourceDialect: Dialect;
  targetDialect: Dialect;
  rules: RuleSet;
  generateCleanup?: boolean;
  outputDir?: string;
  now?: () => Date;
}

interface RunContext {
  parser: SQLParser;
  router: StatementRouter;
  statistics: ConversionStatistics;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local time as `YYYYMMDD_HHMMSS`. */
export function runTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

/** Terminates every statement, separates them with a blank line and ends the file with a newline. */
export function joinStatements(statements: string[]): string {
  const body = statements
    .map(statement => statement.trim().replace(/;+$/, ''))
    .filter(Boolean)
    .join(';\n\n');
  return `${body};\n`.replace(/\r\n?/g, '\n');
}

function emptyStatistics(): ConversionStatistics {
  return {
    files_processed: 0,
    files_converted: 0,
    files_skipped: 0,
    files_failed: 0,
    statements_converted: 0,
    statements_skipped: 0,
    statements_with_errors: 0
  };
}

function errorResult(message: string, outputDir: string | null = null): RunResult {
  return { status: 'error', message, outputDir, fileResults: [], summaryFilePath: null };
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}

/**
 * Runs one conversion over a directory of SQL scripts:
 * discover files, convert each one, then write the cleanup script, review report and summary.
 */
export class ConversionOrchestrator {
  private readonly now: () => Date;

  constructor(private readonly settings: OrchestratorSettings) {
    this.now = settings.now ?? (() => new Date());
  }

  public async convert(sourceDir: string): Promise<RunResult> {
    let files: string[];
    try {
      files = await this.discover(sourceDir);
    } catch (error) {
      logger.error(`Cannot read source directory ${sourceDir}: ${errorMessage(error)}`);
      return errorResult(`Cannot read source directory ${sourceDir}: ${errorMessage(error)}`);
    }

    if (files.length === 0) {
      logger.warn(`No SQL files in ${sourceDir}`);
      return errorResult(NO_INPUT_MESSAGE);
    }

    const timestamp = runTimestamp(this.now());
    let outputDir: string;
    try {
      outputDir = await this.createOutputDir(sourceDir, timestamp);
    } catch (error) {
      logger.error(`Cannot create output directory: ${errorMessage(error)}`);
      return errorResult(`Cannot create output directory: ${errorMessage(error)}`);
    }

    const { sourceDialect, targetDialect, rules } = this.settings;
    const review = new ManualReviewCollector(timestamp, this.now);
    const parser = new SQLParser(sourceDialect, { errorLevel: 'ignore' });
    const ddl = new DDLTransformer(rules, sourceDialect, targetDialect, review);
    const context: RunContext = {
      parser,
      router: new StatementRouter(parser, ddl, targetDialect, review),
      statistics: emptyStatistics()
    };

    logger.info(`Converting ${files.length} file(s) from ${sourceDialect.name} to ${targetDialect.name} into ${outputDir}`);

    // Sequential: statistics and the review sink are shared across files
    const fileResults: FileResult[] = [];
    for (const filePath of files) {
      const result = await this.processFile(filePath, outputDir, context);
      fileResults.push(result);
    }

    try {
      const cleanupScriptPath = this.settings.generateCleanup ? await this.writeCleanupScript(fileResults, outputDir) : null;
      const manualReviewReportPath = await review.flush(outputDir);
      if (manualReviewReportPath) {
        logger.warn(review.renderReport());
      }

      const summary: RunSummary = {
        statistics: context.statistics,
        files: fileResults,
        outputDir,
        cleanupScriptPath,
        manualReviewReportPath
      };
      const summaryFilePath = path.join(outputDir, SUMMARY_FILE);
      await fs.writeJson(summaryFilePath, summary, { spaces: 2 });

      const allFailed = fileResults.every(result => result.status === 'error');
      logger.info(`Conversion finished: ${JSON.stringify(context.statistics)}`);
      return {
        status: allFailed ? 'error' : 'success',
        message: `Conversion finished for ${fileResults.length} files.`,
        outputDir,
        fileResults: fileResults.map(({ fileName, status, message }) => ({ fileName, status, message })),
        summaryFilePath,
        cleanupScriptPath,
        manualReviewReportPath
      };
    } catch (error) {
      logger.error(`Failed to write run artifacts to ${outputDir}: ${errorMessage(error)}`);
      return errorResult(`Failed to write run artifacts: ${errorMessage(error)}`, outputDir);
    }
  }

  private async discover(sourceDir: string): Promise<string[]> {
    const entries = await fs.readdir(sourceDir, { withFileTypes: true });
    return entries
      .filter(entry => entry.isFile() && entry.name.toLowerCase().endsWith('.sql'))
      .map(entry => entry.name)
      .sort()
      .map(name => path.join(sourceDir, name));
  }

  private async createOutputDir(sourceDir: string, timestamp: string): Promise<string> {
    if (this.settings.outputDir) {
      await fs.ensureDir(this.settings.outputDir);
      return this.settings.outputDir;
    }

    const parent = path.join(path.dirname(path.resolve(sourceDir)), 'converted');
    await fs.ensureDir(parent);
    for (let attempt = 0; ; attempt++) {
      const candidate = path.join(parent, attempt === 0 ? timestamp : `${timestamp}_${attempt}`);
      try {
        await fs.mkdir(candidate);
        return candidate;
      } catch (error) {
        if (!isAlreadyExists(error)) throw error;
      }
    }
  }

  private async processFile(filePath: string, outputDir: string, context: RunContext): Promise<FileResult> {
    const fileName = path.basename(filePath);
    const { statistics } = context;
    const result: FileResult = { fileName, status: 'success', message: '', statements: [], logs: [], outputFile: null };
    statistics.files_processed++;

    const fail = (message: string): FileResult => {
      logger.error(message);
      statistics.files_failed++;
      result.status = 'error';
      result.message = message;
      result.logs.push({ action: 'error', details: message, file: fileName });
      return result;
    };

    let statements: ParsedStatement[];
    try {
      let content = normalizeSource(await fs.readFile(filePath, 'utf8'));
      if (this.settings.rules.behaviors.stripProceduralBlocks.enabled) {
        content = stripProceduralBlocks(content);
      }
      statements = context.parser.parse(content);
    } catch (error) {
      return fail(`Failed to read or parse ${fileName}: ${errorMessage(error)}`);
    }

    const kept = statements.filter(statement => !this.shouldSkip(statement, fileName, result.logs, statistics));
    if (kept.length === 0) {
      statistics.files_skipped++;
      result.status = 'skipped';
      result.message = `No convertible statements found in ${fileName}`;
      logger.info(result.message);
      return result;
    }

    for (const statement of kept) {
      const conversion = context.router.route(statement, fileName);
      result.statements.push(...conversion.statements);
      result.logs.push(...conversion.logs);
      if (conversion.failed) {
        statistics.statements_with_errors++;
      } else {
        statistics.statements_converted++;
      }
    }

    const outputFile = path.join(outputDir, fileName);
    try {
      await fs.outputFile(outputFile, joinStatements(result.statements), 'utf8');
    } catch (error) {
      return fail(`Failed to write ${outputFile}: ${errorMessage(error)}`);
    }

    statistics.files_converted++;
    result.outputFile = outputFile;
    result.message = `Converted ${kept.length} statement(s)`;
    logger.info(`${fileName}: ${result.message}`);
    return result;
  }

  private shouldSkip(
    statement: ParsedStatement,
    fileName: string,
    logs: ConversionLogEntry[],
    statistics: ConversionStatistics
  ): boolean {
    const pattern = this.settings.rules.skipPatterns.find(candidate => candidate.test(statement.textWithoutComments));
    if (!pattern) return false;

    statistics.statements_skipped++;
    const preview = statement.textWithoutComments.slice(0, 80);
    logs.push({ action: 'skipped', details: `Skipped statement matching ${pattern.source}: ${preview}`, file: fileName });
    logger.debug(`Skipping statement in ${fileName} (line ${statement.lineNumber}) matching ${pattern.source}`);
    return true;
  }

  private async writeCleanupScript(fileResults: FileResult[], outputDir: string): Promise<string | null> {
    const converted = fileResults.filter(result => result.status === 'success').flatMap(result => result.statements);
    const script = buildCleanupScript(converted, this.settings.targetDialect);
    if (!script) {
      logger.info('No created objects found; cleanup script not written');
      return null;
    }
    const scriptPath = path.join(outputDir, CLEANUP_SCRIPT_FILE);
    await fs.outputFile(scriptPath, script, 'utf8');
    return scriptPath;
  }
}

/**
 * Converts every `*.sql` file in `sourceDir` from one dialect to another.
 * Always resolves with a RunResult; problems are reported through its status and message.
 */
export async function convert(
  sourceDialect: string,
  targetDialect: string,
  sourceDir: string,
  generateCleanup = false,
  options: ConversionOptions = {}
): Promise<RunResult> {
  let source: Dialect;
  let target: Dialect;
  try {
    registerGrammarExtensions();
    source = getDialect(sourceDialect);
    target = getDialect(targetDialect);
  } catch (error) {
    if (error instanceof UnsupportedDialectError) {
      logger.error(error.message);
      return errorResult(error.message);
    }
    throw error;
  }

  const rules = await loadRuleSet({
    sourceDialect: source.name,
    targetDialect: target.name,
    configRoot: options.configRoot,
    targetVersion: options.targetVersion ?? config.defaultTargetVersion
  });

  const orchestrator = new ConversionOrchestrator({
    sourceDialect: source,
    targetDialect: target,
    rules,
    generateCleanup: options.generateCleanup ?? generateCleanup,
    outputDir: options.outputDir,
    now: options.now
  });
  return orchestrator.convert(sourceDir);
}
