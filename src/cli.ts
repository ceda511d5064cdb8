#!/usr/bin/env node

import { Command } from 'commander';
import path from 'path';
import { convert } from './converter';
import { DIALECT_NAMES } from './grammar/dialects';
import { createLogger, errorMessage } from './lib/logger';

const logger = createLogger('cli');

interface ConvertCommandOptions {
  from: string;
  to: string;
  source: string;
  cleanup?: boolean;
  targetVersion?: string;
  configRoot?: string;
  output?: string;
}

const program = new Command();

program
  .name('sql-dialect-convert')
  .description('Convert directories of SQL scripts between database dialects')
  .version('1.0.0');

program
  .command('convert')
  .description('Convert every *.sql file in a directory')
  .requiredOption('--from <dialect>', `Source dialect (${DIALECT_NAMES.join(', ')})`)
  .requiredOption('--to <dialect>', 'Target dialect')
  .requiredOption('--source <dir>', 'Directory holding the source *.sql files')
  .option('--cleanup', 'Also write 00_cleanup.sql dropping every created object', false)
  .option('--target-version <version>', 'Target version used to select type overrides')
  .option('--config-root <dir>', 'Root directory of the conversion rule bundles')
  .option('--output <dir>', 'Output directory (default: converted/<timestamp> beside the source directory)')
  .action(async (options: ConvertCommandOptions) => {
    const result = await convert(options.from, options.to, path.resolve(options.source), options.cleanup ?? false, {
      targetVersion: options.targetVersion,
      configRoot: options.configRoot ? path.resolve(options.configRoot) : undefined,
      outputDir: options.output ? path.resolve(options.output) : undefined
    });

    console.log(JSON.stringify(result, null, 2));
    if (result.manualReviewReportPath) {
      console.log(`Manual review required, see ${result.manualReviewReportPath}`);
    }
    if (result.status === 'error') {
      process.exitCode = 1;
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error(errorMessage(error));
  process.exitCode = 1;
});
