#!/usr/bin/env node
import { Command, CommanderError } from 'commander';
import packageJson from '../package.json';
import { config } from './config/env';
import { AppError, ValidationError } from './errors/AppErrors';
import { FilterOptionsSchema } from './models/FilterOptions';
import { RunSummary } from './models/Table';
import { tableReader, tableWriter } from './repositories';
import { FilterService } from './services/FilterService';
import { logger } from './utils/logger';
export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}
const processIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text)
};
export function buildProgram(io: CliIO = processIO): Command {
  return new Command()
    .name('rent-index-filter')
    .description('Filter Zillow ZORI city data to selected cities.')
    .version(packageJson.version)
    .option('--input <path>', 'Path to the raw Zillow ZORI CSV.', config.defaults.input)
    .option('--output <path>', 'Path to write the cleaned CSV.', config.defaults.output)
    .option('--long', 'Write a tidy/long dataset with one row per city per date.', false)
    .option('--cities <names...>', 'City names to keep.', config.defaults.cities)
    .exitOverride()
    .configureOutput({
      writeOut: io.stdout,
      writeErr: io.stderr
    });
}
export function formatSummary(summary: RunSummary): string {
  return `Filtered ${summary.kept} rows out of ${summary.total}. Output: ${summary.outputPath}`;
}

/**
 * Runs the CLI against user arguments (no node/script prefix) and returns
 * the process exit code.
 */
export function run(
  args: string[],
  io: CliIO = processIO,
  service: FilterService = new FilterService(tableReader, tableWriter)
): number {
  try {
    const program = buildProgram(io);
    program.parse(args, { from: 'user' });
    const parsed = FilterOptionsSchema.safeParse(program.opts());
    if (!parsed.success) {
      throw new ValidationError('Invalid arguments', parsed.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message
      })));
    }
    const summary = service.run(parsed.data);
    io.stdout(`${formatSummary(summary)}\n`);
    return 0;
  } catch (error) {
    return handleError(error, io);
  }
}
function handleError(error: unknown, io: CliIO): number {
  // Commander has already printed usage errors, help and version output
  if (error instanceof CommanderError) {
    return error.exitCode === 0 ? 0 : 2;
  }
  if (error instanceof AppError && error.isOperational) {
    logger.debug({ code: error.code, stack: error.stack }, error.message);
    const details = error instanceof ValidationError ? error.details.map((d) => `\n  ${d.path}: ${d.message}`).join('') : '';
    io.stderr(`${error.message}${details}\n`);
    return error.exitCode;
  }
  logger.error({ err: error }, 'Unexpected failure');
  io.stderr(`${error instanceof Error ? error.message : String(error)}\n`);
  return error instanceof AppError ? error.exitCode : 1;
}
if (require.main === module) {
  process.exitCode = run(process.argv.slice(2));
}
