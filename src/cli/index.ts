import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import { createRequire } from 'node:module';
import path from 'node:path';
import type { IConfig, LogLevel, RunOptions } from '../types/index.js';
import { ConfigStore } from '../core/config/ConfigStore.js';
import { DATE_SOURCES, isDateSource } from '../core/datetime/FallbackClock.js';
import { Logger } from '../core/log/Logger.js';
import { NormalizeService } from '../core/NormalizeService.js';
import { ScreenManager } from '../tui/ScreenManager.js';
import { explanation } from './explain.js';

type CliOptions = {
  recursive?: boolean;
  interactive?: boolean;
  dryRun?: boolean;
  verbose: number;
  quiet?: boolean;
  discardExistingName?: boolean;
  prefixDate: boolean;
  addTime?: boolean;
  dateSource?: string;
  lowercaseExtension: boolean;
  maxYearsBehind?: number;
  maxYearsAhead?: number;
  exclude?: string[];
  undoLog?: string | boolean;
  explain?: boolean;
  version?: boolean;
};

function parseYears(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0 || n > 1000) {
    throw new InvalidArgumentError('expected a whole number of years between 0 and 1000');
  }
  return n;
}

function countVerbose(_value: string, previous: number): number {
  return previous + 1;
}

export function buildProgram(): Command {
  return new Command()
    .name('normalize-filename')
    .description('Rewrite file names to a canonical date-prefixed form')
    .argument('[paths...]', 'files or directories to rename')
    .option('-r, --recursive', 'descend into directories')
    .option('-i, --interactive', 'ask before every rename')
    .option('-n, --dry-run', 'print what would be renamed, change nothing')
    .option('-v, --verbose', 'more output (repeat for debug)', countVerbose, 0)
    .option('-q, --quiet', 'only report errors')
    .option('--discard-existing-name', 'keep only the date prefix')
    .option('--no-prefix-date', 'do not add or move a date prefix')
    .option('--add-time', 'add the time when the prefix comes from a timestamp')
    .addOption(
      new Option('--date-source <source>', 'instant used for names without a date').choices([...DATE_SOURCES])
    )
    .option('--no-lowercase-extension', 'keep the extension as it is')
    .option('--max-years-behind <n>', 'oldest year recognised, relative to now', parseYears)
    .option('--max-years-ahead <n>', 'newest year recognised, relative to now (exclusive)', parseYears)
    .option('--exclude <globs...>', 'basenames to leave alone')
    .option('--undo-log <file>', 'where to append undo commands')
    .option('--no-undo-log', 'do not write an undo log')
    .option('--explain', 'describe what the tool does and exit')
    .option('--version', 'print version')
    .exitOverride()
    .allowUnknownOption(false);
}

/**
 * Flags given on the command line win over the config file; flags left out keep the file's value.
 */
export function applyOverrides(base: IConfig, program: Command): IConfig {
  const opts = program.opts<CliOptions>();
  const given = (key: keyof CliOptions) => program.getOptionValueSource(key) === 'cli';
  const cfg: IConfig = { ...base, exclude: [...base.exclude] };
  if (given('prefixDate')) cfg.prefixDate = opts.prefixDate;
  if (given('discardExistingName')) cfg.discardExistingName = opts.discardExistingName === true;
  if (given('addTime')) cfg.addTime = opts.addTime === true;
  if (given('dateSource') && isDateSource(opts.dateSource)) cfg.dateSource = opts.dateSource;
  if (given('lowercaseExtension')) cfg.lowercaseExtension = opts.lowercaseExtension;
  if (opts.maxYearsBehind !== undefined) cfg.maxYearsBehind = opts.maxYearsBehind;
  if (opts.maxYearsAhead !== undefined) cfg.maxYearsAhead = opts.maxYearsAhead;
  if (opts.exclude) cfg.exclude.push(...opts.exclude);
  if (opts.undoLog === false) cfg.undoLog = null;
  else if (typeof opts.undoLog === 'string') cfg.undoLog = path.resolve(opts.undoLog);
  return cfg;
}

function logLevel(opts: CliOptions): LogLevel {
  if (opts.quiet) return 'error';
  if (opts.verbose >= 2) return 'debug';
  if (opts.verbose === 1) return 'info';
  return 'warn';
}

/** Returns the process exit status: 0 success, 1 some entries failed, 2 usage error. */
export async function run(argv: string[] = process.argv.slice(2)): Promise<number> {
  const program = buildProgram();
  try {
    program.parse(argv, { from: 'user' });
  } catch (err: unknown) {
    if (err instanceof CommanderError) {
      return err.code === 'commander.helpDisplayed' ? 0 : 2;
    }
    throw err;
  }
  const opts = program.opts<CliOptions>();

  if (opts.version) {
    const require = createRequire(import.meta.url);
    const pkg: { version: string } = require('../../package.json');
    process.stdout.write(`${pkg.version}\n`);
    return 0;
  }

  if (opts.explain) {
    process.stdout.write(explanation.trimStart());
    return 0;
  }

  const paths = program.args;
  if (paths.length === 0) {
    process.stderr.write('error: no files or directories given\n');
    return 2;
  }
  if (opts.interactive && !process.stdin.isTTY) {
    process.stderr.write('error: --interactive needs a terminal\n');
    return 2;
  }

  const logger = new Logger({ level: logLevel(opts) });
  const prompter = opts.interactive ? new ScreenManager() : undefined;
  try {
    const config = applyOverrides(await new ConfigStore(logger).get(), program);
    const runOptions: RunOptions = {
      recursive: opts.recursive === true,
      interactive: opts.interactive === true,
      dryRun: opts.dryRun === true
    };
    const service = new NormalizeService(config, runOptions, { logger, prompter });
    service.on('file', (event) => {
      if (event.kind === 'preview') process.stdout.write(`${event.file} -> ${event.target}\n`);
    });
    const summary = await service.run(paths);
    logger.info('done', { ...summary });
    return summary.failed > 0 ? 1 : 0;
  } finally {
    prompter?.dispose();
    await logger.dispose();
  }
}
