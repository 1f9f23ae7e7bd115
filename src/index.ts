import fs from 'fs/promises';
import path from 'path';

import {
  loadConfig,
  resolveConfig,
  saveConfig,
  ShotsortConfig,
  ShotsortConfigError,
} from './config';
import { createContext, OrganizerContext } from './context';
import { getLogger, Logger } from './logger';
import { ProgressListener, ProgressPhase } from './types/Report';
import { isDirectory } from './utils/fsOps';
import { getDefaultConfigPath } from './utils/stateDir';
import { formatCopySummary, formatOrganizeSummary, toCopyStatsDocument } from './utils/summary';
import { AutoCopyDaemon } from './watcher';
import { OrganizePipeline } from './workflow/organize';
import { SuperCopyPipeline } from './workflow/superCopy';

const VERSION = '0.7.0';

export class ShotsortCliError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ShotsortCliError';
  }
}

/** A required source or target path is unset or does not exist */
export class SourceUnavailableError extends ShotsortCliError {
  constructor(message: string) {
    super(message);
    this.name = 'SourceUnavailableError';
  }
}

type CommandName = 'organize' | 'scan' | 'copy' | 'daemon' | 'validate' | 'init';

const COMMANDS: readonly CommandName[] = [
  'organize',
  'scan',
  'copy',
  'daemon',
  'validate',
  'init',
];

export type CommandOptions = {
  config?: string;
  source?: string;
  output?: string;
  dryRun?: boolean;
  json?: boolean;
  force?: boolean;
};

export type ParsedArgs = { command: CommandName; options: CommandOptions };

/** Where the CLI writes; swapped out by tests */
export interface CliIo {
  logger?: Logger;
  print?: (line: string) => void;
}

/**
 * Run the CLI and return the process exit code.
 */
export async function runCli(
  argv: string[] = process.argv,
  io: CliIo = {}
): Promise<number> {
  const args = argv.slice(2);
  const print = io.print ?? ((line: string) => console.log(line));

  if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
    printHelp(print);
    return 0;
  }

  if (args.includes('--version') || args.includes('-v')) {
    print(VERSION);
    return 0;
  }

  const logger = io.logger ?? getLogger();
  try {
    const parsed = parseArgs(args);
    await runCommand(parsed, logger, print);
    return 0;
  } catch (error) {
    if (error instanceof ShotsortCliError || error instanceof ShotsortConfigError) {
      logger.error({ err: error.message }, error.message);
      return 1;
    }
    throw error;
  }
}

export function parseArgs(args: string[]): ParsedArgs {
  if (args.length === 0) {
    throw new ShotsortCliError(`Provide a command (${COMMANDS.join(' | ')}).`);
  }

  const [first, ...rest] = args;
  const command = COMMANDS.find(name => name === first);
  if (!command) {
    throw new ShotsortCliError(`Unknown command "${first}".`);
  }
  return { command, options: parseOptions(command, rest) };
}

function parseOptions(command: CommandName, tokens: string[]): CommandOptions {
  const options: CommandOptions = {};
  const takesPaths = command === 'organize' || command === 'scan' || command === 'copy';

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (!token.startsWith('-')) {
      throw new ShotsortCliError(`Unexpected argument "${token}".`);
    }
    const { flag, inlineValue } = splitFlagToken(token);
    switch (flag) {
      case '--config':
      case '-c': {
        const { value, nextIndex } = consumeOptionValue(flag, inlineValue, tokens, i);
        options.config = value;
        i = nextIndex;
        break;
      }
      case '--source':
      case '-s': {
        if (!takesPaths) {
          throw new ShotsortCliError(`Option ${flag} is not valid for '${command}'.`);
        }
        const { value, nextIndex } = consumeOptionValue(flag, inlineValue, tokens, i);
        options.source = value;
        i = nextIndex;
        break;
      }
      case '--output':
      case '--target':
      case '-o':
      case '-t': {
        if (!takesPaths) {
          throw new ShotsortCliError(`Option ${flag} is not valid for '${command}'.`);
        }
        const { value, nextIndex } = consumeOptionValue(flag, inlineValue, tokens, i);
        options.output = value;
        i = nextIndex;
        break;
      }
      case '--dry-run':
        options.dryRun = true;
        break;
      case '--json':
        options.json = true;
        break;
      case '--force':
        if (command !== 'init') {
          throw new ShotsortCliError(`Option ${flag} is only valid for 'init'.`);
        }
        options.force = true;
        break;
      default:
        throw new ShotsortCliError(`Unknown option "${flag}".`);
    }
  }
  return options;
}

function splitFlagToken(token: string): { flag: string; inlineValue?: string } {
  if (token.startsWith('--')) {
    const eqIndex = token.indexOf('=');
    if (eqIndex !== -1) {
      return { flag: token.slice(0, eqIndex), inlineValue: token.slice(eqIndex + 1) };
    }
  }
  return { flag: token };
}

function consumeOptionValue(
  flag: string,
  inlineValue: string | undefined,
  tokens: string[],
  currentIndex: number
): { value: string; nextIndex: number } {
  if (inlineValue !== undefined && inlineValue.length > 0) {
    return { value: inlineValue, nextIndex: currentIndex };
  }
  const nextToken = tokens[currentIndex + 1];
  if (!nextToken) {
    throw new ShotsortCliError(`Option ${flag} requires a value.`);
  }
  return { value: nextToken, nextIndex: currentIndex + 1 };
}

async function runCommand(
  parsed: ParsedArgs,
  logger: Logger,
  print: (line: string) => void
): Promise<void> {
  const { command, options } = parsed;
  const configPath = options.config
    ? path.resolve(options.config)
    : getDefaultConfigPath();

  if (command === 'init') {
    await handleInit(configPath, Boolean(options.force), logger);
    return;
  }

  const config = await loadConfig(configPath);
  if (command === 'validate') {
    printConfigSummary(config, logger);
    logger.info('Configuration looks good.');
    return;
  }

  const ctx = createContext(config, logger);
  switch (command) {
    case 'organize':
    case 'scan':
      await handleOrganize(ctx, command === 'scan', options, print);
      return;
    case 'copy':
      await handleCopy(ctx, options, print);
      return;
    case 'daemon':
      await handleDaemon(ctx);
      return;
  }
}

async function handleInit(configPath: string, force: boolean, logger: Logger): Promise<void> {
  if (!force && (await fileExists(configPath))) {
    throw new ShotsortCliError(
      `Config already exists at ${configPath}. Pass --force to overwrite it.`
    );
  }
  await saveConfig(resolveConfig({}, configPath), configPath);
  logger.info({ configPath }, 'Wrote default config.');
}

async function handleOrganize(
  ctx: OrganizerContext,
  scanOnly: boolean,
  options: CommandOptions,
  print: (line: string) => void
): Promise<void> {
  const source = options.source
    ? path.resolve(options.source)
    : ctx.config.sourcePath;
  if (!source) {
    throw new SourceUnavailableError(
      'No source path. Pass --source <dir> or set source_path in the config.'
    );
  }
  await requireDirectory(source, 'Source');

  const output = options.output ? path.resolve(options.output) : ctx.config.outputPath;
  const pipeline = new OrganizePipeline(ctx);
  const report = await pipeline.run({
    source,
    output: output || undefined,
    dryRun: Boolean(options.dryRun),
    scanOnly,
  });

  if (options.json) {
    print(JSON.stringify(report, null, 2));
  } else {
    formatOrganizeSummary(report).forEach(line => print(line));
  }
}

async function handleCopy(
  ctx: OrganizerContext,
  options: CommandOptions,
  print: (line: string) => void
): Promise<void> {
  const source = options.source
    ? path.resolve(options.source)
    : ctx.config.superCopySource;
  const target = options.output
    ? path.resolve(options.output)
    : ctx.config.superCopyTarget;
  if (!source || !target) {
    throw new SourceUnavailableError(
      'Super copy needs both --source and --target (or super_copy_source and super_copy_target in the config).'
    );
  }
  await requireDirectory(source, 'Source');

  const pipeline = new SuperCopyPipeline(ctx);
  const listener =
    !options.json && process.stderr.isTTY ? createTerminalProgress() : undefined;
  const stats = await pipeline.run({
    source,
    target,
    dryRun: Boolean(options.dryRun),
    listener,
  });

  if (options.json) {
    print(JSON.stringify(toCopyStatsDocument(stats), null, 2));
  } else {
    formatCopySummary(stats).forEach(line => print(line));
  }
}

async function handleDaemon(ctx: OrganizerContext): Promise<void> {
  const daemon = new AutoCopyDaemon(ctx);
  await daemon.start();
  ctx.logger.info('Auto copy active. Press Ctrl+C to stop.');
  await holdProcessOpen(daemon, ctx.logger);
}

function createTerminalProgress(): ProgressListener {
  return {
    onProgress(event) {
      const announce =
        (event.phase === ProgressPhase.PROGRESS && event.message) ||
        event.phase === ProgressPhase.VERIFY_FAIL;
      if (!announce) {
        return;
      }
      process.stderr.write(`[${event.current}/${event.total}] ${event.message}\n`);
    },
  };
}

function printConfigSummary(config: ShotsortConfig, logger: Logger): void {
  logger.info(
    {
      configPath: config.configPath,
      source: config.sourcePath || undefined,
      output: config.outputPath || undefined,
      superCopySource: config.superCopySource || undefined,
      superCopyTarget: config.superCopyTarget || undefined,
      moveFiles: config.moveFiles,
      duplicateStrategy: config.duplicateStrategy,
      unifiedNaming: config.unifiedNaming,
      useExiftool: config.useExiftool,
      autoCopy: config.autoCopy.enabled,
    },
    'Loaded shotsort config.'
  );
}

async function requireDirectory(dirPath: string, label: string): Promise<void> {
  if (!(await isDirectory(dirPath))) {
    throw new SourceUnavailableError(`${label} path does not exist or is not a directory: ${dirPath}`);
  }
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

async function holdProcessOpen(daemon: AutoCopyDaemon, logger: Logger): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    const handleSignal = (signal: NodeJS.Signals) => {
      logger.info({ signal }, 'Received shutdown signal.');
      cleanup();
      daemon.stop().then(resolve, reject);
    };
    const cleanup = () => {
      process.off('SIGINT', handleSignal);
      process.off('SIGTERM', handleSignal);
    };
    process.on('SIGINT', handleSignal);
    process.on('SIGTERM', handleSignal);
  });
}

function printHelp(print: (line: string) => void): void {
  print(`shotsort v${VERSION}`);
  print('Usage: shotsort <command> [options]\n');
  print('Commands:');
  print('  organize   Sort a folder tree into date/kind/device folders.');
  print('  scan       Show what organize would do, without touching files.');
  print('  copy       Copy into the organized layout with SHA-256 verification.');
  print('  daemon     Auto-copy mounted devices under auto_copy.watch_paths.');
  print('  validate   Check the config file and print a summary.');
  print('  init       Write a config file with the default settings.\n');
  print('Options:');
  print('  -c, --config <path>   Config file (default ~/.shotsort/config.json).');
  print('  -s, --source <dir>    Source folder (organize, scan, copy).');
  print('  -o, --output <dir>    Output folder; -t/--target for copy.');
  print('      --dry-run         Report actions without changing files.');
  print('      --json            Print the report as JSON.');
  print('      --force           Overwrite an existing config (init).');
  print('  -h, --help            Show this help message.');
  print('  -v, --version         Show CLI version.');
}

export { loadConfig, resolveConfig, ShotsortConfig, ShotsortConfigError };
export { createContext, OrganizerContext } from './context';
export { OrganizePipeline } from './workflow/organize';
export { SuperCopyPipeline } from './workflow/superCopy';
export { AutoCopyDaemon } from './watcher';
export * from './types/Report';
export { MediaKind } from './types/MediaKind';
