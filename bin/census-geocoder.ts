#!/usr/bin/env node
/**
 * Census Geocoder CLI Entry Point
 *
 * Offline address and coordinate lookups against local TIGER/Line,
 * PL 94-171 and ACS files.
 *
 * @module census-geocoder-cli
 */

import { Command } from 'commander';
import { existsSync, readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

import { loadConfig, type CLIConfig } from '../src/cli/lib/config.js';
import { EXIT_CODES, exitCodeForError } from '../src/cli/lib/exit-codes.js';
import { createCLILogger, type CLILogger } from '../src/cli/lib/logger.js';
import { printError } from '../src/cli/lib/output.js';
import {
  openSession,
  parseCoordinateOption,
  parseFormatOption,
  parseGeoLevelOption,
  parseIntegerOption,
  type CommandResult,
  type GeocoderSession,
} from '../src/cli/lib/session.js';
import { setLogLevel } from '../src/core/utils/logger.js';

import { batchCommand, parseBatchFormatOption } from '../src/cli/commands/batch.js';
import { coordsCommand } from '../src/cli/commands/coords.js';
import { infoCommand } from '../src/cli/commands/info.js';
import { lookupCommand } from '../src/cli/commands/lookup.js';
import { variablesCommand } from '../src/cli/commands/variables.js';

// ============================================================================
// Global State
// ============================================================================

interface GlobalContext {
  config: CLIConfig;
  logger: CLILogger;
  startTime: number;
}

interface GlobalOptions {
  verbose?: boolean;
  json?: boolean;
  config?: string;
  dataDir?: string;
  concurrency?: number;
}

let globalContext: GlobalContext | null = null;

function getGlobalContext(): GlobalContext {
  if (!globalContext) {
    throw new Error('Global context not initialized. Call initializeContext first.');
  }
  return globalContext;
}

// ============================================================================
// CLI Setup
// ============================================================================

const PackageJsonSchema = z.object({ version: z.string() });

function getVersion(): string {
  // bin/ when run from source, dist/bin/ when built
  for (const candidate of ['../package.json', '../../package.json']) {
    const packageJsonPath = fileURLToPath(new URL(candidate, import.meta.url));
    if (!existsSync(packageJsonPath)) continue;
    const parsed = PackageJsonSchema.safeParse(JSON.parse(readFileSync(packageJsonPath, 'utf-8')));
    if (parsed.success) return parsed.data.version;
  }
  return '0.0.0';
}

function initializeContext(options: GlobalOptions): GlobalContext {
  const startTime = Date.now();

  const config = loadConfig({
    ...(options.config ? { configPath: options.config } : {}),
    overrides: {
      verbose: options.verbose,
      json: options.json,
      dataDir: options.dataDir,
      concurrency: options.concurrency,
    },
  });

  const logger = createCLILogger({
    level: config.verbose ? 'debug' : 'info',
    json: config.json,
  });
  // Library modules stay quiet unless --verbose
  setLogLevel(config.verbose ? 'debug' : 'warn');

  globalContext = { config, logger, startTime };
  return globalContext;
}

/**
 * Run a command against a fresh geocoder session, closing it afterwards
 */
async function withSession(
  run: (context: GlobalContext, session: GeocoderSession) => Promise<CommandResult>
): Promise<void> {
  const context = getGlobalContext();
  const session = openSession(context.config);
  let result: CommandResult;
  try {
    result = await run(context, session);
  } finally {
    await session.close();
  }
  if (!result.success) {
    process.exitCode = EXIT_CODES.ERRORS;
  }
}

function addVariableOptions(command: Command): Command {
  return command
    .option('-v, --variables <codes...>', 'Census variable codes (PL 94-171 or ACS)')
    .option('-g, --groups <names...>', 'PL 94-171 variable groups')
    .option('--acs <codes...>', 'ACS 5-year variable codes')
    .option('--acs-groups <names...>', 'ACS 5-year variable groups');
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('census-geocoder')
    .description('Map US addresses to Census 2020 geographies and census variables, offline')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('--verbose', 'Enable verbose output')
    .option('--json', 'Log as JSON (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .census-geocoderrc)')
    .option('--data-dir <path>', 'Directory holding per-state data')
    .option('--concurrency <n>', 'Batch worker count', parseIntegerOption)
    .hook('preAction', (thisCommand) => {
      try {
        initializeContext(thisCommand.opts<GlobalOptions>());
      } catch (error) {
        printError(
          `Configuration error: ${error instanceof Error ? error.message : String(error)}`
        );
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }
    });

  addVariableOptions(
    program
      .command('lookup <address>')
      .description('Geocode a single address')
      .option('-l, --level <level>', 'Geographic level of the result', parseGeoLevelOption)
      .option('--state <state>', 'State assumed when the address names none')
      .option('--format <fmt>', 'Output format: json|ndjson|csv|table', parseFormatOption, 'json')
  ).action(async (address: string, options: Parameters<typeof lookupCommand>[1]) => {
    await withSession((context, session) =>
      lookupCommand(address, options, { ...context, session })
    );
  });

  addVariableOptions(
    program
      .command('batch <input> <output>')
      .description('Geocode every row of a CSV file')
      .requiredOption('-a, --address-column <name>', 'Column holding the address')
      .option('-l, --level <level>', 'Geographic level of the results', parseGeoLevelOption)
      .option('--state <state>', 'State assumed when a row names none')
      .option('--format <fmt>', 'Output format: csv|ndjson|json', parseBatchFormatOption)
      .option('--progress-every <n>', 'Log progress every n rows', parseIntegerOption)
  ).action(
    async (input: string, output: string, options: Parameters<typeof batchCommand>[2]) => {
      await withSession((context, session) =>
        batchCommand(input, output, options, { ...context, session })
      );
    }
  );

  addVariableOptions(
    program
      .command('coords <lat> <lon>')
      .description('Resolve a coordinate to its census block (put -- before negative values)')
      .option('-l, --level <level>', 'Geographic level of the result', parseGeoLevelOption)
      .option('--state <state>', 'State to search (default: every state on disk)')
      .option('--format <fmt>', 'Output format: json|ndjson|csv|table', parseFormatOption, 'json')
  ).action(async (lat: string, lon: string, options: Parameters<typeof coordsCommand>[2]) => {
    const latitude = parseCoordinateOption(lat);
    const longitude = parseCoordinateOption(lon);
    await withSession((context, session) =>
      coordsCommand(latitude, longitude, options, { ...context, session })
    );
  });

  program
    .command('variables')
    .description('List cataloged census variables and groups')
    .option('--acs', 'List ACS 5-year variables instead of PL 94-171')
    .option('-t, --table <prefix>', 'Only codes in this table, e.g. P1 or B19')
    .option('--format <fmt>', 'Output format: table|json|csv', parseFormatOption, 'table')
    .action(async (options: Parameters<typeof variablesCommand>[0]) => {
      await variablesCommand(options);
    });

  program
    .command('info')
    .description('Show which datasets are present in the data directory')
    .option('--format <fmt>', 'Output format: table|json|csv', parseFormatOption, 'table')
    .action(async (options: Parameters<typeof infoCommand>[0]) => {
      await withSession((_context, session) => infoCommand(options, session.provider));
    });

  return program;
}

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    if (globalContext) {
      globalContext.logger.error('Command failed', {
        error: message,
        duration_ms: Date.now() - globalContext.startTime,
      });
    } else {
      printError(message);
    }
    process.exit(exitCodeForError(error));
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.ERRORS);
});
