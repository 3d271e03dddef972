/**
 * Batch Command
 *
 * Geocode every row of a CSV file and write the results in input order.
 * CSV output keeps the input columns and appends the result columns.
 *
 * Usage:
 *   census-geocoder batch <input.csv> <output> -a <column> [options]
 *
 * Options:
 *   -a, --address-column <name>   Column holding the address (required)
 *   -l, --level <level>           state|county|tract|block_group|block
 *   -v, --variables <codes>       PL 94-171 or ACS codes
 *   -g, --groups <names>          PL 94-171 variable groups
 *   --acs <codes>                 ACS codes
 *   --acs-groups <names>          ACS variable groups
 *   --state <state>               State assumed when a row names none
 *   --format <fmt>                csv|ndjson|json (default: from the output extension)
 *   --progress-every <n>          Log progress every n rows (default: 1000)
 *
 * @module cli/commands/batch
 */

import { createReadStream, createWriteStream } from 'node:fs';
import { extname } from 'node:path';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { InvalidArgumentError } from 'commander';
import type { GeoLevel } from '../../core/types/geography.js';
import type { GeocodeResult } from '../../core/types/result.js';
import { forEachDelimitedRow } from '../../data/delimited.js';
import {
  flattenResult,
  formatCsvHeader,
  formatCsvRow,
  printError,
  printOutput,
  resultColumns,
  type TableColumn,
} from '../lib/output.js';
import {
  selectedVariables,
  type CommandDeps,
  type CommandResult,
  type VariableFlags,
} from '../lib/session.js';

export type BatchFormat = 'csv' | 'ndjson' | 'json';

const BATCH_FORMATS: readonly BatchFormat[] = ['csv', 'ndjson', 'json'];

export interface BatchCommandOptions extends VariableFlags {
  readonly addressColumn: string;
  readonly level?: GeoLevel;
  readonly state?: string;
  readonly format?: BatchFormat;
  readonly concurrency?: number;
  readonly progressEvery?: number;
}

/**
 * Parsed input file: header plus data rows
 */
interface InputTable {
  readonly header: readonly string[];
  readonly rows: ReadonlyArray<readonly string[]>;
}

/**
 * Batch record in json and ndjson output: the result plus its input row
 */
type BatchRecord = GeocodeResult & { readonly input: Readonly<Record<string, string>> };

export function parseBatchFormatOption(value: string): BatchFormat {
  const format = BATCH_FORMATS.find((candidate) => candidate === value);
  if (format === undefined) {
    throw new InvalidArgumentError(`Expected one of ${BATCH_FORMATS.join(', ')}.`);
  }
  return format;
}

/**
 * Output format implied by a file name
 */
export function formatFromPath(path: string): BatchFormat {
  switch (extname(path).toLowerCase()) {
    case '.ndjson':
    case '.jsonl':
      return 'ndjson';
    case '.json':
      return 'json';
    default:
      return 'csv';
  }
}

async function readInputTable(path: string): Promise<InputTable> {
  const records: Array<readonly string[]> = [];
  await forEachDelimitedRow(
    createReadStream(path),
    { bom: true, skip_empty_lines: true },
    (row) => {
      records.push(row);
    }
  );
  const [header = [], ...rows] = records;
  return { header, rows };
}

export async function batchCommand(
  inputPath: string,
  outputPath: string,
  options: BatchCommandOptions,
  deps: CommandDeps
): Promise<CommandResult> {
  const { config, logger, session } = deps;
  logger.commandStart('batch', { inputPath, outputPath });

  const variables = selectedVariables(options, config);
  const format = options.format ?? formatFromPath(outputPath);
  const progressEvery = options.progressEvery ?? 1000;

  const input = await readInputTable(inputPath);
  const addressIndex = input.header.indexOf(options.addressColumn);
  if (addressIndex === -1) {
    printError(`Column '${options.addressColumn}' not found in ${inputPath}`);
    logger.commandEnd(false, { reason: 'missing_column' });
    return { success: false };
  }

  const addresses = input.rows.map((row) => row[addressIndex] ?? '');
  const inputColumns: TableColumn[] = input.header.map((name, i) => ({
    key: `input.${i}`,
    header: name,
  }));
  const columns = [...inputColumns, ...resultColumns(variables)];

  const stream = session.geocoder.geocodeStream(addresses, {
    geoLevel: options.level ?? config.defaults.geoLevel,
    variables,
    ...(options.state ? { stateHint: options.state } : {}),
    ...(options.concurrency !== undefined ? { concurrency: options.concurrency } : {}),
  });

  let processed = 0;
  let matched = 0;

  async function* outputLines(): AsyncGenerator<string, void, undefined> {
    const collected: BatchRecord[] = [];
    if (format === 'csv') {
      yield `${formatCsvHeader(columns)}\n`;
    }

    for await (const result of stream) {
      const row = input.rows[processed];
      processed++;
      if (result.matchType !== 'unmatched') matched++;

      if (format === 'csv') {
        const inputCells = Object.fromEntries(row.map((cell, i) => [`input.${i}`, cell]));
        yield `${formatCsvRow({ ...inputCells, ...flattenResult(result) }, columns)}\n`;
      } else {
        const record: BatchRecord = {
          ...result,
          input: Object.fromEntries(input.header.map((name, i) => [name, row[i] ?? ''])),
        };
        if (format === 'ndjson') {
          yield `${JSON.stringify(record)}\n`;
        } else {
          collected.push(record);
        }
      }

      if (progressEvery > 0 && processed % progressEvery === 0) {
        logger.progress({ current: processed, total: addresses.length, label: 'rows' });
      }
    }

    if (format === 'json') {
      yield `${JSON.stringify(collected, null, 2)}\n`;
    }
  }

  // Rejects on an unwritable output path and stops the geocoding stream
  await pipeline(
    Readable.from(outputLines()),
    createWriteStream(outputPath, { encoding: 'utf-8' })
  );

  const percent = addresses.length > 0 ? ((100 * matched) / addresses.length).toFixed(1) : '0.0';
  printOutput(`Processed ${addresses.length} addresses -> ${outputPath}`);
  printOutput(`Matched: ${matched}/${addresses.length} (${percent}%)`);

  logger.commandEnd(true, { rows: addresses.length, matched });
  return { success: true };
}
