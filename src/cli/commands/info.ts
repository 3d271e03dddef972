/**
 * Info Command
 *
 * Show which datasets are present for each state in the data directory.
 *
 * Usage:
 *   census-geocoder info [--format table|json|csv]
 *
 * @module cli/commands/info
 */

import { readdir, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { getStateNameFromFips } from '../../core/types/fips.js';
import type { FileDatasetProvider } from '../../data/dataset-provider.js';
import {
  formatJson,
  formatOutput,
  printOutput,
  type OutputFormat,
  type TableColumn,
} from '../lib/output.js';
import type { CommandResult } from '../lib/session.js';

export interface InfoOptions {
  readonly format?: OutputFormat;
}

export type StateInfo = {
  readonly stateFips: string;
  readonly name: string;
  readonly addressRanges: boolean;
  readonly blocks: boolean;
  readonly pl94171: boolean;
  readonly acs5: boolean;
  readonly bytes: number;
};

const yesNo = (value: unknown): string => (value ? 'yes' : 'no');

const INFO_COLUMNS: readonly TableColumn[] = [
  { key: 'stateFips', header: 'FIPS' },
  { key: 'name', header: 'State' },
  { key: 'addressRanges', header: 'Ranges', formatter: yesNo },
  { key: 'blocks', header: 'Blocks', formatter: yesNo },
  { key: 'pl94171', header: 'PL 94-171', formatter: yesNo },
  { key: 'acs5', header: 'ACS', formatter: yesNo },
  { key: 'bytes', header: 'Size', align: 'right', formatter: (value) => formatSize(Number(value)) },
];

/**
 * Human-readable byte count
 */
export function formatSize(bytes: number): string {
  let size = bytes;
  for (const unit of ['B', 'KB', 'MB', 'GB']) {
    if (size < 1024) {
      return `${size.toFixed(1)} ${unit}`;
    }
    size /= 1024;
  }
  return `${size.toFixed(1)} TB`;
}

async function directorySize(dir: string): Promise<number> {
  let total = 0;
  for (const entry of await readdir(dir, { withFileTypes: true })) {
    const path = join(dir, entry.name);
    if (entry.isDirectory()) {
      total += await directorySize(path);
    } else if (entry.isFile()) {
      total += (await stat(path)).size;
    }
  }
  return total;
}

/**
 * Inventory of every state directory under the provider's data directory
 */
export async function collectStateInfo(provider: FileDatasetProvider): Promise<StateInfo[]> {
  const states = await provider.listStates();
  return Promise.all(
    states.map(async (stateFips) => {
      const inventory = await provider.inventory(stateFips);
      return {
        stateFips,
        name: getStateNameFromFips(stateFips) ?? stateFips,
        addressRanges: inventory['address-ranges'],
        blocks: inventory['block-polygons'],
        pl94171: inventory.pl94171,
        acs5: inventory.acs5,
        bytes: await directorySize(provider.stateDir(stateFips)),
      };
    })
  );
}

export async function infoCommand(
  options: InfoOptions,
  provider: FileDatasetProvider
): Promise<CommandResult> {
  const states = await collectStateInfo(provider);
  const format = options.format ?? 'table';

  if (format === 'json') {
    printOutput(formatJson({ dataDir: provider.dataDir, states }));
    return { success: true };
  }

  if (format === 'table') {
    printOutput(`Data directory: ${provider.dataDir}`);
    if (states.length === 0) {
      printOutput('No state data found.');
      return { success: true };
    }
  }

  printOutput(formatOutput(states, format, INFO_COLUMNS));
  return { success: true };
}
