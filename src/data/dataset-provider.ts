/**
 * Dataset Provider
 *
 * Supplies per-state datasets from files already on disk. Fetching files
 * from census.gov is outside this module: a missing file is reported as
 * DatasetUnavailableError so the caller can download and retry.
 *
 * DIRECTORY LAYOUT (per state, keyed by 2-digit FIPS):
 *
 *   <dataDir>/06/
 *     addrfeat/            tl_2020_*_addrfeat.zip | *.shp | *.geojson (one per county)
 *     address-ranges.geojson   alternative to addrfeat/
 *     tabblock20/          tl_2020_06_tabblock20.zip | *.shp | *.geojson
 *     blocks.geojson           alternative to tabblock20/
 *     pl94171/             ca2020.pl.zip, or extracted cageo2020.pl + segments
 *     acs5.csv             optional ACS 5-year extract
 */

import { createReadStream, existsSync } from 'node:fs';
import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { PL_CATALOG } from '../census/variables.js';
import type { AddressRangeRecord } from '../core/types/address.js';
import type { CensusTableData, DatasetKind, VariableDataset } from '../core/types/dataset.js';
import { DatasetCorruptError, DatasetUnavailableError, isDatasetError } from '../core/types/errors.js';
import { STATE_FIPS_TO_NAME } from '../core/types/fips.js';
import type { BlockPolygon } from '../core/types/geography.js';
import { createLogger } from '../core/utils/logger.js';
import { parseAcsExtract } from './acs-reader.js';
import { FEATURE_FILE_EXTENSIONS, readFeatureFile, type RawFeature } from './feature-reader.js';
import { PL_ALL_COLUMNS, parsePl94171, plSourceFromFiles, plSourceFromZip } from './pl94171-parser.js';
import { toAddressRangeRecord, toBlockPolygon } from './tiger-records.js';

const logger = createLogger({ module: 'dataset-provider' });

/**
 * Source of per-state datasets
 */
export interface DatasetProvider {
  /** Address-range segments for a state (required) */
  loadAddressRanges(stateFips: string): Promise<readonly AddressRangeRecord[]>;
  /** Block polygons for a state (required) */
  loadBlockPolygons(stateFips: string): Promise<readonly BlockPolygon[]>;
  /**
   * Census table for a state
   *
   * @param columns - Codes to load beyond the provider's default column set
   * @returns Table, or null when the provider has none for the state
   */
  loadCensusTable(
    stateFips: string,
    dataset: VariableDataset,
    columns?: readonly string[]
  ): Promise<CensusTableData | null>;
}

export interface FileDatasetProviderOptions {
  /**
   * PL 94-171 columns to keep in memory. Defaults to the cataloged
   * variables; 'all' keeps every column of the legacy files.
   */
  readonly plColumns?: readonly string[] | 'all';
}

/**
 * Dataset presence for one state directory
 */
export type DatasetInventory = Readonly<Record<DatasetKind, boolean>>;

const LAYOUT = {
  addressRangeDir: 'addrfeat',
  addressRangeFile: 'address-ranges.geojson',
  blockDir: 'tabblock20',
  blockFile: 'blocks.geojson',
  plDir: 'pl94171',
  acsFile: 'acs5.csv',
} as const;

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Regular files in a directory, sorted by name; empty when the directory is absent
 */
async function listFiles(dir: string): Promise<string[]> {
  if (!existsSync(dir)) return [];
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .sort()
    .map((name) => join(dir, name));
}

function isFeatureFile(path: string): boolean {
  const lowerPath = path.toLowerCase();
  return FEATURE_FILE_EXTENSIONS.some((extension) => lowerPath.endsWith(extension));
}

/**
 * Reads `<dataDir>/<stateFips>/` as laid out above
 */
export class FileDatasetProvider implements DatasetProvider {
  private readonly plColumns: readonly string[];

  constructor(
    readonly dataDir: string,
    options: FileDatasetProviderOptions = {}
  ) {
    const columns = options.plColumns ?? Object.keys(PL_CATALOG.variables);
    this.plColumns = columns === 'all' ? PL_ALL_COLUMNS : columns;
  }

  stateDir(stateFips: string): string {
    return join(this.dataDir, stateFips);
  }

  /**
   * State FIPS codes with a directory under the data directory
   */
  async listStates(): Promise<string[]> {
    if (!existsSync(this.dataDir)) return [];
    const entries = await readdir(this.dataDir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isDirectory() && STATE_FIPS_TO_NAME[entry.name] !== undefined)
      .map((entry) => entry.name)
      .sort();
  }

  /**
   * Which datasets are present for a state
   */
  async inventory(stateFips: string): Promise<DatasetInventory> {
    const [addressRanges, blocks, pl] = await Promise.all([
      this.featureFiles(stateFips, LAYOUT.addressRangeDir, LAYOUT.addressRangeFile),
      this.featureFiles(stateFips, LAYOUT.blockDir, LAYOUT.blockFile),
      listFiles(join(this.stateDir(stateFips), LAYOUT.plDir)),
    ]);
    return {
      'address-ranges': addressRanges.length > 0,
      'block-polygons': blocks.length > 0,
      pl94171: pl.length > 0,
      acs5: existsSync(join(this.stateDir(stateFips), LAYOUT.acsFile)),
    };
  }

  async loadAddressRanges(stateFips: string): Promise<readonly AddressRangeRecord[]> {
    const files = await this.requireFeatureFiles(
      stateFips,
      'address-ranges',
      LAYOUT.addressRangeDir,
      LAYOUT.addressRangeFile
    );

    const records: AddressRangeRecord[] = [];
    let skipped = 0;

    for (const file of files) {
      const features = await this.readFeatures(stateFips, 'address-ranges', file);
      features.forEach((feature, position) => {
        const record = toAddressRangeRecord(feature, `${file}#${position}`);
        if (record) {
          records.push(record);
        } else {
          skipped++;
        }
      });
    }

    logger.info('Address ranges loaded', {
      stateFips,
      fileCount: files.length,
      segmentCount: records.length,
      skippedFeatures: skipped,
    });

    return records;
  }

  async loadBlockPolygons(stateFips: string): Promise<readonly BlockPolygon[]> {
    const files = await this.requireFeatureFiles(
      stateFips,
      'block-polygons',
      LAYOUT.blockDir,
      LAYOUT.blockFile
    );

    const blocks: BlockPolygon[] = [];
    for (const file of files) {
      const features = await this.readFeatures(stateFips, 'block-polygons', file);
      for (const feature of features) {
        let block: BlockPolygon | null;
        try {
          block = toBlockPolygon(feature);
        } catch (error) {
          throw new DatasetCorruptError(
            `Invalid block in ${file}: ${errorMessage(error)}`,
            { stateFips, kind: 'block-polygons', path: file },
            { cause: error }
          );
        }
        if (block) blocks.push(block);
      }
    }

    logger.info('Block polygons loaded', {
      stateFips,
      fileCount: files.length,
      blockCount: blocks.length,
    });

    return blocks;
  }

  /**
   * PL 94-171 loads keep the configured columns plus `columns`; ACS
   * extracts are read whole
   */
  async loadCensusTable(
    stateFips: string,
    dataset: VariableDataset,
    columns: readonly string[] = []
  ): Promise<CensusTableData | null> {
    return dataset === 'pl94171'
      ? this.loadPl94171(stateFips, columns)
      : this.loadAcs(stateFips);
  }

  private async loadPl94171(
    stateFips: string,
    extraColumns: readonly string[]
  ): Promise<CensusTableData | null> {
    const dir = join(this.stateDir(stateFips), LAYOUT.plDir);
    const files = await listFiles(dir);
    if (files.length === 0) {
      return null;
    }

    const details = { stateFips, kind: 'pl94171', path: dir } as const;
    try {
      let source = plSourceFromFiles(files);
      if (source === null) {
        const archive = files.find((file) => file.toLowerCase().endsWith('.pl.zip'));
        if (archive !== undefined) {
          source = await plSourceFromZip(await readFile(archive), archive);
        }
      }
      if (source === null) {
        throw new DatasetUnavailableError(
          `No PL 94-171 geographic header or archive in ${dir}`,
          details
        );
      }
      const columns = [...new Set([...this.plColumns, ...extraColumns])];
      return await parsePl94171(source, columns);
    } catch (error) {
      if (isDatasetError(error)) throw error;
      throw new DatasetCorruptError(
        `Failed to read PL 94-171 data for state ${stateFips}: ${errorMessage(error)}`,
        details,
        { cause: error }
      );
    }
  }

  private async loadAcs(stateFips: string): Promise<CensusTableData | null> {
    const path = join(this.stateDir(stateFips), LAYOUT.acsFile);
    if (!existsSync(path)) {
      return null;
    }
    try {
      return await parseAcsExtract(createReadStream(path), path);
    } catch (error) {
      throw new DatasetCorruptError(
        `Failed to read ACS extract for state ${stateFips}: ${errorMessage(error)}`,
        { stateFips, kind: 'acs5', path },
        { cause: error }
      );
    }
  }

  /**
   * Feature files in `<state>/<dir>/`, else the single `<state>/<file>`
   */
  private async featureFiles(stateFips: string, dir: string, file: string): Promise<string[]> {
    const stateDir = this.stateDir(stateFips);
    const files = (await listFiles(join(stateDir, dir))).filter(isFeatureFile);
    if (files.length > 0) return files;

    const single = join(stateDir, file);
    return existsSync(single) ? [single] : [];
  }

  private async requireFeatureFiles(
    stateFips: string,
    kind: DatasetKind,
    dir: string,
    file: string
  ): Promise<string[]> {
    const files = await this.featureFiles(stateFips, dir, file);
    if (files.length === 0) {
      throw new DatasetUnavailableError(`No ${kind} data for state ${stateFips}`, {
        stateFips,
        kind,
        path: this.stateDir(stateFips),
      });
    }
    return files;
  }

  private async readFeatures(
    stateFips: string,
    kind: DatasetKind,
    file: string
  ): Promise<RawFeature[]> {
    try {
      return await readFeatureFile(file);
    } catch (error) {
      throw new DatasetCorruptError(
        `Failed to read ${kind} file ${file}: ${errorMessage(error)}`,
        { stateFips, kind, path: file },
        { cause: error }
      );
    }
  }
}
