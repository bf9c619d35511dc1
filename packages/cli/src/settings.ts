/**
 * Run settings resolved from the config file and flags
 */

import { DEFAULT_COLUMN_MAPPING } from '@tallycheck/core';
import type {
  EmptyCellPolicy,
  HeaderPolicy,
  RowRange,
} from '@tallycheck/engine';
import type { NameSimilarityAlgorithm } from '@tallycheck/similarity';
import { ConfigError } from './config.js';
import type { ConfigFile, SideColumnRefs } from './config.js';

export type OutputFormat = 'text' | 'json';

export interface RunSettings {
  workbook: string;
  sheet?: string | number;
  delimiter?: string;
  encoding?: BufferEncoding;
  columns: { left: SideColumnRefs; right: SideColumnRefs };
  tolerance?: number;
  fuzzyThreshold?: number;
  similarityAlgorithm?: NameSimilarityAlgorithm;
  header: HeaderPolicy;
  rowRange?: RowRange;
  emptyCellPolicy?: EmptyCellPolicy;
  flagIndeterminate: boolean;
  exportPath?: string;
  format: OutputFormat;
  showAll: boolean;
}

function toHeaderPolicy(header: ConfigFile['header']): HeaderPolicy {
  if (header === undefined || header === 'none') return { mode: 'none' };
  if (header === 'auto') return { mode: 'auto' };
  return { mode: 'row', row: header };
}

/**
 * Apply defaults to a merged config. The positional workbook wins over
 * `source.filePath`.
 * @throws ConfigError when no workbook is given
 */
export function resolveSettings(config: ConfigFile, workbook?: string): RunSettings {
  const filePath = workbook ?? config.source?.filePath;
  if (!filePath) {
    throw new ConfigError('No workbook given. Pass a path or set source.filePath in the config file.');
  }

  const start = config.rows?.start;
  const end = config.rows?.end;

  return {
    workbook: filePath,
    sheet: config.source?.sheet,
    delimiter: config.source?.delimiter,
    encoding: config.source?.encoding,
    columns: {
      left: config.columns?.left ?? DEFAULT_COLUMN_MAPPING.left,
      right: config.columns?.right ?? DEFAULT_COLUMN_MAPPING.right,
    },
    tolerance: config.tolerance,
    fuzzyThreshold: config.fuzzyThreshold,
    similarityAlgorithm: config.similarityAlgorithm,
    header: toHeaderPolicy(config.header),
    rowRange: start === undefined && end === undefined ? undefined : { start, end },
    emptyCellPolicy: config.emptyCells,
    flagIndeterminate: config.flagIndeterminate ?? false,
    exportPath: config.output?.exportPath,
    format: config.output?.format ?? 'text',
    showAll: config.output?.showAll ?? false,
  };
}
