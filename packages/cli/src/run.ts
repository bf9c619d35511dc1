/**
 * Validation runner
 *
 * Loads the workbook, resolves the column mapping, runs the engine and
 * writes the report and the optional mismatch export.
 */

import { resolve } from 'node:path';
import type { Grid, SideColumns } from '@tallycheck/core';
import { createGridSource, writeCsvFile } from '@tallycheck/connector-file';
import {
  buildColumnLabels,
  createReconciliationEngine,
  detectHeaderRow,
  EXPORT_COLUMNS,
  formatValidationReport,
  resolveColumnRef,
  toExportRows,
} from '@tallycheck/engine';
import type { HeaderPolicy, SourceInfo, ValidationReport } from '@tallycheck/engine';
import type { SideColumnRefs } from './config.js';
import type { Logger } from './logger.js';
import type { RunSettings } from './settings.js';

export interface RunIO {
  logger: Logger;
  /** Receives the rendered report */
  stdout: (text: string) => void;
}

export interface LoadedGrid {
  grid: Grid;
  source: SourceInfo;
}

export async function loadGrid(settings: RunSettings, logger: Logger): Promise<LoadedGrid> {
  const filePath = resolve(process.cwd(), settings.workbook);
  const source = createGridSource(filePath, {
    sheet: settings.sheet,
    delimiter: settings.delimiter,
    encoding: settings.encoding,
  });

  await source.connect();
  try {
    const grid = source.readGrid();
    const { rowCount, columnCount } = source.describe();
    logger.info('Loaded workbook', { file: filePath, rows: rowCount, columns: columnCount });

    return {
      grid,
      source: {
        id: source.config.id,
        name: source.config.name,
        type: source.config.type,
      },
    };
  } finally {
    await source.disconnect();
  }
}

export interface ResolvedColumns {
  columns: { left: SideColumns; right: SideColumns };
  /** Header policy handed to the engine; auto detection is already settled */
  header: HeaderPolicy;
}

/**
 * Turn column references into indices. Header labels come from the
 * explicit header row, or from row 0 when auto detection finds one.
 */
export function resolveColumns(grid: Grid, settings: RunSettings): ResolvedColumns {
  const header = settleHeader(grid, settings.header);
  const labels = buildColumnLabels(grid, header.mode === 'row' ? header.row : null);

  const side = (refs: SideColumnRefs): SideColumns => ({
    name: resolveColumnRef(refs.name, labels),
    budget: resolveColumnRef(refs.budget, labels),
    actual: resolveColumnRef(refs.actual, labels),
  });

  return {
    columns: { left: side(settings.columns.left), right: side(settings.columns.right) },
    header,
  };
}

function settleHeader(grid: Grid, header: HeaderPolicy): HeaderPolicy {
  if (header.mode !== 'auto') {
    return header;
  }
  const row = detectHeaderRow(grid);
  return row === null ? { mode: 'none' } : { mode: 'row', row };
}

export async function runValidation(
  settings: RunSettings,
  io: RunIO
): Promise<ValidationReport> {
  const { grid, source } = await loadGrid(settings, io.logger);
  const logger = io.logger.child({ source: source.name });

  const { columns, header } = resolveColumns(grid, settings);
  logger.debug('Resolved columns', { columns, header });

  const engine = createReconciliationEngine();
  const report = engine.run(
    grid,
    {
      columns,
      tolerance: settings.tolerance,
      fuzzyThreshold: settings.fuzzyThreshold,
      similarityAlgorithm: settings.similarityAlgorithm,
      header,
      rowRange: settings.rowRange,
      emptyCellPolicy: settings.emptyCellPolicy,
      flagIndeterminate: settings.flagIndeterminate,
    },
    source
  );

  const { summary } = report;
  logger.info('Header row', { mode: settings.header.mode, headerRow: report.headerRow });
  logger.info('Indexed right side', {
    lineItems: summary.rightRecordCount,
    superseded: summary.supersededRightRows,
  });
  if (summary.supersededRightRows > 0) {
    logger.warn('Repeated right-side names; the last row of each name is used', {
      superseded: summary.supersededRightRows,
    });
  }
  logger.info('Validation complete', {
    checked: summary.checked,
    needsAttention: summary.needsAttention,
    exactMatches: summary.exactMatches,
    fuzzyMatches: summary.fuzzyMatches,
    unmatched: summary.unmatched,
  });

  if (settings.exportPath) {
    const exportPath = resolve(process.cwd(), settings.exportPath);
    const rows = toExportRows(report.results, {
      flagIndeterminate: report.options.flagIndeterminate,
    });
    await writeCsvFile(exportPath, rows, { columns: EXPORT_COLUMNS });
    logger.info('Wrote mismatch export', { file: exportPath, rows: rows.length });
  }

  io.stdout(
    settings.format === 'json'
      ? `${JSON.stringify(report, null, 2)}\n`
      : `${formatValidationReport(report, { showAll: settings.showAll })}\n`
  );

  return report;
}

/**
 * 0 when nothing needs attention, 1 otherwise
 */
export function exitCodeFor(report: ValidationReport): number {
  return report.summary.needsAttention > 0 ? 1 : 0;
}
