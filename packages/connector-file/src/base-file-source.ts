/**
 * Base class for file-based grid sources
 * Handles file access, error mapping and the decoded-grid cache
 */

import { readFile, access } from 'node:fs/promises';
import { constants } from 'node:fs';
import type {
  IGridSource,
  GridSourceConfig,
  SourceState,
  Grid,
  GridInfo,
  CellValue,
} from '@tallycheck/core';
import { SourceError, describeGrid } from '@tallycheck/core';

export interface FileSourceConfig extends GridSourceConfig {
  /** Path to the file */
  filePath: string;
  /** Character encoding for text formats (default: utf-8) */
  encoding?: BufferEncoding;
}

/**
 * Abstract base class for file grid sources
 */
export abstract class BaseFileSource<TConfig extends FileSourceConfig>
  implements IGridSource<TConfig>
{
  readonly config: TConfig;
  protected _state: SourceState = 'disconnected';
  protected _grid: CellValue[][] = [];

  constructor(config: TConfig) {
    this.config = config;
  }

  get state(): SourceState {
    return this._state;
  }

  async connect(): Promise<void> {
    this._state = 'connecting';

    try {
      // Check file exists and is readable
      await access(this.config.filePath, constants.R_OK);

      const content = await readFile(this.config.filePath);
      this._grid = trimGrid(await this.parseContent(content));
      this._state = 'connected';
    } catch (error) {
      this._state = 'error';

      if (error instanceof SourceError) {
        throw error;
      }

      const code = error instanceof Error && 'code' in error ? error.code : undefined;

      if (code === 'ENOENT') {
        throw new SourceError({
          code: 'NOT_FOUND',
          message: `File not found: ${this.config.filePath}`,
          sourceId: this.config.id,
          suggestion: 'Check that the file path is correct and the file exists.',
        });
      }

      if (code === 'EACCES') {
        throw new SourceError({
          code: 'PERMISSION_DENIED',
          message: `Cannot read file: ${this.config.filePath}`,
          sourceId: this.config.id,
          suggestion: 'Check file permissions.',
        });
      }

      throw new SourceError({
        code: 'READ_FAILED',
        message: `Failed to read workbook: ${error instanceof Error ? error.message : String(error)}`,
        sourceId: this.config.id,
        suggestion: 'If the file was saved by another spreadsheet program, save it as .xlsx or .csv and try again.',
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  async disconnect(): Promise<void> {
    this._grid = [];
    this._state = 'disconnected';
  }

  readGrid(): Grid {
    this.ensureConnected();
    return this._grid;
  }

  describe(): GridInfo {
    this.ensureConnected();
    return describeGrid(this._grid);
  }

  async testConnection(): Promise<boolean> {
    try {
      await access(this.config.filePath, constants.R_OK);
      return true;
    } catch {
      return false;
    }
  }

  protected ensureConnected(): void {
    if (this._state !== 'connected') {
      throw new SourceError({
        code: 'NOT_CONNECTED',
        message: 'Source is not connected',
        sourceId: this.config.id,
        suggestion: 'Call connect() before reading the grid.',
      });
    }
  }

  /**
   * Decode file content into rows of raw cells (implemented by subclasses)
   */
  protected abstract parseContent(content: Buffer): Promise<CellValue[][]>;
}

function isEmptyCell(cell: CellValue): boolean {
  return cell === null || cell === undefined || cell === '';
}

/**
 * Drop trailing empty cells from each row and trailing empty rows
 */
export function trimGrid(rows: CellValue[][]): CellValue[][] {
  const trimmed = rows.map((row) => {
    let end = row.length;
    while (end > 0 && isEmptyCell(row[end - 1])) {
      end--;
    }
    return row.slice(0, end);
  });

  let rowEnd = trimmed.length;
  while (rowEnd > 0 && trimmed[rowEnd - 1]?.length === 0) {
    rowEnd--;
  }
  return trimmed.slice(0, rowEnd);
}
