/**
 * Grid Source Interface
 *
 * All tabular readers (Excel, CSV) implement this interface so the
 * runner can load a grid without knowing the file format.
 */

import type { Grid, GridInfo } from '../types/index.js';

/** Configuration common to all grid sources */
export interface GridSourceConfig {
  /** Unique identifier for this source instance */
  id: string;
  /** Human-readable name */
  name: string;
  /** Source type (excel, csv) */
  type: string;
}

/** Connection state */
export type SourceState = 'disconnected' | 'connecting' | 'connected' | 'error';

/**
 * Base interface all grid sources must implement
 */
export interface IGridSource<TConfig extends GridSourceConfig = GridSourceConfig> {
  /** Source configuration */
  readonly config: TConfig;

  /** Current connection state */
  readonly state: SourceState;

  /**
   * Open and decode the underlying document
   * @throws SourceError if the document cannot be read
   */
  connect(): Promise<void>;

  /**
   * Release the decoded document
   */
  disconnect(): Promise<void>;

  /**
   * Return the decoded grid. Header rows are not interpreted here.
   * @throws SourceError if called before connect()
   */
  readGrid(): Grid;

  /**
   * Row and column counts of the decoded grid
   */
  describe(): GridInfo;

  /**
   * Check that the document is reachable without decoding it
   */
  testConnection(): Promise<boolean>;
}
