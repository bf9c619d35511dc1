export type {
  GridSourceConfig,
  SourceState,
  IGridSource,
} from './grid-source.js';
