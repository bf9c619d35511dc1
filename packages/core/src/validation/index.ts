export {
  columnIndexSchema,
  sideColumnsSchema,
  columnMappingSchema,
  rowRangeSchema,
  formatIssues,
} from './schemas.js';
