export {
  exportSelectedRows,
  arrangeColumnsForDisplay,
  type ExportSelectedRowsOptions,
  type ExportedRows,
} from './rows.js';
