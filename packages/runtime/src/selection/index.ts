export { selectRows, deselectRows, selectionSummary, type SelectionSummary } from './rows.js';
