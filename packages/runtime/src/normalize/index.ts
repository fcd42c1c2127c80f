export { normalizeDemand, normalizeDemandColumn } from './demand.js';
