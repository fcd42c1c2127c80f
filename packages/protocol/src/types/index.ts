// Re-export all protocol types

export * from './common.js';
export * from './campaigns.js';
export * from './periods.js';
export * from './estimates.js';
