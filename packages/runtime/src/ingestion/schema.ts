// Required column checks for campaign files

import { BASE_REQUIRED_COLUMNS, CAMPAIGN_COLUMNS } from '@campaign-demand/protocol';
import { SchemaError } from '../errors.js';

/**
 * Which optional columns a caller insists on.
 */
export type SchemaOptions = {
  /** Require "Campaign name" (default: true) */
  requireCampaignName?: boolean;

  /** Require "Category_name" (default: false) */
  requireCategory?: boolean;
};

/**
 * The required column set for the given options, in a stable order.
 */
export function requiredColumns(options: SchemaOptions = {}): string[] {
  const { requireCampaignName = true, requireCategory = false } = options;

  const columns = [...BASE_REQUIRED_COLUMNS];
  if (requireCampaignName) {
    columns.push(CAMPAIGN_COLUMNS.campaignName);
  }
  if (requireCategory) {
    columns.push(CAMPAIGN_COLUMNS.categoryName);
  }
  return columns;
}

/**
 * List required columns absent from `columns`.
 */
export function findMissingColumns(
  columns: readonly string[],
  options: SchemaOptions = {}
): string[] {
  const present = new Set(columns);
  return requiredColumns(options).filter((column) => !present.has(column));
}

/**
 * @throws SchemaError naming every missing required column
 */
export function checkRequiredColumns(columns: readonly string[], options: SchemaOptions = {}): void {
  const missing = findMissingColumns(columns, options);
  if (missing.length > 0) {
    throw new SchemaError(missing);
  }
}
