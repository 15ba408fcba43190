/**
 * Stowplan - Catalog Parsing Types
 */

import { ItemRecord } from './packingTypes';

export type CatalogIssueCode =
  | 'ERR_MISSING_FIELD'
  | 'ERR_NOT_A_NUMBER'
  | 'ERR_DIMENSION_INVALID'
  | 'ERR_WEIGHT_INVALID'
  | 'ERR_COUNT_INVALID'
  | 'WARN_ZERO_WEIGHT';

export interface CatalogIssue {
  code: CatalogIssueCode;
  row: number;
  field?: string;
  message: string;
  suggestion: string;
  severity: 'error' | 'warning';
}

/** Unit set detected from the catalog header. */
export type CatalogUnits = 'metric_m' | 'metric_mm' | 'unitless';

export interface RawCatalogRow {
  row: number;
  name: string;
  width: string;
  height: string;
  depth: string;
  weight: string;
  count: string;
}

export interface CatalogParseResult {
  items: ItemRecord[];
  units: CatalogUnits;
  errors: CatalogIssue[];
  warnings: CatalogIssue[];
  summary: {
    total_rows: number;
    valid_items: number;
    total_units: number;
    total_weight: number;
    total_volume: number;
  };
}
