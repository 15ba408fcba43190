/**
 * Stowplan - Item Catalog Parser
 *
 * Reads item catalogs exported as CSV. Three header layouts are accepted:
 * metres and kilograms (`width_m ... weight_kg`), millimetres and grams
 * (`width_mm ... weight_g`, converted to metres and kilograms) and plain
 * `width ... weight` columns taken as given. Japanese column names
 * (`名前`, `幅(m)`, `重量(kg)`, `個数` and so on) are read as their English
 * equivalents. Rows that fail validation are reported and left out; the
 * rest become item records.
 */

import {
  CatalogIssue,
  CatalogParseResult,
  CatalogUnits,
  ItemRecord,
  RawCatalogRow
} from '../types';

// ============================================================================
// PARSER CONFIGURATION
// ============================================================================

export interface UnitLayout {
  units: CatalogUnits;
  columns: { width: string; height: string; depth: string; weight: string };
  /** Divisor applied to lengths and to weight. */
  divisor: number;
}

const UNIT_LAYOUTS: UnitLayout[] = [
  {
    units: 'metric_m',
    columns: { width: 'width_m', height: 'height_m', depth: 'depth_m', weight: 'weight_kg' },
    divisor: 1
  },
  {
    units: 'metric_mm',
    columns: { width: 'width_mm', height: 'height_mm', depth: 'depth_mm', weight: 'weight_g' },
    divisor: 1000
  },
  {
    units: 'unitless',
    columns: { width: 'width', height: 'height', depth: 'depth', weight: 'weight' },
    divisor: 1
  }
];

const DIMENSION_FIELDS = ['width', 'height', 'depth'] as const;

const HEADER_ALIASES = new Map<string, string>([
  ['名前', 'name'],
  ['幅', 'width'],
  ['高さ', 'height'],
  ['奥行き', 'depth'],
  ['重量', 'weight'],
  ['個数', 'count']
]);

// ============================================================================
// CSV PARSING
// ============================================================================

export function normalizeHeader(header: string): string {
  const normalized = header
    .trim()
    .toLowerCase()
    .replace(/[()（）]/g, ' ')
    .trim()
    .replace(/\s+/g, '_');

  const separator = normalized.indexOf('_');
  const base = separator === -1 ? normalized : normalized.slice(0, separator);
  const alias = HEADER_ALIASES.get(base);
  return alias ? alias + normalized.slice(base.length) : normalized;
}

export function parseCSVLine(line: string): string[] {
  const result: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];
    if (char === '"') {
      if (inQuotes && line[i + 1] === '"') {
        current += '"';
        i++;
      } else {
        inQuotes = !inQuotes;
      }
    } else if (char === ',' && !inQuotes) {
      result.push(current);
      current = '';
    } else {
      current += char;
    }
  }
  result.push(current);
  return result;
}

function detectLayout(headers: string[]): UnitLayout {
  if (!headers.includes('name')) {
    throw new Error('Catalog header must contain a "name" column');
  }

  const layout = UNIT_LAYOUTS.find(candidate =>
    Object.values(candidate.columns).every(column => headers.includes(column))
  );
  if (!layout) {
    throw new Error(
      'Catalog header must contain width/height/depth/weight columns in m and kg, mm and g, or without units'
    );
  }
  return layout;
}

export function parseCatalogRows(csvContent: string): { rows: RawCatalogRow[]; layout: UnitLayout } {
  const lines = csvContent.replace(/^\uFEFF/, '').trim().split(/\r?\n/);
  if (lines.length < 2) {
    throw new Error('CSV file must contain header row and at least one data row');
  }

  const headers = parseCSVLine(lines[0]).map(normalizeHeader);
  const layout = detectLayout(headers);
  const rows: RawCatalogRow[] = [];

  for (let i = 1; i < lines.length; i++) {
    const values = parseCSVLine(lines[i]);
    if (values.every(v => v.trim() === '')) continue;

    const row: Record<string, string> = {};
    headers.forEach((header, idx) => {
      row[header] = values[idx]?.trim() ?? '';
    });

    rows.push({
      row: i,
      name: row.name ?? '',
      width: row[layout.columns.width] ?? '',
      height: row[layout.columns.height] ?? '',
      depth: row[layout.columns.depth] ?? '',
      weight: row[layout.columns.weight] ?? '',
      count: row.count ?? ''
    });
  }

  return { rows, layout };
}

// ============================================================================
// VALIDATION
// ============================================================================

function readNumber(
  raw: RawCatalogRow,
  field: 'width' | 'height' | 'depth' | 'weight',
  issues: CatalogIssue[]
): number | null {
  const text = raw[field];
  if (text === '') {
    issues.push({
      code: 'ERR_MISSING_FIELD',
      row: raw.row,
      field,
      message: `Row ${raw.row}: missing ${field}`,
      suggestion: `Fill in the ${field} column`,
      severity: 'error'
    });
    return null;
  }

  const value = Number(text);
  if (!Number.isFinite(value)) {
    issues.push({
      code: 'ERR_NOT_A_NUMBER',
      row: raw.row,
      field,
      message: `Row ${raw.row}: ${field} "${text}" is not a number`,
      suggestion: 'Use plain decimal numbers without unit suffixes',
      severity: 'error'
    });
    return null;
  }
  return value;
}

function validateRow(
  raw: RawCatalogRow,
  layout: UnitLayout
): { item: ItemRecord | null; issues: CatalogIssue[] } {
  const issues: CatalogIssue[] = [];

  if (raw.name === '') {
    issues.push({
      code: 'ERR_MISSING_FIELD',
      row: raw.row,
      field: 'name',
      message: `Row ${raw.row}: missing name`,
      suggestion: 'Give every catalog row a name',
      severity: 'error'
    });
  }

  const dimensions: number[] = [];
  for (const field of DIMENSION_FIELDS) {
    const value = readNumber(raw, field, issues);
    if (value === null) continue;
    if (value <= 0) {
      issues.push({
        code: 'ERR_DIMENSION_INVALID',
        row: raw.row,
        field,
        message: `Row ${raw.row}: ${field} must be greater than zero (got ${value})`,
        suggestion: 'Provide the measured size of the item',
        severity: 'error'
      });
      continue;
    }
    dimensions.push(value / layout.divisor);
  }

  let weight = readNumber(raw, 'weight', issues);
  if (weight !== null && weight < 0) {
    issues.push({
      code: 'ERR_WEIGHT_INVALID',
      row: raw.row,
      field: 'weight',
      message: `Row ${raw.row}: weight cannot be negative (got ${weight})`,
      suggestion: 'Provide the item weight',
      severity: 'error'
    });
    weight = null;
  } else if (weight === 0) {
    issues.push({
      code: 'WARN_ZERO_WEIGHT',
      row: raw.row,
      field: 'weight',
      message: `Row ${raw.row}: weight is zero`,
      suggestion: 'Check that the weight column was filled in',
      severity: 'warning'
    });
  }

  let count = 1;
  if (raw.count !== '') {
    count = Number(raw.count);
    if (!Number.isInteger(count) || count < 1) {
      issues.push({
        code: 'ERR_COUNT_INVALID',
        row: raw.row,
        field: 'count',
        message: `Row ${raw.row}: count must be a positive whole number (got "${raw.count}")`,
        suggestion: 'Use 1 or more',
        severity: 'error'
      });
    }
  }

  if (issues.some(issue => issue.severity === 'error') || weight === null) {
    return { item: null, issues };
  }

  const [width, height, depth] = dimensions;
  return {
    item: {
      name: raw.name,
      width,
      height,
      depth,
      weight: weight / layout.divisor,
      count
    },
    issues
  };
}

// ============================================================================
// MAIN PARSER
// ============================================================================

/**
 * @throws Error when the header is missing or has no recognised column set.
 */
export function parseItemCatalog(csvContent: string): CatalogParseResult {
  const { rows, layout } = parseCatalogRows(csvContent);

  const items: ItemRecord[] = [];
  const errors: CatalogIssue[] = [];
  const warnings: CatalogIssue[] = [];
  let totalUnits = 0;
  let totalWeight = 0;
  let totalVolume = 0;

  for (const raw of rows) {
    const { item, issues } = validateRow(raw, layout);

    issues.forEach(issue => {
      if (issue.severity === 'error') {
        errors.push(issue);
      } else {
        warnings.push(issue);
      }
    });

    if (item) {
      items.push(item);
      totalUnits += item.count;
      totalWeight += item.weight * item.count;
      totalVolume += item.width * item.height * item.depth * item.count;
    }
  }

  return {
    items,
    units: layout.units,
    errors,
    warnings,
    summary: {
      total_rows: rows.length,
      valid_items: items.length,
      total_units: totalUnits,
      total_weight: totalWeight,
      total_volume: totalVolume
    }
  };
}
