/**
 * Stowplan - Packing Input Validation
 *
 * Structural checks run before any placement search. Every problem found is
 * collected so the caller can fix the whole configuration in one pass.
 */

import { CargoUnit, ContainerSpec, Dimensions, InputIssue, ItemRecord } from '../types';

const DIMENSION_FIELDS: (keyof Dimensions)[] = ['width', 'height', 'depth'];

export class PackingInputError extends Error {
  readonly issues: InputIssue[];

  constructor(issues: InputIssue[]) {
    super(
      issues.length === 1
        ? issues[0].message
        : `${issues.length} input problems: ${issues.map(i => i.message).join('; ')}`
    );
    this.name = 'PackingInputError';
    this.issues = issues;
  }
}

function isPositive(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}

export function validateContainer(container: ContainerSpec): InputIssue[] {
  const issues: InputIssue[] = [];

  for (const field of DIMENSION_FIELDS) {
    if (!isPositive(container[field])) {
      issues.push({
        code: 'ERR_CONTAINER_DIMENSION',
        item_id: container.name,
        field,
        message: `Container ${container.name}: ${field} must be a positive number (got ${container[field]})`,
        suggestion: 'Check the container configuration'
      });
    }
  }

  if (!isPositive(container.max_weight)) {
    issues.push({
      code: 'ERR_CONTAINER_WEIGHT',
      item_id: container.name,
      field: 'max_weight',
      message: `Container ${container.name}: max_weight must be a positive number (got ${container.max_weight})`,
      suggestion: 'Set the container weight limit'
    });
  }

  return issues;
}

function validateDimensionsAndWeight(
  id: string,
  dimensions: Dimensions,
  weight: number
): InputIssue[] {
  const issues: InputIssue[] = [];

  for (const field of DIMENSION_FIELDS) {
    if (!isPositive(dimensions[field])) {
      issues.push({
        code: 'ERR_ITEM_DIMENSION',
        item_id: id,
        field,
        message: `Item ${id}: ${field} must be a positive number (got ${dimensions[field]})`,
        suggestion: 'Provide the measured size of the item'
      });
    }
  }

  if (!Number.isFinite(weight) || weight < 0) {
    issues.push({
      code: 'ERR_ITEM_WEIGHT',
      item_id: id,
      field: 'weight',
      message: `Item ${id}: weight must be zero or more (got ${weight})`,
      suggestion: 'Provide the item weight'
    });
  }

  return issues;
}

export function validateItemRecords(records: ItemRecord[]): InputIssue[] {
  const issues: InputIssue[] = [];

  for (const record of records) {
    issues.push(...validateDimensionsAndWeight(record.name, record, record.weight));

    if (!Number.isInteger(record.count) || record.count < 1) {
      issues.push({
        code: 'ERR_ITEM_COUNT',
        item_id: record.name,
        field: 'count',
        message: `Item ${record.name}: count must be a positive whole number (got ${record.count})`,
        suggestion: 'Use 1 or more'
      });
    }
  }

  return issues;
}

export function validateUnits(units: CargoUnit[]): InputIssue[] {
  const issues = units.flatMap(unit => validateDimensionsAndWeight(unit.id, unit.dimensions, unit.weight));

  const seen = new Set<string>();
  for (const unit of units) {
    if (seen.has(unit.id)) {
      issues.push({
        code: 'ERR_DUPLICATE_ID',
        item_id: unit.id,
        field: 'id',
        message: `Item ${unit.id}: id is used by more than one unit`,
        suggestion: 'Give every unit its own id'
      });
    }
    seen.add(unit.id);
  }

  return issues;
}
