/**
 * Geometry Validation Functions
 *
 * Re-checks a finished packing result without trusting the engine's own
 * bookkeeping. Used by the API before a plan is returned and by the tests.
 */

import { PackedItem, PackingResult } from '../../types';
import { boxFitsWithin, boxesOverlap } from './boxMath';
import { GeometryValidationIssue } from './types';

export function checkBounds(result: PackingResult): GeometryValidationIssue[] {
  const issues: GeometryValidationIssue[] = [];

  for (const item of result.packed) {
    if (!boxFitsWithin(item.position, item.occupied, result.container)) {
      const { x, y, z } = item.position;
      issues.push({
        code: 'BOUNDS_EXCEEDED',
        message: `${item.unit.id} at (${x}, ${y}, ${z}) extends outside container ${result.container.name}`,
        item_id: item.unit.id
      });
    }
  }

  return issues;
}

export function checkCollisions(items: PackedItem[]): GeometryValidationIssue[] {
  const issues: GeometryValidationIssue[] = [];

  for (let i = 0; i < items.length; i++) {
    for (let j = i + 1; j < items.length; j++) {
      const a = items[i];
      const b = items[j];

      if (boxesOverlap(a.position, a.occupied, b.position, b.occupied)) {
        issues.push({
          code: 'COLLISION_3D',
          message: `Collision detected between ${a.unit.id} and ${b.unit.id}`,
          item_ids: [a.unit.id, b.unit.id]
        });
      }
    }
  }

  return issues;
}

export function checkWeightLimit(result: PackingResult): GeometryValidationIssue[] {
  const totalWeight = result.packed.reduce((sum, p) => sum + p.unit.weight, 0);

  if (totalWeight > result.container.max_weight) {
    return [{
      code: 'WEIGHT_LIMIT_EXCEEDED',
      message: `Packed weight ${totalWeight} exceeds limit of ${result.container.max_weight}`
    }];
  }
  return [];
}

export function checkEfficiency(result: PackingResult): GeometryValidationIssue[] {
  if (!(result.load_efficiency >= 0 && result.load_efficiency <= 100)) {
    return [{
      code: 'EFFICIENCY_OUT_OF_RANGE',
      message: `Load efficiency ${result.load_efficiency} is outside 0-100%`
    }];
  }
  return [];
}

export function runValidationPipeline(result: PackingResult): GeometryValidationIssue[] {
  const allIssues: GeometryValidationIssue[] = [];

  allIssues.push(...checkBounds(result));
  allIssues.push(...checkCollisions(result.packed));
  allIssues.push(...checkWeightLimit(result));
  allIssues.push(...checkEfficiency(result));

  return allIssues;
}
