/**
 * Geometry Module Types
 */

import { Dimensions, Vector3 } from '../../types';

/** Axis-aligned box given by its minimum corner and extent. */
export interface PlacedBox {
  position: Vector3;
  dimensions: Dimensions;
}

export type GeometryIssueCode =
  | 'BOUNDS_EXCEEDED'
  | 'COLLISION_3D'
  | 'WEIGHT_LIMIT_EXCEEDED'
  | 'EFFICIENCY_OUT_OF_RANGE';

export interface GeometryValidationIssue {
  code: GeometryIssueCode;
  message: string;
  item_id?: string;
  item_ids?: string[];
}
