/**
 * Box primitives used by the placement search.
 *
 * Comparisons are exact: no epsilon is applied, so callers get ordinary
 * floating-point semantics on the numbers they pass in.
 */

import { Dimensions, Vector3 } from '../../types';

export function boxFitsWithin(
  position: Vector3,
  dimensions: Dimensions,
  bounds: Dimensions
): boolean {
  return (
    position.x >= 0 &&
    position.y >= 0 &&
    position.z >= 0 &&
    position.x + dimensions.width <= bounds.width &&
    position.y + dimensions.height <= bounds.height &&
    position.z + dimensions.depth <= bounds.depth
  );
}

/**
 * True when the boxes share positive volume. Boxes that only touch along a
 * face, edge or corner do not overlap.
 */
export function boxesOverlap(
  positionA: Vector3,
  dimensionsA: Dimensions,
  positionB: Vector3,
  dimensionsB: Dimensions
): boolean {
  const xOverlap = positionA.x < positionB.x + dimensionsB.width && positionA.x + dimensionsA.width > positionB.x;
  const yOverlap = positionA.y < positionB.y + dimensionsB.height && positionA.y + dimensionsA.height > positionB.y;
  const zOverlap = positionA.z < positionB.z + dimensionsB.depth && positionA.z + dimensionsA.depth > positionB.z;
  return xOverlap && yOverlap && zOverlap;
}
