/**
 * Candidate anchor points for the placement search.
 *
 * Points are kept in insertion order and are never removed: an anchor that
 * failed for one item, or that already holds an item, can still take a
 * later item of a different shape.
 */

import { ORIGIN, Vector3 } from '../types';

function pointKey(point: Vector3): string {
  return `${point.x},${point.y},${point.z}`;
}

export class CandidatePointSet {
  private readonly points: Vector3[] = [];
  private readonly keys = new Set<string>();

  constructor() {
    this.register(ORIGIN);
  }

  /** Snapshot of the anchors in insertion order. */
  anchors(): Vector3[] {
    return this.points.slice();
  }

  /** Adds the point unless an equal one is present. Returns true when added. */
  register(point: Vector3): boolean {
    const key = pointKey(point);
    if (this.keys.has(key)) {
      return false;
    }
    this.keys.add(key);
    this.points.push({ x: point.x, y: point.y, z: point.z });
    return true;
  }

  has(point: Vector3): boolean {
    return this.keys.has(pointKey(point));
  }

  get size(): number {
    return this.points.length;
  }
}
