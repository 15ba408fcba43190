/**
 * Stowplan - Data Types and Models
 *
 * Structures shared by the catalog parser, the packing engine and the
 * reporting layer: containers, catalog records, cargo units, placements
 * and packing results.
 */

// ============================================================================
// GEOMETRY
// ============================================================================

export interface Dimensions {
  width: number;
  height: number;
  depth: number;
}

export interface Vector3 {
  x: number;
  y: number;
  z: number;
}

export const ORIGIN: Readonly<Vector3> = Object.freeze({ x: 0, y: 0, z: 0 });

// ============================================================================
// ROTATIONS
// ============================================================================

export type RotationIndex = 0 | 1 | 2 | 3 | 4 | 5;

export const ROTATION_INDICES: readonly RotationIndex[] = [0, 1, 2, 3, 4, 5];

type Axis = keyof Dimensions;

/**
 * Axis permutation for each rotation index. Entry `[a, b, c]` means the
 * occupied box is `(dims[a], dims[b], dims[c])`. Renderers rebuild the
 * occupied box from this table, so the order is fixed.
 */
export const ROTATION_TABLE: Readonly<Record<RotationIndex, readonly [Axis, Axis, Axis]>> = {
  0: ['width', 'height', 'depth'],
  1: ['height', 'width', 'depth'],
  2: ['height', 'depth', 'width'],
  3: ['depth', 'height', 'width'],
  4: ['depth', 'width', 'height'],
  5: ['width', 'depth', 'height']
};

// ============================================================================
// CONTAINER
// ============================================================================

export interface ContainerSpec extends Dimensions {
  name: string;
  max_weight: number;
}

// ============================================================================
// CATALOG INPUT
// ============================================================================

export interface ItemRecord extends Dimensions {
  name: string;
  weight: number;
  count: number;
}

/**
 * One physical item. `id` is unique within a run, `name` is the catalog
 * name shared by all units expanded from the same record.
 */
export interface CargoUnit {
  id: string;
  name: string;
  dimensions: Dimensions;
  weight: number;
}

// ============================================================================
// PLACEMENT
// ============================================================================

export type PlacementState =
  | { status: 'unplaced' }
  | { status: 'placed'; position: Vector3; rotation: RotationIndex };

export interface PackedItem {
  unit: CargoUnit;
  position: Vector3;
  rotation: RotationIndex;
  /** Occupied box after applying `rotation`. */
  occupied: Dimensions;
}

/**
 * Why a unit was left out, decided when the engine turned it away.
 * OVERWEIGHT and OVERSIZE are properties of the unit alone; the other two
 * depend on what was loaded before it.
 */
export type UnfittedReason =
  | 'OVERWEIGHT'
  | 'OVERSIZE'
  | 'WEIGHT_CAPACITY_REACHED'
  | 'NO_SPACE';

export interface PackingResult {
  container: ContainerSpec;
  packed: PackedItem[];
  unfitted: CargoUnit[];
  /** Keyed by unit id, one entry per unfitted unit. */
  unfitted_reasons: Record<string, UnfittedReason>;
  packed_volume: number;
  packed_weight: number;
  load_efficiency: number;
}

export interface PackingOptions {
  /** Checked between items; an aborted signal stops the run. */
  signal?: AbortSignal;
}

// ============================================================================
// INPUT ISSUES
// ============================================================================

export type InputErrorCode =
  | 'ERR_CONTAINER_DIMENSION'
  | 'ERR_CONTAINER_WEIGHT'
  | 'ERR_ITEM_DIMENSION'
  | 'ERR_ITEM_WEIGHT'
  | 'ERR_ITEM_COUNT'
  | 'ERR_DUPLICATE_ID';

export interface InputIssue {
  code: InputErrorCode;
  item_id: string;
  field?: string;
  message: string;
  suggestion: string;
}
