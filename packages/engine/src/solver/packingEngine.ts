/**
 * Stowplan - Packing Engine
 *
 * Single-container 3D loading with a deterministic first-fit heuristic:
 * units are tried largest first, each against every candidate anchor and
 * every rotation in fixed order, and the first legal placement wins.
 */

import {
  CargoUnit,
  ContainerSpec,
  Dimensions,
  ItemRecord,
  PackedItem,
  PackingOptions,
  PackingResult,
  PlacementState,
  ROTATION_INDICES,
  UnfittedReason,
  Vector3
} from '../types';
import { boxFitsWithin, boxesOverlap } from './geometry/boxMath';
import { PlacedBox } from './geometry/types';
import { CandidatePointSet } from './candidatePoints';
import {
  containerVolume,
  expandItemRecords,
  fitsInSomeRotation,
  getRotatedDimensions,
  getVolume
} from './entities';
import {
  PackingInputError,
  validateContainer,
  validateItemRecords,
  validateUnits
} from './inputValidation';

interface IndexedUnit {
  unit: CargoUnit;
  index: number;
  volume: number;
}

interface RejectedUnit extends IndexedUnit {
  reason: UnfittedReason;
}

// ============================================================================
// ORDERING
// ============================================================================

/**
 * Largest intrinsic volume first. Array#sort is stable, so equal volumes
 * keep their input order.
 */
export function sortUnitsForPacking(units: CargoUnit[]): CargoUnit[] {
  return indexUnits(units).sort((a, b) => b.volume - a.volume).map(u => u.unit);
}

function indexUnits(units: CargoUnit[]): IndexedUnit[] {
  return units.map((unit, index) => ({ unit, index, volume: getVolume(unit.dimensions) }));
}

// ============================================================================
// PLACEMENT SEARCH
// ============================================================================

function collides(position: Vector3, box: Dimensions, placed: PlacedBox[]): boolean {
  for (const other of placed) {
    if (boxesOverlap(position, box, other.position, other.dimensions)) {
      return true;
    }
  }
  return false;
}

function findPlacement(
  unit: CargoUnit,
  container: ContainerSpec,
  anchors: Vector3[],
  placed: PlacedBox[]
): PackedItem | null {
  for (const anchor of anchors) {
    for (const rotation of ROTATION_INDICES) {
      const occupied = getRotatedDimensions(unit.dimensions, rotation);

      if (!boxFitsWithin(anchor, occupied, container)) continue;
      if (collides(anchor, occupied, placed)) continue;

      return {
        unit,
        position: { x: anchor.x, y: anchor.y, z: anchor.z },
        rotation,
        occupied
      };
    }
  }
  return null;
}

/**
 * Unit-level reasons win over run-level ones, so a unit too large for the
 * empty container is reported as OVERSIZE even when weight turned it away.
 */
function rejectionReason(
  unit: CargoUnit,
  container: ContainerSpec,
  cause: 'weight' | 'space'
): UnfittedReason {
  if (unit.weight > container.max_weight) return 'OVERWEIGHT';
  if (!fitsInSomeRotation(unit.dimensions, container)) return 'OVERSIZE';
  return cause === 'weight' ? 'WEIGHT_CAPACITY_REACHED' : 'NO_SPACE';
}

// ============================================================================
// MAIN PACKING FUNCTION
// ============================================================================

/**
 * Packs `units` into `container`.
 *
 * @throws PackingInputError when the container or any unit is malformed;
 * nothing is searched in that case.
 */
export function packUnits(
  container: ContainerSpec,
  units: CargoUnit[],
  options: PackingOptions = {}
): PackingResult {
  const issues = [...validateContainer(container), ...validateUnits(units)];
  if (issues.length > 0) {
    throw new PackingInputError(issues);
  }

  const ordered = indexUnits(units).sort((a, b) => b.volume - a.volume);

  const candidates = new CandidatePointSet();
  const placedBoxes: PlacedBox[] = [];
  const packed: PackedItem[] = [];
  const unfitted: RejectedUnit[] = [];
  let runningWeight = 0;
  let packedVolume = 0;

  for (const entry of ordered) {
    options.signal?.throwIfAborted();

    const { unit } = entry;

    // The weight test does not depend on anchor or rotation.
    if (runningWeight + unit.weight > container.max_weight) {
      unfitted.push({ ...entry, reason: rejectionReason(unit, container, 'weight') });
      continue;
    }

    const placement = findPlacement(unit, container, candidates.anchors(), placedBoxes);
    if (!placement) {
      unfitted.push({ ...entry, reason: rejectionReason(unit, container, 'space') });
      continue;
    }

    packed.push(placement);
    placedBoxes.push({ position: placement.position, dimensions: placement.occupied });
    runningWeight += unit.weight;
    packedVolume += entry.volume;

    const { x, y, z } = placement.position;
    const { width, height, depth } = placement.occupied;
    candidates.register({ x: x + width, y, z });
    candidates.register({ x, y: y + height, z });
    candidates.register({ x, y, z: z + depth });
  }

  unfitted.sort((a, b) => a.index - b.index);
  const reasons = new Map(unfitted.map(u => [u.unit.id, u.reason] as const));

  return {
    container,
    packed,
    unfitted: unfitted.map(u => u.unit),
    unfitted_reasons: Object.fromEntries(reasons),
    packed_volume: packedVolume,
    packed_weight: runningWeight,
    load_efficiency: (packedVolume / containerVolume(container)) * 100
  };
}

/**
 * Catalog-level entry point: validates the records, expands counts into
 * units and packs them.
 */
export function packItems(
  container: ContainerSpec,
  records: ItemRecord[],
  options: PackingOptions = {}
): PackingResult {
  const issues = [...validateContainer(container), ...validateItemRecords(records)];
  if (issues.length > 0) {
    throw new PackingInputError(issues);
  }
  return packUnits(container, expandItemRecords(records), options);
}

// ============================================================================
// RESULT ACCESSORS
// ============================================================================

export function getUnfittedCountsByName(result: PackingResult): Record<string, number> {
  const counts = new Map<string, number>();
  for (const unit of result.unfitted) {
    counts.set(unit.name, (counts.get(unit.name) ?? 0) + 1);
  }
  return Object.fromEntries(counts);
}

export function getPlacement(result: PackingResult, unitId: string): PlacementState {
  const packed = result.packed.find(p => p.unit.id === unitId);
  if (!packed) {
    return { status: 'unplaced' };
  }
  return { status: 'placed', position: packed.position, rotation: packed.rotation };
}
