/**
 * Stowplan - Container and Item Helpers
 *
 * Volume, rotation and catalog expansion helpers. Containers and units are
 * plain data; nothing here mutates its arguments.
 */

import {
  CargoUnit,
  ContainerSpec,
  Dimensions,
  ItemRecord,
  ORIGIN,
  ROTATION_INDICES,
  RotationIndex,
  ROTATION_TABLE
} from '../types';
import { boxFitsWithin } from './geometry/boxMath';

export function getVolume(dimensions: Dimensions): number {
  return dimensions.width * dimensions.height * dimensions.depth;
}

export function containerVolume(container: ContainerSpec): number {
  return getVolume(container);
}

export function getRotatedDimensions(dimensions: Dimensions, rotation: RotationIndex): Dimensions {
  const [a, b, c] = ROTATION_TABLE[rotation];
  return {
    width: dimensions[a],
    height: dimensions[b],
    depth: dimensions[c]
  };
}

/** True when some rotation of `dimensions` fits an empty container. */
export function fitsInSomeRotation(dimensions: Dimensions, container: Dimensions): boolean {
  return ROTATION_INDICES.some(rotation =>
    boxFitsWithin(ORIGIN, getRotatedDimensions(dimensions, rotation), container)
  );
}

export function formatDimensions(dimensions: Dimensions): string {
  return `${dimensions.width}x${dimensions.height}x${dimensions.depth}`;
}

/**
 * Expands catalog records into one unit per physical item, named
 * `<name>_<index>`. The index runs on across records that share a name, so
 * ids stay unique. Catalog order is kept so equal-volume units break ties
 * in the order the catalog lists them.
 */
export function expandItemRecords(records: ItemRecord[]): CargoUnit[] {
  const units: CargoUnit[] = [];
  const nextIndex = new Map<string, number>();

  for (const record of records) {
    const first = nextIndex.get(record.name) ?? 0;
    nextIndex.set(record.name, first + record.count);

    for (let i = first; i < first + record.count; i++) {
      units.push({
        id: `${record.name}_${i}`,
        name: record.name,
        dimensions: {
          width: record.width,
          height: record.height,
          depth: record.depth
        },
        weight: record.weight
      });
    }
  }

  return units;
}
