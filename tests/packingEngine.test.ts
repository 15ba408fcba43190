/**
 * Packing Engine Tests
 * First-fit placement, ordering, weight limits and input validation
 */

import {
  PackingInputError,
  getPlacement,
  getUnfittedCountsByName,
  packItems,
  packUnits,
  runValidationPipeline,
  sortUnitsForPacking
} from '../packages/engine/src';
import {
  cubeContainer,
  mixedCatalog,
  slenderContainer,
  twoHalfCubes,
  unit
} from './fixtures/packingFixtures';

describe('Reference Scenarios', () => {
  test('two half-size cubes sit side by side along x', () => {
    const result = packItems(cubeContainer, twoHalfCubes);

    expect(result.unfitted).toEqual([]);
    expect(result.packed.map(p => [p.unit.id, p.position, p.rotation])).toEqual([
      ['cube_0', { x: 0, y: 0, z: 0 }, 0],
      ['cube_1', { x: 50, y: 0, z: 0 }, 0]
    ]);
    expect(result.load_efficiency).toBe(25);
    expect(result.packed_weight).toBe(200);
  });

  test('an item longer than every container side is unfitted', () => {
    const result = packItems(cubeContainer, [
      { name: 'beam', width: 200, height: 50, depth: 50, weight: 50, count: 1 }
    ]);

    expect(result.packed).toEqual([]);
    expect(result.unfitted.map(u => u.id)).toEqual(['beam_0']);
    expect(result.load_efficiency).toBe(0);
  });

  test('an item heavier than the limit is unfitted even though it fits', () => {
    const result = packItems({ ...cubeContainer, max_weight: 50 }, [
      { name: 'anvil', width: 50, height: 50, depth: 50, weight: 100, count: 1 }
    ]);

    expect(result.packed).toEqual([]);
    expect(result.unfitted.map(u => u.id)).toEqual(['anvil_0']);
  });

  test('an empty item list gives an empty result', () => {
    const result = packItems(cubeContainer, []);

    expect(result.packed).toEqual([]);
    expect(result.unfitted).toEqual([]);
    expect(result.load_efficiency).toBe(0);
    expect(result.packed_volume).toBe(0);
  });

  test('a large cube leaves no anchor for a second cube', () => {
    const result = packItems(cubeContainer, [
      { name: 'big', width: 80, height: 80, depth: 80, weight: 10, count: 1 },
      { name: 'half', width: 50, height: 50, depth: 50, weight: 10, count: 1 }
    ]);

    expect(result.packed.map(p => [p.unit.id, p.position])).toEqual([
      ['big_0', { x: 0, y: 0, z: 0 }]
    ]);
    expect(result.unfitted.map(u => u.id)).toEqual(['half_0']);
    expect(result.load_efficiency).toBeCloseTo(51.2, 10);
  });
});

describe('Placement Search', () => {
  test('rotates an item when the upright orientation does not fit', () => {
    const container = { name: 'Low', width: 100, height: 50, depth: 50, max_weight: 100 };
    const result = packUnits(container, [unit('post', 50, 100, 50, 1)]);

    expect(result.packed).toHaveLength(1);
    expect(result.packed[0].rotation).toBe(1);
    expect(result.packed[0].occupied).toEqual({ width: 100, height: 50, depth: 50 });
    expect(result.packed[0].position).toEqual({ x: 0, y: 0, z: 0 });
  });

  test('tries anchors in insertion order', () => {
    const result = packUnits(cubeContainer, [
      unit('a', 10, 10, 10, 1),
      unit('b', 20, 20, 20, 1),
      unit('c', 10, 10, 10, 1)
    ]);

    expect(result.packed.map(p => [p.unit.id, p.position])).toEqual([
      ['b', { x: 0, y: 0, z: 0 }],
      ['a', { x: 20, y: 0, z: 0 }],
      ['c', { x: 0, y: 20, z: 0 }]
    ]);
  });

  test('sorts by descending volume and keeps input order on ties', () => {
    const sorted = sortUnitsForPacking([
      unit('a', 10, 10, 10, 1),
      unit('b', 20, 20, 20, 1),
      unit('c', 5, 20, 10, 1),
      unit('d', 10, 10, 10, 1)
    ]);

    expect(sorted.map(u => u.id)).toEqual(['b', 'a', 'c', 'd']);
  });

  test('does not modify the input units', () => {
    const units = [unit('a', 10, 20, 30, 5)];
    const snapshot = JSON.parse(JSON.stringify(units));
    packUnits(cubeContainer, units);

    expect(units).toEqual(snapshot);
  });

  test('a heavy unit blocked by weight does not stop lighter ones', () => {
    const result = packUnits({ ...cubeContainer, max_weight: 100 }, [
      unit('heavy', 60, 60, 60, 90),
      unit('heavier', 50, 50, 50, 20),
      unit('light', 10, 10, 10, 5)
    ]);

    expect(result.packed.map(p => p.unit.id)).toEqual(['heavy', 'light']);
    expect(result.unfitted.map(u => u.id)).toEqual(['heavier']);
    expect(result.packed_weight).toBe(95);
  });

  test('zero-weight units are accepted', () => {
    const result = packUnits(cubeContainer, [unit('air', 10, 10, 10, 0)]);
    expect(result.packed).toHaveLength(1);
  });
});

describe('Result Bookkeeping', () => {
  const catalog = [
    { name: 'small', width: 10, height: 10, depth: 10, weight: 10, count: 1 },
    { name: 'huge', width: 200, height: 10, depth: 10, weight: 1, count: 1 },
    { name: 'medium', width: 50, height: 50, depth: 50, weight: 995, count: 1 }
  ];

  test('lists unfitted units in input order', () => {
    const result = packItems(cubeContainer, catalog);

    expect(result.packed.map(p => p.unit.id)).toEqual(['medium_0']);
    expect(result.unfitted.map(u => u.id)).toEqual(['small_0', 'huge_0']);
  });

  test('counts unfitted units by catalog name', () => {
    const result = packItems({ ...cubeContainer, max_weight: 50 }, [
      { name: 'crate', width: 50, height: 50, depth: 50, weight: 30, count: 3 },
      { name: 'box', width: 10, height: 10, depth: 10, weight: 30, count: 2 }
    ]);

    expect(result.packed.map(p => p.unit.id)).toEqual(['crate_0']);
    expect(getUnfittedCountsByName(result)).toEqual({ crate: 2, box: 2 });
  });

  test('every unit ends up packed or unfitted exactly once', () => {
    const result = packItems(slenderContainer, mixedCatalog);
    const ids = [...result.packed.map(p => p.unit.id), ...result.unfitted.map(u => u.id)];

    expect(ids).toHaveLength(15);
    expect(new Set(ids).size).toBe(15);
  });

  test('produces a valid plan for a mixed catalog', () => {
    const result = packItems(slenderContainer, mixedCatalog);

    expect(runValidationPipeline(result)).toEqual([]);
    expect(result.load_efficiency).toBeGreaterThan(0);
    expect(result.load_efficiency).toBeLessThanOrEqual(100);
  });

  test('is deterministic', () => {
    const first = packItems(slenderContainer, mixedCatalog);
    const second = packItems(slenderContainer, mixedCatalog);

    expect(JSON.stringify(second)).toBe(JSON.stringify(first));
  });

  test('gives same-named records their own units', () => {
    const result = packItems(cubeContainer, [
      { name: 'box', width: 50, height: 50, depth: 50, weight: 1, count: 1 },
      { name: 'box', width: 200, height: 10, depth: 10, weight: 1, count: 1 }
    ]);
    const ids = [...result.packed.map(p => p.unit.id), ...result.unfitted.map(u => u.id)];

    expect(ids).toEqual(['box_0', 'box_1']);
    expect(getPlacement(result, 'box_0')).toEqual({
      status: 'placed',
      position: { x: 0, y: 0, z: 0 },
      rotation: 0
    });
    expect(getPlacement(result, 'box_1')).toEqual({ status: 'unplaced' });
    expect(getUnfittedCountsByName(result)).toEqual({ box: 1 });
  });

  test('reports placement state per unit', () => {
    const result = packItems(cubeContainer, catalog);

    expect(getPlacement(result, 'medium_0')).toEqual({
      status: 'placed',
      position: { x: 0, y: 0, z: 0 },
      rotation: 0
    });
    expect(getPlacement(result, 'small_0')).toEqual({ status: 'unplaced' });
  });
});

describe('Input Validation', () => {
  test('rejects a container with a non-positive dimension', () => {
    expect(() => packItems({ ...cubeContainer, width: 0 }, twoHalfCubes)).toThrow(PackingInputError);
  });

  test('collects every container problem', () => {
    try {
      packItems({ ...cubeContainer, name: 'Bad', width: 0, max_weight: -1 }, []);
      throw new Error('expected packItems to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(PackingInputError);
      if (error instanceof PackingInputError) {
        expect(error.issues.map(i => [i.code, i.field])).toEqual([
          ['ERR_CONTAINER_DIMENSION', 'width'],
          ['ERR_CONTAINER_WEIGHT', 'max_weight']
        ]);
      }
    }
  });

  test('uses the single issue as the error message', () => {
    expect(() => packItems({ ...cubeContainer, name: 'Bad', height: -2 }, [])).toThrow(
      'Container Bad: height must be a positive number (got -2)'
    );
  });

  test('rejects items with invalid dimensions, weight or count', () => {
    try {
      packItems(cubeContainer, [
        { name: 'flat', width: 10, height: 0, depth: 10, weight: 1, count: 1 },
        { name: 'negative', width: 10, height: 10, depth: 10, weight: -1, count: 1 },
        { name: 'partial', width: 10, height: 10, depth: 10, weight: 1, count: 1.5 },
        { name: 'none', width: 10, height: 10, depth: 10, weight: 1, count: 0 }
      ]);
      throw new Error('expected packItems to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(PackingInputError);
      if (error instanceof PackingInputError) {
        expect(error.issues.map(i => [i.code, i.item_id])).toEqual([
          ['ERR_ITEM_DIMENSION', 'flat'],
          ['ERR_ITEM_WEIGHT', 'negative'],
          ['ERR_ITEM_COUNT', 'partial'],
          ['ERR_ITEM_COUNT', 'none']
        ]);
      }
    }
  });

  test('rejects units that share an id', () => {
    try {
      packUnits(cubeContainer, [unit('twin', 10, 10, 10, 1), unit('twin', 20, 20, 20, 1)]);
      throw new Error('expected packUnits to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(PackingInputError);
      if (error instanceof PackingInputError) {
        expect(error.issues.map(i => [i.code, i.item_id])).toEqual([['ERR_DUPLICATE_ID', 'twin']]);
      }
    }
  });

  test('rejects malformed units instead of marking them unfitted', () => {
    expect(() => packUnits(cubeContainer, [unit('nan', Number.NaN, 10, 10, 1)])).toThrow(
      PackingInputError
    );
  });
});

describe('Unfitted Reasons', () => {
  test('records the cause at the moment a unit is turned away', () => {
    // slab_b finds no space while the load is light; the heavy layer
    // placed after it must not relabel it as weight-bound.
    const result = packUnits(cubeContainer, [
      unit('slab_a', 100, 100, 60, 10),
      unit('slab_b', 100, 100, 50, 10),
      unit('plate', 100, 100, 40, 985)
    ]);

    expect(result.packed.map(p => [p.unit.id, p.position])).toEqual([
      ['slab_a', { x: 0, y: 0, z: 0 }],
      ['plate', { x: 0, y: 0, z: 60 }]
    ]);
    expect(result.packed_weight).toBe(995);
    expect(result.unfitted_reasons).toEqual({ slab_b: 'NO_SPACE' });
  });

  test('labels units by weight or size of their own before run state', () => {
    const result = packUnits(cubeContainer, [
      unit('base', 50, 50, 50, 995),
      unit('pole', 200, 10, 10, 10),
      unit('tile', 10, 10, 10, 10),
      unit('anvil', 5, 5, 5, 2000)
    ]);

    expect(result.unfitted_reasons).toEqual({
      pole: 'OVERSIZE',
      tile: 'WEIGHT_CAPACITY_REACHED',
      anvil: 'OVERWEIGHT'
    });
  });
});

describe('Cancellation', () => {
  test('stops when the signal is already aborted', () => {
    const controller = new AbortController();
    controller.abort();

    expect(() =>
      packUnits(cubeContainer, [unit('a', 10, 10, 10, 1)], { signal: controller.signal })
    ).toThrow();
  });

  test('runs normally with a live signal', () => {
    const controller = new AbortController();
    const result = packUnits(cubeContainer, [unit('a', 10, 10, 10, 1)], { signal: controller.signal });
    expect(result.packed).toHaveLength(1);
  });
});
