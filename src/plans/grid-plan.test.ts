/**
 * Tests for Grid Plans
 */

import { describe, it, expect } from 'vitest';
import { GridRowsColumns, GridWidthHeight, GridFromEdges, NoGridPlan, iterGridCells } from './grid-plan';

const FOV = { width: 1, height: 1 };

function xy(plan: GridRowsColumns | GridWidthHeight | GridFromEdges, fov = FOV): Array<[number, number]> {
  return [...plan.iterate(fov)].map((p) => [p.x, p.y]);
}

describe('iterGridCells', () => {
  it('should reverse every other row in row_wise_snake mode', () => {
    expect([...iterGridCells(2, 2, 'row_wise_snake')]).toEqual([
      [0, 0],
      [0, 1],
      [1, 1],
      [1, 0],
    ]);
  });

  it('should walk columns in column_wise_snake mode', () => {
    expect([...iterGridCells(2, 2, 'column_wise_snake')]).toEqual([
      [0, 0],
      [1, 0],
      [1, 1],
      [0, 1],
    ]);
  });

  it('should keep raster order in row_wise mode', () => {
    expect([...iterGridCells(2, 2, 'row_wise')]).toEqual([
      [0, 0],
      [0, 1],
      [1, 0],
      [1, 1],
    ]);
  });
});

describe('Grid Plans', () => {
  it('should be empty without a plan', () => {
    expect(new NoGridPlan().size(FOV)).toBe(0);
  });

  describe('GridRowsColumns', () => {
    it('should centre tiles on the position', () => {
      expect(xy(new GridRowsColumns(2, 2))).toEqual([
        [-0.5, 0.5],
        [0.5, 0.5],
        [0.5, -0.5],
        [-0.5, -0.5],
      ]);
    });

    it('should start at the position when relative to top_left', () => {
      expect(xy(new GridRowsColumns(1, 2, { relativeTo: 'top_left' }))).toEqual([
        [0, 0],
        [1, 0],
      ]);
    });

    it('should shrink the step by the overlap', () => {
      const plan = new GridRowsColumns(1, 2, { overlap: [50, 50], relativeTo: 'top_left' });
      expect(plan.stepSize({ width: 2, height: 2 })).toEqual({ dx: 1, dy: 1 });
      expect(xy(plan, { width: 2, height: 2 })).toEqual([
        [0, 0],
        [1, 0],
      ]);
    });

    it('should prefer its own field of view', () => {
      const plan = new GridRowsColumns(1, 2, { fovWidth: 10, fovHeight: 10 });
      expect(xy(plan)).toEqual([
        [-5, 0],
        [5, 0],
      ]);
    });

    it('should be relative', () => {
      const [first] = new GridRowsColumns(1, 1).iterate(FOV);
      expect(first.isRelative).toBe(true);
    });
  });

  describe('GridWidthHeight', () => {
    it('should cover the area with whole tiles', () => {
      const plan = new GridWidthHeight(3, 2, { mode: 'row_wise' });
      expect(plan.size(FOV)).toBe(6);
      expect(xy(plan).slice(0, 3)).toEqual([
        [-1, 0.5],
        [0, 0.5],
        [1, 0.5],
      ]);
    });
  });

  describe('GridFromEdges', () => {
    it('should include both edges', () => {
      const plan = new GridFromEdges(0, 0, 2, 2, { mode: 'row_wise' });
      expect(plan.size(FOV)).toBe(9);
      const tiles = [...plan.iterate(FOV)];
      expect(tiles[0]).toEqual({ x: 0, y: 2, row: 0, col: 0, isRelative: false });
      expect(tiles[3]).toEqual({ x: 0, y: 1, row: 1, col: 0, isRelative: false });
    });

    it('should serialize edges and options', () => {
      expect(new GridFromEdges(1, 2, 3, 4).toJSON()).toEqual({
        top: 1,
        left: 2,
        bottom: 3,
        right: 4,
        overlap: [0, 0],
        mode: 'row_wise_snake',
        fovWidth: undefined,
        fovHeight: undefined,
      });
    });
  });
});
