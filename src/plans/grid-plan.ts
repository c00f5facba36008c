/**
 * Grid (tile) plans
 *
 * A grid is laid out in rows and columns whose spacing is one field of view
 * minus the requested overlap. Rows go down (decreasing y), columns go right
 * (increasing x).
 */

import { FieldOfView, FovAxisPlan } from './axis-plan';

export type GridPlanKind = 'none' | 'rows_columns' | 'width_height' | 'from_edges';

/**
 * Order in which tiles are visited
 */
export type GridOrderMode = 'row_wise_snake' | 'row_wise' | 'column_wise_snake' | 'column_wise';

export const GRID_ORDER_MODES: readonly GridOrderMode[] = [
  'row_wise_snake',
  'row_wise',
  'column_wise_snake',
  'column_wise',
];

/**
 * Where a relative grid is anchored on the current position
 */
export type RelativeTo = 'center' | 'top_left';

export interface GridPosition {
  x: number;
  y: number;
  row: number;
  col: number;
  isRelative: boolean;
}

/**
 * Shared options of every grid layout
 */
export interface GridOptions {
  /** Overlap between neighbouring tiles, in percent of the field of view (x, y) */
  overlap?: readonly [number, number];
  mode?: GridOrderMode;
  /** Field of view declared on the plan; takes precedence over the sequence's */
  fovWidth?: number;
  fovHeight?: number;
}

/**
 * Visit order of (row, col) cells for each mode
 */
export function* iterGridCells(
  rows: number,
  columns: number,
  mode: GridOrderMode
): IterableIterator<[number, number]> {
  switch (mode) {
    case 'row_wise':
      for (let r = 0; r < rows; r++) {
        for (let c = 0; c < columns; c++) yield [r, c];
      }
      return;
    case 'row_wise_snake':
      for (let r = 0; r < rows; r++) {
        for (let i = 0; i < columns; i++) yield [r, r % 2 ? columns - 1 - i : i];
      }
      return;
    case 'column_wise':
      for (let c = 0; c < columns; c++) {
        for (let r = 0; r < rows; r++) yield [r, c];
      }
      return;
    case 'column_wise_snake':
      for (let c = 0; c < columns; c++) {
        for (let i = 0; i < rows; i++) yield [c % 2 ? rows - 1 - i : i, c];
      }
      return;
  }
}

abstract class GridPlanBase implements FovAxisPlan<GridPosition> {
  abstract readonly kind: Exclude<GridPlanKind, 'none'>;
  abstract readonly isRelative: boolean;
  readonly overlap: readonly [number, number];
  readonly mode: GridOrderMode;
  readonly fovWidth?: number;
  readonly fovHeight?: number;

  constructor(options: GridOptions) {
    this.overlap = options.overlap ?? [0, 0];
    this.mode = options.mode ?? 'row_wise_snake';
    this.fovWidth = options.fovWidth;
    this.fovHeight = options.fovHeight;
  }

  protected abstract rowCount(dy: number): number;
  protected abstract columnCount(dx: number): number;
  protected abstract originX(dx: number): number;
  protected abstract originY(dy: number): number;
  protected abstract layoutJSON(): Record<string, unknown>;

  /**
   * Distance between neighbouring tile centres
   */
  stepSize(fov: FieldOfView): { dx: number; dy: number } {
    const width = this.fovWidth ?? fov.width;
    const height = this.fovHeight ?? fov.height;
    return {
      dx: width - (width * this.overlap[0]) / 100,
      dy: height - (height * this.overlap[1]) / 100,
    };
  }

  size(fov: FieldOfView): number {
    const { dx, dy } = this.stepSize(fov);
    return this.rowCount(dy) * this.columnCount(dx);
  }

  *iterate(fov: FieldOfView): IterableIterator<GridPosition> {
    const { dx, dy } = this.stepSize(fov);
    const x0 = this.originX(dx);
    const y0 = this.originY(dy);
    for (const [row, col] of iterGridCells(this.rowCount(dy), this.columnCount(dx), this.mode)) {
      yield { x: x0 + col * dx, y: y0 - row * dy, row, col, isRelative: this.isRelative };
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      ...this.layoutJSON(),
      overlap: [...this.overlap],
      mode: this.mode,
      fovWidth: this.fovWidth,
      fovHeight: this.fovHeight,
    };
  }
}

export class NoGridPlan implements FovAxisPlan<GridPosition> {
  readonly kind = 'none';
  readonly isRelative = true;

  size(_fov: FieldOfView): number {
    return 0;
  }

  *iterate(_fov: FieldOfView): IterableIterator<GridPosition> {
    // no tiles
  }

  toJSON(): undefined {
    return undefined;
  }
}

/**
 * Fixed number of rows and columns around the current position
 */
export class GridRowsColumns extends GridPlanBase {
  readonly kind = 'rows_columns';
  readonly isRelative = true;
  readonly relativeTo: RelativeTo;

  constructor(
    readonly rows: number,
    readonly columns: number,
    options: GridOptions & { relativeTo?: RelativeTo } = {}
  ) {
    super(options);
    this.relativeTo = options.relativeTo ?? 'center';
  }

  protected rowCount(): number {
    return this.rows;
  }

  protected columnCount(): number {
    return this.columns;
  }

  protected originX(dx: number): number {
    return this.relativeTo === 'center' ? -((this.columns - 1) * dx) / 2 : 0;
  }

  protected originY(dy: number): number {
    return this.relativeTo === 'center' ? ((this.rows - 1) * dy) / 2 : 0;
  }

  protected layoutJSON(): Record<string, unknown> {
    return { rows: this.rows, columns: this.columns, relativeTo: this.relativeTo };
  }
}

/**
 * Enough tiles to cover `width` x `height` around the current position
 */
export class GridWidthHeight extends GridPlanBase {
  readonly kind = 'width_height';
  readonly isRelative = true;
  readonly relativeTo: RelativeTo;

  constructor(
    readonly width: number,
    readonly height: number,
    options: GridOptions & { relativeTo?: RelativeTo } = {}
  ) {
    super(options);
    this.relativeTo = options.relativeTo ?? 'center';
  }

  protected rowCount(dy: number): number {
    return Math.ceil(this.height / dy);
  }

  protected columnCount(dx: number): number {
    return Math.ceil(this.width / dx);
  }

  protected originX(dx: number): number {
    return this.relativeTo === 'center' ? -((this.columnCount(dx) - 1) * dx) / 2 : 0;
  }

  protected originY(dy: number): number {
    return this.relativeTo === 'center' ? ((this.rowCount(dy) - 1) * dy) / 2 : 0;
  }

  protected layoutJSON(): Record<string, unknown> {
    return { width: this.width, height: this.height, relativeTo: this.relativeTo };
  }
}

/**
 * Absolute grid covering the rectangle between four edges
 */
export class GridFromEdges extends GridPlanBase {
  readonly kind = 'from_edges';
  readonly isRelative = false;

  constructor(
    readonly top: number,
    readonly left: number,
    readonly bottom: number,
    readonly right: number,
    options: GridOptions = {}
  ) {
    super(options);
  }

  protected rowCount(dy: number): number {
    return Math.ceil((Math.abs(this.top - this.bottom) + dy) / dy);
  }

  protected columnCount(dx: number): number {
    return Math.ceil((Math.abs(this.right - this.left) + dx) / dx);
  }

  protected originX(): number {
    return Math.min(this.left, this.right);
  }

  protected originY(): number {
    return Math.max(this.top, this.bottom);
  }

  protected layoutJSON(): Record<string, unknown> {
    return { top: this.top, left: this.left, bottom: this.bottom, right: this.right };
  }
}

export type GridPlan = NoGridPlan | GridRowsColumns | GridWidthHeight | GridFromEdges;
