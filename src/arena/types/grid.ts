/**
 * POKE ARENA - Catching Grid Type Definitions
 *
 * Types for the rectangular catching field (24 x 11 by default).
 * Cells are addressed by (row, col) with (0, 0) at the top-left.
 * Movement is 4-connected with unit cost per step.
 */

// ---------------------------------------------------------------------------
// Core Coordinate Types
// ---------------------------------------------------------------------------

/** Grid cell coordinate. */
export interface Cell {
  readonly row: number;
  readonly col: number;
}

/** Orthogonal step direction. */
export type Direction = 'E' | 'W' | 'S' | 'N';

// ---------------------------------------------------------------------------
// Grid
// ---------------------------------------------------------------------------

/**
 * Static catching field. Generated once per catching phase and shared
 * read-only by every pathfinding call.
 */
export interface GridState {
  readonly rows: number;
  readonly cols: number;
  /** Keys (see cellKey) of non-passable cells. */
  readonly blocked: ReadonlySet<string>;
}

/** A species waiting to be caught on the field. */
export interface CatchTarget {
  readonly species: string;
  readonly cell: Cell;
}

// ---------------------------------------------------------------------------
// Pathfinding
// ---------------------------------------------------------------------------

export type PathResult =
  | { ok: true; path: Cell[] }
  | { ok: false; reason: 'PATH_NOT_FOUND' };
