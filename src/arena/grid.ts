/**
 * POKE ARENA - Catching Grid
 *
 * Rectangular cell grid with obstacle cells. Obstacles never sit on the
 * border ring, so both trainers' corner starts stay reachable in practice.
 *
 * All functions are pure with no side effects (randomness is injected).
 */

import type { Cell, CatchTarget, Direction, GridState } from './types/grid';
import type { RandomSource } from './rng';
import { randomInt } from './rng';

// Re-export types for convenience
export type { Cell, CatchTarget, Direction, GridState, PathResult } from './types/grid';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Row/col offsets for the 4 orthogonal neighbours, in expansion order. */
export const DIRECTION_OFFSETS: Readonly<Record<Direction, Cell>> = {
  E: { row: 0, col: 1 },
  W: { row: 0, col: -1 },
  S: { row: 1, col: 0 },
  N: { row: -1, col: 0 },
} as const;

export const DIRECTION_LIST: readonly Direction[] = ['E', 'W', 'S', 'N'];

/** Targets spawn at least this far from every edge. */
const SPAWN_MARGIN = 2;

/** Attempts at a random free cell before falling back to the centre. */
const SPAWN_ATTEMPTS = 100;

// ---------------------------------------------------------------------------
// Coordinate Helpers
// ---------------------------------------------------------------------------

/** Unique string key for a cell. Used for Map/Set lookups. */
export function cellKey(cell: Cell): string {
  return `${cell.row},${cell.col}`;
}

export function cellEquals(a: Cell, b: Cell): boolean {
  return a.row === b.row && a.col === b.col;
}

export function manhattan(a: Cell, b: Cell): number {
  return Math.abs(a.row - b.row) + Math.abs(a.col - b.col);
}

// ---------------------------------------------------------------------------
// Grid Construction
// ---------------------------------------------------------------------------

/**
 * Build a grid from explicit obstacle cells. Obstacles outside the bounds
 * are ignored.
 */
export function createGrid(rows: number, cols: number, obstacles: readonly Cell[] = []): GridState {
  const blocked = new Set<string>();
  for (const cell of obstacles) {
    if (cell.row >= 0 && cell.row < rows && cell.col >= 0 && cell.col < cols) {
      blocked.add(cellKey(cell));
    }
  }
  return { rows, cols, blocked };
}

/**
 * Scatter obstacles over the interior of the grid. Each interior cell is
 * blocked with probability `density`; cells listed in `keepClear` never are.
 */
export function generateObstacleGrid(
  rows: number,
  cols: number,
  density: number,
  rng: RandomSource,
  keepClear: readonly Cell[] = [],
): GridState {
  const clear = new Set(keepClear.map(cellKey));
  const obstacles: Cell[] = [];

  for (let row = 0; row < rows; row++) {
    for (let col = 0; col < cols; col++) {
      // Roll for every cell so the layout for a seed doesn't depend on keepClear
      const roll = rng.next();
      const interior = row > 0 && row < rows - 1 && col > 0 && col < cols - 1;
      if (roll < density && interior && !clear.has(cellKey({ row, col }))) {
        obstacles.push({ row, col });
      }
    }
  }

  return createGrid(rows, cols, obstacles);
}

// ---------------------------------------------------------------------------
// Grid Queries
// ---------------------------------------------------------------------------

export function inBounds(cell: Cell, grid: GridState): boolean {
  return cell.row >= 0 && cell.row < grid.rows && cell.col >= 0 && cell.col < grid.cols;
}

/** In bounds and not an obstacle. */
export function isPassable(cell: Cell, grid: GridState): boolean {
  return inBounds(cell, grid) && !grid.blocked.has(cellKey(cell));
}

/**
 * Passable orthogonal neighbours of a cell, in DIRECTION_LIST order.
 */
export function getNeighbors(cell: Cell, grid: GridState): Cell[] {
  const neighbors: Cell[] = [];
  for (const dir of DIRECTION_LIST) {
    const offset = DIRECTION_OFFSETS[dir];
    const next: Cell = { row: cell.row + offset.row, col: cell.col + offset.col };
    if (isPassable(next, grid)) {
      neighbors.push(next);
    }
  }
  return neighbors;
}

// ---------------------------------------------------------------------------
// Spawning
// ---------------------------------------------------------------------------

/**
 * Pick a random passable interior cell, at least SPAWN_MARGIN away from
 * every edge. Falls back to the grid centre after SPAWN_ATTEMPTS misses.
 */
export function randomSpawnCell(grid: GridState, rng: RandomSource): Cell {
  for (let attempt = 0; attempt < SPAWN_ATTEMPTS; attempt++) {
    const cell: Cell = {
      row: randomInt(rng, SPAWN_MARGIN, Math.max(SPAWN_MARGIN + 1, grid.rows - SPAWN_MARGIN)),
      col: randomInt(rng, SPAWN_MARGIN, Math.max(SPAWN_MARGIN + 1, grid.cols - SPAWN_MARGIN)),
    };
    if (isPassable(cell, grid)) return cell;
  }
  return { row: Math.floor(grid.rows / 2), col: Math.floor(grid.cols / 2) };
}

/**
 * Place one catch target per species. Targets may share a cell; each side
 * only ever hunts its own list.
 */
export function spawnCatchTargets(
  species: readonly string[],
  grid: GridState,
  rng: RandomSource,
): CatchTarget[] {
  return species.map(name => ({ species: name, cell: randomSpawnCell(grid, rng) }));
}

/**
 * Of the given targets, the one closest (Manhattan) to `from`.
 * Ties go to the earlier target. Returns null for an empty list.
 */
export function nearestTarget<T extends { cell: Cell }>(from: Cell, targets: readonly T[]): T | null {
  let best: T | null = null;
  let bestDist = Infinity;
  for (const target of targets) {
    const d = manhattan(from, target.cell);
    if (d < bestDist) {
      bestDist = d;
      best = target;
    }
  }
  return best;
}

// ---------------------------------------------------------------------------
// Serialization
// ---------------------------------------------------------------------------

/** Render the grid as rows of '.' (open) and '#' (blocked). */
export function renderGrid(grid: GridState, marks: ReadonlyMap<string, string> = new Map()): string[] {
  const lines: string[] = [];
  for (let row = 0; row < grid.rows; row++) {
    let line = '';
    for (let col = 0; col < grid.cols; col++) {
      const key = cellKey({ row, col });
      line += marks.get(key) ?? (grid.blocked.has(key) ? '#' : '.');
    }
    lines.push(line);
  }
  return lines;
}
