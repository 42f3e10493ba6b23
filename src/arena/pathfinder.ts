/**
 * POKE ARENA - A* Pathfinding
 *
 * Shortest 4-connected route between two cells, avoiding obstacles.
 *
 * - g: steps from start (unit cost)
 * - h: Manhattan distance to goal (admissible + consistent here, so the
 *   first time the goal is popped its path is optimal)
 * - Ties on f are broken by lower h, then by insertion order, so the same
 *   grid and endpoints always produce the same path.
 */

import type { Cell, GridState, PathResult } from './types/grid';
import { cellEquals, cellKey, getNeighbors, isPassable, manhattan } from './grid';

// ---------------------------------------------------------------------------
// Open set
// ---------------------------------------------------------------------------

interface PathNode {
  cell: Cell;
  key: string;
  g: number;
  h: number;
  f: number;
  /** Insertion sequence number for stable tie-breaking. */
  seq: number;
}

function before(a: PathNode, b: PathNode): boolean {
  if (a.f !== b.f) return a.f < b.f;
  if (a.h !== b.h) return a.h < b.h;
  return a.seq < b.seq;
}

/** Binary min-heap of path nodes keyed by (f, h, seq). */
class OpenSet {
  private heap: PathNode[] = [];

  get size(): number {
    return this.heap.length;
  }

  push(node: PathNode): void {
    const heap = this.heap;
    heap.push(node);
    let i = heap.length - 1;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!before(heap[i], heap[parent])) break;
      [heap[i], heap[parent]] = [heap[parent], heap[i]];
      i = parent;
    }
  }

  pop(): PathNode | undefined {
    const heap = this.heap;
    if (heap.length === 0) return undefined;
    const top = heap[0];
    const last = heap.pop();
    if (heap.length > 0 && last !== undefined) {
      heap[0] = last;
      let i = 0;
      for (;;) {
        const left = 2 * i + 1;
        const right = left + 1;
        let smallest = i;
        if (left < heap.length && before(heap[left], heap[smallest])) smallest = left;
        if (right < heap.length && before(heap[right], heap[smallest])) smallest = right;
        if (smallest === i) break;
        [heap[i], heap[smallest]] = [heap[smallest], heap[i]];
        i = smallest;
      }
    }
    return top;
  }
}

// ---------------------------------------------------------------------------
// Search
// ---------------------------------------------------------------------------

const NOT_FOUND: PathResult = { ok: false, reason: 'PATH_NOT_FOUND' };

/**
 * Find the shortest path from `start` to `goal` (both inclusive).
 *
 * Returns PATH_NOT_FOUND when either endpoint is blocked or out of bounds,
 * or when the open set empties before the goal is reached.
 */
export function findPath(grid: GridState, start: Cell, goal: Cell): PathResult {
  if (!isPassable(start, grid) || !isPassable(goal, grid)) {
    return NOT_FOUND;
  }

  if (cellEquals(start, goal)) {
    return { ok: true, path: [start] };
  }

  const goalKey = cellKey(goal);
  const open = new OpenSet();
  const closed = new Set<string>();
  const bestG = new Map<string, number>();
  const parent = new Map<string, Cell>();
  let seq = 0;

  const startKey = cellKey(start);
  const startH = manhattan(start, goal);
  bestG.set(startKey, 0);
  open.push({ cell: start, key: startKey, g: 0, h: startH, f: startH, seq: seq++ });

  while (open.size > 0) {
    const current = open.pop();
    if (!current) break;
    // Stale entry superseded by a cheaper push
    if (closed.has(current.key)) continue;

    if (current.key === goalKey) {
      return { ok: true, path: reconstruct(goal, parent) };
    }

    closed.add(current.key);

    for (const neighbor of getNeighbors(current.cell, grid)) {
      const key = cellKey(neighbor);
      if (closed.has(key)) continue;

      const tentative = current.g + 1;
      if (tentative >= (bestG.get(key) ?? Infinity)) continue;

      bestG.set(key, tentative);
      parent.set(key, current.cell);
      const h = manhattan(neighbor, goal);
      open.push({ cell: neighbor, key, g: tentative, h, f: tentative + h, seq: seq++ });
    }
  }

  return NOT_FOUND;
}

function reconstruct(goal: Cell, parent: ReadonlyMap<string, Cell>): Cell[] {
  const path: Cell[] = [goal];
  let step = parent.get(cellKey(goal));
  while (step !== undefined) {
    path.push(step);
    step = parent.get(cellKey(step));
  }
  return path.reverse();
}

/** Number of moves along a path (cells minus one). */
export function pathLength(path: readonly Cell[]): number {
  return Math.max(0, path.length - 1);
}
