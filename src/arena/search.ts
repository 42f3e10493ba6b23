/**
 * POKE ARENA - Adversarial Search
 *
 * Depth-limited minimax with alpha-beta pruning over single-side plies.
 * The root side maximizes; plies alternate ASH / ROCKET from there.
 *
 * Leaf score, oriented to the root side:
 *   (ownTotalHp - enemyTotalHp) + (ownAlive - enemyAlive) * aliveWeight
 *   + advice[rootAction] * fuzzyBiasScale   (HEAL / SWAP branches only)
 *
 * The bias is constant across a root branch, so adding it at the leaves
 * keeps alpha-beta exact: pruned and unpruned search agree on the score and
 * on the set of best root actions.
 *
 * Equal-scoring root actions are broken by the injected RandomSource.
 */

import { AdviceSchema, type Action, type Advice, type BattleSnapshot, type SideId } from '../agents/schemas';
import type { EngineConfig } from '../config/engine-config';
import {
  aliveCount,
  applyAction,
  isBattleOver,
  isDefeated,
  isLegal,
  legalActions,
  otherSide,
  totalHp,
} from './battle-state';
import { IllegalActionError } from './errors';
import { NO_ADVICE, advise } from './fuzzy';
import type { RandomSource } from './rng';
import { defaultRandom, pickOne } from './rng';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type SearchConfig = Pick<EngineConfig, 'battle' | 'typeAdvantages' | 'economy'>;

export interface SearchOptions {
  /** Plies to explore. Defaults to config.battle.searchDepth. */
  depth?: number;
  /** Set false to run plain minimax (used to verify pruning). */
  pruning?: boolean;
  /** Tie-break source. */
  rng?: RandomSource;
  /** Precomputed advisor output; computed from the snapshot if omitted. */
  advice?: Advice;
}

export interface SearchResult {
  action: Action;
  score: number;
  /** Every root action that tied for the best score. */
  candidates: Action[];
  nodesVisited: number;
  advice: Advice;
}

/** No-op returned for a side that can no longer act. */
export const NO_OP: Action = Object.freeze({ kind: 'DEFEND' });

/** Scores closer than this are a tie. */
const TIE_EPSILON = 1e-6;

// ---------------------------------------------------------------------------
// Evaluation
// ---------------------------------------------------------------------------

/** Static score of a snapshot from `side`'s point of view. */
export function evaluate(snapshot: BattleSnapshot, side: SideId, config: SearchConfig): number {
  const own = snapshot.sides[side];
  const enemy = snapshot.sides[otherSide(side)];
  return (totalHp(own) - totalHp(enemy))
    + (aliveCount(own) - aliveCount(enemy)) * config.battle.aliveWeight;
}

/** Fuzzy preference for the root action that opened a branch. */
export function branchBias(action: Action, advice: Advice, config: SearchConfig): number {
  switch (action.kind) {
    case 'HEAL':
      return advice.HEAL * config.battle.fuzzyBiasScale;
    case 'SWAP':
      return advice.SWAP * config.battle.fuzzyBiasScale;
    default:
      return 0;
  }
}

// ---------------------------------------------------------------------------
// Search
// ---------------------------------------------------------------------------

interface SearchContext {
  rootSide: SideId;
  config: SearchConfig;
  pruning: boolean;
  nodes: number;
}

function minimax(
  ctx: SearchContext,
  node: BattleSnapshot,
  depth: number,
  alpha: number,
  beta: number,
  bias: number,
): number {
  ctx.nodes++;

  if (depth === 0 || isBattleOver(node)) {
    return evaluate(node, ctx.rootSide, ctx.config) + bias;
  }

  const mover = node.toMove;
  const maximizing = mover === ctx.rootSide;
  let value = maximizing ? -Infinity : Infinity;

  for (const action of legalActions(node, mover)) {
    const child = applyAction(node, mover, action, ctx.config);
    const v = minimax(ctx, child, depth - 1, alpha, beta, bias);

    if (maximizing) {
      value = Math.max(value, v);
      if (ctx.pruning) alpha = Math.max(alpha, value);
    } else {
      value = Math.min(value, v);
      if (ctx.pruning) beta = Math.min(beta, value);
    }

    if (ctx.pruning && alpha >= beta) break;
  }

  return value;
}

/**
 * Pick the best action for `side` against an optimal opponent.
 *
 * A defeated side gets NO_OP without any search.
 *
 * @throws ZodError if supplied advice weights fall outside [0, 1]
 * @throws IllegalActionError if the chosen action is not legal (a bug in
 *   legality or expansion, never an expected outcome)
 */
export function decide(
  snapshot: BattleSnapshot,
  side: SideId,
  config: SearchConfig,
  options: SearchOptions = {},
): SearchResult {
  const root: BattleSnapshot = { ...snapshot, toMove: side };

  if (isDefeated(root.sides[side])) {
    return { action: NO_OP, score: evaluate(root, side, config), candidates: [NO_OP], nodesVisited: 0, advice: { ...NO_ADVICE } };
  }

  const depth = Math.max(1, options.depth ?? config.battle.searchDepth);
  const pruning = options.pruning ?? true;
  const rng = options.rng ?? defaultRandom;
  const advice = options.advice ? AdviceSchema.parse(options.advice) : advise(root, side, config);
  const ctx: SearchContext = { rootSide: side, config, pruning, nodes: 1 };

  let best = -Infinity;
  let candidates: Action[] = [];

  for (const action of legalActions(root, side)) {
    const child = applyAction(root, side, action, config);
    // Searching against best - 2*eps (not best) keeps exact values for ties
    const alpha = pruning && best > -Infinity ? best - 2 * TIE_EPSILON : -Infinity;
    const v = minimax(ctx, child, depth - 1, alpha, Infinity, branchBias(action, advice, config));

    if (v > best + TIE_EPSILON) {
      best = v;
      candidates = [action];
    } else if (Math.abs(v - best) <= TIE_EPSILON) {
      candidates.push(action);
    }
  }

  const action = candidates.length === 1 ? candidates[0] : pickOne(rng, candidates);

  if (!isLegal(root, side, action)) {
    throw new IllegalActionError(side, action, 'search selected an action outside the legal set');
  }

  return { action, score: best, candidates, nodesVisited: ctx.nodes, advice };
}
