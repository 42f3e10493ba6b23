/**
 * POKE ARENA - Battle State Model
 *
 * Snapshot parsing, queries, action legality and the pure single-ply
 * transition used by the search.
 *
 * Snapshots are never mutated: every transition returns a fresh copy, so
 * two trainers (or two search branches) can never alias each other's state.
 */

import {
  BattleSnapshotSchema,
  ElixirTierSchema,
  type Action,
  type BattleSnapshot,
  type Combatant,
  type Roster,
  type SideId,
  type SideState,
} from '../agents/schemas';
import type { EngineConfig } from '../config/engine-config';
import { expectedDamage } from './damage';
import { EmptyRosterError, IllegalActionError } from './errors';

export const SIDES: readonly SideId[] = ['ASH', 'ROCKET'];

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Validate raw input into a BattleSnapshot.
 *
 * - unknown keys are stripped
 * - HP is clamped to [0, maxHp]
 * - an empty roster throws EmptyRosterError
 * - an activeIndex on a fainted or missing combatant moves to the first
 *   living one
 */
export function parseSnapshot(input: unknown): BattleSnapshot {
  const parsed = BattleSnapshotSchema.parse(input);

  for (const side of SIDES) {
    if (parsed.sides[side].roster.combatants.length === 0) {
      throw new EmptyRosterError(side);
    }
  }

  return {
    ...parsed,
    sides: {
      ASH: { ...parsed.sides.ASH, roster: normalizeRoster(parsed.sides.ASH.roster) },
      ROCKET: { ...parsed.sides.ROCKET, roster: normalizeRoster(parsed.sides.ROCKET.roster) },
    },
  };
}

function normalizeRoster(roster: Roster): Roster {
  const current = roster.combatants[roster.activeIndex];
  if (current && current.hp > 0) return roster;
  const firstAlive = roster.combatants.findIndex(c => c.hp > 0);
  return { ...roster, activeIndex: firstAlive >= 0 ? firstAlive : 0 };
}

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

export function otherSide(side: SideId): SideId {
  return side === 'ASH' ? 'ROCKET' : 'ASH';
}

export function activeCombatant(state: SideState): Combatant {
  return state.roster.combatants[state.roster.activeIndex];
}

export function isAlive(combatant: Combatant): boolean {
  return combatant.hp > 0;
}

export function aliveCount(state: SideState): number {
  return state.roster.combatants.filter(isAlive).length;
}

export function totalHp(state: SideState): number {
  return state.roster.combatants.reduce((sum, c) => sum + c.hp, 0);
}

/** Every combatant fainted. */
export function isDefeated(state: SideState): boolean {
  return aliveCount(state) === 0;
}

export function hpRatio(combatant: Combatant): number {
  return combatant.maxHp > 0 ? combatant.hp / combatant.maxHp : 0;
}

/** Battle is over once either side is defeated. */
export function isBattleOver(snapshot: BattleSnapshot): boolean {
  return isDefeated(snapshot.sides.ASH) || isDefeated(snapshot.sides.ROCKET);
}

// ---------------------------------------------------------------------------
// Legality
// ---------------------------------------------------------------------------

/**
 * All legal actions for `side`, in a fixed order:
 * ATTACK, DEFEND, HEAL by tier (Small, Medium, Large), SWAP by roster index.
 * A defeated side has none.
 */
export function legalActions(snapshot: BattleSnapshot, side: SideId): Action[] {
  const state = snapshot.sides[side];
  if (isDefeated(state)) return [];

  const actions: Action[] = [{ kind: 'ATTACK' }, { kind: 'DEFEND' }];
  const active = activeCombatant(state);

  if (active.hp < active.maxHp) {
    for (const tier of ElixirTierSchema.options) {
      if (state.resources.elixirs[tier] > 0) {
        actions.push({ kind: 'HEAL', tier });
      }
    }
  }

  state.roster.combatants.forEach((c, i) => {
    if (i !== state.roster.activeIndex && isAlive(c)) {
      actions.push({ kind: 'SWAP', target: i });
    }
  });

  return actions;
}

export function actionEquals(a: Action, b: Action): boolean {
  if (a.kind !== b.kind) return false;
  if (a.kind === 'HEAL' && b.kind === 'HEAL') return a.tier === b.tier;
  if (a.kind === 'SWAP' && b.kind === 'SWAP') return a.target === b.target;
  return true;
}

export function isLegal(snapshot: BattleSnapshot, side: SideId, action: Action): boolean {
  return legalActions(snapshot, side).some(a => actionEquals(a, action));
}

/** Short label for logs: ATTACK, HEAL(Large), SWAP(2). */
export function describeAction(action: Action): string {
  switch (action.kind) {
    case 'HEAL':
      return `HEAL(${action.tier})`;
    case 'SWAP':
      return `SWAP(${action.target})`;
    default:
      return action.kind;
  }
}

// ---------------------------------------------------------------------------
// Transition
// ---------------------------------------------------------------------------

export function cloneSide(state: SideState): SideState {
  return {
    roster: {
      combatants: state.roster.combatants.map(c => ({ ...c })),
      activeIndex: state.roster.activeIndex,
    },
    resources: {
      elixirs: { ...state.resources.elixirs },
      coins: state.resources.coins,
      fuel: state.resources.fuel,
    },
    defending: state.defending,
  };
}

/**
 * If the active combatant has fainted, bring in the first living one.
 * Mutates a side that the caller already owns.
 */
export function replaceFainted(state: SideState): void {
  if (isAlive(activeCombatant(state))) return;
  const next = state.roster.combatants.findIndex(isAlive);
  if (next >= 0) state.roster.activeIndex = next;
}

/**
 * Apply one ply: `side` performs `action` against the current snapshot.
 *
 * Damage is the deterministic expected value. The mover's previous DEFEND
 * lapses when it acts again. The returned snapshot hands the move to the
 * other side.
 *
 * @throws IllegalActionError when the action is not in legalActions()
 */
export function applyAction(
  snapshot: BattleSnapshot,
  side: SideId,
  action: Action,
  config: Pick<EngineConfig, 'battle' | 'typeAdvantages' | 'economy'>,
): BattleSnapshot {
  if (!isLegal(snapshot, side, action)) {
    throw new IllegalActionError(side, action, 'not in the legal set');
  }

  const foe = otherSide(side);
  const me = cloneSide(snapshot.sides[side]);
  const them = cloneSide(snapshot.sides[foe]);
  me.defending = false;

  switch (action.kind) {
    case 'ATTACK': {
      const attacker = activeCombatant(me);
      const defender = activeCombatant(them);
      const dmg = expectedDamage(attacker, defender, snapshot.fieldType, them.defending, config);
      defender.hp = Math.max(0, defender.hp - dmg);
      replaceFainted(them);
      break;
    }
    case 'DEFEND':
      me.defending = true;
      break;
    case 'HEAL': {
      const active = activeCombatant(me);
      active.hp = Math.min(active.maxHp, active.hp + config.economy.heals[action.tier]);
      me.resources.elixirs[action.tier] -= 1;
      break;
    }
    case 'SWAP':
      me.roster.activeIndex = action.target;
      break;
  }

  const sides = side === 'ASH' ? { ASH: me, ROCKET: them } : { ASH: them, ROCKET: me };
  return { ...snapshot, sides, toMove: foe };
}
