/**
 * POKE ARENA - Turn Resolution
 *
 * Resolves one real battle turn from both trainers' chosen actions.
 * Both actions were chosen against the same snapshot; they resolve
 * simultaneously in this order:
 *
 *   1. SWAP / HEAL for ASH, then ROCKET
 *   2. DEFEND marks a side as guarding for this turn only
 *   3. ASH attacks, then ROCKET attacks (a fainted attacker or target skips)
 *   4. Fainted actives are replaced by the first living combatant
 *
 * Unlike search, live damage is jittered through the injected RandomSource.
 * Pure: returns a new snapshot plus an event list for the caller to render.
 */

import { ActionSchema, type Action, type BattleSnapshot, type ElixirTier, type SideId, type SideState } from '../agents/schemas';
import type { EngineConfig } from '../config/engine-config';
import {
  SIDES,
  activeCombatant,
  cloneSide,
  isAlive,
  isDefeated,
  isLegal,
  otherSide,
  replaceFainted,
} from './battle-state';
import { rollDamage } from './damage';
import { IllegalActionError } from './errors';
import type { RandomSource } from './rng';

// ─── Types ───────────────────────────────────────────────────────────

export type TurnEvent =
  | { type: 'SWAP'; side: SideId; from: string; to: string }
  | { type: 'HEAL'; side: SideId; tier: ElixirTier; species: string; amount: number }
  | { type: 'DEFEND'; side: SideId; species: string }
  | { type: 'ATTACK'; side: SideId; attacker: string; target: string; damage: number; defended: boolean }
  | { type: 'FAINT'; side: SideId; species: string }
  | { type: 'SEND_OUT'; side: SideId; species: string };

export interface TurnResolution {
  snapshot: BattleSnapshot;
  events: TurnEvent[];
}

export type TurnActions = Record<SideId, Action>;

// ─── Helpers ─────────────────────────────────────────────────────────

function cloneForTurn(state: SideState): SideState {
  return { ...cloneSide(state), defending: false };
}

/**
 * A defeated side may only submit the DEFEND no-op. Anything else has to
 * be legal against the shared snapshot.
 */
function assertSubmittable(snapshot: BattleSnapshot, side: SideId, action: Action): void {
  if (isDefeated(snapshot.sides[side])) {
    if (action.kind !== 'DEFEND') {
      throw new IllegalActionError(side, action, 'side is defeated');
    }
    return;
  }
  if (!isLegal(snapshot, side, action)) {
    throw new IllegalActionError(side, action, 'not legal for the resolved snapshot');
  }
}

// ─── Resolution ──────────────────────────────────────────────────────

/**
 * Resolve a full turn.
 *
 * @throws ZodError if a submitted action is malformed
 * @throws IllegalActionError if either submitted action is not legal
 */
export function resolveTurn(
  snapshot: BattleSnapshot,
  actions: TurnActions,
  config: Pick<EngineConfig, 'battle' | 'typeAdvantages' | 'economy'>,
  rng: RandomSource,
): TurnResolution {
  const submitted: TurnActions = {
    ASH: ActionSchema.parse(actions.ASH),
    ROCKET: ActionSchema.parse(actions.ROCKET),
  };
  for (const side of SIDES) {
    assertSubmittable(snapshot, side, submitted[side]);
  }

  const sides: Record<SideId, SideState> = {
    ASH: cloneForTurn(snapshot.sides.ASH),
    ROCKET: cloneForTurn(snapshot.sides.ROCKET),
  };
  const events: TurnEvent[] = [];

  // 1-2. Swaps, heals, guards
  for (const side of SIDES) {
    const state = sides[side];
    const action = submitted[side];
    if (isDefeated(state)) continue;

    if (action.kind === 'SWAP') {
      const from = activeCombatant(state).species;
      state.roster.activeIndex = action.target;
      events.push({ type: 'SWAP', side, from, to: activeCombatant(state).species });
    } else if (action.kind === 'HEAL') {
      const active = activeCombatant(state);
      const before = active.hp;
      active.hp = Math.min(active.maxHp, active.hp + config.economy.heals[action.tier]);
      state.resources.elixirs[action.tier] -= 1;
      events.push({ type: 'HEAL', side, tier: action.tier, species: active.species, amount: active.hp - before });
    } else if (action.kind === 'DEFEND') {
      state.defending = true;
      events.push({ type: 'DEFEND', side, species: activeCombatant(state).species });
    }
  }

  // 3. Attacks, ASH first
  for (const side of SIDES) {
    if (submitted[side].kind !== 'ATTACK') continue;
    const foe = otherSide(side);
    const attacker = activeCombatant(sides[side]);
    const target = activeCombatant(sides[foe]);
    if (!isAlive(attacker) || !isAlive(target)) continue;

    const defended = sides[foe].defending;
    const damage = rollDamage(attacker, target, snapshot.fieldType, defended, config, rng);
    target.hp = Math.max(0, target.hp - damage);
    events.push({ type: 'ATTACK', side, attacker: attacker.species, target: target.species, damage, defended });

    if (!isAlive(target)) {
      events.push({ type: 'FAINT', side: foe, species: target.species });
    }
  }

  // 4. Replace fainted actives; guards lapse at end of turn
  for (const side of SIDES) {
    const state = sides[side];
    state.defending = false;
    const before = state.roster.activeIndex;
    replaceFainted(state);
    if (state.roster.activeIndex !== before) {
      events.push({ type: 'SEND_OUT', side, species: activeCombatant(state).species });
    }
  }

  return {
    snapshot: { ...snapshot, sides, turn: snapshot.turn + 1 },
    events,
  };
}
