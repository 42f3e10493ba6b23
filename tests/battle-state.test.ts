#!/usr/bin/env tsx
/**
 * POKE ARENA - Battle State Tests
 *
 * Snapshot parsing at the boundary, legal action generation, the pure
 * single-ply transition, damage numbers and live turn resolution.
 *
 * Run: npx tsx tests/battle-state.test.ts
 */

import { ZodError } from 'zod';
import { DEFAULT_CONFIG } from '../src/config/engine-config';
import {
  applyAction,
  describeAction,
  legalActions,
  parseSnapshot,
} from '../src/arena/battle-state';
import { expectedDamage, rollDamage } from '../src/arena/damage';
import { resolveTurn } from '../src/arena/combat';
import { EmptyRosterError, EngineError, IllegalActionError } from '../src/arena/errors';
import type { RandomSource } from '../src/arena/rng';
import { assert, assertEqual, assertThrows, section, summary } from './helpers/harness';
import { mon, side, snapshot } from './helpers/fixtures';

/** Jitter of exactly jitterMin + value * (jitterMax - jitterMin). */
function fixedRandom(value: number): RandomSource {
  return { next: () => value };
}

// ─── Parsing ────────────────────────────────────────────────────────────────

function testParsing(): void {
  section('parseSnapshot');

  const raw = {
    sides: {
      ASH: {
        roster: {
          combatants: [
            { species: 'Pikachu', type: 'Electric', hp: 140, maxHp: 100, attack: 22, defense: 10, sprite: 'pika.png' },
            { species: 'Squirtle', type: 'Water', hp: -5, maxHp: 100, attack: 22, defense: 10 },
          ],
          activeIndex: 0,
        },
        resources: { elixirs: { Large: 1 } },
        screenX: 120,
      },
      ROCKET: {
        roster: {
          combatants: [
            { species: 'Meowth', type: 'Electric', hp: 0, maxHp: 100, attack: 22, defense: 10 },
            { species: 'Weezing', type: 'Fire', hp: 60, maxHp: 100, attack: 22, defense: 10 },
          ],
          activeIndex: 0,
        },
        resources: { elixirs: {} },
      },
    },
    fieldType: 'Fire',
    renderLayer: 3,
  };

  const snap = parseSnapshot(raw);
  assertEqual(snap.sides.ASH.roster.combatants[0].hp, 100, 'HP above max clamps to maxHp');
  assertEqual(snap.sides.ASH.roster.combatants[1].hp, 0, 'Negative HP clamps to 0');
  assertEqual(Object.keys(snap.sides.ASH.roster.combatants[0]).includes('sprite'), false, 'Unknown combatant keys are stripped');
  assertEqual(Object.keys(snap).includes('renderLayer'), false, 'Unknown snapshot keys are stripped');
  assertEqual(snap.sides.ASH.resources, { elixirs: { Small: 0, Medium: 0, Large: 1 }, coins: 0, fuel: 0 }, 'Missing resources default to zero');
  assertEqual(snap.sides.ROCKET.roster.activeIndex, 1, 'Fainted active moves to the first living combatant');
  assertEqual(snap.toMove, 'ASH', 'toMove defaults to ASH');
  assertEqual(snap.turn, 0, 'turn defaults to 0');

  const decorated = parseSnapshot({ ...raw, sides: { ...raw.sides, ASH: { ...raw.sides.ASH, notes: 'x' } } });
  assertEqual(decorated, snap, 'Extra fields do not change the parsed snapshot');

  assertThrows(
    () => parseSnapshot({ ...raw, sides: { ...raw.sides, ROCKET: { roster: { combatants: [], activeIndex: 0 }, resources: { elixirs: {} } } } }),
    err => err instanceof EmptyRosterError && err instanceof EngineError && err.code === 'EMPTY_ROSTER' && err.side === 'ROCKET',
    'Empty roster throws EmptyRosterError with code EMPTY_ROSTER',
  );
  assertThrows(
    () => parseSnapshot({ ...raw, fieldType: 'Grass' }),
    err => err instanceof ZodError,
    'Unknown field type throws ZodError',
  );
  assertThrows(() => parseSnapshot(null), err => err instanceof ZodError, 'Non-object input throws ZodError');
}

// ─── Legality ───────────────────────────────────────────────────────────────

function testLegalActions(): void {
  section('legalActions');

  const snap = snapshot(
    side([mon('Pikachu', 'Electric', 60), mon('Charmander', 'Fire', 0), mon('Squirtle', 'Water')], { Small: 1, Large: 2 }),
    side([mon('Meowth', 'Electric')]),
  );
  assertEqual(
    legalActions(snap, 'ASH').map(describeAction),
    ['ATTACK', 'DEFEND', 'HEAL(Small)', 'HEAL(Large)', 'SWAP(2)'],
    'Fixed order; no HEAL without stock; no SWAP to a fainted or active combatant',
  );
  assertEqual(legalActions(snap, 'ROCKET').map(describeAction), ['ATTACK', 'DEFEND'], 'Full HP and no bench: ATTACK and DEFEND only');

  const fullHp = snapshot(side([mon('Pikachu', 'Electric')], { Large: 3 }), side([mon('Meowth', 'Electric')]));
  assertEqual(legalActions(fullHp, 'ASH').map(describeAction), ['ATTACK', 'DEFEND'], 'HEAL is illegal at full HP');

  const defeated = snapshot(side([mon('Pikachu', 'Electric', 0)]), side([mon('Meowth', 'Electric')]));
  assertEqual(legalActions(defeated, 'ASH'), [], 'A defeated side has no legal actions');
}

// ─── Damage ─────────────────────────────────────────────────────────────────

function testDamage(): void {
  section('Damage formula');

  const pikachu = mon('Pikachu', 'Electric');
  const meowth = mon('Meowth', 'Electric');
  const weezing = mon('Weezing', 'Fire');

  assertEqual(expectedDamage(pikachu, meowth, 'Water', false, DEFAULT_CONFIG), 17, 'Neutral hit: 22 - 10/2 = 17');
  assertEqual(expectedDamage(weezing, pikachu, 'Water', false, DEFAULT_CONFIG), 22, 'Type advantage: round(17 * 1.3) = 22');
  assertEqual(expectedDamage(weezing, pikachu, 'Fire', false, DEFAULT_CONFIG), 27, 'Advantage and field: round(17 * 1.3 * 1.2) = 27');
  assertEqual(expectedDamage(pikachu, meowth, 'Water', true, DEFAULT_CONFIG), 8, 'Defending halves: floor(17 / 2) = 8');

  const tank = mon('Wobbuffet', 'Electric', 100, { defense: 80 });
  assertEqual(expectedDamage(pikachu, tank, 'Fire', false, DEFAULT_CONFIG), 5, 'Base damage floors at 5');

  assertEqual(rollDamage(pikachu, meowth, 'Water', false, DEFAULT_CONFIG, fixedRandom(0)), 14, 'Minimum jitter: round(17 * 0.8) = 14');
  assertEqual(rollDamage(pikachu, meowth, 'Water', false, DEFAULT_CONFIG, fixedRandom(0.5)), 17, 'Middle jitter: 17');
}

// ─── Transition ─────────────────────────────────────────────────────────────

function testApplyAction(): void {
  section('applyAction');

  const snap = snapshot(
    side([mon('Pikachu', 'Electric', 50), mon('Squirtle', 'Water')], { Small: 1 }),
    side([mon('Meowth', 'Electric', 10), mon('Weezing', 'Fire')]),
  );
  const frozen = JSON.stringify(snap);

  const attacked = applyAction(snap, 'ASH', { kind: 'ATTACK' }, DEFAULT_CONFIG);
  assertEqual(attacked.sides.ROCKET.roster.combatants[0].hp, 0, 'Attack knocks Meowth out (HP floors at 0)');
  assertEqual(attacked.sides.ROCKET.roster.activeIndex, 1, 'Fainted active is replaced by Weezing');
  assertEqual(attacked.toMove, 'ROCKET', 'Move passes to the other side');

  const healed = applyAction(snap, 'ASH', { kind: 'HEAL', tier: 'Small' }, DEFAULT_CONFIG);
  assertEqual(healed.sides.ASH.roster.combatants[0].hp, 75, 'Small elixir heals 25');
  assertEqual(healed.sides.ASH.resources.elixirs.Small, 0, 'Elixir is consumed');

  const swapped = applyAction(snap, 'ASH', { kind: 'SWAP', target: 1 }, DEFAULT_CONFIG);
  assertEqual(swapped.sides.ASH.roster.activeIndex, 1, 'Swap changes the active combatant');

  const guarded = applyAction(snap, 'ROCKET', { kind: 'DEFEND' }, DEFAULT_CONFIG);
  const hit = applyAction({ ...guarded, sides: { ...guarded.sides, ROCKET: { ...guarded.sides.ROCKET, roster: { ...guarded.sides.ROCKET.roster, activeIndex: 1 } } } }, 'ASH', { kind: 'ATTACK' }, DEFAULT_CONFIG);
  // Pikachu (Electric) into Weezing (Fire), no advantage, field Water: 17 halved to 8
  assertEqual(hit.sides.ROCKET.roster.combatants[1].hp, 92, 'DEFEND halves the next incoming attack');
  const again = applyAction(hit, 'ROCKET', { kind: 'ATTACK' }, DEFAULT_CONFIG);
  assertEqual(again.sides.ROCKET.defending, false, 'DEFEND lapses when the side acts again');

  const cappedHeal = applyAction(
    snapshot(side([mon('Pikachu', 'Electric', 90)], { Large: 1 }), side([mon('Meowth', 'Electric')])),
    'ASH',
    { kind: 'HEAL', tier: 'Large' },
    DEFAULT_CONFIG,
  );
  assertEqual(cappedHeal.sides.ASH.roster.combatants[0].hp, 100, 'Healing caps at maxHp');

  assertThrows(
    () => applyAction(snap, 'ASH', { kind: 'HEAL', tier: 'Large' }, DEFAULT_CONFIG),
    err => err instanceof IllegalActionError && err.code === 'ILLEGAL_ACTION',
    'HEAL without stock throws IllegalActionError',
  );
  assertThrows(
    () => applyAction(snap, 'ROCKET', { kind: 'SWAP', target: 0 }, DEFAULT_CONFIG),
    err => err instanceof IllegalActionError,
    'SWAP to the active combatant throws IllegalActionError',
  );

  assert(JSON.stringify(snap) === frozen, 'Input snapshot is never mutated');
}

// ─── Turn resolution ────────────────────────────────────────────────────────

function testResolveTurn(): void {
  section('resolveTurn');

  const base = snapshot(
    side([mon('Pikachu', 'Electric', 50), mon('Squirtle', 'Water')], { Small: 1 }),
    side([mon('Meowth', 'Electric'), mon('Weezing', 'Fire')]),
  );
  const mid = fixedRandom(0.5);

  const trade = resolveTurn(base, { ASH: { kind: 'ATTACK' }, ROCKET: { kind: 'ATTACK' } }, DEFAULT_CONFIG, mid);
  assertEqual(trade.snapshot.sides.ROCKET.roster.combatants[0].hp, 83, 'ASH hits Meowth for 17');
  assertEqual(trade.snapshot.sides.ASH.roster.combatants[0].hp, 33, 'ROCKET hits Pikachu for 17');
  assertEqual(trade.snapshot.turn, 1, 'Turn counter advances');
  assertEqual(trade.events.map(e => e.type), ['ATTACK', 'ATTACK'], 'Two attack events, ASH first');

  const guarded = resolveTurn(base, { ASH: { kind: 'ATTACK' }, ROCKET: { kind: 'DEFEND' } }, DEFAULT_CONFIG, mid);
  assertEqual(guarded.snapshot.sides.ROCKET.roster.combatants[0].hp, 92, 'DEFEND halves the same-turn attack to 8');
  assertEqual(guarded.snapshot.sides.ROCKET.defending, false, 'Guard lapses at the end of the turn');

  const healFirst = resolveTurn(base, { ASH: { kind: 'HEAL', tier: 'Small' }, ROCKET: { kind: 'ATTACK' } }, DEFAULT_CONFIG, mid);
  assertEqual(healFirst.snapshot.sides.ASH.roster.combatants[0].hp, 58, 'Heal lands before the attack: 50 + 25 - 17');
  assertEqual(healFirst.snapshot.sides.ASH.resources.elixirs.Small, 0, 'Elixir consumed');

  const swapFirst = resolveTurn(base, { ASH: { kind: 'SWAP', target: 1 }, ROCKET: { kind: 'ATTACK' } }, DEFAULT_CONFIG, mid);
  assertEqual(swapFirst.snapshot.sides.ASH.roster.combatants[1].hp, 78, 'Swap lands first; Meowth hits Squirtle with advantage for 22');
  assertEqual(swapFirst.snapshot.sides.ASH.roster.combatants[0].hp, 50, 'Benched Pikachu is untouched');

  const finisher = snapshot(
    side([mon('Pikachu', 'Electric', 50)]),
    side([mon('Meowth', 'Electric', 10), mon('Weezing', 'Fire')]),
  );
  const ko = resolveTurn(finisher, { ASH: { kind: 'ATTACK' }, ROCKET: { kind: 'ATTACK' } }, DEFAULT_CONFIG, mid);
  assertEqual(ko.events.map(e => e.type), ['ATTACK', 'FAINT', 'SEND_OUT'], 'Fainted attacker never swings; Weezing is sent out');
  assertEqual(ko.snapshot.sides.ASH.roster.combatants[0].hp, 50, 'ASH takes no damage');
  assertEqual(ko.snapshot.sides.ROCKET.roster.activeIndex, 1, 'Weezing is active');

  const wiped = snapshot(side([mon('Pikachu', 'Electric')]), side([mon('Meowth', 'Electric', 0)]));
  const noop = resolveTurn(wiped, { ASH: { kind: 'ATTACK' }, ROCKET: { kind: 'DEFEND' } }, DEFAULT_CONFIG, mid);
  assertEqual(noop.events, [], 'Nothing happens against a defeated side');

  assertThrows(
    () => resolveTurn(base, { ASH: { kind: 'HEAL', tier: 'Large' }, ROCKET: { kind: 'ATTACK' } }, DEFAULT_CONFIG, mid),
    err => err instanceof IllegalActionError && err.side === 'ASH',
    'Illegal submitted action throws IllegalActionError',
  );
  assertThrows(
    () => resolveTurn(base, { ASH: { kind: 'SWAP', target: -1 }, ROCKET: { kind: 'ATTACK' } }, DEFAULT_CONFIG, mid),
    err => err instanceof ZodError,
    'Malformed submitted action throws ZodError',
  );
}

testParsing();
testLegalActions();
testDamage();
testApplyAction();
testResolveTurn();
summary();
