#!/usr/bin/env tsx
/**
 * POKE ARENA - Fuzzy Advisor Tests
 *
 * HP bands, the fixed rule table, max-combining and monotonicity.
 *
 * Run: npx tsx tests/fuzzy.test.ts
 */

import { DEFAULT_CONFIG } from '../src/config/engine-config';
import { advise, evaluateRules, hpBand, type FuzzyRule } from '../src/arena/fuzzy';
import { assert, assertEqual, section, summary } from './helpers/harness';
import { mon, side, snapshot } from './helpers/fixtures';

function testBands(): void {
  section('HP bands');

  assertEqual(hpBand(0), 'LOW', '0.00 is LOW');
  assertEqual(hpBand(0.29), 'LOW', '0.29 is LOW');
  assertEqual(hpBand(0.3), 'MEDIUM', '0.30 is MEDIUM');
  assertEqual(hpBand(0.7), 'MEDIUM', '0.70 is MEDIUM');
  assertEqual(hpBand(0.71), 'HIGH', '0.71 is HIGH');
  assertEqual(hpBand(1), 'HIGH', '1.00 is HIGH');
}

function testLowVersusHigh(): void {
  section('Own 0.20 vs enemy 0.85');

  const snap = snapshot(
    side([mon('Pikachu', 'Electric', 20)]),
    side([mon('Meowth', 'Electric', 85)]),
  );
  assertEqual(advise(snap, 'ASH', DEFAULT_CONFIG), { HEAL: 0.9, SWAP: 0 }, 'HEAL 0.90, no SWAP');
}

function testSwapRule(): void {
  section('Low HP against a type that beats ours');

  const snap = snapshot(
    side([mon('Pikachu', 'Electric', 20), mon('Squirtle', 'Water')]),
    side([mon('Weezing', 'Fire', 85)]),
  );
  assertEqual(advise(snap, 'ASH', DEFAULT_CONFIG), { HEAL: 0.9, SWAP: 0.95 }, 'HEAL 0.90 and SWAP 0.95 both fire');

  const healthy = snapshot(
    side([mon('Pikachu', 'Electric', 50)]),
    side([mon('Weezing', 'Fire', 50)]),
  );
  assertEqual(advise(healthy, 'ASH', DEFAULT_CONFIG), { HEAL: 0, SWAP: 0 }, 'Medium vs medium fires nothing');
}

function testMaxCombine(): void {
  section('Weights combine by max');

  const rules: FuzzyRule[] = [
    { when: { own: 'LOW' }, recommend: 'HEAL', weight: 0.4 },
    { when: { enemy: 'HIGH' }, recommend: 'HEAL', weight: 0.7 },
  ];
  const advice = evaluateRules({ own: 'LOW', enemy: 'HIGH', typeDisadvantaged: false }, rules);
  assertEqual(advice.HEAL, 0.7, 'Two firing HEAL rules give the larger weight, not the sum');
}

function testMonotonicity(): void {
  section('Monotonicity');

  let previous = -1;
  let monotone = true;
  for (let hp = 100; hp >= 1; hp--) {
    const snap = snapshot(side([mon('Pikachu', 'Electric', hp)]), side([mon('Meowth', 'Electric', 90)]));
    const heal = advise(snap, 'ASH', DEFAULT_CONFIG).HEAL;
    if (heal < previous) monotone = false;
    previous = heal;
  }
  assert(monotone, 'HEAL never drops as own HP falls (enemy fixed at 0.90)');

  previous = 2;
  monotone = true;
  for (let hp = 100; hp >= 1; hp--) {
    const snap = snapshot(side([mon('Pikachu', 'Electric', 20)]), side([mon('Meowth', 'Electric', hp)]));
    const heal = advise(snap, 'ASH', DEFAULT_CONFIG).HEAL;
    if (heal > previous) monotone = false;
    previous = heal;
  }
  assert(monotone, 'HEAL never rises as enemy HP falls (own fixed at 0.20)');
}

function testDefeated(): void {
  section('Defeated sides');

  const snap = snapshot(side([mon('Pikachu', 'Electric', 20)]), side([mon('Meowth', 'Electric', 0)]));
  assertEqual(advise(snap, 'ASH', DEFAULT_CONFIG), { HEAL: 0, SWAP: 0 }, 'No advice once the enemy is defeated');
  assertEqual(advise(snap, 'ROCKET', DEFAULT_CONFIG), { HEAL: 0, SWAP: 0 }, 'No advice for a defeated side');
}

testBands();
testLowVersusHigh();
testSwapRule();
testMaxCombine();
testMonotonicity();
testDefeated();
summary();
