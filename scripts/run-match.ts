#!/usr/bin/env tsx
/**
 * POKE ARENA - CLI Match Runner
 *
 * Runs a full match end-to-end in the terminal with a colourful play-by-play:
 * catching on the grid, the shop visit, then the battle turn by turn.
 *
 * Usage:
 *   npx tsx scripts/run-match.ts
 *   npm run match
 *
 * Environment variables (optional, also read from .env):
 *   ARENA_SEED, SEARCH_DEPTH, OBSTACLE_DENSITY, CATCH_TICKS, BATTLE_TICKS,
 *   SHOP_STRATEGY=max-heal|ratio-greedy
 *   MATCH_SPEED=instant|fast|slow - Share of battle.decisionInterval to wait
 *     between battle turns: 0, 0.3 or 1 (default: fast)
 */

import 'dotenv/config';

import { loadConfig } from '../src/config/engine-config';
import { createMatch, type MatchEvent, type MatchManager } from '../src/arena/match';
import { cellKey, renderGrid } from '../src/arena/grid';
import { describeAction } from '../src/arena/battle-state';
import type { TurnEvent } from '../src/arena/combat';
import type { SideId, SideState } from '../src/agents/schemas';

// ═══════════════════════════════════════════════════════════════════════════════
// ANSI Color Utilities (no dependencies needed)
// ═══════════════════════════════════════════════════════════════════════════════

const C = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
  gray: '\x1b[90m',
  brightRed: '\x1b[91m',
  brightGreen: '\x1b[92m',
  brightYellow: '\x1b[93m',
  brightBlue: '\x1b[94m',
  brightMagenta: '\x1b[95m',
  brightWhite: '\x1b[97m',
} as const;

function c(color: keyof typeof C, text: string): string {
  return `${C[color]}${text}${C.reset}`;
}

const SIDE_STYLE: Record<SideId, { icon: string; color: keyof typeof C; mark: string }> = {
  ASH: { icon: '⚡', color: 'brightBlue', mark: 'A' },
  ROCKET: { icon: '🚀', color: 'brightMagenta', mark: 'R' },
};

function sideTag(side: SideId): string {
  const style = SIDE_STYLE[side];
  return `${style.icon} ${c(style.color, side.padEnd(6))}`;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HP Bar Rendering
// ═══════════════════════════════════════════════════════════════════════════════

function hpBar(hp: number, maxHp: number, width: number = 20): string {
  const ratio = Math.max(0, hp / maxHp);
  const filled = Math.round(ratio * width);
  const empty = width - filled;

  let barColor: keyof typeof C;
  if (ratio > 0.6) barColor = 'brightGreen';
  else if (ratio > 0.3) barColor = 'brightYellow';
  else if (ratio > 0.1) barColor = 'red';
  else barColor = 'brightRed';

  const bar = c(barColor, '█'.repeat(filled)) + c('gray', '░'.repeat(empty));
  return `[${bar}] ${c('gray', `(${hp}/${maxHp})`)}`;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Display Functions
// ═══════════════════════════════════════════════════════════════════════════════

function printBanner(): void {
  console.log('');
  console.log(c('brightYellow', '  ╔═══════════════════════════════════════════════╗'));
  console.log(c('brightYellow', '  ║') + c('bold', '            P O K E   A R E N A                ') + c('brightYellow', '║'));
  console.log(c('brightYellow', '  ║') + c('gray', '      catch · shop · battle, no human input     ') + c('brightYellow', '║'));
  console.log(c('brightYellow', '  ╚═══════════════════════════════════════════════╝'));
  console.log('');
}

function printSectionHeader(text: string): void {
  const line = '═'.repeat(50);
  console.log('');
  console.log(c('brightYellow', `  ${line}`));
  console.log(c('brightYellow', `  ${c('bold', text)}`));
  console.log(c('brightYellow', `  ${line}`));
}

function printGrid(match: MatchManager): void {
  const marks = new Map<string, string>();
  for (const side of ['ASH', 'ROCKET'] as const) {
    const trainer = match.trainers[side];
    for (const target of trainer.remainingTargets()) {
      marks.set(cellKey(target.cell), c('yellow', '*'));
    }
    marks.set(cellKey(trainer.position), c(SIDE_STYLE[side].color, SIDE_STYLE[side].mark));
  }
  for (const line of renderGrid(match.grid, marks)) {
    console.log(`    ${line.replace(/#/g, c('gray', '#'))}`);
  }
}

function printTeam(side: SideId, state: SideState): void {
  state.roster.combatants.forEach((mon, i) => {
    const active = i === state.roster.activeIndex ? c('brightWhite', '>') : ' ';
    console.log(`  ${active} ${sideTag(side)} ${mon.species.padEnd(11)} ${c('gray', mon.type.padEnd(9))} ${hpBar(mon.hp, mon.maxHp)}`);
  });
  const { Small, Medium, Large } = state.resources.elixirs;
  console.log(c('gray', `      elixirs S:${Small} M:${Medium} L:${Large}`));
}

function describeTurnEvent(event: TurnEvent): string {
  switch (event.type) {
    case 'SWAP':
      return `${sideTag(event.side)} swaps ${event.from} for ${c('bold', event.to)}`;
    case 'HEAL':
      return `${sideTag(event.side)} ${event.species} drinks a ${event.tier} elixir ${c('brightGreen', `+${event.amount}`)}`;
    case 'DEFEND':
      return `${sideTag(event.side)} ${event.species} braces`;
    case 'ATTACK': {
      const guard = event.defended ? c('gray', ' (guarded)') : '';
      return `${sideTag(event.side)} ${event.attacker} hits ${event.target} for ${c('brightRed', String(event.damage))}${guard}`;
    }
    case 'FAINT':
      return `${sideTag(event.side)} ${c('red', `${event.species} fainted!`)}`;
    case 'SEND_OUT':
      return `${sideTag(event.side)} sends out ${c('bold', event.species)}`;
  }
}

function printEvents(events: MatchEvent[]): void {
  for (const event of events) {
    switch (event.type) {
      case 'PHASE':
        printSectionHeader(event.to);
        break;
      case 'CATCH':
        if (event.result.type === 'CAUGHT') {
          console.log(`  ${sideTag(event.side)} caught ${c('bold', event.result.species)}`);
        } else if (event.result.type === 'BLOCKED') {
          console.log(`  ${sideTag(event.side)} ${c('gray', `no path to ${event.result.species}, holding`)}`);
        }
        break;
      case 'SHOP':
        console.log(
          `  ${sideTag(event.side)} bought ` +
          `S:${event.plan.Small} M:${event.plan.Medium} L:${event.plan.Large}`,
        );
        break;
      case 'DECISION':
        console.log(`  ${sideTag(event.side)} ${c('cyan', describeAction(event.action).padEnd(14))} ${c('gray', `score ${event.score.toFixed(1)}`)}`);
        break;
      case 'TURN':
        console.log(`    ${describeTurnEvent(event.event)}`);
        break;
      case 'RESULT':
        console.log('');
        if (event.winner === 'DRAW') {
          console.log(c('brightYellow', `  DRAW (${event.reason})`));
        } else {
          console.log(`  🏆 ${c('bold', c(SIDE_STYLE[event.winner].color, `WINNER: ${event.winner}`))} ${c('gray', `(${event.reason})`)}`);
        }
        break;
    }
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Speed Control
// ═══════════════════════════════════════════════════════════════════════════════

function getTurnDelay(decisionInterval: number): number {
  const speed = process.env.MATCH_SPEED?.toLowerCase() ?? 'fast';
  switch (speed) {
    case 'instant': return 0;
    case 'slow': return decisionInterval * 1000;
    case 'fast':
    default: return decisionInterval * 300;
  }
}

function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise(resolve => setTimeout(resolve, ms));
}

// ═══════════════════════════════════════════════════════════════════════════════
// Main
// ═══════════════════════════════════════════════════════════════════════════════

async function runMatch(): Promise<void> {
  printBanner();

  const { config, seed } = loadConfig();
  const match = createMatch(config, seed, { silent: true });
  const delay = getTurnDelay(config.battle.decisionInterval);

  console.log(c('gray', `  Seed: ${seed}  Field: ${match.fieldType}  Depth: ${config.battle.searchDepth}  Shop: ${config.shopStrategy}`));
  console.log('');
  printGrid(match);

  while (match.phase !== 'DONE') {
    const before = match.phase;
    const events = match.tick();

    if (before === 'CATCHING') {
      // Movement ticks are too chatty; only catches and phase changes print
      printEvents(events.filter(e => e.type !== 'CATCH' || e.result.type !== 'MOVED'));
      if (match.phase !== 'CATCHING') {
        const { ASH, ROCKET } = match.trainers;
        console.log(c('gray', `  Caught ASH ${ASH.caught.length}/${ASH.targets.length}, ROCKET ${ROCKET.caught.length}/${ROCKET.targets.length}`));
        printGrid(match);
      }
      continue;
    }

    printEvents(events);

    if (before === 'BATTLING' && match.snapshot !== null) {
      console.log('');
      printTeam('ASH', match.snapshot.sides.ASH);
      printTeam('ROCKET', match.snapshot.sides.ROCKET);
      await sleep(delay);
    }
  }

  console.log('');
  console.log(c('gray', `  ${'─'.repeat(50)}`));
  console.log(c('brightWhite', '  POKE ARENA'));
  console.log('');
}

// ═══════════════════════════════════════════════════════════════════════════════
// Run
// ═══════════════════════════════════════════════════════════════════════════════

runMatch().catch((err) => {
  console.error('\n\x1b[91mFATAL ERROR:\x1b[0m', err);
  process.exit(1);
});
