/**
 * POKE ARENA - Engine Errors
 *
 * PATH_NOT_FOUND is not here: it is an ordinary PathResult the trainer
 * recovers from. These are contract violations and are never caught inside
 * the engine.
 */

import type { Action, SideId } from '../agents/schemas';

export type EngineErrorCode = 'ILLEGAL_ACTION' | 'EMPTY_ROSTER';

export class EngineError extends Error {
  constructor(
    public readonly code: EngineErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'EngineError';
  }
}

/** An action outside the legal set reached the transition or left the search. */
export class IllegalActionError extends EngineError {
  constructor(
    public readonly side: SideId,
    public readonly action: Action,
    reason: string,
  ) {
    super('ILLEGAL_ACTION', `Illegal action ${JSON.stringify(action)} for ${side}: ${reason}`);
    this.name = 'IllegalActionError';
  }
}

/** A side arrived with zero combatants. */
export class EmptyRosterError extends EngineError {
  constructor(public readonly side: SideId) {
    super('EMPTY_ROSTER', `Side ${side} has an empty roster`);
    this.name = 'EmptyRosterError';
  }
}
