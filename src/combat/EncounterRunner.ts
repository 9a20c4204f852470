// ---------------------------------------------------------------------------
// EncounterRunner.ts — Drives a CombatSession from an input source
// ---------------------------------------------------------------------------
// The runner owns no game rules.  It renders, asks for a decision, submits
// it, and repeats until the session leaves ACTIVE.
// ---------------------------------------------------------------------------

import {
  CombatState,
  type CombatSession,
  type CombatSnapshot,
  type PlayerAction,
} from '@/combat/CombatManager';

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

/** Presents the current encounter.  Never mutates it. */
export interface CombatRenderer {
  render(snapshot: CombatSnapshot): void;
}

/** Produces the player's next decision (menus, scripted input, an AI, ...). */
export interface ActionSource {
  chooseAction(snapshot: CombatSnapshot): Promise<PlayerAction>;
}

// ---------------------------------------------------------------------------
// Runner
// ---------------------------------------------------------------------------

/**
 * Play a started session to its end.
 *
 * While the player is stunned the turn is submitted without asking the
 * input source.  Declined actions are simply asked for again.
 *
 * @returns The terminal state.
 */
export async function runEncounter(
  session: CombatSession,
  input: ActionSource,
  renderer: CombatRenderer,
): Promise<CombatState> {
  while (session.state === CombatState.ACTIVE) {
    const snapshot = session.snapshot();
    renderer.render(snapshot);

    if (snapshot.playerStunned) {
      session.submitAction(null);
      continue;
    }

    const action = await input.chooseAction(snapshot);
    session.submitAction(action);
  }

  renderer.render(session.snapshot());
  return session.state;
}
