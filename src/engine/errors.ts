// ---------------------------------------------------------------------------
// errors.ts — Error types raised by the combat engine
// ---------------------------------------------------------------------------
// Declined player actions are never errors; they come back as TurnOutcome
// messages.  Everything here is either malformed content or a caller bug.
// ---------------------------------------------------------------------------

import type { ZodIssue } from 'zod';

/** Base class for every error thrown by the engine. */
export class CombatEngineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Static content (skills, classes, items, enemies, balance) failed
 * validation.  Raised at load time, before any encounter starts.
 */
export class ContentValidationError extends CombatEngineError {
  public readonly source: string;
  public readonly issues: readonly string[];

  constructor(source: string, issues: readonly string[]) {
    super(`[Content] Invalid ${source}: ${issues.join('; ')}`);
    this.source = source;
    this.issues = issues;
  }

  /** Build from zod issues, rendering each as `path: message`. */
  static fromZodIssues(source: string, issues: readonly ZodIssue[]): ContentValidationError {
    return new ContentValidationError(
      source,
      issues.map((issue) => {
        const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
        return `${path}: ${issue.message}`;
      }),
    );
  }
}

/** A skill reached resolution with a type outside the closed set. */
export class UnknownSkillTypeError extends CombatEngineError {
  constructor(skillName: string, skillType: string) {
    super(`[SkillSystem] Unknown skill type "${skillType}" on skill "${skillName}"`);
  }
}

/** An encounter was started with a combatant that is already down. */
export class InvalidEncounterError extends CombatEngineError {}

/** An action was submitted to a session that already reached a terminal state. */
export class CombatEndedError extends CombatEngineError {
  constructor(state: string) {
    super(`[CombatManager] Combat already ended (${state})`);
  }
}

/** Process environment failed validation (strict config loading only). */
export class ConfigurationError extends CombatEngineError {
  public readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`[Config] Invalid environment: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

/** A lookup by id missed the content catalog. */
export class UnknownContentError extends CombatEngineError {
  constructor(kind: string, id: string) {
    super(`[Content] Unknown ${kind} "${id}"`);
  }
}
