// ---------------------------------------------------------------------------
// CombatManager.ts — Turn-based encounter state machine
// ---------------------------------------------------------------------------
// Pure TypeScript.  Rendering and input collection happen elsewhere; this
// module only sequences actions and reports what happened.
// ---------------------------------------------------------------------------

import { basicAttack, rollFlee, type AttackResult } from '@/combat/CombatActions';
import { decideEnemyAction, EnemyActionType } from '@/combat/EnemyAI';
import type { EnemyEntity } from '@/entities/EnemyEntity';
import type { PlayerEntity } from '@/entities/PlayerEntity';
import { CombatEndedError, InvalidEncounterError } from '@/engine/errors';
import { createLogger, type Logger } from '@/engine/Logger';
import { mathRandom, type RandomSource } from '@/engine/Random';
import { gainExp, type LevelUpResult } from '@/rpg/LevelingSystem';
import { defaultSkillTarget, resolveSkill, SkillType } from '@/rpg/SkillSystem';
import type { StatsSnapshot } from '@/rpg/StatSystem';

// ---------------------------------------------------------------------------
// Enums
// ---------------------------------------------------------------------------

/** High-level state of the encounter. */
export enum CombatState {
  IDLE = 'IDLE',
  ACTIVE = 'ACTIVE',
  PLAYER_VICTORY = 'PLAYER_VICTORY',
  PLAYER_DEFEAT = 'PLAYER_DEFEAT',
  PLAYER_FLED = 'PLAYER_FLED',
}

export enum CombatEventType {
  COMBAT_START = 'COMBAT_START',
  DAMAGE_DEALT = 'DAMAGE_DEALT',
  HEALING_APPLIED = 'HEALING_APPLIED',
  STATUS_APPLIED = 'STATUS_APPLIED',
  ACTION_DECLINED = 'ACTION_DECLINED',
  TURN_END = 'TURN_END',
  STATE_CHANGED = 'STATE_CHANGED',
  VICTORY = 'VICTORY',
  DEFEAT = 'DEFEAT',
  FLED = 'FLED',
}

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

/** One decision from the player.  Indices are 0-based into the player's lists. */
export type PlayerAction =
  | { kind: 'attack' }
  | { kind: 'skill'; index: number }
  | { kind: 'item'; index: number }
  | { kind: 'flee' }
  /** The player backed out of a sub-menu. */
  | { kind: 'cancel' };

/** What a single `submitAction` call produced. */
export interface TurnOutcome {
  /** Messages appended to the log by this call, in order. */
  messages: string[];
  state: CombatState;
  /** True when the action was declined and the player must choose again. */
  requery: boolean;
  /** True when a turn was spent (including a failed flee). */
  consumedTurn: boolean;
  /** Turns spent so far in this encounter. */
  turn: number;
}

/** Rewards granted on victory. */
export interface CombatReward {
  exp: number;
  gold: number;
  levelUp: LevelUpResult | null;
}

export interface CombatantSnapshot {
  name: string;
  kind: 'player' | 'enemy';
  visual?: string;
  stats: StatsSnapshot;
  /** Human-readable effect summary, "None" when clear. */
  statusText: string;
}

export interface SkillMenuEntry {
  name: string;
  description: string;
  mpCost: number;
  affordable: boolean;
}

export interface ItemMenuEntry {
  name: string;
  description: string;
}

/** Everything a renderer or input collector needs, detached from live state. */
export interface CombatSnapshot {
  state: CombatState;
  turn: number;
  player: CombatantSnapshot & { className: string; gold: number };
  enemy: CombatantSnapshot;
  skills: SkillMenuEntry[];
  items: ItemMenuEntry[];
  playerStunned: boolean;
  messages: string[];
}

export interface CombatEvent {
  type: CombatEventType;
  data: Record<string, unknown>;
}

export type CombatEventListener = (event: CombatEvent) => void;

export interface CombatSessionOptions {
  /** Source of every roll in the encounter.  Defaults to `Math.random`. */
  rng?: RandomSource;
  /** Defaults to the shared application logger. */
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// CombatSession
// ---------------------------------------------------------------------------

/**
 * A single encounter between one player and one enemy.
 *
 * Each `submitAction` call runs at most one turn:
 *
 * 1. Player phase, skipped while stunned.  Declined choices (cancel, bad
 *    index, not enough MP, unusable item) return with `requery` set and
 *    nothing else happens.
 * 2. Enemy phase: basic attack unless stunned.
 * 3. End of turn: status effects tick on the player, then on the enemy.
 *
 * Victory ends the turn immediately, as do a successful flee and the
 * player falling during the enemy phase.
 */
export class CombatSession {
  // -----------------------------------------------------------------------
  // State
  // -----------------------------------------------------------------------

  private _state: CombatState = CombatState.IDLE;
  private _player: PlayerEntity | null = null;
  private _enemy: EnemyEntity | null = null;
  private readonly _messages: string[] = [];
  private readonly _listeners: Map<CombatEventType, CombatEventListener[]> = new Map();
  private readonly _rng: RandomSource;
  private readonly _log: Logger;
  private _turn: number = 0;
  private _rewards: CombatReward | null = null;

  constructor(options: CombatSessionOptions = {}) {
    this._rng = options.rng ?? mathRandom;
    this._log = options.logger ?? createLogger('CombatManager');
  }

  // -----------------------------------------------------------------------
  // Accessors
  // -----------------------------------------------------------------------

  public get state(): CombatState {
    return this._state;
  }

  public get turn(): number {
    return this._turn;
  }

  public get rewards(): CombatReward | null {
    return this._rewards;
  }

  public get player(): PlayerEntity {
    return this.requireStarted().player;
  }

  public get enemy(): EnemyEntity {
    return this.requireStarted().enemy;
  }

  /** The full log, oldest first. */
  public messages(): string[] {
    return [...this._messages];
  }

  public isActive(): boolean {
    return this._state === CombatState.ACTIVE;
  }

  /** When true the next turn skips the player's action entirely. */
  public isPlayerStunned(): boolean {
    return this.player.stats.isStunned();
  }

  // -----------------------------------------------------------------------
  // Event system
  // -----------------------------------------------------------------------

  public on(type: CombatEventType, listener: CombatEventListener): void {
    const arr = this._listeners.get(type);
    if (arr) {
      arr.push(listener);
    } else {
      this._listeners.set(type, [listener]);
    }
  }

  public off(type: CombatEventType, listener: CombatEventListener): void {
    const arr = this._listeners.get(type);
    if (!arr) return;
    const idx = arr.indexOf(listener);
    if (idx !== -1) arr.splice(idx, 1);
  }

  private emit(type: CombatEventType, data: Record<string, unknown> = {}): void {
    const arr = this._listeners.get(type);
    if (!arr) return;
    const event: CombatEvent = { type, data };
    for (const fn of arr) {
      fn(event);
    }
  }

  // -----------------------------------------------------------------------
  // Encounter lifecycle
  // -----------------------------------------------------------------------

  /**
   * Begin the encounter.  Both combatants must be alive.
   *
   * @throws InvalidEncounterError if either side is already down, or the
   *         session was started before.
   */
  public start(player: PlayerEntity, enemy: EnemyEntity): this {
    if (this._state !== CombatState.IDLE) {
      throw new InvalidEncounterError('[CombatManager] Session already started');
    }
    if (!player.stats.isAlive()) {
      throw new InvalidEncounterError(`[CombatManager] ${player.name} cannot fight with 0 HP`);
    }
    if (!enemy.stats.isAlive()) {
      throw new InvalidEncounterError(`[CombatManager] ${enemy.name} cannot fight with 0 HP`);
    }

    this._player = player;
    this._enemy = enemy;
    this._messages.push(`A wild ${enemy.name} appears!`);

    this.setState(CombatState.ACTIVE);
    this._log.info({ player: player.name, enemy: enemy.name }, 'encounter started');
    this.emit(CombatEventType.COMBAT_START, { player: player.name, enemy: enemy.name });
    return this;
  }

  /**
   * Run one player decision through the turn protocol.
   *
   * While the player is stunned the action is ignored (pass `null`) and the
   * turn proceeds straight to the enemy phase.
   *
   * @throws CombatEndedError once the encounter has reached a terminal state.
   */
  public submitAction(action: PlayerAction | null): TurnOutcome {
    if (this._state !== CombatState.ACTIVE) {
      throw new CombatEndedError(this._state);
    }
    const { player, enemy } = this.requireStarted();
    const firstNew = this._messages.length;

    if (player.stats.isStunned()) {
      this._turn += 1;
      this._messages.push(`${player.name} is stunned and cannot act!`);
    } else {
      const declined = this.runPlayerAction(player, enemy, action);
      if (declined !== null) {
        return this.decline(firstNew, declined);
      }
      if (this._state !== CombatState.ACTIVE) {
        return this.outcome(firstNew, false, true);
      }
    }

    this.runEnemyPhase(player, enemy);
    if (this._state !== CombatState.ACTIVE) {
      return this.outcome(firstNew, false, true);
    }

    this.endOfTurn(player, enemy, firstNew);
    return this.outcome(firstNew, false, true);
  }

  // -----------------------------------------------------------------------
  // Snapshot
  // -----------------------------------------------------------------------

  /** Detached view for renderers and menus. */
  public snapshot(): CombatSnapshot {
    const { player, enemy } = this.requireStarted();
    return {
      state: this._state,
      turn: this._turn,
      player: {
        name: player.name,
        kind: 'player',
        visual: player.visual,
        className: player.className,
        gold: player.gold,
        stats: player.stats.snapshot(),
        statusText: player.stats.describeStatusEffects(),
      },
      enemy: {
        name: enemy.name,
        kind: 'enemy',
        visual: enemy.visual,
        stats: enemy.stats.snapshot(),
        statusText: enemy.stats.describeStatusEffects(),
      },
      skills: player.skills.map((s) => ({
        name: s.name,
        description: s.description,
        mpCost: s.mpCost,
        affordable: player.stats.mp >= s.mpCost,
      })),
      items: player.inventory.getContents().map((i) => ({
        name: i.name,
        description: i.description,
      })),
      playerStunned: player.stats.isStunned(),
      messages: this.messages(),
    };
  }

  // -----------------------------------------------------------------------
  // Turn phases
  // -----------------------------------------------------------------------

  /**
   * Player phase.
   *
   * @returns A decline reason when the turn was not spent, otherwise `null`.
   */
  private runPlayerAction(
    player: PlayerEntity,
    enemy: EnemyEntity,
    action: PlayerAction | null,
  ): string | null {
    if (action === null || action.kind === 'cancel') {
      return 'cancelled';
    }

    switch (action.kind) {
      case 'attack': {
        this._turn += 1;
        this.recordAttack(basicAttack(player, enemy, this._rng));
        break;
      }

      case 'skill': {
        const skill = Number.isInteger(action.index) ? player.skills[action.index] : undefined;
        if (!skill) {
          this._messages.push('Invalid skill choice.');
          return 'invalid_skill';
        }

        const target = defaultSkillTarget(skill.type) === 'self' ? player : enemy;
        const outcome = resolveSkill(player, target, skill, this._rng);
        this._messages.push(outcome.message);
        if (!outcome.success) {
          return outcome.reason;
        }

        this._turn += 1;
        if (outcome.status) {
          this.emit(CombatEventType.STATUS_APPLIED, {
            source: player.name,
            target: outcome.affected,
            effect: { ...outcome.status.effect },
            refreshed: outcome.status.refreshed,
          });
        } else if (skill.type === SkillType.HEAL) {
          this.emit(CombatEventType.HEALING_APPLIED, {
            source: player.name,
            target: outcome.affected,
            amount: outcome.amount,
          });
        } else if (skill.type === SkillType.DAMAGE) {
          this.emit(CombatEventType.DAMAGE_DEALT, {
            source: player.name,
            target: outcome.affected,
            amount: outcome.amount,
            skill: skill.name,
          });
        }
        break;
      }

      case 'item': {
        const outcome = player.inventory.useItem(action.index, player.stats);
        this._messages.push(outcome.message);
        if (!outcome.success) {
          return outcome.reason;
        }

        this._turn += 1;
        if (outcome.hpRestored > 0) {
          this.emit(CombatEventType.HEALING_APPLIED, {
            source: outcome.item.name,
            target: player.name,
            amount: outcome.hpRestored,
          });
        }
        break;
      }

      case 'flee': {
        this._turn += 1;
        if (rollFlee(this._rng)) {
          this._messages.push(`${player.name} successfully fled!`);
          this.setState(CombatState.PLAYER_FLED);
          this._log.info({ turn: this._turn }, 'player fled');
          this.emit(CombatEventType.FLED, { player: player.name });
          return null;
        }
        this._messages.push(`${player.name} couldn't escape!`);
        break;
      }
    }

    if (!enemy.stats.isAlive()) {
      this.handleVictory(player, enemy);
    }
    return null;
  }

  private runEnemyPhase(player: PlayerEntity, enemy: EnemyEntity): void {
    const decision = decideEnemyAction(enemy);

    if (decision.type === EnemyActionType.STUNNED) {
      this._messages.push(`${enemy.name} is stunned and cannot act!`);
      return;
    }

    const result = basicAttack(enemy, player, this._rng);
    this.recordAttack(result);
    if (!result.targetAlive) {
      this.handleDefeat(player);
    }
  }

  private endOfTurn(player: PlayerEntity, enemy: EnemyEntity, firstNew: number): void {
    this._messages.push(...player.stats.tickStatusEffects(player.name));
    this._messages.push(...enemy.stats.tickStatusEffects(enemy.name));

    this._log.debug(
      {
        turn: this._turn,
        playerHp: player.stats.hp,
        enemyHp: enemy.stats.hp,
      },
      'turn resolved',
    );
    this.emit(CombatEventType.TURN_END, {
      turn: this._turn,
      messages: this._messages.slice(firstNew),
    });

    if (!player.stats.isAlive()) {
      this.handleDefeat(player);
    } else if (!enemy.stats.isAlive()) {
      this.handleVictory(player, enemy);
    }
  }

  // -----------------------------------------------------------------------
  // Terminal states
  // -----------------------------------------------------------------------

  private handleVictory(player: PlayerEntity, enemy: EnemyEntity): void {
    this._messages.push(`${enemy.name} defeated!`);

    const levelBefore = player.stats.level;
    const levelUp = gainExp(player.stats, enemy.expReward);
    player.gold += enemy.goldReward;

    this._messages.push(`Gained ${enemy.expReward} EXP and ${enemy.goldReward} gold!`);
    if (player.stats.level > levelBefore) {
      this._messages.push(`[LEVEL UP!] Now level ${player.stats.level}!`);
    }

    this._rewards = { exp: enemy.expReward, gold: enemy.goldReward, levelUp };
    this.setState(CombatState.PLAYER_VICTORY);
    this._log.info({ turn: this._turn, rewards: this._rewards }, 'enemy defeated');
    this.emit(CombatEventType.VICTORY, { rewards: this._rewards });
  }

  private handleDefeat(player: PlayerEntity): void {
    this._messages.push(`${player.name} has been defeated...`);
    this.setState(CombatState.PLAYER_DEFEAT);
    this._log.info({ turn: this._turn }, 'player defeated');
    this.emit(CombatEventType.DEFEAT, { player: player.name });
  }

  // -----------------------------------------------------------------------
  // Internal helpers
  // -----------------------------------------------------------------------

  private recordAttack(result: AttackResult): void {
    this._messages.push(result.message);
    this.emit(CombatEventType.DAMAGE_DEALT, {
      source: result.attacker,
      target: result.target,
      amount: result.damage,
    });
  }

  private decline(firstNew: number, reason: string): TurnOutcome {
    this._log.debug({ reason }, 'action declined');
    this.emit(CombatEventType.ACTION_DECLINED, { reason });
    return this.outcome(firstNew, true, false);
  }

  private outcome(firstNew: number, requery: boolean, consumedTurn: boolean): TurnOutcome {
    return {
      messages: this._messages.slice(firstNew),
      state: this._state,
      requery,
      consumedTurn,
      turn: this._turn,
    };
  }

  private setState(next: CombatState): void {
    const prev = this._state;
    this._state = next;
    this.emit(CombatEventType.STATE_CHANGED, { prev, next });
  }

  private requireStarted(): { player: PlayerEntity; enemy: EnemyEntity } {
    if (!this._player || !this._enemy) {
      throw new InvalidEncounterError('[CombatManager] Session has not been started');
    }
    return { player: this._player, enemy: this._enemy };
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/** Create a session and start it in one call. */
export function startCombat(
  player: PlayerEntity,
  enemy: EnemyEntity,
  options: CombatSessionOptions = {},
): CombatSession {
  return new CombatSession(options).start(player, enemy);
}
