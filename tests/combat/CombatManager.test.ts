import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Writable } from 'node:stream';
import pino from 'pino';
import {
  CombatEventType,
  CombatSession,
  CombatState,
  startCombat,
  type CombatEvent,
} from '@/combat/CombatManager';
import { createDamageOverTime, createStun } from '@/combat/StatusEffectSystem';
import { spawnEnemy, type EnemyEntity } from '@/entities/EnemyEntity';
import { createPlayer, type PlayerEntity } from '@/entities/PlayerEntity';
import { CombatEndedError, InvalidEncounterError } from '@/engine/errors';
import { Inventory } from '@/rpg/InventorySystem';
import { createSequenceRandom, requireItem } from '../helpers';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

// 0.5 makes every variance roll exactly 1.0 and every flee roll fail.
function makeSession(player: PlayerEntity, enemy: EnemyEntity, ...rolls: number[]): CombatSession {
  return startCombat(player, enemy, { rng: createSequenceRandom(...(rolls.length > 0 ? rolls : [0.5])) });
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('CombatSession', () => {
  let player: PlayerEntity;
  let goblin: EnemyEntity;

  beforeEach(() => {
    player = createPlayer('Aria', 'warrior');
    goblin = spawnEnemy('goblin-scout');
  });

  // -----------------------------------------------------------------------
  // Lifecycle
  // -----------------------------------------------------------------------

  describe('start', () => {
    it('opens the log and becomes active', () => {
      const session = makeSession(player, goblin);
      expect(session.state).toBe(CombatState.ACTIVE);
      expect(session.turn).toBe(0);
      expect(session.messages()).toEqual(['A wild Goblin Scout appears!']);
    });

    it('refuses a combatant that is already down', () => {
      goblin.stats.hp = 0;
      expect(() => new CombatSession().start(player, goblin)).toThrow(InvalidEncounterError);
    });

    it('refuses to start twice', () => {
      const session = makeSession(player, goblin);
      expect(() => session.start(player, spawnEnemy('slime'))).toThrow(InvalidEncounterError);
    });

    it('needs a start before anything else', () => {
      expect(() => new CombatSession().snapshot()).toThrow(InvalidEncounterError);
    });
  });

  // -----------------------------------------------------------------------
  // Attacks and victory
  // -----------------------------------------------------------------------

  describe('attack', () => {
    it('resolves the player and enemy phases', () => {
      const session = makeSession(player, goblin);
      const outcome = session.submitAction({ kind: 'attack' });

      expect(outcome).toEqual({
        messages: ['Aria attacks Goblin Scout for 18 damage!', 'Goblin Scout attacks Aria for 10 damage!'],
        state: CombatState.ACTIVE,
        requery: false,
        consumedTurn: true,
        turn: 1,
      });
      expect(goblin.stats.hp).toBe(22);
      expect(player.stats.hp).toBe(110);
    });

    it('ends in victory as soon as the enemy falls, granting rewards', () => {
      const session = makeSession(player, goblin);
      session.submitAction({ kind: 'attack' });
      session.submitAction({ kind: 'attack' });
      const outcome = session.submitAction({ kind: 'attack' });

      expect(outcome.messages).toEqual([
        'Aria attacks Goblin Scout for 18 damage!',
        'Goblin Scout defeated!',
        'Gained 30 EXP and 15 gold!',
      ]);
      expect(outcome.state).toBe(CombatState.PLAYER_VICTORY);
      expect(player.stats.hp).toBe(100);
      expect(player.stats.exp).toBe(30);
      expect(player.gold).toBe(15);
      expect(session.rewards).toEqual({ exp: 30, gold: 15, levelUp: null });
    });

    it('reports a level-up earned by the victory', () => {
      player.stats.exp = 90;
      goblin.stats.hp = 10;
      const session = makeSession(player, goblin);
      const outcome = session.submitAction({ kind: 'attack' });

      expect(outcome.messages).toEqual([
        'Aria attacks Goblin Scout for 18 damage!',
        'Goblin Scout defeated!',
        'Gained 30 EXP and 15 gold!',
        '[LEVEL UP!] Now level 2!',
      ]);
      expect(player.stats.level).toBe(2);
      expect(player.stats.hp).toBe(132);
      expect(session.rewards?.levelUp?.newLevel).toBe(2);
    });

    it('rejects further actions once the encounter is over', () => {
      goblin.stats.hp = 1;
      const session = makeSession(player, goblin);
      session.submitAction({ kind: 'attack' });
      expect(() => session.submitAction({ kind: 'attack' })).toThrow(CombatEndedError);
    });
  });

  // -----------------------------------------------------------------------
  // Defeat
  // -----------------------------------------------------------------------

  describe('defeat', () => {
    it('ends when the enemy knocks the player out, skipping the tick', () => {
      player.stats.hp = 5;
      goblin.stats.addStatusEffect(createDamageOverTime('Burn', 3, 2));
      const session = makeSession(player, goblin);
      const outcome = session.submitAction({ kind: 'attack' });

      expect(outcome.messages).toEqual([
        'Aria attacks Goblin Scout for 18 damage!',
        'Goblin Scout attacks Aria for 10 damage!',
        'Aria has been defeated...',
      ]);
      expect(outcome.state).toBe(CombatState.PLAYER_DEFEAT);
      expect(goblin.stats.hp).toBe(22);
      expect(goblin.stats.statusEffects[0].duration).toBe(2);
    });

    it('favours defeat when both sides fall to effects on the same turn', () => {
      player.stats.hp = 12;
      player.stats.addStatusEffect(createDamageOverTime('Poison', 5, 3));
      goblin.stats.hp = 25;
      goblin.stats.addStatusEffect(createDamageOverTime('Burn', 7, 3));
      const session = makeSession(player, goblin);
      const outcome = session.submitAction({ kind: 'attack' });

      expect(outcome.messages).toEqual([
        'Aria attacks Goblin Scout for 18 damage!',
        'Goblin Scout attacks Aria for 10 damage!',
        '[DOT] Poison deals 5 damage to Aria!',
        '[DOT] Burn deals 7 damage to Goblin Scout!',
        'Aria has been defeated...',
      ]);
      expect(outcome.state).toBe(CombatState.PLAYER_DEFEAT);
      expect(session.rewards).toBeNull();
    });
  });

  // -----------------------------------------------------------------------
  // Flee
  // -----------------------------------------------------------------------

  describe('flee', () => {
    it('escapes with no enemy action when the roll is under the chance', () => {
      const session = makeSession(player, goblin, 0.1);
      const outcome = session.submitAction({ kind: 'flee' });

      expect(outcome.messages).toEqual(['Aria successfully fled!']);
      expect(outcome.state).toBe(CombatState.PLAYER_FLED);
      expect(player.stats.hp).toBe(120);
    });

    it('spends the turn on a failed attempt', () => {
      const session = makeSession(player, goblin);
      const outcome = session.submitAction({ kind: 'flee' });

      expect(outcome.messages).toEqual(["Aria couldn't escape!", 'Goblin Scout attacks Aria for 10 damage!']);
      expect(outcome).toMatchObject({ state: CombatState.ACTIVE, consumedTurn: true, requery: false, turn: 1 });
    });
  });

  // -----------------------------------------------------------------------
  // Declined actions
  // -----------------------------------------------------------------------

  describe('declined actions', () => {
    it('treats cancel as a silent requery', () => {
      const session = makeSession(player, goblin);
      const outcome = session.submitAction({ kind: 'cancel' });

      expect(outcome).toEqual({
        messages: [],
        state: CombatState.ACTIVE,
        requery: true,
        consumedTurn: false,
        turn: 0,
      });
      expect(player.stats.hp).toBe(120);
      expect(session.messages()).toEqual(['A wild Goblin Scout appears!']);
    });

    it('rejects an out-of-range skill', () => {
      const session = makeSession(player, goblin);
      const outcome = session.submitAction({ kind: 'skill', index: 9 });
      expect(outcome.messages).toEqual(['Invalid skill choice.']);
      expect(outcome.requery).toBe(true);
      expect(goblin.stats.hp).toBe(40);
    });

    it('rejects a skill the player cannot afford', () => {
      player.stats.mp = 5;
      const session = makeSession(player, goblin);
      const outcome = session.submitAction({ kind: 'skill', index: 0 });

      expect(outcome.messages).toEqual(['Not enough MP! Need 10 MP.']);
      expect(outcome).toMatchObject({ requery: true, consumedTurn: false });
      expect(player.stats.mp).toBe(5);
      expect(player.stats.hp).toBe(120);
    });

    it('rejects an empty inventory', () => {
      player.inventory = new Inventory();
      const session = makeSession(player, goblin);
      expect(session.submitAction({ kind: 'item', index: 0 }).messages).toEqual(['You have no items!']);
    });

    it('keeps an item that does nothing in combat', () => {
      player.inventory = new Inventory([requireItem('rusty-key')]);
      const session = makeSession(player, goblin);
      const outcome = session.submitAction({ kind: 'item', index: 0 });

      expect(outcome.messages).toEqual(["Rusty Key can't be used in combat."]);
      expect(outcome.requery).toBe(true);
      expect(player.inventory.size).toBe(1);
    });
  });

  // -----------------------------------------------------------------------
  // Skills and items
  // -----------------------------------------------------------------------

  describe('skills and items', () => {
    it('spends MP on a damage skill', () => {
      const session = makeSession(player, goblin);
      const outcome = session.submitAction({ kind: 'skill', index: 0 });

      expect(outcome.messages).toEqual([
        'Aria uses Power Strike! Deals 27 damage!',
        'Goblin Scout attacks Aria for 10 damage!',
      ]);
      expect(goblin.stats.hp).toBe(13);
      expect(player.stats.mp).toBe(20);
    });

    it('lets a buff raise later attacks', () => {
      const session = makeSession(player, goblin);
      const first = session.submitAction({ kind: 'skill', index: 2 });
      expect(first.messages).toEqual([
        'Aria uses Battle Cry! Attack +5 for 3 turns!',
        'Goblin Scout attacks Aria for 10 damage!',
      ]);

      const second = session.submitAction({ kind: 'attack' });
      expect(second.messages[0]).toBe('Aria attacks Goblin Scout for 23 damage!');
    });

    it('uses an item and removes it', () => {
      player.stats.hp = 60;
      const session = makeSession(player, goblin);
      const outcome = session.submitAction({ kind: 'item', index: 0 });

      expect(outcome.messages).toEqual([
        'Used Health Potion! Restored 40 HP.',
        'Goblin Scout attacks Aria for 10 damage!',
      ]);
      expect(player.stats.hp).toBe(90);
      expect(player.inventory.size).toBe(2);
    });

    it('grants rewards when a DOT finishes the enemy', () => {
      const mage = createPlayer('Mira', 'wizard');
      const slime = spawnEnemy('slime');
      slime.stats.hp = 5;
      const session = makeSession(mage, slime);
      const outcome = session.submitAction({ kind: 'skill', index: 1 });

      expect(outcome.messages).toEqual([
        'Mira uses Poison Cloud! Slime is afflicted with Poison!',
        'Slime attacks Mira for 6 damage!',
        '[DOT] Poison deals 6 damage to Slime!',
        'Slime defeated!',
        'Gained 20 EXP and 10 gold!',
      ]);
      expect(outcome.state).toBe(CombatState.PLAYER_VICTORY);
      expect(mage.gold).toBe(10);
    });
  });

  // -----------------------------------------------------------------------
  // Stun
  // -----------------------------------------------------------------------

  describe('stun', () => {
    it('skips a stunned player and ignores the submitted action', () => {
      player.stats.addStatusEffect(createStun(1));
      const session = makeSession(player, goblin);
      expect(session.isPlayerStunned()).toBe(true);

      const outcome = session.submitAction({ kind: 'attack' });

      expect(outcome.messages).toEqual([
        'Aria is stunned and cannot act!',
        'Goblin Scout attacks Aria for 10 damage!',
        '[*] Stunned on Aria wore off!',
      ]);
      expect(outcome).toMatchObject({ consumedTurn: true, turn: 1 });
      expect(goblin.stats.hp).toBe(40);
      expect(session.isPlayerStunned()).toBe(false);
    });

    it('skips the enemy phase of the turn the stun lands', () => {
      const thief = createPlayer('Vex', 'thief');
      const session = makeSession(thief, goblin);
      const outcome = session.submitAction({ kind: 'skill', index: 2 });

      expect(outcome.messages).toEqual([
        'Vex uses Stunning Strike! Goblin Scout is stunned for 1 turns!',
        'Goblin Scout is stunned and cannot act!',
        '[*] Stunned on Goblin Scout wore off!',
      ]);
      expect(thief.stats.hp).toBe(90);
      expect(thief.stats.mp).toBe(20);
    });

    it('holds the enemy for two turns and lets it act on the third', () => {
      goblin.stats.addStatusEffect(createStun(2));
      const session = makeSession(player, goblin);

      expect(session.submitAction({ kind: 'flee' }).messages).toEqual([
        "Aria couldn't escape!",
        'Goblin Scout is stunned and cannot act!',
      ]);
      expect(session.submitAction({ kind: 'flee' }).messages).toEqual([
        "Aria couldn't escape!",
        'Goblin Scout is stunned and cannot act!',
        '[*] Stunned on Goblin Scout wore off!',
      ]);
      expect(player.stats.hp).toBe(120);

      const third = session.submitAction({ kind: 'flee' });
      expect(third.messages).toEqual(["Aria couldn't escape!", 'Goblin Scout attacks Aria for 10 damage!']);
      expect(third.turn).toBe(3);
      expect(player.stats.hp).toBe(110);
    });
  });

  // -----------------------------------------------------------------------
  // Snapshot
  // -----------------------------------------------------------------------

  describe('snapshot', () => {
    it('describes both sides and the menus', () => {
      player.stats.mp = 12;
      const session = makeSession(player, goblin);
      const snap = session.snapshot();

      expect(snap.player).toMatchObject({ name: 'Aria', className: 'Warrior', gold: 0, statusText: 'None' });
      expect(snap.enemy).toMatchObject({ name: 'Goblin Scout', visual: 'goblin', statusText: 'None' });
      expect(snap.skills.map((s) => [s.name, s.affordable])).toEqual([
        ['Power Strike', true],
        ['Whirlwind', false],
        ['Battle Cry', false],
      ]);
      expect(snap.items.map((i) => i.name)).toEqual(['Health Potion', 'Mana Potion', 'Health Potion']);
      expect(snap.playerStunned).toBe(false);
    });

    it('is detached from live state', () => {
      const session = makeSession(player, goblin);
      const snap = session.snapshot();
      session.submitAction({ kind: 'attack' });
      expect(snap.enemy.stats.hp).toBe(40);
      expect(snap.messages).toEqual(['A wild Goblin Scout appears!']);
    });
  });

  // -----------------------------------------------------------------------
  // Events and options
  // -----------------------------------------------------------------------

  describe('events', () => {
    it('notifies listeners and stops after off()', () => {
      const session = new CombatSession({ rng: createSequenceRandom(0.5) });
      const states: unknown[] = [];
      const onState = (e: CombatEvent) => states.push(e.data.next);
      const onDamage = vi.fn();
      session.on(CombatEventType.STATE_CHANGED, onState);
      session.on(CombatEventType.DAMAGE_DEALT, onDamage);

      goblin.stats.hp = 18;
      session.start(player, goblin);
      session.off(CombatEventType.DAMAGE_DEALT, onDamage);
      session.submitAction({ kind: 'attack' });

      expect(states).toEqual([CombatState.ACTIVE, CombatState.PLAYER_VICTORY]);
      expect(onDamage).not.toHaveBeenCalled();
    });

    it('emits the victory rewards', () => {
      const onVictory = vi.fn();
      const session = new CombatSession({ rng: createSequenceRandom(0.5) });
      session.on(CombatEventType.VICTORY, onVictory);
      goblin.stats.hp = 1;
      session.start(player, goblin).submitAction({ kind: 'attack' });

      expect(onVictory).toHaveBeenCalledTimes(1);
      expect(onVictory).toHaveBeenCalledWith({
        type: CombatEventType.VICTORY,
        data: { rewards: { exp: 30, gold: 15, levelUp: null } },
      });
    });

    it('reports declines', () => {
      const onDecline = vi.fn();
      const session = makeSession(player, goblin);
      session.on(CombatEventType.ACTION_DECLINED, onDecline);
      session.submitAction({ kind: 'skill', index: -1 });

      expect(onDecline).toHaveBeenCalledWith({
        type: CombatEventType.ACTION_DECLINED,
        data: { reason: 'invalid_skill' },
      });
    });
  });

  describe('options', () => {
    it('draws every roll from the injected source', () => {
      const rng = createSequenceRandom(0.5);
      const session = startCombat(player, goblin, { rng });
      session.submitAction({ kind: 'attack' });
      session.submitAction({ kind: 'flee' });
      expect(rng.calls).toBe(4);
    });

    it('logs through the injected logger', () => {
      const lines: string[] = [];
      const sink = new Writable({
        write(chunk: Buffer, _encoding, callback) {
          lines.push(chunk.toString());
          callback();
        },
      });
      const logger = pino({ level: 'info' }, sink);
      const session = new CombatSession({ rng: createSequenceRandom(0.5), logger });
      session.start(player, goblin);

      expect(lines).toHaveLength(1);
      expect(JSON.parse(lines[0])).toMatchObject({
        msg: 'encounter started',
        player: 'Aria',
        enemy: 'Goblin Scout',
      });
    });
  });
});
