import { describe, it, expect } from 'vitest';
import type { GameRecord } from '../../types/index.js';
import { buildHeadToHead } from './headToHead.js';
import {
  createIdentityConfig,
  EMPTY_IDENTITY_CONFIG,
  isHidden,
  mergeIdentities,
  resolveIdentity,
  resolveLedger,
} from './identity.js';
import { ConfigError } from './runReport.js';
import { game } from './testHelpers.js';

// "Annie" is an old account of Ann's; "Zoe" is an old account of Amy's
const config = createIdentityConfig({
  aliases: { Annie: 'Ann', Zoe: 'Amy' },
  hidden: ['Hal'],
});

const games = (): GameRecord[] => [
  game(2019, 1, 'Annie', 100, 'Ben', 90),
  game(2019, 2, 'Ben', 110, 'Annie', 90),
  game(2019, 3, 'Annie', 95, 'Ben', 95),
  game(2019, 4, 'Zoe', 80, 'Ben', 70),
  game(2019, 5, 'Annie', 60, 'Ann', 70),
  game(2020, 1, 'Ann', 100, 'Ben', 99),
  game(2020, 2, 'Ann', 101, 'Ben', 99),
  game(2020, 3, 'Ben', 120, 'Ann', 80, 'SF'),
  game(2020, 4, 'Amy', 88, 'Ben', 90),
  game(2020, 5, 'Ann', 70, 'Hal', 60),
];

describe('Identity Resolution', () => {
  describe('createIdentityConfig', () => {
    it('should freeze the configuration', () => {
      expect(Object.isFrozen(config)).toBe(true);
      expect(Object.isFrozen(config.aliases)).toBe(true);
      expect(config.version).toBe(1);
    });

    it('should reject alias cycles', () => {
      expect(() => createIdentityConfig({ aliases: { A: 'B', B: 'C', C: 'A' } })).toThrow(
        ConfigError
      );
      expect(() => createIdentityConfig({ aliases: { A: 'A' } })).toThrow('Alias cycle detected');
    });

    it('should reject names that could collide inside a pair key', () => {
      expect(() => createIdentityConfig({ aliases: { 'Ann::Lee': 'Ann' } })).toThrow(
        'Manager name "Ann::Lee" may not contain "::"'
      );
      expect(() => createIdentityConfig({ hidden: ['Hal::2'] })).toThrow(ConfigError);
    });
  });

  describe('resolveIdentity', () => {
    it('should follow alias chains to the canonical name', () => {
      const chained = createIdentityConfig({ aliases: { old: 'older', older: 'Ann' } });
      expect(resolveIdentity('old', chained)).toBe('Ann');
      expect(resolveIdentity('Ann', chained)).toBe('Ann');
      expect(resolveIdentity('Ben', EMPTY_IDENTITY_CONFIG)).toBe('Ben');
    });
  });

  describe('isHidden', () => {
    it('should match hidden names case-insensitively', () => {
      expect(isHidden('hal', config)).toBe(true);
      expect(isHidden('HAL', config)).toBe(true);
      expect(isHidden('Ann', config)).toBe(false);
    });
  });

  describe('resolveLedger', () => {
    it('should rename managers and winners and drop games against oneself', () => {
      const resolved = resolveLedger(games(), config);
      expect(resolved).toHaveLength(games().length - 1);
      expect(resolved[0]).toMatchObject({ team1Manager: 'Ann', winnerManager: 'Ann' });
      expect(resolved.some(g => g.team1Manager === g.team2Manager)).toBe(false);
    });
  });

  describe('mergeIdentities', () => {
    it('should equal aggregation over the resolved ledger', () => {
      const merged = mergeIdentities(buildHeadToHead(games()), config);
      const rebuilt = buildHeadToHead(resolveLedger(games(), config));
      expect(JSON.stringify(merged)).toBe(JSON.stringify(rebuilt));
    });

    it('should sum counters and replay streaks for colliding records', () => {
      const merged = mergeIdentities(buildHeadToHead(games()), config);
      expect(merged['Ann::Ben']).toMatchObject({
        regularWinsA: 3,
        regularWinsB: 1,
        playoffWinsA: 0,
        playoffWinsB: 1,
        tiedGames: [{ season: 2019, week: 3 }],
        currentStreak: { holder: 'Ben', length: 1, start: { season: 2020, week: 3 } },
        longestStreak: {
          holder: 'Ann',
          length: 2,
          start: { season: 2020, week: 1 },
          end: { season: 2020, week: 2 },
        },
        lastGame: { season: 2020, week: 3 },
      });
    });

    it('should swap sides when the canonical name sorts the other way', () => {
      const original = buildHeadToHead(games());
      expect(original['Ben::Zoe']).toMatchObject({ managerA: 'Ben', regularWinsB: 1 });
      const merged = mergeIdentities(original, config);
      expect(merged['Ben::Zoe']).toBeUndefined();
      expect(merged['Amy::Ben']).toMatchObject({
        managerA: 'Amy',
        managerB: 'Ben',
        regularWinsA: 1,
        regularWinsB: 1,
      });
    });

    it('should drop the record of an alias against its canonical name', () => {
      const merged = mergeIdentities(buildHeadToHead(games()), config);
      expect(merged['Ann::Annie']).toBeUndefined();
    });

    it('should be idempotent', () => {
      const once = mergeIdentities(buildHeadToHead(games()), config);
      const twice = mergeIdentities(once, config);
      expect(JSON.stringify(twice)).toBe(JSON.stringify(once));
    });

    it('should not mutate the input store', () => {
      const store = buildHeadToHead(games());
      const before = JSON.stringify(store);
      mergeIdentities(store, config);
      expect(JSON.stringify(store)).toBe(before);
    });

    it('should pass records through unchanged without aliases', () => {
      const store = buildHeadToHead(games());
      expect(mergeIdentities(store, EMPTY_IDENTITY_CONFIG)).toEqual(store);
    });
  });
});
