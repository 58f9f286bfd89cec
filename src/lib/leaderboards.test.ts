import { describe, it, expect } from 'vitest';
import type { GameRecord, SeasonSummary, StandingRow } from '../../types/index.js';
import { buildHeadToHead } from './headToHead.js';
import { createIdentityConfig } from './identity.js';
import {
  allTimeRecords,
  finalStandingsLeaderboard,
  h2hLeaderboards,
  leagueSummary,
  streakLeaderboard,
} from './leaderboards.js';
import { game } from './testHelpers.js';

const config = createIdentityConfig({ hidden: ['Hal'] });

const league = (): GameRecord[] => [
  game(2020, 1, 'Ann', 100, 'Ben', 90),
  game(2020, 1, 'Cal', 80, 'Dee', 85),
  game(2020, 2, 'Ann', 100, 'Cal', 100),
  game(2020, 2, 'Ben', 70, 'Dee', 60),
  game(2020, 3, 'Ann', 90, 'Dee', 95),
  game(2020, 3, 'Ben', 105, 'Cal', 110),
  game(2020, 14, 'Ann', 120, 'Dee', 110, 'SF'),
  game(2020, 14, 'Ben', 90, 'Cal', 80, 'consolation'),
  game(2020, 15, 'Ann', 99, 'Ben', 100, '1st'),
  game(2021, 1, 'Ben', 100, 'Hal', 90),
];

describe('Leaderboards', () => {
  describe('allTimeRecords', () => {
    it('should keep regular-season and playoff records apart', () => {
      const records = allTimeRecords(league(), config);
      expect(records.map(r => r.manager)).toEqual(['Dee', 'Ben', 'Ann', 'Cal']);
      expect(records[2]).toEqual({
        manager: 'Ann',
        regular: { wins: 1, losses: 1, ties: 1, pct: 0.333 },
        playoff: { wins: 1, losses: 1, ties: 0, pct: 0.5 },
      });
      expect(records[1]?.playoff).toEqual({ wins: 1, losses: 0, ties: 0, pct: 1 });
    });

    it('should not count consolation games', () => {
      const cal = allTimeRecords(league(), config).find(r => r.manager === 'Cal');
      expect(cal?.regular).toEqual({ wins: 1, losses: 1, ties: 1, pct: 0.333 });
      expect(cal?.playoff).toEqual({ wins: 0, losses: 0, ties: 0, pct: 0 });
    });

    it('should leave out excluded seasons', () => {
      const excluding = createIdentityConfig({ hidden: ['Hal'], excludedSeasons: [2021] });
      const records = allTimeRecords(league(), excluding);
      expect(records.map(r => r.manager)).toEqual(['Dee', 'Ann', 'Ben', 'Cal']);
      expect(records[2]?.regular).toEqual({ wins: 1, losses: 2, ties: 0, pct: 0.333 });
    });

    it('should merge aliases into the canonical manager', () => {
      const aliased = createIdentityConfig({ aliases: { Hal: 'Dee' } });
      const dee = allTimeRecords(league(), aliased).find(r => r.manager === 'Dee');
      expect(dee?.regular).toEqual({ wins: 2, losses: 2, ties: 0, pct: 0.5 });
    });
  });

  describe('leagueSummary', () => {
    it('should total games, points and ties', () => {
      expect(leagueSummary(league(), config)).toEqual({
        seasons: 2,
        games: 10,
        managers: 4,
        totalPoints: 1874,
        ties: 1,
      });
    });
  });

  describe('finalStandingsLeaderboard', () => {
    const row = (manager: string, pointsFor: number, rank: number): StandingRow => ({
      manager,
      wins: 0,
      losses: 0,
      ties: 0,
      pointsFor,
      rank,
    });
    const settings = { playoffStartWeek: 14, numPlayoffTeams: 4 };
    const seasons: SeasonSummary[] = [
      {
        season: 2021,
        settings,
        standings: [row('Ben', 400, 1), row('Ann', 400, 2)],
        finalRanks: { Ben: 2, Ann: 1 },
      },
      {
        season: 2019,
        settings,
        standings: [row('Cal', 300, 1)],
        finalRanks: { Cal: 1 },
      },
      {
        season: 2020,
        settings,
        standings: [row('Ann', 500, 1), row('Ben', 520, 2), row('Annie', 100, 3)],
        finalRanks: { Ben: 1, Ann: 2, Annie: 3 },
      },
    ];
    const identities = createIdentityConfig({
      aliases: { Annie: 'Ann' },
      excludedSeasons: [2019],
    });

    it('should average finishes and keep the better one for an alias', () => {
      const { managers } = finalStandingsLeaderboard(seasons, identities);
      expect(managers).toEqual([
        {
          manager: 'Ann',
          finishes: { 2020: 2, 2021: 1 },
          averageFinish: 1.5,
          finishCounts: { 1: 1, 2: 1 },
          seasonsPlayed: 2,
        },
        {
          manager: 'Ben',
          finishes: { 2020: 1, 2021: 2 },
          averageFinish: 1.5,
          finishCounts: { 1: 1, 2: 1 },
          seasonsPlayed: 2,
        },
      ]);
    });

    it('should name champions and scoring champions per season', () => {
      const summary = finalStandingsLeaderboard(seasons, identities).seasons;
      expect(summary).toEqual([
        {
          season: 2020,
          teams: 3,
          champion: 'Ben',
          scoringChamp: { manager: 'Ben', pointsFor: 520 },
        },
        {
          season: 2021,
          teams: 2,
          champion: 'Ann',
          scoringChamp: { manager: 'Ann', pointsFor: 400 },
        },
      ]);
    });
  });

  describe('streakLeaderboard', () => {
    it('should list the longest run of each pair, longest first', () => {
      const store = buildHeadToHead([
        game(2019, 1, 'Ann', 2, 'Ben', 1),
        game(2019, 2, 'Ann', 2, 'Ben', 1),
        game(2019, 3, 'Ann', 1, 'Ben', 2),
        game(2019, 1, 'Cal', 2, 'Dee', 1),
        game(2019, 2, 'Cal', 2, 'Dee', 1),
        game(2019, 3, 'Cal', 2, 'Dee', 1),
        game(2019, 4, 'Hal', 5, 'Ann', 1),
      ]);
      expect(streakLeaderboard(store, config)).toEqual([
        { winner: 'Cal', loser: 'Dee', length: 3, active: true, range: "Wk1'19 - Wk3'19" },
        { winner: 'Ann', loser: 'Ben', length: 2, active: false, range: "Wk1'19 - Wk2'19" },
      ]);
    });

    it('should skip pairs that have only tied', () => {
      const store = buildHeadToHead([game(2019, 1, 'Ann', 5, 'Ben', 5)]);
      expect(streakLeaderboard(store, config)).toEqual([]);
    });
  });

  describe('h2hLeaderboards', () => {
    const store = buildHeadToHead([
      game(2020, 1, 'Ann', 2, 'Ben', 1),
      game(2020, 2, 'Ann', 2, 'Ben', 1),
      game(2020, 3, 'Ann', 2, 'Ben', 1),
      game(2020, 4, 'Ann', 1, 'Ben', 2),
      game(2020, 1, 'Cal', 2, 'Dee', 1),
      game(2020, 2, 'Cal', 2, 'Dee', 1),
      game(2020, 3, 'Cal', 2, 'Dee', 1),
      game(2020, 4, 'Cal', 2, 'Dee', 1),
      game(2020, 14, 'Ann', 2, 'Ben', 1, 'SF'),
    ]);

    it('should rank win percentage among pairs with enough wins', () => {
      const { regularWinPct } = h2hLeaderboards(store, config);
      expect(regularWinPct).toEqual([
        { manager: 'Cal', opponent: 'Dee', wins: 4, losses: 0, pct: 1 },
        { manager: 'Ann', opponent: 'Ben', wins: 3, losses: 1, pct: 0.75 },
      ]);
    });

    it('should rank raw regular-season and playoff wins', () => {
      const boards = h2hLeaderboards(store, config);
      expect(boards.mostRegularWins.map(l => `${l.manager}>${l.opponent} ${l.wins}`)).toEqual([
        'Cal>Dee 4',
        'Ann>Ben 3',
        'Ben>Ann 1',
      ]);
      expect(boards.mostPlayoffWins).toEqual([
        { manager: 'Ann', opponent: 'Ben', wins: 1, losses: 0, pct: 1 },
      ]);
    });
  });
});
