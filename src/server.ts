import { ApolloServer } from '@apollo/server';
import fs from 'node:fs';
import path from 'node:path';
import { gql } from 'graphql-tag';

import type {
  GameRecord,
  GameRef,
  GameType,
  HeadToHeadRecord,
  HeadToHeadStore,
  IdentityConfig,
  SeasonSummary,
} from '../types/index.js';
import { DateTime } from './lib/dateTimeScalar.js';
import { findHeadToHead, perspective } from './lib/headToHead.js';
import { mergeIdentities, resolveIdentity, resolveLedger } from './lib/identity.js';
import { allTimeRecords, leagueSummary, streakLeaderboard } from './lib/leaderboards.js';
import { formatGameRef } from './lib/standings.js';

export interface LeagueData {
  games: GameRecord[];
  seasons: SeasonSummary[];
  store: HeadToHeadStore;
  config: IdentityConfig;
  generatedAt?: Date;
}

const typeDefs = gql(fs.readFileSync(path.join(process.cwd(), 'src', 'schema.graphql'), 'utf-8'));

// GraphQL enum names cannot start with a digit
const GameTypeEnum: Record<string, GameType> = {
  REGULAR: 'regular',
  QF: 'QF',
  SF: 'SF',
  FIRST: '1st',
  THIRD: '3rd',
  CONSOLATION: 'consolation',
};

function createResolvers(data: LeagueData) {
  const { config } = data;
  const games = resolveLedger(data.games, config);
  const store = mergeIdentities(data.store, config);
  const generatedAt = data.generatedAt ?? new Date();
  const resolve = (name: string) => resolveIdentity(name, config);

  return {
    DateTime,
    GameType: GameTypeEnum,
    Query: {
      games: (
        _: unknown,
        args: { season?: number; week?: number; manager?: string; gameType?: GameType }
      ) => {
        let list = games;
        if (args.season != null) list = list.filter(g => g.season === args.season);
        if (args.week != null) list = list.filter(g => g.week === args.week);
        if (args.manager) {
          const m = resolve(args.manager);
          list = list.filter(g => g.team1Manager === m || g.team2Manager === m);
        }
        if (args.gameType) list = list.filter(g => g.gameType === args.gameType);
        return list;
      },
      headToHead: (_: unknown, { managerA, managerB }: { managerA: string; managerB: string }) =>
        findHeadToHead(store, resolve(managerA), resolve(managerB)) ?? null,
      headToHeadFor: (_: unknown, { manager }: { manager: string }) => {
        const m = resolve(manager);
        return Object.values(store)
          .filter(r => r.managerA === m || r.managerB === m)
          .map(r => perspective(r, m));
      },
      seasonStandings: (_: unknown, { season }: { season: number }) => {
        const s = data.seasons.find(x => x.season === season);
        if (!s) return null;
        return {
          season: s.season,
          playoffStartWeek: s.settings.playoffStartWeek,
          numPlayoffTeams: s.settings.numPlayoffTeams,
          rows: s.standings.map(row => ({
            ...row,
            manager: resolve(row.manager),
            finalRank: s.finalRanks[row.manager] ?? null,
          })),
        };
      },
      allTimeRecords: () => allTimeRecords(data.games, config),
      streaks: (_: unknown, { limit }: { limit?: number }) => {
        const rows = streakLeaderboard(store, config);
        return limit != null ? rows.slice(0, limit) : rows;
      },
      summary: () => ({ generatedAt, ...leagueSummary(data.games, config) }),
    },
    HeadToHead: {
      ties: (r: HeadToHeadRecord) => r.tiedGames.length,
    },
    GameRef: {
      label: (ref: GameRef) => formatGameRef(ref),
    },
  };
}

export function createApolloServer(data: LeagueData) {
  return new ApolloServer({ typeDefs, resolvers: createResolvers(data) });
}
