export type Identity = string;

export type PlayoffGameType = 'QF' | 'SF' | '1st' | '3rd';
export type GameType = 'regular' | PlayoffGameType | 'consolation';
export const PLAYOFF_GAME_TYPES: readonly PlayoffGameType[] = ['QF', 'SF', '1st', '3rd'];

export interface GameRef {
  season: number;
  week: number;
}

export interface GameRecord {
  season: number;
  week: number;
  gameType: GameType;
  team1Manager: Identity;
  team2Manager: Identity;
  team1Score: number;
  team2Score: number;
  winnerManager: Identity | null;
}

// Snapshot shapes, as cached from the league API
export interface RawManager {
  nickname: string;
}

export interface RawTeam {
  teamKey: string;
  name?: string;
  points: number;
  managers: RawManager[];
}

export interface RawMatchup {
  teams: [RawTeam, RawTeam];
  isTied: boolean;
  winnerTeamKey: string | null;
  // Absent in older snapshots
  isPlayoffs?: boolean;
  isConsolation: boolean;
}

export interface LeagueSeasonSettings {
  playoffStartWeek: number;
  numPlayoffTeams: number;
}

export interface SeasonSnapshot {
  season: number;
  settings?: LeagueSeasonSettings;
  weeks: Record<string, RawMatchup[]>;
}

export interface StandingRow {
  manager: Identity;
  wins: number;
  losses: number;
  ties: number;
  pointsFor: number;
  rank: number;
}

export interface ClassifiedMatchup {
  season: number;
  week: number;
  gameType: GameType;
  team1Manager: Identity;
  team2Manager: Identity;
  team1Score: number;
  team2Score: number;
  // Winner as the classifier advanced it through the bracket; on a tied
  // bracket game this is the tiebreak winner
  bracketWinner: Identity | null;
  // Winner as the source system reported it; undefined when it reported neither
  reportedWinner?: Identity | null;
}

export interface SeasonSummary {
  season: number;
  settings: LeagueSeasonSettings;
  standings: StandingRow[];
  finalRanks: Record<Identity, number>;
}

export type HistoryGameType = 'regular' | PlayoffGameType;

export interface HistoryEntry {
  winner: Identity;
  gameType: HistoryGameType;
  season: number;
  week: number;
}

export interface CurrentStreak {
  holder: Identity | null;
  length: number;
  start: GameRef | null;
}

export interface LongestStreak {
  holder: Identity | null;
  length: number;
  start: GameRef | null;
  end: GameRef | null;
}

export interface HeadToHeadRecord {
  managerA: Identity;
  managerB: Identity;
  regularWinsA: number;
  regularWinsB: number;
  playoffWinsA: number;
  playoffWinsB: number;
  regularHistory: HistoryEntry[];
  playoffHistory: HistoryEntry[];
  tiedGames: GameRef[];
  currentStreak: CurrentStreak;
  longestStreak: LongestStreak;
  lastGame: GameRef;
}

export type HeadToHeadStore = Record<string, HeadToHeadRecord>;

export interface IdentityConfig {
  version: number;
  aliases: Readonly<Record<Identity, Identity>>;
  hidden: readonly Identity[];
  excludedSeasons: readonly number[];
}

export type WarningKind =
  | 'MissingSeasonData'
  | 'InconsistentWinner'
  | 'UnresolvedBracketSlot'
  | 'BracketTiebreak'
  | 'PlayoffFlagMismatch'
  | 'MissingPriorIncrementalState'
  | 'DuplicateMatchup'
  | 'OutOfOrderIncrementalGame';

export interface PipelineWarning {
  kind: WarningKind;
  level: 'warn' | 'info';
  season?: number;
  week?: number;
  message: string;
}

export interface SeasonFailure {
  season: number;
  reason: string;
}
