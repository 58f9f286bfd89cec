import type {
  GameRecord,
  HeadToHeadStore,
  IdentityConfig,
  SeasonSummary,
} from '../../types/index.js';
import {
  ACCOLADE_KINDS,
  computeAccolades,
  type AccoladeKind,
  type AccoladeReport,
} from './accolades.js';
import {
  allTimeRecords,
  finalStandingsLeaderboard,
  h2hLeaderboards,
  leagueSummary,
  streakLeaderboard,
  type AllTimeRecord,
  type FinalStandingsLeaderboard,
  type HeadToHeadLeaderboards,
  type LeagueSummary,
  type MatchupLine,
  type StreakRow,
} from './leaderboards.js';
import { idify } from './dataLoader.js';
import {
  buildPreview,
  type PreviewTeam,
  type UpcomingWeek,
  type WeekPreview,
} from './preview.js';
import { buildWeeklyReport, type ReportAccolade, type WeeklyReport } from './weeklyReport.js';

export interface PageData {
  generatedAt: string;
  summary: LeagueSummary;
  records: AllTimeRecord[];
  standings: FinalStandingsLeaderboard;
  streaks: StreakRow[];
  h2h: HeadToHeadLeaderboards;
  accolades: AccoladeReport;
  preview?: WeekPreview;
  report?: WeeklyReport;
}

export function buildPageData(
  games: GameRecord[],
  seasons: SeasonSummary[],
  store: HeadToHeadStore,
  config: IdentityConfig,
  generatedAt: Date = new Date(),
  upcoming?: UpcomingWeek
): PageData {
  return {
    generatedAt: generatedAt.toISOString(),
    summary: leagueSummary(games, config),
    records: allTimeRecords(games, config),
    standings: finalStandingsLeaderboard(seasons, config),
    streaks: streakLeaderboard(store, config),
    h2h: h2hLeaderboards(store, config),
    accolades: computeAccolades(games, config),
    preview: upcoming && buildPreview(upcoming, games, store, config),
    report: buildWeeklyReport(games, config),
  };
}

export function escapeHtml(s: string) {
  return String(s)
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

const NAV = [
  { file: 'index.html', id: 'home', label: 'Home' },
  { file: 'standings.html', id: 'standings', label: 'Final Standings' },
  { file: 'h2h.html', id: 'h2h', label: 'Head-to-Head' },
  { file: 'streaks.html', id: 'streaks', label: 'Streaks' },
  { file: 'accolades.html', id: 'accolades', label: 'Accolades' },
  { file: 'preview.html', id: 'preview', label: 'Week Preview' },
  { file: 'report.html', id: 'report', label: 'Weekly Report' },
] as const;

type PageId = (typeof NAV)[number]['id'];

function layout(active: PageId, title: string, generatedAt: string, body: string) {
  const links = NAV.map(
    n =>
      `<a href="${n.file}"${n.id === active ? ' class="active" aria-current="page"' : ''}>${escapeHtml(n.label)}</a>`
  ).join('\n      ');
  return `<!doctype html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <title>${escapeHtml(title)}</title>
  <meta name="viewport" content="width=device-width,initial-scale=1">
  <link rel="stylesheet" href="common-theme.css">
</head>
<body data-page="${active}">
  <nav class="site-nav">
      ${links}
  </nav>
  <div class="content-wrapper">
    <h1>${escapeHtml(title)}</h1>
    <p class="meta-info">Generated ${escapeHtml(generatedAt)}</p>
${body}
  </div>
</body>
</html>
`;
}

function table(id: string, headers: string[], rows: (string | number)[][], rowIds: string[] = []) {
  const head = headers.map(h => `<th>${escapeHtml(h)}</th>`).join('');
  const bodyRows = rows
    .map((r, i) => {
      const rowId = rowIds[i];
      const cells = r.map(c => `<td>${escapeHtml(String(c))}</td>`).join('');
      return rowId ? `<tr id="${escapeHtml(rowId)}">${cells}</tr>` : `<tr>${cells}</tr>`;
    })
    .join('\n        ');
  return `    <table id="${id}">
      <thead><tr>${head}</tr></thead>
      <tbody>
        ${bodyRows}
      </tbody>
    </table>`;
}

const section = (title: string, inner: string) =>
  `  <section>
    <h2>${escapeHtml(title)}</h2>
${inner}
  </section>`;

const wlt = (l: { wins: number; losses: number; ties: number }) =>
  `${l.wins}-${l.losses}-${l.ties}`;

const pct = (n: number) => n.toFixed(3);

export function renderIndexPage(data: PageData): string {
  const s = data.summary;
  const summary = `    <ul class="summary">
      <li>Seasons: <strong>${s.seasons}</strong></li>
      <li>Games: <strong>${s.games}</strong></li>
      <li>Managers: <strong>${s.managers}</strong></li>
      <li>Total points: <strong>${s.totalPoints.toFixed(2)}</strong></li>
      <li>Ties: <strong>${s.ties}</strong></li>
    </ul>`;
  const records = table(
    'all-time-records',
    ['Manager', 'Regular', 'Reg %', 'Playoffs', 'Playoff %'],
    data.records.map(r => [
      r.manager,
      wlt(r.regular),
      pct(r.regular.pct),
      wlt(r.playoff),
      pct(r.playoff.pct),
    ]),
    data.records.map(r => `record-${idify(r.manager)}`)
  );
  return layout(
    'home',
    'League History',
    data.generatedAt,
    [section('At a glance', summary), section('All-time records', records)].join('\n')
  );
}

export function renderStandingsPage(data: PageData): string {
  const { managers, seasons } = data.standings;
  const seasonList = seasons.map(s => s.season);
  const careers = table(
    'final-standings',
    ['Manager', 'Avg finish', 'Seasons', 'Titles', ...seasonList.map(String)],
    managers.map(m => [
      m.manager,
      m.averageFinish.toFixed(2),
      m.seasonsPlayed,
      m.finishCounts[1] ?? 0,
      ...seasonList.map(season => m.finishes[season] ?? '-'),
    ]),
    managers.map(m => `finish-${idify(m.manager)}`)
  );
  const bySeason = table(
    'season-summaries',
    ['Season', 'Teams', 'Champion', 'Scoring champ', 'Points for'],
    seasons.map(s => [
      s.season,
      s.teams,
      s.champion ?? '-',
      s.scoringChamp?.manager ?? '-',
      s.scoringChamp ? s.scoringChamp.pointsFor.toFixed(2) : '-',
    ])
  );
  return layout(
    'standings',
    'Final Standings',
    data.generatedAt,
    [section('Career finishes', careers), section('Seasons', bySeason)].join('\n')
  );
}

function matchupTable(id: string, lines: MatchupLine[], limit: number) {
  return table(
    id,
    ['Rank', 'Manager', 'Opponent', 'Record', 'Win %'],
    lines.slice(0, limit).map((m, i) => [i + 1, m.manager, m.opponent, `${m.wins}-${m.losses}`, pct(m.pct)])
  );
}

export function renderHeadToHeadPage(data: PageData): string {
  return layout(
    'h2h',
    'Head-to-Head',
    data.generatedAt,
    [
      section('Regular season win % (min 3 wins)', matchupTable('h2h-win-pct', data.h2h.regularWinPct, 10)),
      section('Most regular season wins', matchupTable('h2h-regular-wins', data.h2h.mostRegularWins, 10)),
      section('Most playoff wins', matchupTable('h2h-playoff-wins', data.h2h.mostPlayoffWins, 5)),
    ].join('\n')
  );
}

export function renderStreaksPage(data: PageData): string {
  const rows = table(
    'streaks',
    ['Rank', 'Winner', 'Loser', 'Length', 'Span', 'Active'],
    data.streaks.map((s, i) => [i + 1, s.winner, s.loser, s.length, s.range, s.active ? 'yes' : ''])
  );
  return layout('streaks', 'Longest Streaks', data.generatedAt, section('Streaks by pair', rows));
}

const ACCOLADE_LABELS: Record<AccoladeKind, string> = {
  topPoints: 'Top score',
  highestScoringLoss: 'Highest scoring loss',
  lowestScoringWin: 'Lowest scoring win',
  smallestMarginOfDefeat: 'Smallest margin of defeat',
  blowoutWin: 'Biggest blowout',
};

export function renderAccoladesPage(data: PageData): string {
  const { allTime } = data.accolades;
  const records = table(
    'accolade-records',
    ['Accolade', 'Manager', 'Opponent', 'Value', 'When'],
    ACCOLADE_KINDS.flatMap(k => {
      const r = allTime.records[k];
      return r
        ? [[ACCOLADE_LABELS[k], r.manager, r.opponent, r.value.toFixed(2), `Wk${r.week} ${r.season}`]]
        : [];
    })
  );
  const counts = table(
    'accolade-counts',
    ['Manager', ...ACCOLADE_KINDS.map(k => ACCOLADE_LABELS[k]), 'Alt W-L', 'Alt %', 'Std dev'],
    allTime.managers.map(m => [
      m.manager,
      ...ACCOLADE_KINDS.map(k => m.counts[k]),
      `${m.altWins}-${m.altLosses}`,
      pct(m.altPct),
      m.stdev === null ? '-' : m.stdev.toFixed(2),
    ])
  );
  return layout(
    'accolades',
    'Accolades',
    data.generatedAt,
    [section('All-time records', records), section('Weekly accolades and alternative universe', counts)].join(
      '\n'
    )
  );
}

const seed = (t: PreviewTeam) => `${t.rank === null ? '-' : `#${t.rank}`} ${t.manager} (${t.record})`;

export function renderPreviewPage(data: PageData): string {
  const { preview } = data;
  if (!preview || !preview.lines.length) {
    return layout('preview', 'Week Preview', data.generatedAt, '    <p class="empty">No upcoming matchups</p>');
  }
  const rows = table(
    'preview',
    ['Higher seed', 'Lower seed', 'Regular H2H', 'Playoff H2H', 'Streak', 'Playoff wins'],
    preview.lines.map(l => [
      seed(l.higher),
      seed(l.lower),
      l.regular ?? '-',
      l.playoff ?? '-',
      l.regular === null ? 'First meeting' : (l.streak ?? 'No streak'),
      l.playoffWins.map(p => `${p.manager}: ${p.games.join(', ')}`).join('; ') || '-',
    ])
  );
  return layout(
    'preview',
    'Week Preview',
    data.generatedAt,
    section(`Week ${preview.week}, ${preview.season}`, rows)
  );
}

function accoladeLine(a: ReportAccolade): string {
  const value = a.value.toFixed(2);
  const detail =
    a.kind === 'smallestMarginOfDefeat'
      ? `lost by ${value} to ${a.opponent}`
      : a.kind === 'blowoutWin'
        ? `won by ${value} over ${a.opponent}`
        : `${value} vs ${a.opponent}`;
  return `${ACCOLADE_LABELS[a.kind]}: ${a.manager} (${detail}) (${a.seasonCount}x this season)`;
}

const delta = (d: number | null) => (d === null ? '(-)' : d >= 0 ? `(+${d})` : `(${d})`);

export function renderReportPage(data: PageData): string {
  const { report } = data;
  if (!report) {
    return layout('report', 'Weekly Report', data.generatedAt, '    <p class="empty">No completed weeks yet</p>');
  }
  const accolades = `    <ul id="weekly-accolades">
${report.accolades.map(a => `      <li>${escapeHtml(accoladeLine(a))}</li>`).join('\n')}
    </ul>`;
  const standings = table(
    'alt-standings',
    [
      'Alt rank',
      'Alt +/-',
      'Manager',
      'Week score',
      'Alt result',
      'Points for',
      'Alt W-L',
      'Real rank',
      'Real +/-',
      'Real result',
      'Real W-L-T',
    ],
    report.rows.map(r => [
      r.altRank,
      delta(r.altDelta),
      r.manager,
      r.weeklyScore === null ? '-' : r.weeklyScore.toFixed(2),
      r.altResult ?? '-',
      r.pointsFor.toFixed(2),
      `${r.altWins}-${r.altLosses}`,
      r.realRank,
      delta(r.realDelta),
      r.realResult ?? '-',
      wlt({ wins: r.realWins, losses: r.realLosses, ties: r.realTies }),
    ]),
    report.rows.map(r => `alt-${idify(r.manager)}`)
  );
  return layout(
    'report',
    'Weekly Report',
    data.generatedAt,
    [
      section(`Week ${report.week}, ${report.season} accolades`, accolades),
      section('Alternative universe vs real standings', standings),
    ].join('\n')
  );
}

/** Every page keyed by file name. */
export function renderPages(data: PageData): Record<string, string> {
  return {
    'index.html': renderIndexPage(data),
    'standings.html': renderStandingsPage(data),
    'h2h.html': renderHeadToHeadPage(data),
    'streaks.html': renderStreaksPage(data),
    'accolades.html': renderAccoladesPage(data),
    'preview.html': renderPreviewPage(data),
    'report.html': renderReportPage(data),
  };
}
