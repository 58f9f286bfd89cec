import 'dotenv/config';
import { startStandaloneServer } from '@apollo/server/standalone';
import { loadConfig } from './lib/config.js';
import { loadHeadToHead, loadIdentityConfig, loadLedger } from './lib/dataLoader.js';
import { buildHeadToHead } from './lib/headToHead.js';
import { summarizeSeasons } from './lib/ledger.js';
import { RunReport } from './lib/runReport.js';
import { createApolloServer } from './server.js';

const config = loadConfig();
const report = new RunReport();
const games = loadLedger(config, report);
const store = loadHeadToHead(config.h2hFile) ?? buildHeadToHead(games);
report.print();

const server = createApolloServer({
  games,
  seasons: summarizeSeasons(games),
  store,
  config: loadIdentityConfig(config.identitiesFile),
});
const { url } = await startStandaloneServer(server, {
  listen: { port: config.apolloPort },
});
console.log(`🚀 GraphQL ready at ${url} (USE_CSV=${config.useCsv ? '1' : '0'})`);
