import cron from 'node-cron';
import { createApp } from './app.js';
import { browserCheckerFactory } from './checker.js';
import { loadConfig } from './config.js';
import { Repository } from './db.js';
import { JobRunner } from './jobs.js';
import { Logger } from './logger.js';
import { loadAirportDirectory, loadRouteGraph } from './routes.js';

const config = loadConfig();
const logger = new Logger('scout', config.logLevel);

const graph = loadRouteGraph(config.routesPath);
const airports = loadAirportDirectory(config.airportsPath);
const repo = new Repository(config.dbPath);

const jobs = new JobRunner({
  repo,
  graph,
  airports,
  cacheMaxAgeMs: config.cacheMaxAgeMs,
  checks: config.checks,
  createChecker: browserCheckerFactory(
    { ...config.checker, ...config.playwright, requestTimeoutMs: config.checks.checkTimeoutMs },
    logger.child('checker'),
  ),
  logger: logger.child('jobs'),
});

const app = createApp({ repo, jobs, graph, logger: logger.child('http') });

cron.schedule(config.cron, () => {
  jobs.runAllOnce().catch((e) => logger.error('Scheduled job error', e));
});

app.listen(config.port, '0.0.0.0', () => {
  logger.info(`Itinerary scout listening on http://0.0.0.0:${config.port}`, { airports: graph.size });
});
