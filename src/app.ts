import express, { type NextFunction, type Request, type Response } from 'express';
import type { Repository } from './db.js';
import { ConfigurationError } from './errors.js';
import type { JobRunner } from './jobs.js';
import { Logger } from './logger.js';
import type { RouteGraph } from './routes.js';
import { estimateSearch, searchRequestSchema } from './search.js';

export type AppDeps = {
  repo: Repository;
  jobs: JobRunner;
  graph: RouteGraph;
  logger?: Logger;
};

function idParam(req: Request): number | null {
  const id = Number(req.params.id);
  return Number.isInteger(id) && id > 0 ? id : null;
}

export function createApp({ repo, jobs, graph, logger = new Logger('http') }: AppDeps) {
  const app = express();
  app.use(express.json());

  app.get('/healthz', (_req, res) => res.json({ ok: true, airports: graph.size }));

  app.get('/api/searches', (_req, res) => {
    res.json(repo.listSearches());
  });

  app.post('/api/searches', (req, res) => {
    const parsed = searchRequestSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ error: parsed.error.flatten() });
    const id = repo.addSearch(parsed.data);
    res.status(201).json({ id });
  });

  app.delete('/api/searches/:id', (req, res) => {
    const id = idParam(req);
    if (!id) return res.status(400).json({ error: 'invalid id' });
    if (!repo.deleteSearch(id)) return res.status(404).json({ error: 'not found' });
    res.json({ ok: true });
  });

  app.post('/api/searches/:id/runs', (req, res) => {
    const id = idParam(req);
    if (!id) return res.status(400).json({ error: 'invalid id' });
    const search = repo.getSearch(id);
    if (!search) return res.status(404).json({ error: 'not found' });
    const runId = jobs.start(search);
    res.status(202).json({ runId });
  });

  app.get('/api/runs/:id', (req, res) => {
    const id = idParam(req);
    if (!id) return res.status(400).json({ error: 'invalid id' });
    const run = repo.getRun(id);
    if (!run) return res.status(404).json({ error: 'not found' });
    res.json(run);
  });

  app.post('/api/estimate', (req, res) => {
    const parsed = searchRequestSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ error: parsed.error.flatten() });
    res.json(estimateSearch(parsed.data, graph, logger));
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof ConfigurationError) {
      return res.status(400).json({ error: err.message });
    }
    logger.error('Request failed', err);
    res.status(500).json({ error: 'internal error' });
  });

  return app;
}
