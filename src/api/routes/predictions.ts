import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import type { AppDeps } from '../deps.js';

const fixtureSchema = z.object({
  homeTeam: z.string().min(1),
  awayTeam: z.string().min(1),
});

const batchSchema = z.object({
  fixtures: z.array(fixtureSchema).min(1).max(100),
});

const upcomingQuery = z.object({
  days: z.coerce.number().int().min(0).max(14).default(1),
});

export const predictionsRoutes: FastifyPluginAsync<AppDeps> = async (app, { engine, feed, today }) => {
  // POST /predictions — single fixture
  app.post('/', async (request) => {
    const { homeTeam, awayTeam } = fixtureSchema.parse(request.body);
    return engine.predict(homeTeam, awayTeam);
  });

  // POST /predictions/batch — per-fixture outcomes in request order
  app.post('/batch', async (request) => {
    const { fixtures } = batchSchema.parse(request.body);
    const data = engine.predictBatch(fixtures);
    return {
      data,
      count: data.length,
      failed: data.filter((r) => !r.ok).length,
    };
  });

  // GET /predictions/upcoming — scheduled games from the scoreboard feed
  app.get('/upcoming', async (request) => {
    const { days } = upcomingQuery.parse(request.query);
    const fixtures = await feed.fetchUpcomingFixtures(days, today());
    const data = engine.predictBatch(fixtures);
    return { data, count: data.length };
  });
};
