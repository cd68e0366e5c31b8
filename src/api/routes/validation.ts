import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import type { AppDeps } from '../deps.js';

const completedGameSchema = z.object({
  homeTeam: z.string().min(1),
  awayTeam: z.string().min(1),
  homeScore: z.number().int().nonnegative(),
  awayScore: z.number().int().nonnegative(),
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
});

const validateSchema = z.object({
  games: z.array(completedGameSchema).max(2000),
});

const recentQuery = z.object({
  days: z.coerce.number().int().min(1).max(30).default(7),
});

export const validationRoutes: FastifyPluginAsync<AppDeps> = async (app, { validator, feed, today }) => {
  // POST /validation — replay a caller-supplied window
  app.post('/', async (request) => {
    const { games } = validateSchema.parse(request.body);
    return validator.validate(games);
  });

  // GET /validation/recent — finals from the last N days
  app.get('/recent', async (request) => {
    const { days } = recentQuery.parse(request.query);
    const games = await feed.fetchCompletedGames(days, today());
    const report = validator.validate(games);
    return { period: `Last ${days} days`, ...report };
  });
};
