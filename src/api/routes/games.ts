import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import type { AppDeps } from '../deps.js';

const liveQuery = z.object({
  date: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/)
    .optional(),
});

export const gamesRoutes: FastifyPluginAsync<AppDeps> = async (app, { feed, today }) => {
  // GET /games/live — in-progress scores, today unless a date is given
  app.get('/live', async (request) => {
    const { date } = liveQuery.parse(request.query);
    const data = await feed.fetchLiveGames(date ?? today());
    return { data, count: data.length };
  });
};
