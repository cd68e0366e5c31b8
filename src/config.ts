import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().default(3000),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error']).default('info'),
  TEAM_STATS_PATH: z.string().default('./data/nba_teams_combined.csv'),
  TEAM_ALIASES_PATH: z.string().default('./data/team-aliases.json'),
  MODELS_DIR: z.string().default('./models'),
  /** Total-points line every over/under prediction is made against. */
  OVER_UNDER_LINE: z.coerce.number().positive().default(235),
  ESPN_BASE_URL: z
    .string()
    .url()
    .default('https://site.api.espn.com/apis/site/v2/sports/basketball/nba'),
});

export const config = envSchema.parse(process.env);
export type Config = z.infer<typeof envSchema>;
