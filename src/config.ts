import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { DeadlinesConfig } from './types.js';

dotenv.config();

const envSchema = z.object({
  CANVAS_API_TOKEN: z.string().trim().min(1, 'CANVAS_API_TOKEN environment variable is required'),
  CANVAS_BASE_URL: z.string().url().default('https://canvas.sfu.ca'),
  DEADLINES_TIMEZONE: z.string().trim().min(1).default('America/Los_Angeles'),
  CANVAS_PAGE_SIZE: z.coerce.number().int().min(1).max(100).default(100),
  CANVAS_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): DeadlinesConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${problems}`);
  }

  return {
    apiToken: parsed.data.CANVAS_API_TOKEN,
    baseUrl: parsed.data.CANVAS_BASE_URL.replace(/\/+$/, ''),
    timezone: parsed.data.DEADLINES_TIMEZONE,
    pageSize: parsed.data.CANVAS_PAGE_SIZE,
    timeoutMs: parsed.data.CANVAS_TIMEOUT_MS,
  };
}

export default loadConfig;
