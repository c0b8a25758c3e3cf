import { z } from 'zod';
import { ConfigurationError } from './errors';

const DEV_ENVIRONMENTS = ['local', 'dev', 'development'];

const schema = z.object({
  NODE_ENV: z.string().default('production'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export type LogLevel = z.infer<typeof schema>['LOG_LEVEL'];

export interface Config {
  env: string;
  isDev: boolean;
  logLevel: LogLevel;
}

/**
 * Parse settings from an env-like record.
 * Throws ConfigurationError naming the offending keys; values are never echoed.
 */
export const loadConfig = (env: Record<string, string | undefined>): Config => {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    const keys = [...new Set(parsed.error.issues.map(issue => String(issue.path[0])))];
    throw new ConfigurationError(keys);
  }

  return {
    env: parsed.data.NODE_ENV,
    isDev: DEV_ENVIRONMENTS.includes(parsed.data.NODE_ENV),
    logLevel: parsed.data.LOG_LEVEL,
  };
};

export const config = loadConfig(process.env);
