import 'dotenv/config';
import { z } from 'zod';
import { ConfigError } from './errors';

const DEFAULT_DB_PATH = 'icecream.db';

const envSchema = z.object({
  SLACK_TOKEN: z
    .string({ required_error: 'SLACK_TOKEN must be set' })
    .min(1, 'SLACK_TOKEN must be set'),
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(1).max(65535).default(9000),
  DB_PATH: z.string().min(1).default(DEFAULT_DB_PATH),
  // bounded wait for the store file lock at startup
  DB_LOCK_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(3000),
  WEBHOOK_PATH: z.string().startsWith('/', 'WEBHOOK_PATH must start with /').default('/'),
  SLASH_COMMAND: z.string().min(1).default('/icecream'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
});

export type LogLevel = z.infer<typeof envSchema>['LOG_LEVEL'];

export interface AppConfig {
  port: number;
  host: string;
  token: string;
  logLevel: LogLevel;
  webhookPath: string;
  slashCommand: string;
  db: {
    path: string;
    lockTimeoutMs: number;
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`invalid configuration: ${issues}`);
  }

  const vars = parsed.data;
  return {
    port: vars.PORT,
    host: vars.HOST,
    token: vars.SLACK_TOKEN,
    logLevel: vars.LOG_LEVEL,
    webhookPath: vars.WEBHOOK_PATH,
    slashCommand: vars.SLASH_COMMAND,
    db: {
      path: vars.DB_PATH,
      lockTimeoutMs: vars.DB_LOCK_TIMEOUT_MS,
    },
  };
}
