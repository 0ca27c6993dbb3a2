import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

export type Environment = 'PRODUCTION' | 'DEBUG';

const optionalText = z.string().trim().default('');

const integer = (fallback: number, min: number, max: number = Number.MAX_SAFE_INTEGER) =>
  z.coerce.number().int().min(min).max(max).default(fallback);

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform(value => value === 'true' || value === '1');

export const environmentSchema = z.object({
  ENVIRONMENT: z
    .string()
    .default('PRODUCTION')
    .transform(value => value.toUpperCase())
    .pipe(z.enum(['PRODUCTION', 'DEBUG'])),
  PORT: integer(3000, 0, 65535),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

  DB_HOST: z.string().default('localhost'),
  DB_PORT: integer(5432, 1, 65535),
  DB_NAME: z.string().default('votes'),
  DB_USER: optionalText,
  DB_PASSWORD: optionalText,
  DB_SSL: booleanFlag,

  SPREADSHEET_ID: optionalText,
  SHEET_NAME: z.string().trim().min(1).default('Sheet1'),
  GOOGLE_APPLICATION_CREDENTIALS: optionalText,

  TWITCH_CLIENT_ID: optionalText,
  TWITCH_CLIENT_SECRET: optionalText,
  TWITCH_ACCESS_TOKEN: optionalText,
  TWITCH_REFRESH_TOKEN: optionalText,
  TWITCH_BROADCASTER_ID: optionalText,
  TWITCH_BOT_USER_ID: optionalText,
  TWITCH_BOT_ACCESS_TOKEN: optionalText,
  TWITCH_BOT_REFRESH_TOKEN: optionalText,
  TWITCH_CHANNEL_NAME: z.string().trim().min(1).default('Streamer'),

  REWARD_ID_ORDINARY: optionalText,
  REWARD_ID_ELEVATED: optionalText,
  REWARD_ID_PREMIUM: optionalText,

  ORDINARY_VOTE_WEIGHT: integer(1, 1),
  ELEVATED_VOTE_WEIGHT: integer(10, 1),
  PREMIUM_VOTE_WEIGHT: integer(25, 1),
  MIN_MATCH_SCORE: integer(80, 0, 100),
  NAME_CACHE_TTL_SECONDS: integer(300, 0),
  POLL_INTERVAL_SECONDS: integer(1, 1, 4),
  SYNC_INTERVAL_SECONDS: integer(5, 1, 59),
  MIRROR_GROWTH_TOLERANCE: z.coerce.number().min(0).default(0.1),
  UNSAFE_WARNING_AFTER: integer(3, 1),
  PROCESSED_IDS_FILE: z.string().trim().min(1).default('data/processed_ids.txt'),
  INACCURATE_INPUT_FILE: z.string().trim().min(1).default('data/inaccurate_games.txt')
});

export type EnvironmentConfig = z.infer<typeof environmentSchema>;

export class ConfigurationError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join('\n  - ')}`);
    this.name = 'ConfigurationError';
  }
}

export function parseEnvironment(source: NodeJS.ProcessEnv): EnvironmentConfig {
  const result = environmentSchema.safeParse(source);
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return result.data;
}

/**
 * Settings without which the bot cannot talk to its collaborators.
 * Checked at start-up only, so tests and tooling can import config freely.
 */
export function assertRuntimeSettings(config: EnvironmentConfig): void {
  const required: Array<keyof EnvironmentConfig> = [
    'DB_USER',
    'SPREADSHEET_ID',
    'GOOGLE_APPLICATION_CREDENTIALS',
    'TWITCH_CLIENT_ID',
    'TWITCH_CLIENT_SECRET',
    'TWITCH_REFRESH_TOKEN',
    'TWITCH_BROADCASTER_ID',
    'TWITCH_BOT_USER_ID',
    'TWITCH_BOT_REFRESH_TOKEN'
  ];
  const missing = required.filter(key => config[key] === '').map(key => `${key}: required`);

  if (!config.REWARD_ID_ORDINARY && !config.REWARD_ID_ELEVATED && !config.REWARD_ID_PREMIUM) {
    missing.push('REWARD_ID_*: at least one reward id must be configured');
  }

  if (missing.length > 0) {
    throw new ConfigurationError(missing);
  }
}

export const env: EnvironmentConfig = parseEnvironment(process.env);

export const ENVIRONMENT: Environment = env.ENVIRONMENT;
