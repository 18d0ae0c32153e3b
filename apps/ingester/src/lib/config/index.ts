/**
 * Ingester Configuration
 * Reads and validates settings from the environment (loaded by dotenv in the entry script)
 */

import { z } from 'zod';

export interface WatchConfig {
  readonly folderPath: string;
  readonly pollIntervalSeconds: number;
  /** Divert fanfiction.net URLs to the notifier instead of queueing them. */
  readonly disableFanfictionNet: boolean;
}

export interface SmtpConfig {
  host: string;
  port: number;
  secure: boolean;
  user?: string;
  password?: string;
  from: string;
  to: string;
}

export type NotifyConfig = { provider: 'log' } | { provider: 'email'; smtp: SmtpConfig };

export interface IngesterConfig {
  watch: WatchConfig;
  queueCapacity: number;
  notify: NotifyConfig;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

const envBoolean = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no']))
  .transform((v) => v === 'true' || v === '1' || v === 'yes');

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

// setTimeout fires after 1 ms for delays above 2^31 - 1 ms
const MAX_POLL_INTERVAL_SECONDS = Math.floor(2_147_483_647 / 1000);

const envSchema = z
  .object({
    WATCH_FOLDER_PATH: z
      .string({ required_error: 'folder path must be specified' })
      .trim()
      .min(1, 'folder path must be specified'),
    WATCH_POLL_INTERVAL_SECONDS: z.coerce
      .number()
      .int()
      .positive()
      .max(MAX_POLL_INTERVAL_SECONDS)
      .default(60),
    DISABLE_FANFICTION_NET: envBoolean.default('false'),
    QUEUE_CAPACITY: z.coerce.number().int().positive().default(1000),
    NOTIFY_PROVIDER: z.enum(['log', 'email']).default('log'),
    SMTP_HOST: optionalString,
    SMTP_PORT: z.coerce.number().int().positive().default(587),
    SMTP_SECURE: envBoolean.default('false'),
    SMTP_USER: optionalString,
    SMTP_PASSWORD: optionalString,
    NOTIFY_EMAIL_FROM: optionalString,
    NOTIFY_EMAIL_TO: optionalString,
  })
  .superRefine((env, ctx) => {
    if (env.NOTIFY_PROVIDER !== 'email') return;
    for (const key of ['SMTP_HOST', 'NOTIFY_EMAIL_FROM', 'NOTIFY_EMAIL_TO'] as const) {
      if (!env[key]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: 'required when NOTIFY_PROVIDER is email',
        });
      }
    }
  });

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`);
}

/**
 * Load configuration from environment variables
 * Throws ConfigError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): IngesterConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error));
  }

  const e = parsed.data;
  let notify: NotifyConfig = { provider: 'log' };
  if (e.NOTIFY_PROVIDER === 'email' && e.SMTP_HOST && e.NOTIFY_EMAIL_FROM && e.NOTIFY_EMAIL_TO) {
    notify = {
      provider: 'email',
      smtp: {
        host: e.SMTP_HOST,
        port: e.SMTP_PORT,
        secure: e.SMTP_SECURE,
        user: e.SMTP_USER,
        password: e.SMTP_PASSWORD,
        from: e.NOTIFY_EMAIL_FROM,
        to: e.NOTIFY_EMAIL_TO,
      },
    };
  }

  return {
    watch: Object.freeze({
      folderPath: e.WATCH_FOLDER_PATH,
      pollIntervalSeconds: e.WATCH_POLL_INTERVAL_SECONDS,
      disableFanfictionNet: e.DISABLE_FANFICTION_NET,
    }),
    queueCapacity: e.QUEUE_CAPACITY,
    notify,
  };
}
