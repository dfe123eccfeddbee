/**
 * Environment configuration.
 *
 * `process.env` (filled from .env by dotenv in the entry scripts) is validated once
 * into an explicit AppConfig that is passed down; nothing below the scripts reads
 * the environment directly.
 */

import { z } from 'zod';

import type { DbSettings } from '../services/storage/mysqlStore';
import type { SmtpSettings } from '../services/notifications/smtp';
import { AnalysisError } from '../services/utils/errors';
import { DEFAULT_ANALYSIS_SETTINGS, SOURCE } from './analysisConfig';
import type { AnalysisSettings } from './analysisConfig';

export interface AppConfig {
  db: DbSettings;
  notificationsEnabled: boolean;
  smtp: SmtpSettings | null; // only required when notifications are on
  settings: AnalysisSettings;
  sourceUrl: string;
}

// Blank lines in .env arrive as '' and mean "use the default"
const optional = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess(value => (value === '' ? undefined : value), schema.optional());

const flag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform(value => value === 'true' || value === '1' || value === 'yes');

const positiveInt = z.coerce.number().int().positive();

const EnvSchema = z
  .object({
    DB_HOST: z.string().default('localhost'),
    DB_PORT: optional(z.coerce.number().int().min(1).max(65535)),
    DB_USER: z.string().default('root'),
    DB_PASSWORD: z.string().default(''),
    DB_NAME: z.string().regex(/^\w+$/, 'letters, digits and underscores only').default('commodities_db'),

    NOTIFICATIONS_ENABLED: optional(flag),
    SMTP_HOST: optional(z.string()),
    SMTP_PORT: optional(z.coerce.number().int().min(1).max(65535)),
    SMTP_SECURE: optional(flag),
    SMTP_USER: optional(z.string()),
    SMTP_PASSWORD: optional(z.string()),
    SMTP_FROM: optional(z.string().email()),

    STRONG_LEAD_TOP_K: optional(positiveInt),
    MIN_STRONG_LEAD_TIMEFRAMES: optional(z.coerce.number().int().min(1).max(3)),
    MOMENTUM_THRESHOLD: optional(z.coerce.number().nonnegative()),
    TOP_N: optional(positiveInt),

    COMMODITIES_URL: optional(z.string().url()),
  })
  .superRefine((env, ctx) => {
    if (!env.NOTIFICATIONS_ENABLED) return;
    for (const key of ['SMTP_HOST', 'SMTP_USER', 'SMTP_PASSWORD'] as const) {
      if (!env[key]) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: 'required when NOTIFICATIONS_ENABLED is on' });
      }
    }
  });

export type RawEnv = Record<string, string | undefined>;

export function loadAppConfig(env: RawEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new AnalysisError('CONFIG_INVALID', `Invalid environment: ${details}`, { cause: parsed.error });
  }
  const e = parsed.data;

  const notificationsEnabled = e.NOTIFICATIONS_ENABLED ?? false;
  const smtp: SmtpSettings | null =
    notificationsEnabled && e.SMTP_HOST && e.SMTP_USER && e.SMTP_PASSWORD
      ? {
          host: e.SMTP_HOST,
          port: e.SMTP_PORT ?? 587,
          secure: e.SMTP_SECURE ?? false,
          user: e.SMTP_USER,
          password: e.SMTP_PASSWORD,
          from: e.SMTP_FROM ?? e.SMTP_USER,
        }
      : null;

  return {
    db: {
      host: e.DB_HOST,
      port: e.DB_PORT ?? 3306,
      user: e.DB_USER,
      password: e.DB_PASSWORD,
      database: e.DB_NAME,
    },
    notificationsEnabled,
    smtp,
    settings: {
      topN: e.TOP_N ?? DEFAULT_ANALYSIS_SETTINGS.topN,
      strongLeadTopK: e.STRONG_LEAD_TOP_K ?? DEFAULT_ANALYSIS_SETTINGS.strongLeadTopK,
      minStrongLeadTimeframes: e.MIN_STRONG_LEAD_TIMEFRAMES ?? DEFAULT_ANALYSIS_SETTINGS.minStrongLeadTimeframes,
      momentumThreshold: e.MOMENTUM_THRESHOLD ?? DEFAULT_ANALYSIS_SETTINGS.momentumThreshold,
    },
    sourceUrl: e.COMMODITIES_URL ?? SOURCE.URL,
  };
}
