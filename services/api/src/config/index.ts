import { z } from 'zod';
import { parseWorkingDays } from '@timecard/shared';

const booleanFlag = z
  .enum(['true', 'false'])
  .default('false')
  .transform((value) => value === 'true');

const EnvSchema = z
  .object({
    PORT: z.coerce.number().int().positive().default(3001),
    HOST: z.string().min(1).default('0.0.0.0'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    LOG_PRETTY: booleanFlag,
    STORE_DRIVER: z.enum(['postgres', 'memory']).default('postgres'),

    DATABASE_URL: z.string().url().optional(),
    DB_HOST: z.string().min(1).default('localhost'),
    DB_PORT: z.coerce.number().int().positive().default(5432),
    DB_NAME: z.string().min(1).default('timecards'),
    DB_USER: z.string().min(1).default('timecards'),
    DB_PASSWORD: z.string().default('timecards_dev'),
    DB_SSL: z.enum(['true', 'false']).optional(),
    DB_POOL_MAX: z.coerce.number().int().positive().default(10),

    FUTURE_SUBMISSION_GRACE_DAYS: z.coerce.number().int().min(0).default(0),
    WORKING_DAYS: z.string().default('MON,TUE,WED,THU,FRI'),
    DAILY_HOURS_CAP: z.coerce.number().positive().max(24).default(12),

    MAIL_TRANSPORT: z.enum(['smtp', 'log']).default('log'),
    MAIL_FROM: z.string().min(1).default('timecards@localhost'),
    SMTP_HOST: z.string().optional(),
    SMTP_PORT: z.coerce.number().int().positive().default(587),
    SMTP_SECURE: booleanFlag,
    SMTP_USER: z.string().optional(),
    SMTP_PASSWORD: z.string().optional(),
  })
  .superRefine((env, ctx) => {
    const days = parseWorkingDays(env.WORKING_DAYS);
    if (!days || days.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['WORKING_DAYS'],
        message: 'Expected a comma-separated list of MON..SUN',
      });
    }
    if (env.MAIL_TRANSPORT === 'smtp' && !env.SMTP_HOST) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SMTP_HOST'],
        message: 'Required when MAIL_TRANSPORT=smtp',
      });
    }
  });

/**
 * Business rules of the workflow. Passed to the store and aggregator at construction.
 */
export interface WorkflowConfig {
  futureSubmissionGraceDays: number;
  /** ISO weekdays, 1 = Monday. */
  workingDays: number[];
  dailyHoursCap: number;
}

export interface DatabaseConfig {
  /** `DATABASE_URL`; wins over the discrete fields when set. */
  connectionString?: string;
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  ssl: boolean;
  poolMax: number;
}

export type MailConfig =
  | { transport: 'log'; from: string }
  | {
      transport: 'smtp';
      from: string;
      host: string;
      port: number;
      secure: boolean;
      user?: string;
      password?: string;
    };

export interface AppConfig {
  port: number;
  host: string;
  logLevel: string;
  prettyLogs: boolean;
  storeDriver: 'postgres' | 'memory';
  database: DatabaseConfig;
  workflow: WorkflowConfig;
  mail: MailConfig;
}

export const DEFAULT_WORKFLOW_CONFIG: WorkflowConfig = {
  futureSubmissionGraceDays: 0,
  workingDays: [1, 2, 3, 4, 5],
  dailyHoursCap: 12,
};

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Read and validate configuration once at startup.
 * Nothing below this reads `process.env` during an operation.
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  const values = parsed.data;

  const mail: MailConfig =
    values.MAIL_TRANSPORT === 'smtp' && values.SMTP_HOST
      ? {
          transport: 'smtp',
          from: values.MAIL_FROM,
          host: values.SMTP_HOST,
          port: values.SMTP_PORT,
          secure: values.SMTP_SECURE,
          user: values.SMTP_USER,
          password: values.SMTP_PASSWORD,
        }
      : { transport: 'log', from: values.MAIL_FROM };

  return {
    port: values.PORT,
    host: values.HOST,
    logLevel: values.LOG_LEVEL,
    prettyLogs: values.LOG_PRETTY,
    storeDriver: values.STORE_DRIVER,
    database: {
      connectionString: values.DATABASE_URL,
      host: values.DB_HOST,
      port: values.DB_PORT,
      database: values.DB_NAME,
      user: values.DB_USER,
      password: values.DB_PASSWORD,
      // Hosted databases behind a URL expect TLS unless told otherwise.
      ssl: values.DATABASE_URL ? values.DB_SSL !== 'false' : values.DB_SSL === 'true',
      poolMax: values.DB_POOL_MAX,
    },
    workflow: {
      futureSubmissionGraceDays: values.FUTURE_SUBMISSION_GRACE_DAYS,
      workingDays: parseWorkingDays(values.WORKING_DAYS) ?? DEFAULT_WORKFLOW_CONFIG.workingDays,
      dailyHoursCap: values.DAILY_HOURS_CAP,
    },
    mail,
  };
}
