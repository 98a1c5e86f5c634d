import { z } from 'zod';
import cron from 'node-cron';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

/**
 * Environment schema.
 * Every variable is optional; defaults describe a local single-node setup.
 */
export const EnvSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  CORS_ORIGIN: z.string().default('http://localhost:5173'),

  // Input matrices and outputs
  DATA_FOLDER: z.string().min(1).default('./data'),
  LAT_FILENAME: z.string().min(1).default('Lat_last15min.csv'),
  LON_FILENAME: z.string().min(1).default('Lon_last15min.csv'),
  S4C_FILENAME: z.string().min(1).default('S4C_last15min.csv'),
  OUTPUT_FILENAME: z.string().min(1).default('data.csv'),
  ALERT_LOG_FILENAME: z.string().min(1).default('alerts.csv'),

  // Alert log policy
  ALERT_THRESHOLD: z.coerce.number().min(0).default(0.4),
  ALERT_RETENTION_DAYS: z.coerce.number().int().min(0).default(60),

  // Processing cycle
  PROCESSING_ENABLED: booleanFlag.default('false'),
  PROCESSING_CRON: z
    .string()
    .default('*/15 * * * *')
    .refine((expression) => cron.validate(expression), {
      message: 'PROCESSING_CRON must be a valid cron expression',
    }),
  PROCESSING_RUN_ON_START: booleanFlag.default('true'),
});

export type AppConfig = z.infer<typeof EnvSchema>;

/**
 * ConfigModule `validate` hook: parse and default the environment,
 * failing fast with every invalid variable listed.
 */
export function validateEnv(config: Record<string, unknown>): AppConfig {
  const parsed = EnvSchema.safeParse(config);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }
  return parsed.data;
}
