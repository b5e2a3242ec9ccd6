import { z } from 'zod';

const booleanFlag = (fallback: 'true' | 'false') =>
  z
    .enum(['true', 'false'])
    .default(fallback)
    .transform((v) => v === 'true');

/**
 * Environment configuration schema with zod validation.
 * The app will fail fast on startup if a variable is malformed.
 */
const envSchema = z.object({
  // Storage
  DATA_DIR: z.string().default('./data'),

  // Daily reports
  DAILY_REPORT_WITH_GUI: booleanFlag('true'),
  DAILY_REPORT_ENABLED: booleanFlag('true'),

  // Issue tracker
  MAX_SELECTOR_OPTIONS: z
    .string()
    .default('100')
    .transform((v) => parseInt(v, 10))
    .pipe(z.number().int().positive()),

  // Home tab
  BOT_ADMIN_USER_ID: z.string().optional(),

  // App
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type EnvConfig = z.infer<typeof envSchema>;

/**
 * Validate and parse environment variables.
 * Throws a descriptive error if validation fails.
 */
export function validateEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }

  return result.data;
}

/**
 * NestJS configuration factory.
 * Called by ConfigModule.forRoot({ load: [configuration] })
 */
export default () => {
  const env = validateEnv();

  return {
    nodeEnv: env.NODE_ENV,

    paths: {
      data: env.DATA_DIR,
    },

    daily: {
      withGui: env.DAILY_REPORT_WITH_GUI,
      scheduled: env.DAILY_REPORT_ENABLED,
    },

    issueTracker: {
      maxSelectorOptions: env.MAX_SELECTOR_OPTIONS,
    },

    home: {
      adminUserId: env.BOT_ADMIN_USER_ID,
    },
  };
};
