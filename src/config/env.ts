import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const optionalString = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().min(1).optional()
);

const booleanFlag = z.preprocess(
  (value) => (typeof value === 'string' ? ['1', 'true', 'yes'].includes(value.trim().toLowerCase()) : value),
  z.boolean().default(false)
);

const envSchema = z.object({
  PORT: z.string().default('3000'),
  NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
  REDIS_URL: optionalString,
  REDIS_CONNECT_TIMEOUT_MS: z.coerce.number().int().positive().default(2000),
  API_KEYS: optionalString,
  TWILIO_AUTH_TOKEN: optionalString,
  WEBHOOK_BASE_URL: z.string().default('http://localhost:3000'),
  SENTRY_DSN: optionalString,
  CONVERSATION_TIMEOUT_HOURS: z.coerce.number().positive().default(24),
  CONVERSATION_EXPIRY_INCLUSIVE: booleanFlag,
  CONTEXT_WINDOW: z.coerce.number().int().positive().default(10),
  CLEANUP_INTERVAL_MINUTES: z.coerce.number().positive().default(15),
  BUSINESS_TIMEZONE: z.string().default('America/New_York'),
});

export type Env = z.infer<typeof envSchema>;

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('❌ Invalid environment variables:', parsed.error.flatten().fieldErrors);
  process.exit(1);
}

export const env = parsed.data;
