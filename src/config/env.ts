import { z } from 'zod';
import 'dotenv/config';

export const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.coerce.number().default(3000),
    HOST: z.string().default('0.0.0.0'),

    // Gemini. A missing key is reported per request, not at boot.
    GEMINI_API_KEY: z
      .string()
      .optional()
      .transform((value) => value || undefined),
    GEMINI_MODEL: z
      .string()
      .optional()
      .transform((value) => value || undefined),
    POST_VARIANT: z.enum(['detailed', 'standard', 'concise']).default('detailed'),

    // Retry policy for generation calls
    RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(6),
    RETRY_MIN_DELAY_MS: z.coerce.number().int().min(1).default(1000),
    RETRY_MAX_DELAY_MS: z.coerce.number().int().min(1).default(60_000),

    // Logging
    LOG_LEVEL: z
      .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
      .default('info'),
  })
  .refine((env) => env.RETRY_MIN_DELAY_MS <= env.RETRY_MAX_DELAY_MS, {
    message: 'RETRY_MIN_DELAY_MS must not exceed RETRY_MAX_DELAY_MS',
    path: ['RETRY_MIN_DELAY_MS'],
  });

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('Invalid environment variables:');
  for (const issue of parsed.error.issues) {
    console.error(`  ${issue.path.join('.')}: ${issue.message}`);
  }
  process.exit(1);
}

export const config = parsed.data;
export type Config = z.infer<typeof envSchema>;
