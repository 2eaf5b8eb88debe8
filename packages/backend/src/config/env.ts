import dotenv from 'dotenv';
import { z } from 'zod';

// Load .env file before validation
dotenv.config();

const requiredSecret = (name: string) =>
  z
    .string({ required_error: `${name} is required` })
    .trim()
    .min(1, `${name} must not be empty`);

const envSchema = z.object({
  PORT: z
    .string()
    .default('3000')
    .transform(Number)
    .pipe(z.number().int().positive()),

  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),

  CORS_ORIGINS: z
    .string()
    .default('http://localhost:5173')
    .transform((val) => val.split(',').map((s) => s.trim()).filter(Boolean)),

  // Salesforce connected app (OAuth2 refresh-token flow)
  SALESFORCE_CLIENT_ID: requiredSecret('SALESFORCE_CLIENT_ID'),
  SALESFORCE_CLIENT_SECRET: requiredSecret('SALESFORCE_CLIENT_SECRET'),
  SALESFORCE_REFRESH_TOKEN: requiredSecret('SALESFORCE_REFRESH_TOKEN'),

  SALESFORCE_INSTANCE_URL: z
    .string({ required_error: 'SALESFORCE_INSTANCE_URL is required' })
    .url('SALESFORCE_INSTANCE_URL must be a valid URL')
    .transform((val) => val.replace(/\/+$/, '')),

  SALESFORCE_API_VERSION: z
    .string()
    .regex(/^v\d+\.\d+$/, 'SALESFORCE_API_VERSION must look like v60.0')
    .default('v60.0'),

  // https://test.salesforce.com for sandbox orgs
  SALESFORCE_LOGIN_URL: z
    .string()
    .url('SALESFORCE_LOGIN_URL must be a valid URL')
    .default('https://login.salesforce.com')
    .transform((val) => val.replace(/\/+$/, '')),

  SALESFORCE_TIMEOUT_MS: z
    .string()
    .default('30000')
    .transform(Number)
    .pipe(z.number().int().positive()),
});

export type Env = z.infer<typeof envSchema>;

function validateEnv(): Env {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const formatted = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');

    console.error('Environment validation failed:\n' + formatted);
    process.exit(1);
  }

  return result.data;
}

export const env = validateEnv();
