import dotenv from 'dotenv';
import { z } from 'zod';
import { DEFAULT_SOURCES } from './sources';

dotenv.config();

const optionalString = z
  .string()
  .optional()
  .transform(value => (value && value.trim() !== '' ? value.trim() : undefined));

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  FRONTEND_URL: z.string().default('http://localhost:5173'),
  OUTPUT_DIR: z.string().default('./output'),
  SOURCE_BASE_URL: z.string().url().default('https://www.reddit.com'),
  SOURCES: optionalString,
  ANTHROPIC_API_KEY: optionalString,
  ANTHROPIC_MODEL: z.string().default('claude-sonnet-4-20250514'),
  ZAPIER_WEBHOOK_URL: optionalString,
  MAKE_WEBHOOK_URL: optionalString,
  LINKEDIN_ACCESS_TOKEN: optionalString,
  LINKEDIN_PERSON_ID: optionalString,
  AYRSHARE_API_KEY: optionalString,
});

export interface PublishingCredentials {
  zapierWebhookUrl?: string;
  makeWebhookUrl?: string;
  linkedinAccessToken?: string;
  linkedinPersonId?: string;
  ayrshareApiKey?: string;
}

export interface AppConfig {
  port: number;
  env: 'development' | 'production' | 'test';
  logLevel: string;
  frontendUrl: string;
  outputDir: string;
  sourceBaseUrl: string;
  sources: string[];
  anthropic: {
    apiKey?: string;
    model: string;
  };
  publishing: PublishingCredentials;
}

/**
 * Read and validate the environment. Throws with the offending variable names
 * when a value cannot be parsed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }

  const vars = parsed.data;

  return {
    port: vars.PORT,
    env: vars.NODE_ENV,
    logLevel: vars.LOG_LEVEL ?? (vars.NODE_ENV === 'production' ? 'info' : 'debug'),
    frontendUrl: vars.FRONTEND_URL,
    outputDir: vars.OUTPUT_DIR,
    sourceBaseUrl: vars.SOURCE_BASE_URL.replace(/\/+$/, ''),
    sources: vars.SOURCES
      ? vars.SOURCES.split(',').map(s => s.trim()).filter(s => s.length > 0)
      : [...DEFAULT_SOURCES],
    anthropic: {
      apiKey: vars.ANTHROPIC_API_KEY,
      model: vars.ANTHROPIC_MODEL,
    },
    publishing: {
      zapierWebhookUrl: vars.ZAPIER_WEBHOOK_URL,
      makeWebhookUrl: vars.MAKE_WEBHOOK_URL,
      linkedinAccessToken: vars.LINKEDIN_ACCESS_TOKEN,
      linkedinPersonId: vars.LINKEDIN_PERSON_ID,
      ayrshareApiKey: vars.AYRSHARE_API_KEY,
    },
  };
}
