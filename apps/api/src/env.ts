import dotenv from 'dotenv';
import path from 'node:path';
import { z } from 'zod';

export const EnvSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: z.coerce.number().int().positive().default(5000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  LINE_CHANNEL_ACCESS_TOKEN: z.string().min(1),
  LINE_CHANNEL_SECRET: z.string().min(1),

  GROQ_API_KEY: z.string().min(1),
  GROQ_BASE_URL: z
    .string()
    .url()
    .default('https://api.groq.com/openai/v1')
    .transform((s) => s.replace(/\/$/, '')),
  TRANSCRIPTION_MODEL: z.string().default('whisper-large-v3'),
  EXTRACTION_MODEL: z.string().default('llama3-8b-8192'),
  EXTRACTION_MAX_TOKENS: z.coerce.number().int().positive().default(200),
  UPSTREAM_TIMEOUT_MS: z.coerce.number().int().positive().default(25_000),

  // Where voice messages are staged while they are transcribed. Defaults to the OS temp dir.
  AUDIO_TMP_DIR: z.string().optional(),

  REMINDER_STORE: z.enum(['firestore', 'memory']).default('firestore'),
  GOOGLE_APPLICATION_CREDENTIALS: z.string().optional(),
  FIREBASE_PROJECT_ID: z.string().optional(),
  FIREBASE_CLIENT_EMAIL: z.string().optional(),
  FIREBASE_PRIVATE_KEY: z.string().optional()
});

export type Env = z.infer<typeof EnvSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  return EnvSchema.parse(source);
}

export function loadEnv(): Env {
  // When run via `npm -w`, the CWD is the package folder (apps/api).
  // Load the repo-root `.env` unless ENV_FILE points elsewhere.
  dotenv.config({
    path: process.env.ENV_FILE ?? path.join(process.env.INIT_CWD ?? process.cwd(), '.env')
  });
  return parseEnv(process.env);
}
