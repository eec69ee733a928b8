import path from 'node:path';
import { config as loadDotenv, type DotenvParseOutput } from 'dotenv';
import { z, type ZodIssue } from 'zod';

const schemaBase = z.object({
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('warn'),

  ENGINE_MODE: z.enum(['demo', 'process']).default('demo'),
  ENGINE_COMMAND: z.string().default('dfrotz'),
  ENGINE_ARGS: z.string().default(''),
  ENGINE_CWD: z.string().default(''),
  STORY_FILE: z.string().default(''),
  ENGINE_IDLE_MS: z.coerce.number().int().min(10).max(60000).default(150),

  COMMAND_QUEUE_CAPACITY: z.coerce.number().int().min(1).max(100000).default(64),
  OUTPUT_CHANNEL_CAPACITY: z.coerce.number().int().min(1).max(100000).default(256),
  SHUTDOWN_TIMEOUT_MS: z.coerce.number().int().min(50).max(600000).default(3000),
  FORCE_STOP_GRACE_MS: z.coerce.number().int().min(10).max(60000).default(1000),

  PRIORITY_KEYBOARD: z.coerce.number().int().min(-1000).max(1000).default(0),
  PRIORITY_VOICE: z.coerce.number().int().min(-1000).max(1000).default(1),
  MAX_INPUT_BYTES: z.coerce.number().int().min(16).max(65536).default(1024),
  INPUT_HISTORY_SIZE: z.coerce.number().int().min(0).max(10000).default(100),
  VOICE_MIN_CONFIDENCE: z.coerce.number().min(0).max(1).default(0.6),
  SCRIPT_DELAY_MS: z.coerce.number().int().min(0).max(600000).default(0),
  TRANSCRIPT_FILE: z.string().default(''),
});

export const appConfigSchema = schemaBase.superRefine((input, ctx) => {
  if (input.ENGINE_MODE === 'process' && !input.ENGINE_COMMAND.trim()) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['ENGINE_COMMAND'],
      message: 'ENGINE_MODE=process requires ENGINE_COMMAND to be set.',
    });
  }

  if (input.ENGINE_MODE === 'process' && !input.STORY_FILE.trim()) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['STORY_FILE'],
      message: 'ENGINE_MODE=process requires STORY_FILE to be set.',
    });
  }
});

export type AppConfig = z.output<typeof appConfigSchema>;

const CONFIG_KEYS = Object.keys(schemaBase.shape);
const KNOWN_CONFIG_KEYS = new Set<string>(CONFIG_KEYS);

const formatIssue = (issue: ZodIssue) => {
  const key = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${key}: ${issue.message}`;
};

export const formatConfigSchemaIssues = (issues: ZodIssue[]): string =>
  issues.map((issue) => `- ${formatIssue(issue)}`).join('\n');

const unknownDotenvKeys = (input: DotenvParseOutput | undefined): string[] => {
  if (!input) return [];
  return Object.keys(input)
    .filter((key) => !KNOWN_CONFIG_KEYS.has(key))
    .sort();
};

const pickConfigValues = (env: NodeJS.ProcessEnv) => {
  const output: Record<string, string | undefined> = {};
  for (const key of CONFIG_KEYS) {
    output[key] = env[key];
  }
  return output;
};

const envFilePath = process.env.IFBRIDGE_ENV_FILE || path.join(process.cwd(), '.env');
const dotenvOutput = loadDotenv({ path: envFilePath });
const loadError = dotenvOutput.error;
if (loadError && !('code' in loadError && loadError.code === 'ENOENT')) {
  throw new Error(`Unable to load config file ${envFilePath}: ${loadError.message}`);
}

export const parseAppConfig = (
  env: NodeJS.ProcessEnv = process.env,
  dotenvVars: DotenvParseOutput | undefined = dotenvOutput.parsed,
): AppConfig => {
  const unknown = unknownDotenvKeys(dotenvVars);
  if (unknown.length > 0) {
    throw new Error(`Unknown config key(s) in ${envFilePath}: ${unknown.join(', ')}`);
  }

  const parsed = appConfigSchema.safeParse(pickConfigValues(env));
  if (!parsed.success) {
    throw new Error(`Invalid ifbridge configuration:\n${formatConfigSchemaIssues(parsed.error.issues)}`);
  }
  return parsed.data;
};

export const config = parseAppConfig();
