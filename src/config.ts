import path from 'node:path';
import { config as loadDotenv, type DotenvParseOutput } from 'dotenv';
import { z } from 'zod';
import { formatSchemaIssues } from './utils/zod.js';

const bool = z.preprocess((value) => {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') {
    if (value === 1) return true;
    if (value === 0) return false;
    return value;
  }
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
    if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
    return value;
  }
  return value;
}, z.boolean());

const schemaBase = z.object({
  NODE_ENV: z.string().default('production'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  HTTP_HOST: z.string().default('127.0.0.1'),
  HTTP_PORT: z.coerce.number().int().min(0).max(65535).default(8000),

  PROJECT_ROOT: z.string().default('.'),
  DATA_RESULTS_DIR: z.string().default('~/.local/share/trial-orchestrator/results'),

  MINING_COMMAND: z.string().default('python'),
  MINING_ARGS: z.string().default('-m quantaalpha.cli mine'),
  BACKTEST_COMMAND: z.string().default('python'),
  BACKTEST_ARGS: z.string().default('-m quantaalpha.backtest.run_backtest'),
  BACKTEST_CONFIG_PATH: z.string().default('configs/backtest.yaml'),
  BACKTEST_RESULTS_DIR: z.string().default(''),

  TRIAL_TIMEOUT_SECONDS: z.coerce.number().int().min(1).max(7 * 24 * 60 * 60).default(36000),
  BRANCH_PARALLEL: bool.default(false),
  BRANCH_LOG_ROOT: z.string().default('log'),
  BRANCH_LOG_PREFIX: z.string().default('branch'),

  TASK_LOG_LIMIT: z.coerce.number().int().min(20).max(100000).default(500),
  SUBSCRIBER_REPLAY_LOGS: z.coerce.number().int().min(0).max(500).default(20),
  CLASSIFIER_RULES_FILE: z.string().default(''),
});

export const appConfigSchema = schemaBase.superRefine((input, ctx) => {
  if (!input.MINING_COMMAND.trim()) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['MINING_COMMAND'],
      message: 'MINING_COMMAND must name the program that runs a mining trial.',
    });
  }

  if (!input.BACKTEST_COMMAND.trim()) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['BACKTEST_COMMAND'],
      message: 'BACKTEST_COMMAND must name the program that runs a backtest trial.',
    });
  }

  if (input.SUBSCRIBER_REPLAY_LOGS > input.TASK_LOG_LIMIT) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['SUBSCRIBER_REPLAY_LOGS'],
      message: 'SUBSCRIBER_REPLAY_LOGS cannot exceed TASK_LOG_LIMIT.',
    });
  }
});

type SchemaOutput = z.output<typeof appConfigSchema>;

const CONFIG_KEYS = Object.keys(schemaBase.shape);
const KNOWN_CONFIG_KEYS = new Set<string>(CONFIG_KEYS);

// Keys the trial programs read from the same .env file.
const ALLOWED_FOREIGN_ENV_KEYS = new Set<string>([
  'OPENAI_API_KEY',
  'OPENAI_BASE_URL',
  'CHAT_MODEL',
  'REASONING_MODEL',
  'QLIB_DATA_DIR',
  'USE_LOCAL',
]);

const unknownDotenvKeys = (input: DotenvParseOutput | undefined): string[] => {
  if (!input) return [];
  return Object.keys(input)
    .filter((key) => !KNOWN_CONFIG_KEYS.has(key) && !ALLOWED_FOREIGN_ENV_KEYS.has(key))
    .sort();
};

const pickConfigValues = (env: NodeJS.ProcessEnv): Record<string, string | undefined> => {
  const output: Record<string, string | undefined> = {};
  for (const key of CONFIG_KEYS) {
    output[key] = env[key];
  }
  return output;
};

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  typeof error === 'object' && error !== null && 'code' in error;

const envFilePath = process.env.TRIAL_ORCHESTRATOR_ENV_FILE || path.join(process.cwd(), '.env');
const dotenvOutput = loadDotenv({ path: envFilePath });
if (dotenvOutput.error && !(isErrnoException(dotenvOutput.error) && dotenvOutput.error.code === 'ENOENT')) {
  throw new Error(`Unable to load config file ${envFilePath}: ${dotenvOutput.error.message}`);
}

const parseSchema = (env: NodeJS.ProcessEnv): SchemaOutput => {
  const parsed = appConfigSchema.safeParse(pickConfigValues(env));
  if (!parsed.success) {
    throw new Error(`Invalid trial orchestrator configuration:\n${formatSchemaIssues(parsed.error.issues)}`);
  }
  return parsed.data;
};

export const parseAppConfig = (
  env: NodeJS.ProcessEnv = process.env,
  dotenvVars: DotenvParseOutput | undefined = dotenvOutput.parsed,
) => {
  const unknown = unknownDotenvKeys(dotenvVars);
  if (unknown.length > 0) {
    throw new Error(`Unknown config key(s) in ${envFilePath}: ${unknown.join(', ')}`);
  }

  return parseSchema(env);
};

export const config = parseAppConfig();

export type AppConfig = ReturnType<typeof parseAppConfig>;
