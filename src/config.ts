import path from 'node:path';
import { config as loadDotenv, type DotenvParseOutput } from 'dotenv';
import { z, type ZodIssue } from 'zod';

const strList = (value: string) =>
  value
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);

const normalizeExtension = (value: string) => {
  const lowered = value.toLowerCase();
  return lowered.startsWith('.') ? lowered : `.${lowered}`;
};

const schemaBase = z.object({
  NODE_ENV: z.string().default('production'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  DATA_DIR: z.string().default('~/.local/share/codewarden'),
  UPLOAD_DIR: z.string().default('~/.local/share/codewarden/uploads'),
  FIXED_DIR: z.string().default('~/.local/share/codewarden/fixed'),
  CONTROL_HTTP_PORT: z.coerce.number().int().min(0).max(65535).default(8787),
  CONTROL_AUTH_TOKEN: z.string().default(''),

  MAX_FILE_BYTES: z.coerce.number().int().min(1).max(50 * 1024 * 1024).default(10 * 1024 * 1024),
  ALLOWED_EXTENSIONS: z.string().default('.py,.js,.ts,.java,.cpp,.c,.go,.rb'),

  ENGINE_MODE: z.enum(['process', 'mock']).default('mock'),
  ENGINE_COMMAND: z.string().default(''),
  ENGINE_ARGS: z.string().default(''),
  ENGINE_CWD: z.string().default('~/.local/share/codewarden/engine'),

  STAGE_TIMEOUT_MS: z.coerce.number().int().min(100).max(60 * 60 * 1000).default(120000),
  STAGE_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(2),
  STAGE_RETRY_BASE_MS: z.coerce.number().int().min(0).max(60000).default(500),
  STAGE_RETRY_MAX_MS: z.coerce.number().int().min(0).max(600000).default(5000),

  SUBSCRIBER_QUEUE_DEPTH: z.coerce.number().int().min(1).max(10000).default(64),
  REPLAY_BUFFER_SIZE: z.coerce.number().int().min(0).max(10000).default(32),
  TASK_RETENTION_MAX: z.coerce.number().int().min(0).default(500),
  TASK_RETENTION_HOURS: z.coerce.number().min(0).default(24),
});

export const appConfigSchema = schemaBase.superRefine((input, ctx) => {
  if (input.ENGINE_MODE === 'process' && !input.ENGINE_COMMAND.trim()) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['ENGINE_COMMAND'],
      message: 'ENGINE_MODE=process requires ENGINE_COMMAND to be set.',
    });
  }

  if (input.STAGE_RETRY_MAX_MS < input.STAGE_RETRY_BASE_MS) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['STAGE_RETRY_MAX_MS'],
      message: 'STAGE_RETRY_MAX_MS must be greater than or equal to STAGE_RETRY_BASE_MS.',
    });
  }

  if (strList(input.ALLOWED_EXTENSIONS).length === 0) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['ALLOWED_EXTENSIONS'],
      message: 'ALLOWED_EXTENSIONS must list at least one extension.',
    });
  }
});

type SchemaInput = z.input<typeof appConfigSchema>;
type SchemaOutput = z.output<typeof appConfigSchema>;

const CONFIG_KEYS = Object.keys(schemaBase.shape);
const KNOWN_CONFIG_KEYS = new Set<string>(CONFIG_KEYS);

const ALLOWED_FOREIGN_ENV_KEYS = new Set<string>(['CODEWARDEN_URL', 'OPENAI_API_KEY', 'ANTHROPIC_API_KEY', 'DEEPSEEK_API_KEY']);

const formatIssue = (issue: ZodIssue) => {
  const key = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${key}: ${issue.message}`;
};

export const formatConfigSchemaIssues = (issues: ZodIssue[]): string =>
  issues.map((issue) => `- ${formatIssue(issue)}`).join('\n');

const unknownDotenvKeys = (input: DotenvParseOutput | undefined): string[] => {
  if (!input) return [];
  return Object.keys(input)
    .filter((key) => !KNOWN_CONFIG_KEYS.has(key) && !ALLOWED_FOREIGN_ENV_KEYS.has(key))
    .sort();
};

const pickConfigValues = (env: NodeJS.ProcessEnv): Partial<Record<keyof SchemaInput, string>> => {
  const output: Record<string, string | undefined> = {};
  for (const key of CONFIG_KEYS) {
    output[key] = env[key];
  }
  return output;
};

const envFilePath = process.env.CODEWARDEN_ENV_FILE || path.join(process.cwd(), '.env');
const dotenvOutput = loadDotenv({ path: envFilePath });
const dotenvErrorCode = dotenvOutput.error && 'code' in dotenvOutput.error ? dotenvOutput.error.code : undefined;
if (dotenvOutput.error && dotenvErrorCode !== 'ENOENT') {
  throw new Error(`Unable to load config file ${envFilePath}: ${dotenvOutput.error.message}`);
}

const parseSchema = (env: NodeJS.ProcessEnv): SchemaOutput => {
  const parsed = appConfigSchema.safeParse(pickConfigValues(env));
  if (!parsed.success) {
    throw new Error(`Invalid codewarden configuration:\n${formatConfigSchemaIssues(parsed.error.issues)}`);
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

  const parsed = parseSchema(env);
  return {
    ...parsed,
    ALLOWED_EXTENSIONS: strList(parsed.ALLOWED_EXTENSIONS).map(normalizeExtension),
  };
};

export const config = parseAppConfig();

export type AppConfig = ReturnType<typeof parseAppConfig>;
