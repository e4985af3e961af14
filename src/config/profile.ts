import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { CLASSIFY_CONFIG, DEFAULT_MODEL, LANGUAGES } from '../agents/config';
import { InterestTagSchema } from '../agents/schemas';

export const DEFAULT_PROFILE_PATH = 'profiles/default.json';
export const DEFAULT_CATEGORIES = ['cs.CL', 'cs.AI', 'cs.LG', 'cs.CV'];
const MIN_INTERVAL_SECONDS = 30;

export class ConfigError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n${issues.join('\n')}` : message);
    this.name = 'ConfigError';
  }
}

const InterestTagEntrySchema = z.preprocess(
  (value) => (typeof value === 'string' ? { label: value } : value),
  InterestTagSchema
);

export const ChannelConfigSchema = z.object({
  type: z.string().default('feishu'),
  webhook_url: z.string().default(''),
  delay_seconds: z.number().nonnegative().default(2),
  separator_text: z.string().default('🚧 Next: {label} ({current}/{total}) 🚧'),
  exclude_tags: z.array(z.string()).default([]),
});

export type ChannelConfig = z.infer<typeof ChannelConfigSchema>;

const LlmConfigSchema = z.object({
  model: z.string().default(DEFAULT_MODEL),
  api_key_env: z.string().default('GOOGLE_API_KEY'),
  temperature: z.number().min(0).max(2).default(0.2),
  max_concurrency: z.number().int().positive().default(CLASSIFY_CONFIG.defaultConcurrency),
  timeout_ms: z.number().int().positive().default(CLASSIFY_CONFIG.timeoutMs),
});

export type LlmConfig = z.infer<typeof LlmConfigSchema>;

export const ProfileSchema = z.object({
  subscriptions: z
    .object({
      categories: z.array(z.string()).default(DEFAULT_CATEGORIES),
      interest_tags: z.array(InterestTagEntrySchema).default([]),
    })
    .default({}),
  channels: z.array(ChannelConfigSchema).default([]),
  llm: LlmConfigSchema.default({}),
  schedule: z
    .object({
      mode: z.enum(['workday', 'daily']).default('workday'),
      max_attempts: z.number().int().positive().default(6),
      interval_seconds: z
        .number()
        .int()
        .default(3600)
        .transform((value) => Math.max(MIN_INTERVAL_SECONDS, value)),
    })
    .default({}),
  data_dirs: z
    .object({
      raw: z.string().default('./data/raw'),
      archive: z.string().default('./data/paper_database'),
      daily: z.string().default('./data/daily'),
    })
    .default({}),
  language: z.enum(LANGUAGES).default('en'),
});

export type Profile = z.infer<typeof ProfileSchema>;
export type ProfileInput = z.input<typeof ProfileSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `- ${issue.path.join('.')}: ${issue.message}`);
}

export function parseProfile(data: unknown): Profile {
  const result = ProfileSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigError('Invalid profile', formatIssues(result.error));
  }
  return result.data;
}

/** Environment overrides applied on top of the profile file. */
export function applyEnvOverrides(profile: Profile, env: NodeJS.ProcessEnv = process.env): Profile {
  const llm = { ...profile.llm };
  if (env.LLM_MODEL) {
    llm.model = env.LLM_MODEL;
  }
  const concurrency = Number(env.LLM_CONCURRENCY);
  if (Number.isInteger(concurrency) && concurrency > 0) {
    llm.max_concurrency = concurrency;
  }

  let channels = profile.channels;
  if (channels.length === 0 && env.FEISHU_WEBHOOK_URL) {
    channels = [ChannelConfigSchema.parse({ type: 'feishu', webhook_url: env.FEISHU_WEBHOOK_URL })];
  }

  return { ...profile, llm, channels };
}

export async function loadProfile(
  profilePath: string = process.env.PROFILE_PATH || DEFAULT_PROFILE_PATH,
  env: NodeJS.ProcessEnv = process.env
): Promise<Profile> {
  let data: unknown = {};
  try {
    data = JSON.parse(await fs.readFile(profilePath, 'utf8'));
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
      throw new ConfigError(
        `Could not read profile ${profilePath}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }
  return applyEnvOverrides(parseProfile(data), env);
}

/** Directory that holds the stage ledger: `DATA_ROOT`, else the parent of the raw dir. */
export function resolveDataRoot(profile: Profile, env: NodeJS.ProcessEnv = process.env): string {
  if (env.DATA_ROOT) {
    return env.DATA_ROOT;
  }
  const raw = path.normalize(profile.data_dirs.raw);
  return path.basename(raw) === 'raw' ? path.dirname(raw) : './data';
}

export function resolveApiKey(llm: LlmConfig, env: NodeJS.ProcessEnv = process.env): string {
  const key = (env[llm.api_key_env] ?? '').trim();
  if (!key) {
    throw new ConfigError(`Environment variable ${llm.api_key_env} is not set`);
  }
  return key;
}

export async function ensureDataDirectories(profile: Profile): Promise<void> {
  for (const dir of Object.values(profile.data_dirs)) {
    await fs.mkdir(dir, { recursive: true });
  }
}
