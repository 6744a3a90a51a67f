import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import * as z from 'zod';
import {
  DEFAULT_AI_NAME,
  DEFAULT_CONFIG_FILE,
  DEFAULT_PROMPT_PREAMBLE,
  DEFAULT_THREADS_DIR,
  DEFAULT_USER_NAME,
} from './thread/constants.js';
import { ConfigurationError } from './thread/errors.js';
import type { RoleConfiguration } from './thread/model.js';
import { DEFAULT_REGION_FILTERS, isRegionFilterName, type RegionFilterName } from './thread/quote.js';

export const DEFAULT_BASE_URL = 'https://api.openai.com/v1';
export const DEFAULT_MODEL = 'gpt-4o-mini';

export interface TransportConfig {
  baseUrl: string;
  model: string;
  apiKey?: string;
}

/**
 * Runtime configuration for locating thread files and building conversations.
 *
 * `rootDir` is treated as a trust boundary: thread paths must resolve within it.
 */
export interface OutlineChatConfig {
  rootDir: string;
  threadsDir: string;
  roles: RoleConfiguration;
  regionFilters: RegionFilterName[];
  transport: TransportConfig;
}

const headingName = z
  .string()
  .min(1)
  .refine((value) => !/[\r\n]/.test(value) && value.trim() === value, {
    message: 'must be a single line without surrounding spaces',
  });

const ConfigFileSchema = z
  .object({
    threadsDir: z.string().min(1).optional(),
    userName: headingName.optional(),
    aiName: headingName.optional(),
    promptPreamble: z.string().optional(),
    regionFilters: z.array(z.string()).optional(),
    transport: z
      .object({
        baseUrl: z.string().url().optional(),
        model: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface ConfigSources {
  rootDir: string;
  /** Overrides the config file's `threadsDir`. */
  threadsDir?: string;
  /** Explicit config file; relative to `rootDir`. Must exist when given. */
  configFile?: string;
  env?: NodeJS.ProcessEnv;
}

async function readConfigFile(path: string, required: boolean): Promise<ConfigFile> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? error.code : undefined;
    if (!required && code === 'ENOENT') return {};
    throw new ConfigurationError(`Cannot read config file: ${path}`, error);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Config file is not valid JSON: ${path}`, error);
  }

  const parsed = ConfigFileSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.join('.') || '(root)';
    throw new ConfigurationError(`Invalid config file ${path}: ${where}: ${issue?.message ?? 'invalid'}`);
  }
  return parsed.data;
}

/**
 * Merge defaults, the JSON config file and environment into a config value.
 *
 * Environment:
 * - `OUTLINE_CHAT_API_KEY`: transport API key.
 * - `OUTLINE_CHAT_BASE_URL`, `OUTLINE_CHAT_MODEL`: override the file.
 */
export async function loadConfig(sources: ConfigSources): Promise<OutlineChatConfig> {
  const env = sources.env ?? process.env;
  const rootDir = resolve(sources.rootDir);
  const configPath = resolve(rootDir, sources.configFile ?? DEFAULT_CONFIG_FILE);
  const file = await readConfigFile(configPath, sources.configFile !== undefined);

  const regionFilters = file.regionFilters ?? DEFAULT_REGION_FILTERS;
  const unknownFilter = regionFilters.find((name) => !isRegionFilterName(name));
  if (unknownFilter !== undefined) {
    throw new ConfigurationError(`Unknown region filter: ${JSON.stringify(unknownFilter)}`);
  }

  const roles: RoleConfiguration = {
    userName: file.userName ?? DEFAULT_USER_NAME,
    aiName: file.aiName ?? DEFAULT_AI_NAME,
    promptPreamble: file.promptPreamble ?? DEFAULT_PROMPT_PREAMBLE,
  };
  if (roles.userName === roles.aiName) {
    throw new ConfigurationError('userName and aiName must differ');
  }

  return {
    rootDir,
    threadsDir: sources.threadsDir ?? file.threadsDir ?? DEFAULT_THREADS_DIR,
    roles,
    regionFilters: regionFilters.filter(isRegionFilterName),
    transport: {
      baseUrl: env.OUTLINE_CHAT_BASE_URL || file.transport?.baseUrl || DEFAULT_BASE_URL,
      model: env.OUTLINE_CHAT_MODEL || file.transport?.model || DEFAULT_MODEL,
      apiKey: env.OUTLINE_CHAT_API_KEY || undefined,
    },
  };
}

/**
 * Parse server CLI args into config sources.
 *
 * Supported flags:
 * - `--root <dir>`: filesystem root (defaults to `cwd`).
 * - `--threads <dir>`: threads directory relative to root (defaults to `.outline-chat`).
 * - `--config <file>`: JSON config file relative to root (defaults to `outline-chat.json` if present).
 */
export function parseConfigArgs(argv: string[], cwd: string): ConfigSources {
  const args = [...argv];

  let rootDir = cwd;
  let threadsDir: string | undefined;
  let configFile: string | undefined;

  while (args.length > 0) {
    const flag = args.shift();
    if (!flag) break;

    if (flag === '--root') {
      const value = args.shift();
      if (!value) throw new ConfigurationError('Missing value for --root');
      rootDir = resolve(cwd, value);
      continue;
    }

    if (flag === '--threads') {
      const value = args.shift();
      if (!value) throw new ConfigurationError('Missing value for --threads');
      threadsDir = value;
      continue;
    }

    if (flag === '--config') {
      const value = args.shift();
      if (!value) throw new ConfigurationError('Missing value for --config');
      configFile = value;
      continue;
    }

    throw new ConfigurationError(`Unknown argument: ${flag}`);
  }

  return { rootDir, threadsDir, configFile };
}
