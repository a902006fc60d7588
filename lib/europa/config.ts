import fs from 'node:fs';
import { z } from 'zod';
import type { EuropaConfig } from './types';

export const DEFAULT_CONFIG: EuropaConfig = {
  userAgent: 'europa-media-extract/0.1',
  defaultLanguage: 'en',
  playlistUrl: 'http://ec.europa.eu/avservices/video/player/playlist.cfm',
  meetingApiUrl: 'https://acs-api.europarl.connectedviews.eu/api/FullMeeting',
  tenantId: 'bae646ca-1fc8-4363-80ba-2c04f06b4968',
  apiVersion: '1.0'
};

const ConfigSchema = z.object({
  userAgent: z.string().trim().min(1, 'userAgent must not be empty'),
  defaultLanguage: z
    .string()
    .trim()
    .toLowerCase()
    .regex(/^[a-z]{2,3}$/, 'defaultLanguage must be a two or three letter language code'),
  playlistUrl: z.string().url('playlistUrl must be a valid URL'),
  meetingApiUrl: z.string().url('meetingApiUrl must be a valid URL'),
  tenantId: z.string().trim().min(1, 'tenantId must not be empty'),
  apiVersion: z.string().trim().min(1, 'apiVersion must not be empty')
});

const FileConfigSchema = ConfigSchema.partial().strict();

const ENV_KEYS: Array<[keyof EuropaConfig, string]> = [
  ['userAgent', 'EUROPA_USER_AGENT'],
  ['defaultLanguage', 'EUROPA_SITELANG'],
  ['playlistUrl', 'EC_PLAYLIST_URL'],
  ['meetingApiUrl', 'EUROPARL_MEETING_API_URL'],
  ['tenantId', 'EUROPARL_TENANT_ID'],
  ['apiVersion', 'EUROPARL_API_VERSION']
];

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  configPath?: string | null;
}

function readConfigFile(configPath: string): Partial<EuropaConfig> {
  if (!fs.existsSync(configPath)) {
    throw new Error(`Config file not found at ${configPath}`);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new Error(`Config file ${configPath} is not valid JSON`, { cause: error });
  }
  const parsed = FileConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid config file ${configPath}: ${formatIssue(parsed.error)}`);
  }
  return parsed.data;
}

function readEnv(env: NodeJS.ProcessEnv): Partial<EuropaConfig> {
  const overrides: Partial<EuropaConfig> = {};
  for (const [key, variable] of ENV_KEYS) {
    const value = env[variable];
    if (value !== undefined && value !== '') {
      overrides[key] = value;
    }
  }
  return overrides;
}

function formatIssue(error: z.ZodError) {
  return error.issues.map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message)).join('; ');
}

/**
 * Defaults, then the JSON config file, then environment variables.
 */
export function loadConfig({ env = process.env, configPath = null }: LoadConfigOptions = {}): EuropaConfig {
  const merged = {
    ...DEFAULT_CONFIG,
    ...(configPath ? readConfigFile(configPath) : {}),
    ...readEnv(env)
  };
  const parsed = ConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new Error(`Invalid configuration: ${formatIssue(parsed.error)}`);
  }
  return parsed.data;
}
