import { ConfigError } from './services/errors';

export interface Config {
  githubToken: string;
  port: number;
  includePrivateRepos: boolean;
  cacheMaxAge: number;
}

type Env = Record<string, string | undefined>;

const DEFAULT_PORT = 3000;
const DEFAULT_CACHE_MAX_AGE = 43200;

export function loadConfig(env: Env = process.env): Config {
  const githubToken = env.GITHUB_TOKEN?.trim();
  if (!githubToken) {
    throw new ConfigError('GITHUB_TOKEN is not set');
  }

  return {
    githubToken,
    port: readInteger(env, 'PORT', DEFAULT_PORT),
    includePrivateRepos: readBoolean(env, 'INCLUDE_PRIVATE_REPOS', true),
    cacheMaxAge: readInteger(env, 'CACHE_MAX_AGE', DEFAULT_CACHE_MAX_AGE),
  };
}

function readInteger(env: Env, key: string, fallback: number): number {
  const raw = env[key]?.trim();
  if (!raw) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigError(`${key} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

function readBoolean(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) {
    return fallback;
  }
  if (raw === 'true' || raw === '1') {
    return true;
  }
  if (raw === 'false' || raw === '0') {
    return false;
  }
  throw new ConfigError(`${key} must be true or false, got "${raw}"`);
}
