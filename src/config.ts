/**
 * Configuration
 *
 * Settings come from, in increasing precedence: built-in defaults, a profile
 * in a YAML file, `ARMLINK_*` environment variables, and explicit overrides.
 */

import * as fs from 'fs';
import * as yaml from 'js-yaml';

export interface ArmlinkConfig {
  host: string;
  port: number;
  /** Path of the WebSocket endpoint, starting with `/` */
  path: string;
  /** Default per-call deadline in ms; 0 means none */
  timeoutMs: number;
  /** WebSocket handshake deadline in ms */
  connectTimeoutMs: number;
}

/**
 * Parsed profile file.
 *
 * ```yaml
 * default: lab
 * profiles:
 *   lab:
 *     host: 192.168.1.40
 *     timeoutMs: 5000
 * ```
 */
export interface ProfileFile {
  default?: string;
  profiles: Record<string, Partial<ArmlinkConfig>>;
}

export type Environment = Readonly<Record<string, string | undefined>>;

export interface ResolveConfigOptions {
  /** Profile file, already loaded or as a path */
  file?: ProfileFile | string;
  /** Profile name; falls back to `ARMLINK_PROFILE`, then the file's `default` */
  profile?: string;
  overrides?: Partial<ArmlinkConfig>;
  /** Defaults to `process.env` */
  env?: Environment;
}

export const DEFAULT_CONFIG: Readonly<ArmlinkConfig> = {
  host: 'localhost',
  port: 8000,
  path: '/ws',
  timeoutMs: 0,
  connectTimeoutMs: 10000,
};

/**
 * Invalid configuration value or profile file.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// ============================================================================
// Validation
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function checkPort(value: number, source: string): number {
  if (!Number.isInteger(value) || value < 1 || value > 65535) {
    throw new ConfigError(`Invalid port from ${source}: ${value} (expected an integer between 1 and 65535)`);
  }
  return value;
}

function checkDuration(value: number, name: string, source: string): number {
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigError(`Invalid ${name} from ${source}: ${value} (expected a non-negative number)`);
  }
  return value;
}

function normalizePath(value: string): string {
  return value.startsWith('/') ? value : `/${value}`;
}

function parseNumber(text: string, name: string, source: string): number {
  const value = Number(text.trim());
  if (text.trim() === '' || Number.isNaN(value)) {
    throw new ConfigError(`Invalid ${name} from ${source}: ${JSON.stringify(text)} is not a number`);
  }
  return value;
}

/**
 * Validates every field that is present and normalizes `path`.
 */
function checkPartial(config: Partial<ArmlinkConfig>, source: string): Partial<ArmlinkConfig> {
  const checked: Partial<ArmlinkConfig> = {};
  if (config.host !== undefined) {
    if (config.host.length === 0) {
      throw new ConfigError(`Invalid host from ${source}: must not be empty`);
    }
    checked.host = config.host;
  }
  if (config.port !== undefined) checked.port = checkPort(config.port, source);
  if (config.path !== undefined) checked.path = normalizePath(config.path);
  if (config.timeoutMs !== undefined) checked.timeoutMs = checkDuration(config.timeoutMs, 'timeoutMs', source);
  if (config.connectTimeoutMs !== undefined) {
    checked.connectTimeoutMs = checkDuration(config.connectTimeoutMs, 'connectTimeoutMs', source);
  }
  return checked;
}

function readProfile(value: unknown, name: string, filePath: string): Partial<ArmlinkConfig> {
  const source = `profile "${name}" in ${filePath}`;
  if (!isRecord(value)) {
    throw new ConfigError(`Invalid ${source}: expected a mapping`);
  }
  const profile: Partial<ArmlinkConfig> = {};
  for (const [key, field] of Object.entries(value)) {
    switch (key) {
      case 'host':
      case 'path':
        if (typeof field !== 'string') {
          throw new ConfigError(`Invalid ${key} in ${source}: expected a string`);
        }
        profile[key] = field;
        break;
      case 'port':
      case 'timeoutMs':
      case 'connectTimeoutMs':
        if (typeof field !== 'number') {
          throw new ConfigError(`Invalid ${key} in ${source}: expected a number`);
        }
        profile[key] = field;
        break;
      default:
        throw new ConfigError(`Unknown setting "${key}" in ${source}`);
    }
  }
  return checkPartial(profile, source);
}

// ============================================================================
// Sources
// ============================================================================

/**
 * Parses a YAML profile file.
 */
export function parseConfigFile(content: string, filePath: string = '<inline>'): ProfileFile {
  let document: unknown;
  try {
    document = yaml.load(content);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Invalid YAML in ${filePath}: ${reason}`);
  }

  if (!isRecord(document)) {
    throw new ConfigError(`Config file ${filePath} must contain a mapping`);
  }
  if (!isRecord(document.profiles)) {
    throw new ConfigError(`Config file missing 'profiles' mapping in ${filePath}`);
  }

  const profiles: Record<string, Partial<ArmlinkConfig>> = {};
  for (const [name, value] of Object.entries(document.profiles)) {
    profiles[name] = readProfile(value, name, filePath);
  }

  const file: ProfileFile = { profiles };
  if (document.default !== undefined) {
    if (typeof document.default !== 'string') {
      throw new ConfigError(`Invalid 'default' in ${filePath}: expected a profile name`);
    }
    if (!(document.default in profiles)) {
      throw new ConfigError(`Default profile "${document.default}" is not defined in ${filePath}`);
    }
    file.default = document.default;
  }
  return file;
}

/**
 * Loads and validates a YAML profile file.
 */
export function loadConfigFile(filePath: string): ProfileFile {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Config file does not exist: ${filePath}`);
  }
  return parseConfigFile(fs.readFileSync(filePath, 'utf-8'), filePath);
}

/**
 * Reads the `ARMLINK_*` variables that are set and non-empty.
 */
export function configFromEnv(env: Environment = process.env): Partial<ArmlinkConfig> {
  const getEnv = (key: string): string | undefined => {
    const value = env[key];
    return value === undefined || value === '' ? undefined : value;
  };

  const config: Partial<ArmlinkConfig> = {};
  const host = getEnv('ARMLINK_HOST');
  if (host !== undefined) config.host = host;
  const port = getEnv('ARMLINK_PORT');
  if (port !== undefined) config.port = parseNumber(port, 'port', 'ARMLINK_PORT');
  const path = getEnv('ARMLINK_PATH');
  if (path !== undefined) config.path = path;
  const timeout = getEnv('ARMLINK_TIMEOUT_MS');
  if (timeout !== undefined) config.timeoutMs = parseNumber(timeout, 'timeoutMs', 'ARMLINK_TIMEOUT_MS');
  const connectTimeout = getEnv('ARMLINK_CONNECT_TIMEOUT_MS');
  if (connectTimeout !== undefined) {
    config.connectTimeoutMs = parseNumber(connectTimeout, 'connectTimeoutMs', 'ARMLINK_CONNECT_TIMEOUT_MS');
  }
  return checkPartial(config, 'environment');
}

/**
 * Merges every configuration source into a complete, validated config.
 *
 * @throws ConfigError on an invalid value or an unknown profile
 */
export function resolveConfig(options: ResolveConfigOptions = {}): ArmlinkConfig {
  const env = options.env ?? process.env;
  const file = typeof options.file === 'string' ? loadConfigFile(options.file) : options.file;

  const profileName = options.profile ?? (env.ARMLINK_PROFILE || undefined) ?? file?.default;
  let profile: Partial<ArmlinkConfig> = {};
  if (profileName !== undefined) {
    const found = file?.profiles[profileName];
    if (!found) {
      throw new ConfigError(
        file ? `Unknown profile "${profileName}"` : `Profile "${profileName}" requested but no config file was given`
      );
    }
    profile = found;
  }

  return {
    ...DEFAULT_CONFIG,
    ...profile,
    ...configFromEnv(env),
    ...checkPartial(withoutUndefined(options.overrides ?? {}), 'overrides'),
  };
}

function withoutUndefined(config: Partial<ArmlinkConfig>): Partial<ArmlinkConfig> {
  const result: Partial<ArmlinkConfig> = {};
  if (config.host !== undefined) result.host = config.host;
  if (config.port !== undefined) result.port = config.port;
  if (config.path !== undefined) result.path = config.path;
  if (config.timeoutMs !== undefined) result.timeoutMs = config.timeoutMs;
  if (config.connectTimeoutMs !== undefined) result.connectTimeoutMs = config.connectTimeoutMs;
  return result;
}

/**
 * WebSocket URL of the arm, e.g. `ws://localhost:8000/ws`.
 */
export function endpointUrl(config: Pick<ArmlinkConfig, 'host' | 'port' | 'path'>): string {
  return `ws://${config.host}:${config.port}${normalizePath(config.path)}`;
}

// ============================================================================
// Process-wide configuration
// ============================================================================

let globalConfig: ArmlinkConfig | undefined;

/**
 * Configure process-wide settings, on top of defaults and environment.
 */
export function configure(config: Partial<ArmlinkConfig>): void {
  globalConfig = {
    ...getConfig(),
    ...checkPartial(withoutUndefined(config), 'configure()'),
  };
}

/**
 * Get current configuration. Resolved from defaults and the environment on
 * first use.
 */
export function getConfig(): ArmlinkConfig {
  if (!globalConfig) {
    globalConfig = resolveConfig();
  }
  return globalConfig;
}

/**
 * Drops settings made with `configure()`; the next `getConfig()` re-reads
 * the environment.
 */
export function resetConfig(): void {
  globalConfig = undefined;
}
