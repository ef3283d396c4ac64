import fs from 'node:fs';
import path from 'node:path';
import yaml from 'yaml';
import { z } from 'zod';

export const DEFAULT_BASE_URL = 'https://www.19pine.ai';

export interface ReconnectConfig {
  /** First retry delay; doubles on each attempt. */
  delayMs: number;
  maxDelayMs: number;
  maxAttempts: number;
}

export interface EngineConfig {
  workLogDebounceMs: number;
  /**
   * Seal an open text buffer after this much silence even without a complete
   * marker. Unset means never.
   */
  textIdleTimeoutMs?: number | undefined;
  /** Buffers held open longer than this are flushed as partial events. */
  coalescenceCeilingMs: number;
  queueCapacity: number;
}

export interface PineClientConfig {
  baseUrl: string;
  accessToken?: string | undefined;
  userId?: string | undefined;
  deviceId?: string | undefined;
  debug: boolean;
  readyTimeoutMs: number;
  requestTimeoutMs: number;
  reconnect: ReconnectConfig;
  engine: EngineConfig;
}

export const DEFAULT_RECONNECT_CONFIG: ReconnectConfig = {
  delayMs: 1000,
  maxDelayMs: 30_000,
  maxAttempts: 5,
};

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  workLogDebounceMs: 3000,
  coalescenceCeilingMs: 120_000,
  queueCapacity: 10_000,
};

const DEFAULT_CONFIG_FILENAMES = ['pine.config.json', 'pine.config.yaml', 'pine.config.yml'];

const ConfigFileSchema = z.object({
  baseUrl: z.string().optional(),
  accessToken: z.string().optional(),
  userId: z.string().optional(),
  deviceId: z.string().optional(),
  debug: z.boolean().optional(),
  readyTimeoutMs: z.number().optional(),
  requestTimeoutMs: z.number().optional(),
  reconnect: z
    .object({
      delayMs: z.number().optional(),
      maxDelayMs: z.number().optional(),
      maxAttempts: z.number().optional(),
    })
    .optional(),
  engine: z
    .object({
      workLogDebounceMs: z.number().optional(),
      textIdleTimeoutMs: z.number().optional(),
      coalescenceCeilingMs: z.number().optional(),
      queueCapacity: z.number().optional(),
    })
    .optional(),
});
type ConfigFileContents = z.infer<typeof ConfigFileSchema>;

export function defaultConfig(overrides: Partial<PineClientConfig> = {}): PineClientConfig {
  return {
    baseUrl: DEFAULT_BASE_URL,
    debug: false,
    readyTimeoutMs: 15_000,
    requestTimeoutMs: 10_000,
    ...overrides,
    reconnect: { ...DEFAULT_RECONNECT_CONFIG, ...overrides.reconnect },
    engine: { ...DEFAULT_ENGINE_CONFIG, ...overrides.engine },
  };
}

/**
 * Resolve client configuration. Environment variables win; otherwise the first
 * `pine.config.(json|yaml|yml)` found in `cwd` is used; otherwise defaults.
 */
export function loadConfig(cwd: string = process.cwd()): PineClientConfig {
  const envUrl = readEnv('PINE_BASE_URL');
  const envToken = readEnv('PINE_ACCESS_TOKEN');
  const envUserId = readEnv('PINE_USER_ID');
  const envDeviceId = readEnv('PINE_DEVICE_ID');

  const fileContents = envUrl ? undefined : readConfigFile(cwd);
  const config = defaultConfig();

  if (fileContents) {
    if (fileContents.baseUrl) config.baseUrl = fileContents.baseUrl;
    if (fileContents.accessToken) config.accessToken = fileContents.accessToken;
    if (fileContents.userId) config.userId = fileContents.userId;
    if (fileContents.deviceId) config.deviceId = fileContents.deviceId;
    if (typeof fileContents.debug === 'boolean') config.debug = fileContents.debug;
    config.readyTimeoutMs = positiveOr(fileContents.readyTimeoutMs, config.readyTimeoutMs);
    config.requestTimeoutMs = positiveOr(fileContents.requestTimeoutMs, config.requestTimeoutMs);
    config.reconnect = {
      delayMs: positiveOr(fileContents.reconnect?.delayMs, config.reconnect.delayMs),
      maxDelayMs: positiveOr(fileContents.reconnect?.maxDelayMs, config.reconnect.maxDelayMs),
      maxAttempts: positiveOr(fileContents.reconnect?.maxAttempts, config.reconnect.maxAttempts),
    };
    const textIdleTimeoutMs = positiveOr(fileContents.engine?.textIdleTimeoutMs, undefined);
    config.engine = {
      workLogDebounceMs: positiveOr(
        fileContents.engine?.workLogDebounceMs,
        config.engine.workLogDebounceMs,
      ),
      coalescenceCeilingMs: positiveOr(
        fileContents.engine?.coalescenceCeilingMs,
        config.engine.coalescenceCeilingMs,
      ),
      queueCapacity: positiveOr(fileContents.engine?.queueCapacity, config.engine.queueCapacity),
      ...(textIdleTimeoutMs !== undefined ? { textIdleTimeoutMs } : {}),
    };
  }

  if (envUrl) config.baseUrl = envUrl;
  if (envToken) config.accessToken = envToken;
  if (envUserId) config.userId = envUserId;
  if (envDeviceId) config.deviceId = envDeviceId;

  const envDebug = readEnv('PINE_DEBUG');
  if (envDebug !== undefined) {
    config.debug = envDebug === '1' || envDebug.toLowerCase() === 'true';
  }

  const envDebounce = Number(readEnv('PINE_WORK_LOG_DEBOUNCE_MS'));
  config.engine.workLogDebounceMs = positiveOr(envDebounce, config.engine.workLogDebounceMs);

  const envTextIdle = positiveOr(Number(readEnv('PINE_TEXT_IDLE_TIMEOUT_MS')), undefined);
  if (envTextIdle !== undefined) {
    config.engine.textIdleTimeoutMs = envTextIdle;
  }

  return config;
}

function readEnv(name: string): string | undefined {
  const value = process.env[name];
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function positiveOr<T extends number | undefined>(value: unknown, fallback: T): number | T {
  return typeof value === 'number' && Number.isFinite(value) && value > 0 ? value : fallback;
}

function readConfigFile(cwd: string): ConfigFileContents | undefined {
  const configPath = findConfigFile(cwd);
  if (!configPath) return undefined;

  const content = fs.readFileSync(configPath, 'utf8');
  const parsed: unknown = configPath.endsWith('.json') ? JSON.parse(content) : yaml.parse(content);
  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new Error(`Invalid config file ${path.basename(configPath)}: ${result.error.message}`);
  }
  return result.data;
}

function findConfigFile(cwd: string): string | undefined {
  for (const filename of DEFAULT_CONFIG_FILENAMES) {
    const fullPath = path.join(cwd, filename);
    if (fs.existsSync(fullPath)) {
      return fullPath;
    }
  }
  return undefined;
}
