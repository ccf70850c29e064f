import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { bytesPerBlock } from './types.js';

const portSchema = z.coerce.number().int().min(0).max(65_535);

const configSchema = z
  .object({
    audio: z
      .object({
        sampleRate: z.coerce.number().int().min(8_000).max(192_000).default(44_100),
        channels: z.coerce.number().int().min(1).max(8).default(2),
        blockSize: z.coerce.number().int().min(16).max(65_536).default(1024),
        // null selects a device automatically
        deviceIndex: z.coerce.number().int().min(0).nullable().default(null),
      })
      .default({}),
    capture: z
      .object({
        inputFormat: z.string().min(1).default('pulse'),
        ffmpegPath: z.string().min(1).optional(),
        openTimeoutMs: z.number().int().min(100).max(60_000).default(3_000),
        readTimeoutMs: z.number().int().min(100).max(60_000).default(5_000),
        maxQueuedBlocks: z.number().int().min(1).max(1_024).default(8),
      })
      .default({}),
    server: z
      .object({
        host: z.string().min(1).default('0.0.0.0'),
        httpPort: portSchema.default(5_000),
        wsPort: portSchema.default(8_765),
        wsPath: z.string().startsWith('/').default('/'),
        staticDir: z.string().min(1).default('public'),
      })
      .default({}),
    delivery: z
      .object({
        sendTimeoutMs: z.number().int().min(10).max(60_000).default(1_000),
        maxPendingBytes: z.number().int().min(4 * 1024).max(64 * 1024 * 1024).default(256 * 1024),
        closeTimeoutMs: z.number().int().min(10).max(60_000).default(1_000),
      })
      .default({}),
  })
  .superRefine((config, ctx) => {
    const blockBytes = bytesPerBlock(config.audio);
    if (config.delivery.maxPendingBytes < blockBytes) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['delivery', 'maxPendingBytes'],
        message: `must hold at least one block (${blockBytes} bytes)`,
      });
    }
  });

export type AppConfig = z.infer<typeof configSchema>;

type Section = keyof AppConfig;

const ENV_OVERRIDES: ReadonlyArray<{ env: string; section: Section; key: string }> = [
  { env: 'SAMPLE_RATE', section: 'audio', key: 'sampleRate' },
  { env: 'CHANNELS', section: 'audio', key: 'channels' },
  { env: 'BLOCK_SIZE', section: 'audio', key: 'blockSize' },
  { env: 'CAPTURE_DEVICE', section: 'audio', key: 'deviceIndex' },
  { env: 'CAPTURE_FORMAT', section: 'capture', key: 'inputFormat' },
  { env: 'FFMPEG_PATH', section: 'capture', key: 'ffmpegPath' },
  { env: 'HOST', section: 'server', key: 'host' },
  { env: 'HTTP_PORT', section: 'server', key: 'httpPort' },
  { env: 'WS_PORT', section: 'server', key: 'wsPort' },
];

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

async function readConfigFile(configPath: string): Promise<Record<string, unknown>> {
  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch (error) {
    if (isRecord(error) && error.code === 'ENOENT') {
      return {};
    }
    throw error;
  }
  const parsed: unknown = JSON.parse(raw);
  if (!isRecord(parsed)) {
    throw new Error(`${configPath}: expected a JSON object`);
  }
  return parsed;
}

export function applyEnvOverrides(
  raw: Record<string, unknown>,
  env: NodeJS.ProcessEnv
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...raw };
  for (const { env: name, section, key } of ENV_OVERRIDES) {
    const value = env[name]?.trim();
    if (!value) continue;
    const current = merged[section];
    merged[section] = { ...(isRecord(current) ? current : {}), [key]: value };
  }
  return merged;
}

export function parseConfig(raw: unknown): AppConfig {
  return configSchema.parse(raw);
}

let cachedConfig: AppConfig | null = null;

export async function loadConfig(
  configPath = path.resolve('config.json'),
  env: NodeJS.ProcessEnv = process.env
): Promise<AppConfig> {
  if (cachedConfig) {
    return cachedConfig;
  }
  const fileConfig = await readConfigFile(configPath);
  const config = parseConfig(applyEnvOverrides(fileConfig, env));
  cachedConfig = config;
  return config;
}

export function reloadConfig(): void {
  cachedConfig = null;
}
