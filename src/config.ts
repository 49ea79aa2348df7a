import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { parse } from 'yaml';
import { z } from 'zod';
import { Gateway, type CredentialSource, type HttpTransport } from './gateway.js';
import { PROVIDER_NAMES, type ProviderName } from './providers/base.js';
import { API_KEY_ENV } from './providers/catalog.js';
import { createRegistry, type ProviderRegistry } from './providers/registry.js';
import { DEFAULT_PACING_MS } from './providers/simulated.js';

const ProviderSettingsSchema = z.object({
  apiKey: z.string().optional(),
  baseUrl: z.string().url().optional(),
});

const ConfigSchema = z.object({
  defaultProvider: z.enum(PROVIDER_NAMES).default('openai'),
  defaultModel: z.string().min(1).default('gpt-4o-mini'),
  providers: z
    .object({
      openai: ProviderSettingsSchema.optional(),
      anthropic: ProviderSettingsSchema.optional(),
      deepseek: ProviderSettingsSchema.optional(),
      gemini: ProviderSettingsSchema.optional(),
      mistral: ProviderSettingsSchema.optional(),
    })
    .default({}),
  streaming: z
    .object({
      pacingMs: z.number().int().min(0).default(DEFAULT_PACING_MS),
    })
    .default({}),
  server: z
    .object({
      host: z.string().default('127.0.0.1'),
      port: z.number().int().min(0).max(65535).default(8787),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

export interface LoadedConfig {
  settings: Config;
  configPath: string;
  registry: ProviderRegistry;
  credentials: CredentialSource;
  gateway: Gateway;
}

export interface LoadConfigOptions {
  configPath?: string;
  fetch?: HttpTransport;
}

export function defaultConfigPath(): string {
  return process.env.CHATGATE_CONFIG || join(homedir(), '.chatgate', 'config.yaml');
}

export function configExists(configPath: string = defaultConfigPath()): boolean {
  return existsSync(configPath);
}

/**
 * Parse and validate raw config data (as read from YAML).
 */
export function parseConfig(raw: unknown): Config {
  const result = ConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  ${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid config file format:\n${issues}`);
  }
  return result.data;
}

/**
 * Configured key first, then the provider's environment variable. Evaluated
 * at call time.
 */
export function createCredentialSource(settings: Config): CredentialSource {
  return (provider: ProviderName) =>
    settings.providers[provider]?.apiKey || process.env[API_KEY_ENV[provider]] || undefined;
}

export function buildFromSettings(
  settings: Config,
  options: Omit<LoadConfigOptions, 'configPath'> = {}
): Omit<LoadedConfig, 'configPath'> {
  const baseUrls: Partial<Record<ProviderName, string>> = {};
  for (const name of PROVIDER_NAMES) {
    const baseUrl = settings.providers[name]?.baseUrl;
    if (baseUrl) {
      baseUrls[name] = baseUrl;
    }
  }

  const registry = createRegistry({ baseUrls });
  const credentials = createCredentialSource(settings);
  const gateway = new Gateway({
    registry,
    credentials,
    fetch: options.fetch,
    pacingMs: settings.streaming.pacingMs,
  });

  return { settings, registry, credentials, gateway };
}

export function loadConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const configPath = options.configPath ?? defaultConfigPath();

  let raw: unknown = {};
  if (existsSync(configPath)) {
    const content = readFileSync(configPath, 'utf-8');
    try {
      raw = parse(content);
    } catch (error) {
      throw new Error(
        `Error parsing config file ${configPath}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  return { configPath, ...buildFromSettings(parseConfig(raw), options) };
}
