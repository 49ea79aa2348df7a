import type { CredentialSource } from './gateway.js';
import type { ProviderName } from './providers/base.js';
import type { ProviderRegistry } from './providers/registry.js';

export interface ModelCatalog {
  providers: ProviderName[];
  models: Record<string, string[]>;
}

export interface ProviderHealth {
  available: boolean;
  models: string[];
  status: 'operational';
  credentials: 'configured' | 'missing';
}

export function buildModelCatalog(registry: ProviderRegistry): ModelCatalog {
  const providers = registry.listProviders();
  const models: Record<string, string[]> = {};
  for (const provider of providers) {
    models[provider] = registry.listModelAliases(provider);
  }
  return { providers, models };
}

/**
 * Static per-provider report; no provider is contacted.
 */
export function buildHealthReport(
  registry: ProviderRegistry,
  credentials: CredentialSource
): Record<string, ProviderHealth> {
  const report: Record<string, ProviderHealth> = {};
  for (const provider of registry.listProviders()) {
    report[provider] = {
      available: true,
      models: registry.listModelAliases(provider),
      status: 'operational',
      credentials: credentials(provider) ? 'configured' : 'missing',
    };
  }
  return report;
}
