import { isProviderName, type ProviderName } from './base.js';
import { DEFAULT_CATALOG, type AliasListing, type ProviderCatalogEntry } from './catalog.js';

export interface ProviderDescriptor {
  readonly name: ProviderName;
  readonly baseUrl: string;
  readonly listing: AliasListing;
  readonly modelAliases: ReadonlyMap<string, string>;
}

export interface RegistryOverrides {
  baseUrls?: Partial<Record<ProviderName, string>>;
}

/**
 * Read-only table of known providers and their model aliases.
 * Built once at startup and shared by every gateway call.
 */
export class ProviderRegistry {
  private readonly descriptors: ReadonlyMap<ProviderName, ProviderDescriptor>;

  constructor(entries: readonly ProviderCatalogEntry[], overrides: RegistryOverrides = {}) {
    const descriptors = new Map<ProviderName, ProviderDescriptor>();
    for (const entry of entries) {
      const baseUrl = overrides.baseUrls?.[entry.name] ?? entry.baseUrl;
      descriptors.set(
        entry.name,
        Object.freeze({
          name: entry.name,
          baseUrl: baseUrl.replace(/\/+$/, ''),
          listing: entry.listing,
          modelAliases: new Map(entry.models),
        })
      );
    }
    this.descriptors = descriptors;
    Object.freeze(this);
  }

  descriptor(provider: string): ProviderDescriptor | undefined {
    return isProviderName(provider) ? this.descriptors.get(provider) : undefined;
  }

  /**
   * Map an alias to the literal model id the provider expects.
   * Literal ids and uncatalogued names pass through unchanged.
   */
  resolveModel(provider: string, alias: string): string {
    const aliases = this.descriptor(provider)?.modelAliases;
    if (!aliases) {
      return alias;
    }
    for (const modelId of aliases.values()) {
      if (modelId === alias) {
        return alias;
      }
    }
    return aliases.get(alias) ?? alias;
  }

  listProviders(): ProviderName[] {
    return [...this.descriptors.keys()];
  }

  /**
   * openai and anthropic expose their friendly aliases; the others expose
   * literal model ids. Clients depend on this difference.
   */
  listModelAliases(provider: string): string[] {
    const descriptor = this.descriptor(provider);
    if (!descriptor) {
      return [];
    }
    const names =
      descriptor.listing === 'aliases'
        ? descriptor.modelAliases.keys()
        : descriptor.modelAliases.values();
    return [...new Set(names)];
  }

  getModelInfo(provider: string): Record<string, string> {
    const descriptor = this.descriptor(provider);
    return descriptor ? Object.fromEntries(descriptor.modelAliases) : {};
  }
}

export function createRegistry(overrides?: RegistryOverrides): ProviderRegistry {
  return new ProviderRegistry(DEFAULT_CATALOG, overrides);
}
