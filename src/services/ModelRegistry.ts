import {
  MODEL_ENDPOINTS,
  PROVIDER_CREDENTIAL_URLS,
  PROVIDER_ENV_VARS,
  PROVIDER_HOSTS,
} from '../constants/models';
import type { ModelConfig, ModelGroup, ProviderName } from '../types/translation';

function compareOrdinal(left: string, right: string): number {
  if (left < right) {
    return -1;
  }

  return left > right ? 1 : 0;
}

/**
 * Read-only lookup table of the models the CLI knows how to reach.
 *
 * Names are matched exactly: no case folding, no trimming.
 */
export class ModelRegistry {
  private readonly urlsByModel: ReadonlyMap<string, string>;
  private readonly sortedModels: readonly ModelConfig[];

  constructor(entries: ReadonlyArray<readonly [string, string]> = MODEL_ENDPOINTS) {
    const urls = new Map<string, string>();

    for (const [model, url] of entries) {
      if (urls.has(model)) {
        throw new Error(`Duplicate model '${model}' in registry table.`);
      }
      urls.set(model, url);
    }

    this.urlsByModel = urls;
    this.sortedModels = Object.freeze(
      Array.from(urls, ([name, url]) =>
        Object.freeze({ name, url, provider: ModelRegistry.providerForUrl(url) }),
      ).sort(
        (a, b) => compareOrdinal(a.provider, b.provider) || compareOrdinal(a.name, b.name),
      ),
    );
  }

  lookupUrl(model: string): string | undefined {
    return this.urlsByModel.get(model);
  }

  /** Accepts either a registered model name or an endpoint URL. */
  lookupProvider(modelOrUrl: string): ProviderName {
    const url = this.lookupUrl(modelOrUrl) ?? modelOrUrl;
    return ModelRegistry.providerForUrl(url);
  }

  isModelSupported(model: string): boolean {
    return this.urlsByModel.has(model);
  }

  allModels(): readonly ModelConfig[] {
    return this.sortedModels;
  }

  supportedModelNames(): string[] {
    return this.sortedModels.map((model) => model.name);
  }

  groupedByProvider(): ModelGroup[] {
    const groups: ModelGroup[] = [];

    for (const model of this.sortedModels) {
      const current = groups[groups.length - 1];

      if (current && current.provider === model.provider) {
        groups[groups.length - 1] = { ...current, models: [...current.models, model.name] };
      } else {
        groups.push({ provider: model.provider, url: model.url, models: [model.name] });
      }
    }

    return groups;
  }

  envVarForModel(model: string): string | undefined {
    return PROVIDER_ENV_VARS[this.lookupProvider(model)];
  }

  /** Like `lookupProvider`, but reports `'Unknown'` for names outside the table. */
  modelProvider(model: string): ProviderName | 'Unknown' {
    return this.isModelSupported(model) ? this.lookupProvider(model) : 'Unknown';
  }

  credentialUrlFor(provider: ProviderName): string | undefined {
    return PROVIDER_CREDENTIAL_URLS[provider];
  }

  private static providerForUrl(url: string): ProviderName {
    for (const [host, provider] of PROVIDER_HOSTS) {
      if (url.includes(host)) {
        return provider;
      }
    }

    return 'Other';
  }
}

let sharedRegistry: ModelRegistry | undefined;

export function getModelRegistry(): ModelRegistry {
  sharedRegistry ??= new ModelRegistry();
  return sharedRegistry;
}
