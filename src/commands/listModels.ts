import { localize } from '../i18n/localize';
import { ModelRegistry } from '../services/ModelRegistry';
import type { LogSink } from '../utils/logger';

export function formatModelList(registry: ModelRegistry, options?: { language?: string }): string {
  const lines = ['', localize('listModels.heading', undefined, options)];

  for (const group of registry.groupedByProvider()) {
    lines.push('', `${group.provider} (${group.url}):`);
    lines.push(...group.models.map((model) => `  - ${model}`));
  }

  lines.push('', localize('listModels.usage', undefined, options));
  return `${lines.join('\n')}\n`;
}

export function createListModelsCommand(
  registry: ModelRegistry,
  output: LogSink,
  options?: { language?: string },
): () => number {
  return () => {
    output.write(formatModelList(registry, options));
    return 0;
  };
}
