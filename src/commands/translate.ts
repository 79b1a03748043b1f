import { localize } from '../i18n/localize';
import { PromptResolver } from '../services/PromptResolver';
import { RequestResolver } from '../services/RequestResolver';
import { TranslationClient } from '../services/TranslationClient';
import { TranslatorError } from '../services/TranslatorError';
import type { CliConfiguration } from '../types/config';
import { CliLogger } from '../utils/logger';
import type { LogSink } from '../utils/logger';

export type TranslateCommandOptions = {
  model: string;
  url?: string;
  key?: string;
  prompt?: string;
  promptFile?: string;
};

export interface TranslateCommandDependencies {
  configuration: CliConfiguration;
  resolver: RequestResolver;
  promptResolver: PromptResolver;
  client: TranslationClient;
  logger: CliLogger;
  stdout: LogSink;
  stderr: LogSink;
}

export function createTranslateCommand(
  deps: TranslateCommandDependencies,
): (text: string | undefined, options: TranslateCommandOptions) => Promise<number> {
  const { configuration, resolver, promptResolver, client, logger, stdout, stderr } = deps;
  const language = configuration.language;

  const report = (error: unknown): void => {
    if (error instanceof TranslatorError) {
      logger.info(`Translation aborted: ${error.kind}.`);
      stderr.write(
        `${localize('cli.error', { message: error.message }, { language })}\n\n` +
          `${localize('cli.hint', { message: error.userFriendlyMessage }, { language })}\n`,
      );
      return;
    }

    logger.error('Unexpected failure while translating.', error);
    const message = error instanceof Error ? error.message : String(error);
    stderr.write(`${localize('cli.error', { message }, { language })}\n`);
  };

  return async (text, options) => {
    const { model, url, key } = options;

    try {
      resolver.validate({ text, model, url, key });

      const prompt = await promptResolver.resolve({
        prompt: options.prompt,
        promptFile: options.promptFile ?? configuration.promptFile,
      });
      const request = resolver.resolve({ text, model, url, key, prompt: prompt.instructions });

      logger.info(
        `Translating with model ${request.model} via ${request.provider} (${request.dialect} API, prompt source: ${prompt.source}).`,
      );

      const result = await client.translate(request);
      stdout.write(`${result.text}\n`);
      return 0;
    } catch (error) {
      report(error);
      return 1;
    }
  };
}
