import { Command, CommanderError } from 'commander';

import { createListModelsCommand } from '../commands/listModels';
import { createTranslateCommand } from '../commands/translate';
import type { TranslateCommandOptions } from '../commands/translate';
import { APP_DESCRIPTION, APP_NAME, APP_VERSION } from '../constants/app';
import { FetchTransport } from '../services/HttpTransport';
import type { HttpTransport } from '../services/HttpTransport';
import { getModelRegistry } from '../services/ModelRegistry';
import { PromptResolver } from '../services/PromptResolver';
import { RequestResolver } from '../services/RequestResolver';
import { TranslationClient } from '../services/TranslationClient';
import { getCliConfiguration } from '../utils/config';
import type { Environment } from '../utils/config';
import { CliLogger } from '../utils/logger';
import type { LogSink } from '../utils/logger';

export interface CliDependencies {
  env: Environment;
  stdout: LogSink;
  stderr: LogSink;
  transport?: HttpTransport;
  cwd?: string;
}

type ProgramOptions = TranslateCommandOptions & {
  listModels?: boolean;
  verbose?: boolean;
};

function buildProgram(defaultModel: string, deps: CliDependencies): Command {
  return new Command()
    .name(APP_NAME)
    .description(APP_DESCRIPTION)
    .version(APP_VERSION, '-V, --version')
    .argument('[text]', 'text to translate')
    .option('-m, --model <model>', 'model used for the translation', defaultModel)
    .option('-u, --url <url>', 'custom API endpoint URL (skips model validation)')
    .option('-k, --key <key>', 'API key; overrides the provider environment variable')
    .option('-p, --prompt <prompt>', 'custom translation instructions')
    .option('--prompt-file <path>', 'read the translation instructions from a file')
    .option('--list-models', 'list all supported models and their URLs')
    .option('--verbose', 'print diagnostic logs to stderr')
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({
      writeOut: (chunk) => {
        deps.stdout.write(chunk);
      },
      writeErr: (chunk) => {
        deps.stderr.write(chunk);
      },
    });
}

/** Parses `argv` (node-style, including the executable and script) and returns the exit code. */
export async function runCli(argv: readonly string[], deps: CliDependencies): Promise<number> {
  const configuration = getCliConfiguration(deps.env);
  const program = buildProgram(configuration.defaultModel, deps);

  try {
    await program.parseAsync([...argv]);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  const options = program.opts<ProgramOptions>();
  const text = program.args.length > 0 ? program.args[0] : undefined;
  const language = configuration.language;
  const logger = new CliLogger(deps.stderr, options.verbose ? 'info' : configuration.logLevel);
  const registry = getModelRegistry();

  if (options.listModels) {
    return createListModelsCommand(registry, deps.stdout, { language })();
  }

  const translate = createTranslateCommand({
    configuration,
    resolver: new RequestResolver({ env: deps.env, registry, language }),
    promptResolver: new PromptResolver(logger, { cwd: deps.cwd, language }),
    client: new TranslationClient(
      deps.transport ?? new FetchTransport(configuration.timeoutMs),
      logger,
      { language },
    ),
    logger,
    stdout: deps.stdout,
    stderr: deps.stderr,
  });

  return translate(text, options);
}
