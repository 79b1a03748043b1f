import { readFile } from 'fs/promises';
import { resolve as resolvePath } from 'path';

import { DEFAULT_TRANSLATION_PROMPT } from '../constants/prompts';
import type { TranslationPrompt } from '../types/translation';
import { CliLogger } from '../utils/logger';
import { TranslatorError } from './TranslatorError';

export interface PromptSources {
  prompt?: string;
  promptFile?: string;
}

export interface ResolvedPrompt extends TranslationPrompt {
  path?: string;
}

/**
 * Picks the translation instructions: an explicit `--prompt` wins, then a
 * prompt file, then the built-in default. An empty file falls back to the
 * default with a warning.
 */
export class PromptResolver {
  constructor(
    private readonly logger: CliLogger,
    private readonly options: { cwd?: string; language?: string } = {},
  ) {}

  async resolve(sources: PromptSources): Promise<ResolvedPrompt> {
    if (sources.prompt !== undefined && sources.prompt.trim()) {
      return this.createPrompt(sources.prompt, 'option');
    }

    if (sources.promptFile) {
      const filePrompt = await this.readPromptFile(sources.promptFile);

      if (filePrompt) {
        return filePrompt;
      }
    }

    return this.createPrompt(DEFAULT_TRANSLATION_PROMPT, 'default');
  }

  private async readPromptFile(file: string): Promise<ResolvedPrompt | undefined> {
    const path = resolvePath(this.options.cwd ?? process.cwd(), file);
    let raw: string;

    try {
      raw = await readFile(path, 'utf8');
    } catch (error) {
      this.logger.error(`Failed to read translation prompt from ${path}.`, error);
      throw new TranslatorError(
        { kind: 'validation', field: 'prompt-file', expected: 'a readable file', actual: path },
        { language: this.options.language, cause: error },
      );
    }

    if (!raw.trim()) {
      this.logger.warn(`Translation prompt file ${path} is empty. Falling back to the default prompt.`);
      return undefined;
    }

    this.logger.info(`Using translation prompt from ${path}.`);
    return this.createPrompt(raw, 'file', path);
  }

  private createPrompt(
    rawInstructions: string,
    source: TranslationPrompt['source'],
    path?: string,
  ): ResolvedPrompt {
    return {
      instructions: rawInstructions.trim(),
      source,
      path,
    };
  }
}
