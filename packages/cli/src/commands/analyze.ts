// packages/cli/src/commands/analyze.ts — Analyze one document

import { resolve } from 'node:path';

import {
  AnalysisController,
  type ConfigOverrides,
  EventBus,
  GeminiModel,
  VERSION,
  createLogger,
  errorMessage,
  formatCost,
  loadConfig,
  resolveApiKey,
  writeReport,
} from '@docsift/core';
import chalk from 'chalk';
import type { Command } from 'commander';

import { askForDocumentPath } from '../prompts.js';
import {
  createEventRenderer,
  describeFailure,
  exitCodeFor,
  printAnalysis,
  printBanner,
} from '../render.js';
import { normalizeInputPath } from '../utils.js';

export interface AnalyzeOptions {
  maxChars?: number;
  maxAttempts?: number;
  backoff?: number;
  model?: string;
  outputDir?: string;
  save?: boolean;
  json?: boolean;
}

/** CLI flags as config overrides. Unset flags leave file settings alone. */
export function buildOverrides(options: AnalyzeOptions): ConfigOverrides {
  return {
    model: { name: options.model },
    analysis: { maxChars: options.maxChars },
    retry: { maxAttempts: options.maxAttempts, backoffBaseSeconds: options.backoff },
    output: { dir: options.outputDir, save: options.save === false ? false : undefined },
  };
}

export async function analyzeCommand(
  file: string | undefined,
  options: AnalyzeOptions,
  command: Command,
): Promise<void> {
  const { verbose } = command.optsWithGlobals<{ verbose?: boolean }>();
  const exitCode = await runAnalysis(file, options, verbose ?? false);
  if (exitCode !== 0) {
    process.exit(exitCode);
  }
}

/** Run one analysis end to end and return the process exit code. */
async function runAnalysis(
  file: string | undefined,
  options: AnalyzeOptions,
  verbose: boolean,
): Promise<number> {
  try {
    printBanner(VERSION);

    const sourcePath = normalizeInputPath(file ?? (await askForDocumentPath()));
    if (!sourcePath) {
      console.error(chalk.red('No file specified. Exiting.'));
      return 1;
    }

    const config = loadConfig({ overrides: buildOverrides(options) });
    const logger = createLogger(verbose ? 'debug' : config.advanced.logLevel, 'analyze');
    logger.debug(
      `model=${config.model.name} maxChars=${config.analysis.maxChars} ` +
        `maxAttempts=${config.retry.maxAttempts} backoff=${config.retry.backoffBaseSeconds}s`,
    );

    const model = new GeminiModel({ apiKey: resolveApiKey(config), model: config.model.name });
    const eventBus = new EventBus();
    const renderer = createEventRenderer();
    eventBus.on('event', (event) => renderer.render(event));

    const controller = AnalysisController.fromConfig(config, { model, eventBus, logger });
    const result = await controller.analyzeFile(sourcePath);
    renderer.stop();

    if (result.kind !== 'success') {
      const [headline, ...details] = describeFailure(result);
      console.error(chalk.red(`\n${headline}`));
      for (const line of details) console.error(chalk.yellow(line));
      return exitCodeFor(result);
    }

    if (options.json) {
      console.log(
        JSON.stringify(
          {
            sourcePath,
            format: result.document.format,
            truncated: result.document.truncated,
            attempts: result.attempts,
            tokenCount: result.tokenCount,
            estimatedCost: result.estimatedCost,
            analysis: result.text,
          },
          null,
          2,
        ),
      );
    } else {
      printAnalysis(result.text);
    }

    if (config.output.save) {
      const reportPath = writeReport(result.text, sourcePath, {
        outputDir: resolve(config.output.dir),
      });
      console.error(chalk.green(`\nAnalysis saved to: ${reportPath}`));
    }

    console.error(
      chalk.dim(`Tokens: ${result.tokenCount} | Cost: ${formatCost(result.estimatedCost)}`),
    );
    return 0;
  } catch (error) {
    console.error(chalk.red(`Error: ${errorMessage(error)}`));
    return 1;
  }
}
