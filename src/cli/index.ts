#!/usr/bin/env node
import { createProgram } from './program.js';
import { createEnterPrompt } from './prompt.js';
import { createCrawlReporter } from './reporter.js';
import { orchestrateBackup } from '../core/index.js';
import { getLogger } from '../utils/logger.js';
import { EXIT_SUCCESS, handleError, InterruptedError, reportError } from '../utils/errors.js';
import type { CliOptions } from './types.js';

function run(): void {
  const controller = new AbortController();
  const interrupt = () => {
    if (!controller.signal.aborted) {
      controller.abort(new InterruptedError());
    }
  };
  process.once('SIGINT', interrupt);

  const program = createProgram(async (username: string, options: CliOptions) => {
    const logger = getLogger();
    logger.setVerbose(options.verbose ?? false);

    logger.debug('Parsed CLI arguments:');
    logger.debug(`  Username: ${username}`);
    logger.debug(`  Output root: ${options.outRoot}`);
    logger.debug(`  Credential file: ${options.creds}`);
    logger.debug(`  Timeout: ${options.timeoutMs}ms`);
    logger.debug(`  Delay: ${options.delayMs}ms`);
    logger.debug(`  Max "Show More" attempts: ${options.maxAttempts}`);
    if (options.maxPhotos) {
      logger.debug(`  Max photos: ${options.maxPhotos}`);
    }
    if (options.headless) {
      logger.debug('  Headless mode: enabled');
    }

    try {
      await orchestrateBackup(username, {
        outRoot: options.outRoot,
        credentialsPath: options.creds,
        maxPhotos: options.maxPhotos,
        delayMs: options.delayMs,
        timeoutMs: options.timeoutMs,
        maxLoadMoreAttempts: options.maxAttempts,
        headless: options.headless,
        awaitOperatorSignal: createEnterPrompt(interrupt),
        onEvent: createCrawlReporter(logger),
        signal: controller.signal,
      });
    } catch (error) {
      process.exit(reportError(controller.signal.aborted ? new InterruptedError() : error));
    }

    process.exit(EXIT_SUCCESS);
  });

  program.parseAsync(process.argv).catch(handleError);
}

run();
