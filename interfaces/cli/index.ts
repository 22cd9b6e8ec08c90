#!/usr/bin/env node
/**
 * scrkb entry point: builds the configuration, logger and extractors once
 * and hands them to the command tree.
 */

import path from 'path';
import { describeError, isScrKbError } from '../../shared/domain/errors.js';
import { ScrKbConfig, ensureDirectories, loadConfig } from '../../shared/infrastructure/config.js';
import { ContentExtractors } from '../../shared/infrastructure/ContentExtractor.js';
import { HtmlContentExtractor } from '../../shared/infrastructure/HtmlContentExtractor.js';
import { HttpClient } from '../../shared/infrastructure/HttpClient.js';
import { Logger, parseLogLevel } from '../../shared/infrastructure/logging.js';
import { PdfContentExtractor } from '../../shared/infrastructure/PdfContentExtractor.js';
import { withKnowledgeRepository } from '../../shared/infrastructure/repositories/SqliteKnowledgeRepository.js';
import { buildProgram } from './program.js';

function createLogger(config: ScrKbConfig): Logger {
  return new Logger({
    minLevel: parseLogLevel(config.logLevel),
    logDir: config.logToFile ? path.join(config.dataDir, 'logs') : undefined
  });
}

function createExtractors(config: ScrKbConfig, logger: Logger): ContentExtractors {
  const httpClient = new HttpClient(logger, {
    timeout: config.extraction.fetchTimeoutMs,
    userAgent: config.extraction.userAgent
  });
  return {
    pdf: new PdfContentExtractor(logger, { maxPages: config.extraction.maxPdfPages }),
    html: new HtmlContentExtractor(httpClient, logger, { maxLinks: config.extraction.maxLinks })
  };
}

async function main(argv: string[]): Promise<void> {
  const config = loadConfig();
  ensureDirectories(config);
  const logger = createLogger(config);

  const program = buildProgram({
    config,
    logger,
    extractors: createExtractors(config, logger),
    withRepository: work => withKnowledgeRepository(config.databasePath, logger, work),
    print: line => process.stdout.write(`${line}\n`),
    setExitCode: code => {
      process.exitCode = code;
    }
  });

  await program.parseAsync(argv);
}

main(process.argv).catch((error: unknown) => {
  const prefix = isScrKbError(error) ? `[${error.errorCode}] ` : '';
  process.stderr.write(`Error: ${prefix}${describeError(error)}\n`);
  process.exitCode = 1;
});
