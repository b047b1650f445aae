#!/usr/bin/env node
import dotenv from 'dotenv';

import {
  formatCatalog,
  HELP,
  parseArgs,
  runInteractive,
  runSingleShot,
  traceTransitions,
  VERSION,
} from './cli';
import { loadConfig, loadKnowledgeBasePath } from './config';
import { describeError, PipelineError } from './errors';
import { createGenerationClient } from './llm/client';
import { Orchestrator } from './pipeline/orchestrator';
import { loadCatalog } from './store/catalog';

export const main = async (argv: string[] = process.argv.slice(2)): Promise<number> => {
  const parsed = parseArgs(argv);

  if (!parsed.ok) {
    console.error(`Error: ${parsed.error}`);
    console.log(HELP);
    return 1;
  }

  const { options } = parsed;

  if (options.help) {
    console.log(HELP);
    return 0;
  }

  if (options.version) {
    console.log(VERSION);
    return 0;
  }

  try {
    const catalog = loadCatalog(options.dataPath ?? loadKnowledgeBasePath());

    if (options.list) {
      process.stdout.write(formatCatalog(catalog));
      return 0;
    }

    const config = loadConfig();

    const orchestrator = new Orchestrator(
      catalog,
      createGenerationClient(config),
      options.verbose ? traceTransitions(process.stdout) : {},
    );

    if (options.query) {
      return await runSingleShot(orchestrator, options.query, process.stdout, options.verbose);
    }

    return await runInteractive(orchestrator, { input: process.stdin, output: process.stdout }, options.verbose);
  } catch (error) {
    if (error instanceof PipelineError) {
      console.error(`Error: ${error.message}`);
      return 1;
    }
    throw error;
  }
};

if (require.main === module) {
  dotenv.config();

  process.once('SIGINT', () => {
    process.stdout.write('\nGoodbye!\n');
    process.exit(0);
  });

  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error('Unexpected failure:', describeError(error));
      process.exitCode = 1;
    });
}
