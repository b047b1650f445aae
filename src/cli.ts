import * as readline from 'node:readline';

import { describeError, EmptyInputError, isPermanentServiceError } from './errors';
import { isExitCommand } from './pipeline/intake';
import { PipelineHooks } from './pipeline/orchestrator';
import { KnowledgeCatalog } from './store/catalog';
import { Answer } from './types';

export const VERSION = '1.0.0';

export const HELP = `
Knowledge Router v${VERSION}

Usage:
  knowledge-router [options]            Interactive mode
  knowledge-router [options] <query>    Answer a single query

Options:
  --data <path>     Knowledge store JSON (default: $KNOWLEDGE_BASE_PATH or data/knowledge.json)
  --list            List the namespaces in the knowledge store and exit
  --verbose, -V     Show the matched namespace and pipeline states
  --help, -h        Show this help
  --version, -v     Show version

Examples:
  knowledge-router "What is the Pythagorean theorem?"
  knowledge-router --data ./my-knowledge.json --verbose
`;

export const PROMPT = 'Query: ';

export type CliOptions = {
  help: boolean;
  version: boolean;
  list: boolean;
  verbose: boolean;
  dataPath?: string;
  query?: string;
};

export type ParsedArgs =
  | { ok: true; options: CliOptions }
  | { ok: false; error: string };

/**
 * Minimal surface of `Orchestrator` the front end drives.
 */
export interface QueryHandler {
  handle(raw: string): Promise<Answer>;
}

type OutputStream = Pick<NodeJS.WritableStream, 'write'>;

type InteractiveIo = {
  input: NodeJS.ReadableStream;
  output: OutputStream;
};

export const parseArgs = (argv: readonly string[]): ParsedArgs => {
  const options: CliOptions = { help: false, version: false, list: false, verbose: false };
  const words: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--help' || arg === '-h') {
      options.help = true;
    } else if (arg === '--version' || arg === '-v') {
      options.version = true;
    } else if (arg === '--list') {
      options.list = true;
    } else if (arg === '--verbose' || arg === '-V') {
      options.verbose = true;
    } else if (arg.startsWith('--data=')) {
      options.dataPath = arg.slice('--data='.length);
    } else if (arg === '--data') {
      const value = argv[i + 1];
      if (value === undefined) {
        return { ok: false, error: '--data requires a path' };
      }
      options.dataPath = value;
      i++;
    } else if (arg === '--') {
      words.push(...argv.slice(i + 1));
      break;
    } else if (arg.startsWith('-') && arg.length > 1) {
      return { ok: false, error: `Unknown option '${arg}'` };
    } else {
      words.push(arg);
    }
  }

  const query = words.join(' ').trim();
  if (query) {
    options.query = query;
  }

  return { ok: true, options };
};

export const formatAnswer = (answer: Answer, verbose = false): string => {
  const lines: string[] = [];

  if (verbose) {
    lines.push(`Matching Namespace: ${answer.sourceNamespaceId ?? 'none'}`);
    if (answer.diagnostic) {
      lines.push(`Diagnostic: ${answer.diagnostic}`);
    }
  }

  lines.push(answer.text);

  return `${lines.join('\n')}\n`;
};

export const formatCatalog = (catalog: KnowledgeCatalog): string =>
  catalog
    .descriptors()
    .map((descriptor) => `${descriptor.id}  ${descriptor.label} - ${descriptor.summary}\n`)
    .join('');

export const traceTransitions = (output: OutputStream): PipelineHooks => ({
  onTransition: (state, { query }) => {
    output.write(`[${query.id}] ${state}\n`);
  },
});

export const runSingleShot = async (
  handler: QueryHandler,
  query: string,
  output: OutputStream,
  verbose = false,
): Promise<number> => {
  try {
    const answer = await handler.handle(query);
    output.write(formatAnswer(answer, verbose));
    return 0;
  } catch (error) {
    if (error instanceof EmptyInputError) {
      output.write(`Error: ${error.message}\n`);
      return 1;
    }
    if (isPermanentServiceError(error)) {
      output.write(`Fatal: ${error.message}\n`);
      return 1;
    }
    throw error;
  }
};

export const runInteractive = async (
  handler: QueryHandler,
  { input, output }: InteractiveIo,
  verbose = false,
): Promise<number> => {
  const rl = readline.createInterface({ input, terminal: false, crlfDelay: Infinity });

  output.write("\nKnowledge Router - Interactive Mode\nType 'exit' to quit\n\n");
  output.write(PROMPT);

  try {
    for await (const line of rl) {
      if (isExitCommand(line)) {
        output.write('Goodbye!\n');
        return 0;
      }

      try {
        const answer = await handler.handle(line);
        output.write(`\n${formatAnswer(answer, verbose)}\n`);
      } catch (error) {
        if (isPermanentServiceError(error)) {
          output.write(`Fatal: ${error.message}\n`);
          return 1;
        }
        if (!(error instanceof EmptyInputError)) {
          output.write(`Error: ${describeError(error)}\n\n`);
        }
      }

      output.write(PROMPT);
    }
  } finally {
    rl.close();
  }

  // End of input.
  output.write('\nGoodbye!\n');
  return 0;
};
