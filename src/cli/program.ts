// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * CLI Program
 *
 * Commands of the docqa shell. Each command resolves configuration, builds
 * a DocumentQA and prints through the output helpers.
 */

import { createInterface } from 'readline';
import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { DocumentQA } from '../app.js';
import {
  initConfig,
  loadConfigFile,
  loadWorkspaceConfig,
  mergeConfig,
  validateConfig,
  type CLIOptions,
  type ResolvedConfig,
  type WorkspaceConfig,
} from '../config/index.js';
import { formatError, toError } from '../errors.js';
import { LogLevel, logger, parseLogLevel } from '../logger.js';
import type { RetrievedDocument } from '../rag/types.js';
import { spinner } from '../spinner.js';
import { VERSION } from '../version.js';
import { formatAnswer, formatChatBanner, formatIndexSummary, formatSources } from './output.js';

/** Words that leave the chat loop */
export const EXIT_WORDS = ['quit', 'exit', 'q'];

interface GlobalOptions {
  config?: string;
  mode?: string;
  indexName?: string;
  indexDir?: string;
  backend?: string;
  provider?: string;
  model?: string;
  embeddingProvider?: string;
  embeddingModel?: string;
  verbose?: boolean;
  debug?: boolean;
  trace?: boolean;
}

interface AnswerOptions {
  stream?: boolean;
  sources: boolean;
}

/**
 * Parse a positive integer option value.
 */
export function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

/**
 * Resolve configuration from the workspace file, environment and CLI options.
 */
export function resolveConfig(global: GlobalOptions, overrides: CLIOptions = {}, cwd: string = process.cwd()): ResolvedConfig {
  let workspace: WorkspaceConfig | null;
  let configPath: string | null;
  if (global.config) {
    workspace = loadConfigFile(global.config);
    configPath = global.config;
  } else {
    ({ config: workspace, configPath } = loadWorkspaceConfig(cwd));
  }

  if (workspace && configPath) {
    logger.verbose(`Loaded config from ${configPath}`);
    for (const warning of validateConfig(workspace)) {
      logger.warn(`${configPath}: ${warning}`);
    }
  }

  return mergeConfig(workspace, {
    mode: global.mode,
    indexName: global.indexName,
    indexDir: global.indexDir,
    backend: global.backend,
    provider: global.provider,
    model: global.model,
    embeddingProvider: global.embeddingProvider,
    embeddingModel: global.embeddingModel,
    ...overrides,
  });
}

/**
 * Run a command action, printing failures and setting the exit code.
 */
async function run(action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (error) {
    spinner.stop();
    console.error(formatError(toError(error)));
    process.exitCode = 1;
  }
}

/**
 * Ask a yes/no question on the terminal.
 */
function confirm(message: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  return new Promise((resolve) => {
    rl.question(`${message} [y/N] `, (answer) => {
      rl.close();
      resolve(/^y(es)?$/i.test(answer.trim()));
    });
  });
}

/**
 * Answer one question, complete or streamed.
 */
async function answerQuestion(qa: DocumentQA, question: string, options: AnswerOptions): Promise<void> {
  spinner.thinking(qa.getMode().name);

  if (!options.stream) {
    const result = await qa.query(question);
    spinner.stop();
    console.log(formatAnswer(result, options.sources));
    return;
  }

  // Ctrl+C stops the stream instead of the process
  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort();
  process.once('SIGINT', onInterrupt);

  let documents: RetrievedDocument[] = [];
  const startTime = Date.now();
  try {
    let started = false;
    const stream = qa.streamQuery(question, {
      signal: controller.signal,
      onRetrieved: (retrieved) => {
        documents = retrieved;
      },
    });
    for await (const fragment of stream) {
      if (!started) {
        spinner.stop();
        console.log(chalk.bold('Answer:'));
        started = true;
      }
      process.stdout.write(fragment);
    }
  } finally {
    process.removeListener('SIGINT', onInterrupt);
    spinner.stop();
  }

  process.stdout.write('\n\n');
  console.log(chalk.dim(`Latency: ${((Date.now() - startTime) / 1000).toFixed(2)}s, ${documents.length} documents retrieved`));
  if (options.sources) {
    console.log(formatSources(documents));
  }
}

/**
 * Build the docqa command-line program.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('docqa')
    .description('Ask questions about your documents')
    .version(VERSION, '-v, --version', 'Output the current version')
    .option('-c, --config <path>', 'Config file (default: .docqa.json in the current directory)')
    .option('--mode <name>', 'Execution mode (standard, fast)')
    .option('--index-name <name>', 'Vector index name')
    .option('--index-dir <path>', 'Directory holding local indexes')
    .option('--backend <name>', 'Index backend (vectra, memory)')
    .option('-p, --provider <type>', 'Generation provider (openai, anthropic, ollama, mock)')
    .option('-m, --model <name>', 'Generation model (overrides the mode default)')
    .option('--embedding-provider <type>', 'Embedding provider (openai, ollama)')
    .option('--embedding-model <name>', 'Embedding model')
    .option('--verbose', 'Show pipeline stages with timing')
    .option('--debug', 'Show provider calls and batch details')
    .option('--trace', 'Show full prompts and answers')
    .hook('preAction', () => {
      const level = parseLogLevel(program.opts<GlobalOptions>());
      logger.setLevel(level);
      // Spinners interfere with verbose output
      if (level > LogLevel.NORMAL) {
        spinner.setEnabled(false);
      }
    });

  program
    .command('index <directory>')
    .description('Load, chunk and index documents')
    .option('-g, --glob <pattern>', 'Files to load (default: **/*.pdf)')
    .option('--chunk-size <n>', 'Chunk size in characters', parsePositiveInteger)
    .option('--chunk-overlap <n>', 'Overlap between chunks in characters', (value: string) => {
      const parsed = Number(value);
      if (!Number.isInteger(parsed) || parsed < 0) {
        throw new InvalidArgumentError('Must be a non-negative integer.');
      }
      return parsed;
    })
    .option('--batch-size <n>', 'Chunks per embed/upsert batch', parsePositiveInteger)
    .action((directory: string, opts: { glob?: string; chunkSize?: number; chunkOverlap?: number; batchSize?: number }) =>
      run(async () => {
        const config = resolveConfig(program.opts<GlobalOptions>(), {
          chunkSize: opts.chunkSize,
          chunkOverlap: opts.chunkOverlap,
          batchSize: opts.batchSize,
        });
        const qa = new DocumentQA({ config });

        spinner.loading(directory);
        const summary = await qa.indexDocuments(directory, opts.glob ?? config.glob, (batch, total, stored) => {
          spinner.indexing(batch, total, stored);
        });
        spinner.stop();
        console.log(formatIndexSummary(config.indexName, summary));
      })
    );

  program
    .command('ask <question...>')
    .description('Ask a single question')
    .option('-s, --stream', 'Print the answer as it is generated')
    .option('--no-sources', 'Do not list the retrieved documents')
    .option('-k, --k <n>', 'Documents to retrieve (overrides the mode)', parsePositiveInteger)
    .action((words: string[], opts: { stream?: boolean; sources: boolean; k?: number }) =>
      run(async () => {
        const config = resolveConfig(program.opts<GlobalOptions>(), { k: opts.k });
        const qa = new DocumentQA({ config });
        await answerQuestion(qa, words.join(' '), opts);
      })
    );

  program
    .command('search <query...>')
    .description('Show the most similar chunks without generating an answer')
    .option('-k, --k <n>', 'Number of results', parsePositiveInteger)
    .action((words: string[], opts: { k?: number }) =>
      run(async () => {
        const config = resolveConfig(program.opts<GlobalOptions>());
        const qa = new DocumentQA({ config });
        const results = await qa.search(words.join(' '), opts.k);
        console.log(qa.getRetriever().formatAsToolOutput(results));
      })
    );

  program
    .command('chat')
    .description('Ask questions interactively')
    .option('-s, --stream', 'Print answers as they are generated')
    .option('--no-sources', 'Do not list the retrieved documents')
    .action((opts: { stream?: boolean; sources: boolean }) =>
      run(async () => {
        const config = resolveConfig(program.opts<GlobalOptions>());
        const qa = new DocumentQA({ config });
        const mode = qa.getMode();
        console.log(formatChatBanner(mode.name, mode.model));

        const rl = createInterface({
          input: process.stdin,
          output: process.stdout,
          prompt: chalk.cyan('\nYour question: '),
        });
        rl.prompt();

        for await (const line of rl) {
          const question = line.trim();
          if (EXIT_WORDS.includes(question.toLowerCase())) {
            console.log('Goodbye!');
            break;
          }
          if (question) {
            // A failed question does not end the session
            try {
              await answerQuestion(qa, question, opts);
            } catch (error) {
              spinner.stop();
              console.error(formatError(toError(error)));
            }
          }
          rl.prompt();
        }
        rl.close();
      })
    );

  program
    .command('delete-index')
    .description('Delete the vector index and everything in it')
    .option('-y, --yes', 'Skip the confirmation prompt')
    .action((opts: { yes?: boolean }) =>
      run(async () => {
        const config = resolveConfig(program.opts<GlobalOptions>());
        if (!opts.yes && !(await confirm(`Delete index "${config.indexName}"? This cannot be undone.`))) {
          console.log(chalk.dim('Cancelled.'));
          return;
        }
        const qa = new DocumentQA({ config });
        await qa.deleteIndex();
        console.log(chalk.green(`Deleted index ${config.indexName}`));
      })
    );

  program
    .command('init')
    .description('Write an example .docqa.json in the current directory')
    .action(() =>
      run(async () => {
        const result = initConfig();
        if (result.success) {
          console.log(chalk.green(`Created ${result.path}`));
        } else {
          console.error(chalk.yellow(`${result.error}: ${result.path}`));
          process.exitCode = 1;
        }
      })
    );

  return program;
}
