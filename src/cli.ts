import { Command } from 'commander';
import { loadConfig, maskKey } from './config.js';
import { runLoadTest } from './controller.js';
import { ConfigurationError, errorMessage, SerializationError } from './errors.js';
import { createLogger } from './logger.js';
import { printReport } from './reporter.js';

export interface CliIO {
  exit?: (code: number) => void;
  writeErr?: (text: string) => void;
}

interface RunCommandOptions {
  url?: string;
  key?: string;
  rqs?: string;
  duration?: string;
  timeout?: string;
  verbose?: boolean;
  output?: string;
}

export function createProgram(io: CliIO = {}): Command {
  const exit = io.exit ?? ((code: number) => process.exit(code));
  const writeErr = io.writeErr ?? ((text: string) => process.stderr.write(text));
  const logLine = (line: string) => writeErr(`${line}\n`);

  const program = new Command();

  program
    .configureOutput({ writeErr })
    .name('burstload')
    .description('Fire bursts of concurrent POST requests at an endpoint once per second')
    .version('1.0.0');

  const runCommand = program.command('run', { isDefault: true });

  runCommand
    .description('Run a load test for a fixed duration')
    .option('-u, --url <url>', 'Target POST url (env BURSTLOAD_URL)')
    .option('-k, --key <key>', 'API key sent as X-Api-Key (env BURSTLOAD_API_KEY)')
    .option('-r, --rqs <number>', 'Requests per second (env BURSTLOAD_RQS, default 10)')
    .option('-d, --duration <seconds>', 'Duration in seconds (env BURSTLOAD_DURATION, default 1)')
    .option('-t, --timeout <ms>', 'Per-request timeout in ms (env BURSTLOAD_TIMEOUT_MS, default 10000)')
    .option('-v, --verbose', 'Print the body of every response')
    .option('-o, --output <format>', 'Report format: json, pretty', 'json')
    .action(async (options: RunCommandOptions) => {
      let logger = createLogger({ write: logLine });
      try {
        const cfg = loadConfig({
          url: options.url,
          apiKey: options.key,
          rqs: options.rqs,
          duration: options.duration,
          timeout: options.timeout,
          verbose: options.verbose,
          output: options.output,
        });
        logger = createLogger({ verbose: cfg.verbose, write: logLine });

        logger.info(`url: ${cfg.url}`);
        logger.info(`key: ${maskKey(cfg.apiKey)}`);
        logger.info(`rqs: ${cfg.requestsPerTick}`);
        logger.info(`duration: ${cfg.duration}`);
        logger.info(`verbose: ${cfg.verbose}`);

        const controller = new AbortController();
        process.once('SIGINT', () => controller.abort());

        const summary = await runLoadTest(cfg, { logger, signal: controller.signal });
        printReport(summary, { format: cfg.output, logger });

        exit(0);
      } catch (error) {
        logger.error(`error: ${errorMessage(error)}`);
        // help for `run` itself, where the offending options are listed
        if (error instanceof ConfigurationError) {
          runCommand.outputHelp({ error: true });
        }
        exit(error instanceof SerializationError ? 1 : 2);
      }
    });

  return program;
}
