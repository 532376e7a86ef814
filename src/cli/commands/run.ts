import { ConfigParser } from '../../config/parser';
import { ConfigValidator } from '../../config/validator';
import { RawRunOptions } from '../../config/types';
import { LoadRunner } from '../../core/load-runner';
import { ConfigurationError } from '../../core/errors';
import { ConsoleReporter } from '../../reporting/console-reporter';
import { JSONOutput } from '../../outputs/json';
import { logger, LogLevel } from '../../utils/logger';

export interface RunCommandOptions {
  url?: string;
  method?: string;
  concurrency?: string;
  requests?: string;
  data?: string;
  header?: string[];
  wsMessage?: string;
  wsDuration?: string;
  timeout?: string;
  config?: string;
  output?: string;
  verbose?: boolean;
}

export function toRawOptions(options: RunCommandOptions): RawRunOptions {
  return {
    url: options.url,
    method: options.method,
    concurrency: options.concurrency,
    requests: options.requests,
    data: options.data,
    headers: options.header,
    ws_message: options.wsMessage,
    ws_duration: options.wsDuration,
    timeout: options.timeout
  };
}

export async function runCommand(options: RunCommandOptions): Promise<void> {
  try {
    if (options.verbose) {
      logger.setLevel(LogLevel.DEBUG);
    }

    const parser = new ConfigParser();
    let raw = toRawOptions(options);

    if (options.config) {
      logger.info(`Loading run file: ${options.config}`);
      raw = parser.merge(await parser.parse(options.config), raw);
    }

    const validator = new ConfigValidator();
    const validation = validator.validate(raw);

    if (!validation.valid) {
      logger.error('Configuration validation failed:');
      validation.errors.forEach(error => logger.error(`  - ${error}`));
      process.exitCode = 1;
      return;
    }

    if (validation.warnings.length > 0) {
      logger.warn('Configuration warnings:');
      validation.warnings.forEach(warning => logger.warn(`  - ${warning}`));
    }

    const { config, run } = parser.resolve(raw);
    const reporter = new ConsoleReporter();
    reporter.printBanner(config, run);

    const summary = await new LoadRunner(config, run).run();
    reporter.printSummary(summary);

    if (options.output) {
      await new JSONOutput(options.output).write(summary, config, run);
      logger.success(`Summary written to ${options.output}`);
    }
  } catch (error: unknown) {
    if (error instanceof ConfigurationError) {
      logger.error(`Configuration error: ${error.message}`);
    } else {
      logger.error(`Load test failed: ${error instanceof Error ? error.message : String(error)}`);
      if (options.verbose && error instanceof Error) {
        console.error(error.stack);
      }
    }
    process.exitCode = 1;
  }
}
