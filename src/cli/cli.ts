#!/usr/bin/env node

import { Command } from 'commander';
import { runCommand } from './commands/run';

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

const program = new Command();

program
    .name('loadcannon')
    .description('Concurrent load generator for HTTP and WebSocket endpoints')
    .version('1.0.0');

program
    .command('run', { isDefault: true })
    .description('Drive a fixed number of requests or WebSocket sessions against one URL')
    .option('-u, --url <url>', 'Target URL (http(s):// or ws(s)://)')
    // Defaults live in ConfigParser.resolve so a run file can supply these
    .option('-c, --concurrency <number>', 'Number of concurrent workers (default: 1)')
    .option('-r, --requests <number>', 'Total requests (HTTP) or sessions (WebSocket) (default: 1)')
    .option('-m, --method <method>', 'GET, POST, PUT, DELETE, PATCH, HEAD, OPTIONS, or WS for WebSocket (default: GET)')
    .option('-d, --data <body>', 'Request body')
    .option('-H, --header <header>', 'Request header as "Key:Value" (repeatable)', collect)
    .option('--ws-message <message>', 'Text frame sent once after each WebSocket connects')
    .option('--ws-duration <seconds>', 'Seconds each WebSocket session stays open')
    .option('-t, --timeout <seconds>', 'Request and handshake timeout in seconds (default: 30)')
    .option('-f, --config <file>', 'YAML or JSON run file; command-line flags take precedence')
    .option('-o, --output <file>', 'Write the summary as JSON')
    .option('-v, --verbose', 'Enable verbose logging')
    .action(runCommand);

program.parseAsync().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
