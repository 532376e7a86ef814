import chalk from 'chalk';
import { LoadConfiguration, RunOptions } from '../config/types';
import { Summary } from '../metrics/types';

function formatMs(value: number): string {
  return `${value.toFixed(2)} ms`;
}

export function describeProtocol(config: LoadConfiguration): string {
  switch (config.protocol.type) {
    case 'http':
      return config.protocol.method;
    case 'websocket':
      return 'WebSocket';
    case 'unsupported':
      return `${config.protocol.method} (unsupported)`;
  }
}

export function formatBanner(config: LoadConfiguration, run: RunOptions): string[] {
  const lines = [
    chalk.bold('--- Load test started ---'),
    `Target URL: ${config.url}`,
    `Protocol/method: ${describeProtocol(config)}`,
    `Concurrency: ${run.concurrency}`,
    `Total requests/sessions: ${run.requests}`
  ];

  if (config.ws_hold_duration !== undefined) {
    lines.push(`WebSocket hold duration: ${config.ws_hold_duration} s`);
  }
  if (config.body !== undefined) {
    lines.push(`Request body: ${config.body}`);
  }
  const headers = Object.entries(config.headers);
  if (headers.length > 0) {
    lines.push(`Headers: ${headers.map(([key, value]) => `${key}: ${value}`).join(', ')}`);
  }

  return lines;
}

export function formatSummary(summary: Summary): string[] {
  const lines = [
    '',
    chalk.bold('--- Results ---'),
    `Total duration: ${(summary.total_duration / 1000).toFixed(3)} s`,
    `Successful: ${chalk.green(String(summary.successful_requests))}`,
    `Failed: ${summary.failed_requests > 0 ? chalk.red(String(summary.failed_requests)) : '0'}`,
    `Total: ${summary.total_requests}`,
    summary.requests_per_second !== null
      ? `Requests per second: ${summary.requests_per_second.toFixed(2)}`
      : 'Requests per second: N/A (duration too short)'
  ];

  if (summary.latency) {
    const { latency } = summary;
    lines.push(
      `Mean latency: ${formatMs(latency.mean)}`,
      `Min latency: ${formatMs(latency.min)}`,
      `Max latency: ${formatMs(latency.max)}`,
      'Latency percentiles:',
      `  P50: ${formatMs(latency.p50)}`,
      `  P90: ${formatMs(latency.p90)}`,
      `  P95: ${formatMs(latency.p95)}`,
      `  P99: ${formatMs(latency.p99)}`
    );
  } else {
    lines.push(chalk.yellow('No successful requests; latency statistics unavailable.'));
  }

  if (summary.status_distribution.length > 0) {
    lines.push('', chalk.bold('Status code distribution:'));
    for (const { status, count } of summary.status_distribution) {
      lines.push(`  - ${status}: ${count}`);
    }
  }

  if (summary.error_distribution.length > 0) {
    lines.push('', chalk.bold('Errors:'));
    for (const { error, count } of summary.error_distribution) {
      lines.push(`  - ${error}: ${count}`);
    }
  }

  return lines;
}

export class ConsoleReporter {
  private write: (line: string) => void;

  constructor(write: (line: string) => void = (line) => console.log(line)) {
    this.write = write;
  }

  printBanner(config: LoadConfiguration, run: RunOptions): void {
    formatBanner(config, run).forEach(line => this.write(line));
  }

  printSummary(summary: Summary): void {
    formatSummary(summary).forEach(line => this.write(line));
  }
}
