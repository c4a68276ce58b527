import chalk from 'chalk';
import type { ScenarioResult } from './types.js';
import { calculateLatencyStats } from './metrics.js';
import { buildTimeline, renderTimeline } from './timeline.js';

export interface ReporterOptions {
  format: 'pretty' | 'json';
  columns?: number;
  color?: boolean;
}

function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  return `${(ms / 1000).toFixed(2)}s`;
}

function formatLatency(ms: number): string {
  return ms.toFixed(2);
}

function throughput(result: ScenarioResult): number {
  return result.duration > 0 ? result.summary.count / (result.duration / 1000) : 0;
}

export function printResults(result: ScenarioResult, options: ReporterOptions = { format: 'pretty' }): void {
  if (options.format === 'json') {
    console.log(JSON.stringify(toJson(result, options), null, 2));
  } else {
    printPretty(result, options);
  }
}

function printPretty(result: ScenarioResult, options: ReporterOptions): void {
  const { summary } = result;
  const stats = calculateLatencyStats(result.samples.map(s => s.duration));
  const succeeded = summary.count - summary.failedCount;
  const successRate = ((succeeded / summary.count) * 100).toFixed(1);
  const timeline = buildTimeline(result.samples, { columns: options.columns, testStart: result.testStart });

  console.log('');
  console.log(chalk.bold('Service Load Test Results'));
  console.log(chalk.gray('══════════════════════════════════════'));
  console.log(`${chalk.cyan('Scenario:')}      ${result.scenario}`);
  console.log(`Made ${summary.count} requests in ${formatDuration(result.duration)}`);
  console.log(`${summary.failedCount} requests got error responses`);
  console.log('');

  console.log(chalk.bold('Requests:'));
  console.log(`  Total:        ${summary.count}`);
  console.log(`  Succeeded:    ${chalk.green(succeeded)} (${successRate}%)`);
  console.log(`  Failed:       ${chalk.red(summary.failedCount)} (${(100 - parseFloat(successRate)).toFixed(1)}%)`);
  console.log('');

  console.log(chalk.bold('Latency (ms):'));
  console.log(`  Mean:         ${formatLatency(summary.meanLatency)}`);
  console.log(`  Stdev:        ${formatLatency(summary.stdevLatency)}`);
  console.log(`  Min:          ${formatLatency(stats.min)}`);
  console.log(`  Max:          ${formatLatency(stats.max)}`);
  console.log(`  p50:          ${formatLatency(stats.p50)}`);
  console.log(`  p95:          ${formatLatency(stats.p95)}`);
  console.log(`  p99:          ${formatLatency(stats.p99)}`);
  console.log('');

  console.log(`${chalk.cyan('Throughput:')}   ${chalk.bold(throughput(result).toFixed(1))} req/s`);
  if (result.service?.forced) {
    console.log(chalk.yellow('Service had to be killed after the shutdown grace period'));
  }
  console.log(chalk.gray('══════════════════════════════════════'));
  console.log('');
  console.log(renderTimeline(timeline, { color: options.color }));
  console.log('');
}

export function toJson(result: ScenarioResult, options: Partial<ReporterOptions> = {}): Record<string, unknown> {
  const { summary } = result;
  const stats = calculateLatencyStats(result.samples.map(s => s.duration));
  const timeline = buildTimeline(result.samples, { columns: options.columns, testStart: result.testStart });

  return {
    scenario: result.scenario,
    duration_ms: Math.round(result.duration),
    requests: {
      total: summary.count,
      succeeded: summary.count - summary.failedCount,
      failed: summary.failedCount,
      success_rate: ((summary.count - summary.failedCount) / summary.count) * 100,
    },
    latency_ms: {
      mean: summary.meanLatency,
      stdev: summary.stdevLatency,
      min: stats.min,
      max: stats.max,
      p50: stats.p50,
      p95: stats.p95,
      p99: stats.p99,
    },
    throughput_rps: throughput(result),
    timeline: {
      cell_weight: timeline.cellWeight,
      seconds: timeline.rows.map(row => ({
        second: row.second,
        passed: row.passed,
        failed: row.failed,
        cells: row.cells.map(solid => (solid ? 1 : 0)).join(''),
      })),
    },
    ...(result.service && {
      service: {
        exit_code: result.service.code,
        signal: result.service.signal,
        forced_kill: result.service.forced,
      },
    }),
  };
}
