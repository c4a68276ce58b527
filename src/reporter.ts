import chalk from 'chalk';
import type { CheckResult } from './types.js';
import type { RunnerResult } from './runner.js';
import type { ReleaseReport } from './service/types.js';

export interface ReporterOptions {
  verbose?: boolean;
  json?: boolean;
}

const CHECK_ICON = chalk.green('✓');
const FAIL_ICON = chalk.red('✗');
const PENDING_ICON = chalk.yellow('○');
const NAME_WIDTH = 28;

export function formatDuration(ms: number): string {
  if (ms < 1) return '<1ms';
  if (ms < 1000) return `${Math.round(ms)}ms`;
  return `${(ms / 1000).toFixed(1)}s`;
}

export function printHeader(mode: string): void {
  console.log(chalk.bold(`\nService Functional Checks (${mode})`));
  console.log(chalk.gray('═'.repeat(53)));
}

export function printCheckStart(name: string): void {
  process.stdout.write(`   ${PENDING_ICON} ${name.padEnd(NAME_WIDTH)}`);
}

export function printCheckResult(result: CheckResult, options: ReporterOptions = {}): void {
  process.stdout.write('\r');

  const icon = result.success ? CHECK_ICON : FAIL_ICON;
  const durationStr = result.duration > 0
    ? chalk.gray(formatDuration(result.duration).padStart(8))
    : chalk.gray('-'.padStart(8));

  console.log(`   ${icon} ${result.name.padEnd(NAME_WIDTH)}${durationStr}    ${result.message}`);

  if (!result.success && result.details && options.verbose) {
    console.log(chalk.gray(`     └─ ${result.details}`));
  }

  if (!result.success && result.suggestion) {
    console.log(chalk.yellow(`     └─ Suggestion: ${result.suggestion}`));
  }
}

export function printSummary(result: RunnerResult): void {
  console.log(chalk.gray('═'.repeat(53)));

  const total = result.passed + result.failed;
  const passedStr = result.failed === 0
    ? chalk.green(`${result.passed}/${total} checks passed`)
    : chalk.red(`${result.failed}/${total} checks failed`);

  console.log(`   ${passedStr}${' '.repeat(20)}Total: ${formatDuration(result.totalDuration)}`);

  if (result.failed === 0) {
    console.log(chalk.green.bold(`\n   Status: PASSED ✓\n`));
  } else {
    console.log(chalk.red.bold(`\n   Status: FAILED ✗\n`));
  }
}

export function toJson(result: RunnerResult, service?: ReleaseReport): Record<string, unknown> {
  return {
    status: result.failed === 0 ? 'passed' : 'failed',
    checks: result.results.map(r => ({
      name: r.name,
      success: r.success,
      duration_ms: Math.round(r.duration),
      message: r.message,
      ...(r.details ? { details: r.details } : {}),
      ...(r.suggestion ? { suggestion: r.suggestion } : {}),
    })),
    summary: {
      total: result.passed + result.failed,
      passed: result.passed,
      failed: result.failed,
      duration_ms: Math.round(result.totalDuration),
    },
    ...(service && {
      service: {
        exit_code: service.code,
        signal: service.signal,
        forced_kill: service.forced,
      },
    }),
  };
}

export class Reporter {
  private options: ReporterOptions;

  constructor(options: ReporterOptions = {}) {
    this.options = options;
  }

  start(mode: string): void {
    if (!this.options.json) {
      printHeader(mode);
    }
  }

  onCheckStart(name: string): void {
    if (!this.options.json) {
      printCheckStart(name);
    }
  }

  onCheckComplete(result: CheckResult): void {
    if (!this.options.json) {
      printCheckResult(result, this.options);
    }
  }

  finish(result: RunnerResult, service?: ReleaseReport): void {
    if (this.options.json) {
      console.log(JSON.stringify(toJson(result, service), null, 2));
    } else {
      printSummary(result);
    }
  }
}
