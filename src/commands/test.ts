/**
 * Test Command
 * Check that an identity authenticates against its host
 */

import ora from 'ora';
import type { TestResult } from '../services/orchestrator.js';
import { openContext, type GlobalOptions } from './context.js';
import { printBanner, error, colors, formatProbe, reportError } from '../utils/display.js';

function printResult(test: TestResult): void {
  console.log(`${colors.primary(test.tag || test.alias)} ${colors.muted(`(${test.alias})`)}  ${formatProbe(test.result)}`);
  if (test.result.outcome !== 'success' && test.result.diagnostic) {
    for (const line of test.result.diagnostic.split('\n')) {
      console.log(colors.muted(`  │ ${line}`));
    }
  }
}

export async function testCommand(
  tag: string | undefined,
  options: GlobalOptions & { all?: boolean; path?: string }
): Promise<void> {
  printBanner();

  const spinner = ora('Testing connection...');

  try {
    const { orchestrator } = await openContext(options);
    spinner.start();

    let results: TestResult[];
    if (options.all) {
      results = await orchestrator.testAll();
    } else if (tag) {
      results = [await orchestrator.test(tag)];
    } else {
      results = [await orchestrator.testRepository(options.path)];
    }
    spinner.stop();

    for (const result of results) {
      printResult(result);
    }

    const failed = results.filter(r => r.result.outcome !== 'success');
    if (failed.length > 0) {
      console.log();
      error(`${failed.length} of ${results.length} connection test(s) failed`);
      process.exitCode = 1;
    }
  } catch (err) {
    if (spinner.isSpinning) {
      spinner.fail('Connection test could not run');
    }
    reportError(err);
  }
}
