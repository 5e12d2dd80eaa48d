import chalk from 'chalk';
import { describeError } from '../../errors.js';

/**
 * Run a command handler; failures print in red and set a non-zero exit code.
 */
export async function runCommand(handler: () => Promise<void> | void): Promise<void> {
  try {
    await handler();
  } catch (error) {
    console.error(chalk.red(`❌ ${describeError(error)}`));
    process.exitCode = 1;
  }
}
