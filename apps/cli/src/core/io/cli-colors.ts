/**
 * Shared color utilities for CLI output
 */

import chalk from 'chalk';

export const colors = {
  bright: chalk.bold,
  dim: chalk.dim,
  red: chalk.red,
  green: chalk.green,
  yellow: chalk.yellow,
  blue: chalk.blue,
  cyan: chalk.cyan,
};

/**
 * Get the formatted preamble string with version
 */
export function getPreamble(version: string): string {
  return `${colors.bright('📦 runbox')} ${colors.dim(`v${version}`)} | ${colors.cyan('isolate · install · launch')}`;
}

/**
 * Get the preamble separator line
 */
export function getPreambleSeparator(): string {
  return colors.dim('━'.repeat(48));
}
