/**
 * Shared logging utilities for CLI commands
 */

import { colors } from './cli-colors.js';

// Global flag to control output suppression for structured formats
let globalSuppressOutput = false;

/**
 * Set the global output suppression state
 * @returns The previous suppression state
 */
export function setSuppressOutput(suppress: boolean): boolean {
  const previous = globalSuppressOutput;
  globalSuppressOutput = suppress;
  return previous;
}

// Errors are printed even when output is suppressed; they go to stderr
export function printError(message: string): void {
  console.error(colors.red(`❌ ${message}`));
}

export function printSuccess(message: string): void {
  if (!globalSuppressOutput) {
    console.log(colors.green(`✅ ${message}`));
  }
}

export function printWarning(message: string): void {
  if (!globalSuppressOutput) {
    console.log(colors.yellow(`⚠️  ${message}`));
  }
}

export function printInfo(message: string): void {
  if (!globalSuppressOutput) {
    console.log(colors.cyan(`ℹ️  ${message}`));
  }
}
