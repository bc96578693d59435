/**
 * Output Formatter - renders command results as summary text, JSON or YAML
 */

import { Chalk, type ChalkInstance } from 'chalk';
import yaml from 'js-yaml';
import { formatPlan } from '@runbox/core';
import type { CommandResults } from '../command-results.js';
import type { CommandResult } from '../command-result.js';

export type OutputFormat = 'summary' | 'json' | 'yaml';

export interface OutputOptions {
  format: OutputFormat;
  quiet: boolean;
  verbose: boolean;
  /** Whether to include color codes */
  colors?: boolean;
}

export class OutputFormatter {
  static format(results: CommandResults, options: OutputOptions): string {
    switch (options.format) {
      case 'json':
        return this.formatJSON(results, options);
      case 'yaml':
        return this.formatYAML(results);
      case 'summary':
      default:
        return this.formatSummary(results, options);
    }
  }

  private static formatJSON(results: CommandResults, options: OutputOptions): string {
    return JSON.stringify(this.cleanForSerialization(results), null, options.verbose ? 2 : 0);
  }

  private static formatYAML(results: CommandResults): string {
    return yaml.dump(this.cleanForSerialization(results), { lineWidth: -1, noRefs: true });
  }

  /**
   * Human-readable summary (default CLI output)
   */
  private static formatSummary(results: CommandResults, options: OutputOptions): string {
    const c = new Chalk({ level: options.colors === false ? 0 : undefined });
    let output = '';

    if (!options.quiet) {
      output += `${c.cyan(`📊 ${results.command}`)} completed in ${c.bold(`${results.duration}ms`)}\n`;

      if (options.verbose) {
        output += c.dim(`Environment: ${results.environment}`) + '\n';
        output += c.dim(`Timestamp: ${results.timestamp.toISOString()}`) + '\n';
        output += c.dim(`User: ${results.executionContext.user}`) + '\n';
        if (results.executionContext.dryRun) {
          output += c.yellow('⚠️  DRY RUN MODE') + '\n';
        }
        output += '\n';
      }
    }

    for (const result of results.results) {
      const status = result.extensions?.status ?? 'unknown';
      const [indicator, paint] = this.statusIndicator(result, c);

      output += `${paint(indicator)} ${c.bold(result.entity)} (${result.platform}): ${paint(status)}\n`;

      const extensions = result.extensions;
      if (extensions?.endpoint && !options.quiet) {
        output += c.dim(`   endpoint: ${extensions.endpoint}`) + '\n';
      }

      if (extensions?.plan && !options.quiet) {
        for (const line of formatPlan(extensions.plan)) {
          output += c.dim(`   ${line}`) + '\n';
        }
      }

      if (extensions?.health && !options.quiet) {
        const health = extensions.health.healthy ? c.green('healthy') : c.red('unhealthy');
        output += `   ${c.dim('health:')} ${health}\n`;
        if (options.verbose) {
          for (const [key, value] of Object.entries(extensions.health.details)) {
            if (value !== undefined && value !== null) {
              output += c.dim(`     ${key}: ${this.formatValue(value)}`) + '\n';
            }
          }
        }
      }

      if (extensions?.dependencies && extensions.dependencies.missing.length > 0) {
        output += c.yellow(`   missing: ${extensions.dependencies.missing.join(', ')}`) + '\n';
      }

      if (extensions?.files && !options.quiet) {
        for (const file of extensions.files) {
          output += c.dim(`   created: ${file}`) + '\n';
        }
      }

      if (options.verbose && result.metadata) {
        for (const [key, value] of Object.entries(result.metadata)) {
          if (value !== undefined && value !== null) {
            output += c.dim(`   ${key}: ${this.formatValue(value)}`) + '\n';
          }
        }
      }

      if (!result.success && result.error) {
        output += c.red(`   error: ${result.error}`) + '\n';
      }
    }

    if (!options.quiet && results.results.length > 1) {
      output += `\n${c.cyan('Summary:')} ${c.green(`${results.summary.succeeded} succeeded`)}, `;
      if (results.summary.failed > 0) {
        output += `${c.red(`${results.summary.failed} failed`)}, `;
      }
      if (results.summary.warnings > 0) {
        output += `${c.yellow(`${results.summary.warnings} warnings`)}, `;
      }
      output += `${results.summary.total} total\n`;
    }

    return output;
  }

  private static statusIndicator(
    result: CommandResult,
    c: ChalkInstance
  ): [string, (text: string) => string] {
    if (!result.success) {
      return ['[FAIL]', c.red];
    }
    switch (result.extensions?.status) {
      case 'running':
      case 'provisioned':
      case 'initialized':
        return ['[OK]', c.green];
      case 'stopped':
      case 'exited':
      case 'skipped':
      case 'destroyed':
      case 'planned':
        return ['[--]', c.yellow];
      case 'not-provisioned':
      case 'stale':
      case 'unhealthy':
        return ['[WARN]', c.yellow];
      case 'unknown':
      case undefined:
        return ['[??]', c.dim];
      default:
        return ['[--]', c.dim];
    }
  }

  private static formatValue(value: unknown): string {
    if (value instanceof Date) {
      return value.toISOString();
    }
    if (Array.isArray(value)) {
      return value.map(v => this.formatValue(v)).join(', ');
    }
    if (typeof value === 'object' && value !== null) {
      return JSON.stringify(value);
    }
    return String(value);
  }

  /**
   * Dates become ISO strings; undefined fields are dropped
   */
  static cleanForSerialization(value: unknown): unknown {
    if (value instanceof Date) {
      return value.toISOString();
    }
    if (Array.isArray(value)) {
      return value.map(item => this.cleanForSerialization(item));
    }
    if (typeof value === 'object' && value !== null) {
      const cleaned: Record<string, unknown> = {};
      for (const [key, item] of Object.entries(value)) {
        if (item !== undefined && typeof item !== 'function') {
          cleaned[key] = this.cleanForSerialization(item);
        }
      }
      return cleaned;
    }
    return value;
  }
}

/**
 * Format results for the given output format
 */
export function formatResults(
  results: CommandResults,
  format: OutputFormat = 'summary',
  verbose: boolean = false
): string {
  return OutputFormatter.format(results, { format, quiet: false, verbose });
}
