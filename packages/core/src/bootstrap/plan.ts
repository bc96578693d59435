/**
 * Bootstrap plan
 *
 * The ordered steps a platform will run. Provision covers isolation and
 * installation; start covers port declaration and launch.
 */

import type { BootstrapStep } from './errors';

export interface PlanStep {
  step: BootstrapStep;
  description: string;
  /** argv of the process the step runs, when it runs one */
  command?: string[];
}

/**
 * Render a plan as numbered lines for --dry-run output
 */
export function formatPlan(plan: PlanStep[]): string[] {
  return plan.map((entry, index) => {
    const command = entry.command ? `: ${entry.command.join(' ')}` : '';
    return `${index + 1}. [${entry.step}] ${entry.description}${command}`;
  });
}
