/**
 * Console formatting for plans, results and listings
 */

import { assertNever, kindIcon } from '@quicklaunch/core';
import type { Entry, ExecutionPlan, ExecutionResult, SafetyWarning } from '@quicklaunch/core';

export const color = {
  red: (s: string) => `\x1b[31m${s}\x1b[0m`,
  green: (s: string) => `\x1b[32m${s}\x1b[0m`,
  yellow: (s: string) => `\x1b[33m${s}\x1b[0m`,
  cyan: (s: string) => `\x1b[36m${s}\x1b[0m`,
  gray: (s: string) => `\x1b[90m${s}\x1b[0m`,
  bold: (s: string) => `\x1b[1m${s}\x1b[0m`,
};

export function formatWarnings(warnings: readonly SafetyWarning[]): string[] {
  const lines: string[] = [];
  for (const warning of warnings) {
    lines.push(color.yellow(`⚠ ${warning.message}`));
    for (const suggestion of warning.suggestions ?? []) {
      lines.push(`    ${color.cyan(suggestion)}`);
    }
  }
  return lines;
}

export function formatPlan(plan: ExecutionPlan): string[] {
  const lines = [color.bold('Dry run (nothing will be executed)')];
  if (plan.segments.length > 1) {
    plan.segments.forEach((segment, i) => lines.push(`  ${i + 1}. ${segment}`));
  } else {
    lines.push(`  ${plan.segments[0] ?? plan.command}`);
  }
  return [...lines, ...formatWarnings(plan.warnings)];
}

export function formatResult(alias: string, result: ExecutionResult): string[] {
  switch (result.status) {
    case 'success':
      return [color.green(`✓ ${alias} finished`)];
    case 'dry-run':
      return [color.gray(`${alias}: dry run`)];
    case 'failed': {
      const index = result.firstFailedSegment ?? 0;
      const where = result.segments.length > 1 ? ` at step ${index + 1}: ${result.segments[index]}` : '';
      const lines = [color.red(`✗ ${alias} failed (exit ${result.exitCode})${where}`)];
      if (result.error) lines.push(color.gray(result.error));
      return lines;
    }
    case 'spawn-failure':
      return [color.red(`✗ ${alias} could not start: ${result.error ?? 'unknown error'}`)];
    default:
      return assertNever(result.status);
  }
}

export function formatEntryLine(entry: Entry, usage: number): string {
  const used = usage > 0 ? color.gray(` (${usage})`) : '';
  const description = entry.description ? color.gray(`  # ${entry.description}`) : '';
  return `${kindIcon(entry.kind)} ${color.cyan(entry.alias)}${used} → ${entry.command}${description}`;
}
