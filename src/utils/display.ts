/**
 * Display Utilities
 * Console styling and formatting for CLI output
 */

import chalk from 'chalk';
import { BRAND } from '../constants.js';
import { ExternalToolError, SshmError } from '../errors.js';
import type { IdentityView, Inconsistency, ProbeResult } from '../types/index.js';

/**
 * Brand colors
 */
export const colors = {
  primary: chalk.hex('#0EA5E9'),    // Sky
  secondary: chalk.hex('#10B981'),  // Emerald
  accent: chalk.hex('#F59E0B'),     // Amber
  muted: chalk.gray,
  error: chalk.hex('#EF4444'),
  success: chalk.hex('#10B981'),
  warning: chalk.hex('#F59E0B'),
  info: chalk.hex('#3B82F6'),
};

/**
 * Print the sshm banner
 */
export function printBanner(): void {
  console.log();
  console.log(colors.primary.bold(`  ${BRAND.prefix} ${BRAND.name}`));
  console.log(colors.muted(`    ${BRAND.tagline}`));
  console.log();
}

/**
 * Print a success message
 */
export function success(message: string): void {
  console.log(colors.success(`${BRAND.prefix} ${message}`));
}

/**
 * Print an error message
 */
export function error(message: string): void {
  console.error(colors.error(`✖ ${message}`));
}

/**
 * Print a warning message
 */
export function warning(message: string): void {
  console.log(colors.warning(`⚠ ${message}`));
}

/**
 * Print an info message
 */
export function info(message: string): void {
  console.log(colors.info(`ℹ ${message}`));
}

/**
 * Print a dimmed/muted message
 */
export function dim(message: string): void {
  console.log(colors.muted(message));
}

/**
 * Print a key-value pair
 */
export function keyValue(key: string, value: string, indent: number = 0): void {
  const spaces = ' '.repeat(indent);
  console.log(`${spaces}${colors.muted(key + ':')} ${value}`);
}

/**
 * Format a date for display
 */
export function formatDate(isoDate: string): string {
  const date = new Date(isoDate);
  return date.toLocaleDateString() + ' ' + date.toLocaleTimeString();
}

/** One-line summary of an identity, as shown by `list` */
export function formatIdentity(identity: IdentityView): string {
  const marker = identity.isActive ? colors.success('●') : colors.muted('○');
  const tag = identity.isActive ? colors.primary.bold(identity.tag) : colors.primary(identity.tag);
  const parts = [`${marker} ${tag}`, colors.muted(`(${identity.keys.map(k => k.keyType).join(', ') || identity.keyType})`)];
  if (identity.alias) {
    parts.push(colors.secondary(identity.alias));
  }
  if (!identity.existsOnDisk) {
    parts.push(colors.warning('missing key files'));
  }
  return parts.join(' ');
}

export function formatIssue(issue: Inconsistency): string {
  return `${colors.warning(issue.kind)} ${issue.detail}`;
}

const OUTCOME_LABELS: Record<ProbeResult['outcome'], string> = {
  success: 'authenticated',
  'authentication-rejected': 'authentication rejected',
  unreachable: 'host unreachable',
  timeout: 'timed out',
};

export function formatProbe(result: ProbeResult): string {
  const label = OUTCOME_LABELS[result.outcome];
  if (result.outcome === 'success') {
    return colors.success(result.username ? `${label} as ${result.username}` : label);
  }
  return colors.error(label);
}

/**
 * Print a failed operation: kind, subject, message and the failing step
 */
export function reportError(err: unknown): void {
  if (err instanceof SshmError) {
    error(`${err.message}`);
    const where = err.step ? `${err.kind} during ${err.step}` : err.kind;
    console.error(colors.muted(`  ${where}: ${err.subject}`));
    if (err instanceof ExternalToolError && err.diagnostic) {
      for (const line of err.diagnostic.split('\n')) {
        console.error(colors.muted(`  │ ${line}`));
      }
    }
  } else {
    error(err instanceof Error ? err.message : String(err));
  }
  process.exitCode = 1;
}
