/**
 * Advisory safety checks
 *
 * Signatures only annotate a plan; nothing here blocks execution.
 */

import { splitChain } from './chain.js';

export type SafetyWarningId =
  | 'recursive-delete-root'
  | 'shutdown'
  | 'reboot'
  | 'raw-disk-copy'
  | 'make-filesystem'
  | 'format'
  | 'write-block-device'
  | 'sudo-rm'
  | 'sudo-cd';

export interface SafetyWarning {
  id: SafetyWarningId;
  message: string;
  /** Alternative commands the user may prefer. */
  suggestions?: string[];
}

interface DestructiveSignature {
  id: SafetyWarningId;
  pattern: RegExp;
  message: string;
}

export const DESTRUCTIVE_SIGNATURES: readonly DestructiveSignature[] = [
  { id: 'recursive-delete-root', pattern: /\brm\s+-rf?\s+\//i, message: 'Recursive delete of an absolute path' },
  { id: 'shutdown', pattern: /\bshutdown\b/i, message: 'Shuts the machine down' },
  { id: 'reboot', pattern: /\breboot\b/i, message: 'Reboots the machine' },
  { id: 'raw-disk-copy', pattern: /\bdd\s+if=/i, message: 'Raw disk copy with dd' },
  { id: 'make-filesystem', pattern: /\bmkfs\b/i, message: 'Creates a filesystem (erases the device)' },
  { id: 'format', pattern: /\bformat\b/i, message: 'Formats a device' },
  { id: 'write-block-device', pattern: />\s*\/dev\/sd[a-z]/i, message: 'Writes directly to a block device' },
  { id: 'sudo-rm', pattern: /\bsudo\b.*\brm\b/i, message: 'Deletes files as root' },
];

function sudoCdSuggestions(command: string): string[] {
  const segments = splitChain(command);
  if (segments.length < 2) return [];
  const cdPart = segments[0];
  const rest = segments.slice(1).join(' && ');
  const cd = cdPart.replace(/^sudo\s+cd/, 'cd').trim();
  return [
    `${cd} && ${rest}`,
    `${cd} && sudo ${rest}`,
    `sudo bash -c "${cd} && ${rest}"`,
  ];
}

/**
 * Inspect a resolved command. Returns one warning per matching signature.
 */
export function inspectCommand(command: string): SafetyWarning[] {
  const warnings: SafetyWarning[] = DESTRUCTIVE_SIGNATURES
    .filter((sig) => sig.pattern.test(command))
    .map((sig) => ({ id: sig.id, message: sig.message }));

  if (/^\s*sudo\s+cd\s/.test(command)) {
    warnings.push({
      id: 'sudo-cd',
      message: "'sudo cd' does not change the directory for the commands that follow",
      suggestions: sudoCdSuggestions(command),
    });
  }

  return warnings;
}

export function isDestructive(command: string): boolean {
  return DESTRUCTIVE_SIGNATURES.some((sig) => sig.pattern.test(command));
}
