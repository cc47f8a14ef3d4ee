/**
 * Checks run on a command before it is saved
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

export const COMMON_TYPOS: ReadonlyMap<string, string> = new Map([
  ['cd..', 'cd ..'],
  ['ls-la', 'ls -la'],
  ['gitcommit', 'git commit'],
  ['gitpush', 'git push'],
  ['gitpull', 'git pull'],
  ['npminstall', 'npm install'],
  ['dockerrun', 'docker run'],
]);

/** Words that are never looked up on PATH. */
const SHELL_BUILTINS = ['cd', 'export', 'source', '.'];

export interface CommandCheck {
  /** Corrected command when the first word is a known typo. */
  suggestion: string | null;
  /** First word of the command as given, when it is not found on PATH. */
  missing: string | null;
}

function isExecutableFile(candidate: string): boolean {
  try {
    fs.accessSync(candidate, fs.constants.X_OK);
    return fs.statSync(candidate).isFile();
  } catch {
    return false;
  }
}

export function findExecutable(name: string, env: NodeJS.ProcessEnv = process.env): string | null {
  if (name.includes('/')) {
    return isExecutableFile(name) ? name : null;
  }
  for (const dir of (env.PATH ?? '').split(path.delimiter)) {
    if (!dir) continue;
    const candidate = path.join(dir, name);
    if (isExecutableFile(candidate)) return candidate;
  }
  return null;
}

export function checkCommand(
  command: string,
  lookup: (name: string) => string | null = (name) => findExecutable(name),
): CommandCheck {
  const trimmed = command.trim();
  const [first = ''] = trimmed.split(/\s+/);

  const fix = COMMON_TYPOS.get(first);
  const suggestion = fix === undefined ? null : fix + trimmed.slice(first.length);

  const skip = first === ''
    || first.startsWith('./')
    || /[={$]/.test(first)
    || SHELL_BUILTINS.includes(first);
  const missing = !skip && lookup(first) === null ? first : null;

  return { suggestion, missing };
}
