/**
 * Chain splitting
 *
 * Splits on `&&` outside single and double quotes. Everything else in a
 * segment is passed to the shell untouched.
 */

export const CHAIN_OPERATOR = '&&';

export function splitChain(command: string): string[] {
  const segments: string[] = [];
  let current = '';
  let quote: '"' | "'" | null = null;

  for (let i = 0; i < command.length; i++) {
    const ch = command[i];

    if (quote) {
      current += ch;
      if (ch === '\\' && quote === '"' && i + 1 < command.length) {
        current += command[++i];
      } else if (ch === quote) {
        quote = null;
      }
      continue;
    }

    if (ch === '"' || ch === "'") {
      quote = ch;
      current += ch;
      continue;
    }

    if (ch === '\\' && i + 1 < command.length) {
      current += ch + command[++i];
      continue;
    }

    if (ch === '&' && command[i + 1] === '&') {
      segments.push(current.trim());
      current = '';
      i++;
      continue;
    }

    current += ch;
  }

  segments.push(current.trim());
  return segments.filter((s) => s.length > 0);
}

export function joinChain(segments: readonly string[]): string {
  return segments.join(` ${CHAIN_OPERATOR} `);
}
