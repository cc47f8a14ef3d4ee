/**
 * Template resolver
 *
 * Placeholders are `{name}` markers with `name` in [A-Za-z0-9_]. `${name}` is
 * shell parameter expansion and is left alone.
 */

import { MissingValueError } from './errors.js';
import type { Placeholder } from './types.js';

const MARKER = /(\$?)\{([A-Za-z0-9_]+)\}/g;

/**
 * Placeholder names in order of first occurrence, without duplicates.
 */
export function extractPlaceholders(command: string): string[] {
  const names: string[] = [];
  for (const match of command.matchAll(MARKER)) {
    if (match[1] === '$') continue;
    const name = match[2];
    if (!names.includes(name)) names.push(name);
  }
  return names;
}

/**
 * Recompute the placeholder list for `command`, keeping the defaults of names
 * that are still present.
 */
export function derivePlaceholders(command: string, previous: Placeholder[] = []): Placeholder[] {
  const defaults = new Map(previous.map((p) => [p.name, p.default]));
  return extractPlaceholders(command).map((name) => {
    const def = defaults.get(name);
    return def === undefined ? { name } : { name, default: def };
  });
}

/**
 * Substitute every placeholder in one pass. Throws MissingValueError, naming
 * all unresolved placeholders, before anything is substituted.
 */
export function resolveTemplate(
  command: string,
  values: Readonly<Record<string, string>>,
  placeholders: Placeholder[] = [],
): string {
  const defaults = new Map(placeholders.map((p) => [p.name, p.default]));
  const resolved = new Map<string, string>();
  const missing: string[] = [];

  for (const name of extractPlaceholders(command)) {
    const value = Object.prototype.hasOwnProperty.call(values, name) ? values[name] : defaults.get(name);
    if (value === undefined) {
      missing.push(name);
    } else {
      resolved.set(name, value);
    }
  }

  if (missing.length > 0) {
    throw new MissingValueError(missing);
  }

  return command.replace(MARKER, (marker: string, dollar: string, name: string) => {
    if (dollar === '$') return marker;
    return resolved.get(name) ?? marker;
  });
}

export interface PlaceholderRequest {
  name: string;
  default?: string;
  /** 0-based position among the template's placeholders. */
  index: number;
  total: number;
  /** True when the previous answer for this placeholder was rejected. */
  retry: boolean;
}

export type ResolutionStatus = 'collecting' | 'complete' | 'cancelled';

/**
 * Interactive placeholder collection as a request/response exchange.
 *
 * The caller asks for `current()`, answers with `submit()` or aborts with
 * `cancel()`. Nothing is substituted until every value is known.
 */
export class TemplateResolution {
  private readonly placeholders: Placeholder[];
  private readonly values = new Map<string, string>();
  private position = 0;
  private retry = false;
  private state: ResolutionStatus;

  constructor(
    private readonly command: string,
    placeholders: Placeholder[] = [],
  ) {
    this.placeholders = derivePlaceholders(command, placeholders);
    this.state = this.placeholders.length === 0 ? 'complete' : 'collecting';
  }

  get status(): ResolutionStatus {
    return this.state;
  }

  current(): PlaceholderRequest | null {
    if (this.state !== 'collecting') return null;
    const placeholder = this.placeholders[this.position];
    return {
      name: placeholder.name,
      default: placeholder.default,
      index: this.position,
      total: this.placeholders.length,
      retry: this.retry,
    };
  }

  /**
   * Answer the current request. An empty answer takes the default; without a
   * default the same request is asked again.
   */
  submit(raw: string): PlaceholderRequest | null {
    if (this.state !== 'collecting') return null;
    const placeholder = this.placeholders[this.position];
    const value = raw.trim();

    if (value === '') {
      if (placeholder.default === undefined) {
        this.retry = true;
        return this.current();
      }
      this.values.set(placeholder.name, placeholder.default);
    } else {
      this.values.set(placeholder.name, value);
    }

    this.retry = false;
    this.position += 1;
    if (this.position >= this.placeholders.length) {
      this.state = 'complete';
    }
    return this.current();
  }

  cancel(): void {
    if (this.state === 'collecting') {
      this.state = 'cancelled';
    }
  }

  /** Resolved command, or null unless every placeholder has been answered. */
  result(): string | null {
    if (this.state !== 'complete') return null;
    return resolveTemplate(this.command, this.collectedValues(), this.placeholders);
  }

  collectedValues(): Readonly<Record<string, string>> {
    // fromEntries defines own keys, `__proto__` included.
    return Object.fromEntries(this.values);
  }
}
