/**
 * Document decoding
 *
 * Reads the current store document and the formats older installs wrote:
 * a JSON map of alias to record (or to a bare command string), an export
 * file wrapping such a map in `commands`, and `alias: command` lines.
 */

import { z } from 'zod';
import { StoreDocumentSchema, fromRecord } from '@quicklaunch/core';
import type { Entry } from '@quicklaunch/core';

const LegacyCommandSchema = z.object({
  type: z.enum(['link', 'chain']).default('link'),
  command: z.string(),
  description: z.string().default(''),
  tags: z.array(z.string()).default([]),
  created: z.string().optional(),
});

const LegacyTemplateSchema = z.object({
  template: z.string(),
  description: z.string().default(''),
  placeholders: z.array(z.string()).default([]),
});

export interface DecodeResult {
  entries: Entry[];
  /** One line per record that was skipped. */
  skipped: string[];
  /** Set when the document as a whole could not be read. */
  fatal: string | null;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Turn one value of a legacy alias map into a record candidate for
 * `fromRecord`. Unknown shapes are passed through and rejected there.
 */
export function recordCandidate(alias: string, value: unknown): unknown {
  if (typeof value === 'string') {
    return { alias, kind: 'link', command: value };
  }
  if (!isPlainObject(value)) return value;
  if ('kind' in value) return { ...value, alias };

  const template = LegacyTemplateSchema.safeParse(value);
  if (template.success) {
    return {
      alias,
      kind: 'template',
      command: template.data.template,
      description: template.data.description,
      placeholders: template.data.placeholders,
    };
  }

  const command = LegacyCommandSchema.safeParse(value);
  if (command.success) {
    return {
      alias,
      kind: command.data.type,
      command: command.data.command,
      description: command.data.description,
      tags: command.data.tags,
      createdAt: command.data.created,
    };
  }

  return { ...value, alias };
}

/** Parse `alias: command` lines; `#` starts a comment line. */
export function parseLines(content: string): Array<{ alias: string; command: string }> {
  const pairs: Array<{ alias: string; command: string }> = [];
  for (const raw of content.split('\n')) {
    const line = raw.trim();
    if (line === '' || line.startsWith('#')) continue;
    const sep = line.indexOf(':');
    if (sep === -1) continue;
    const alias = line.slice(0, sep).trim();
    const command = line.slice(sep + 1).trim();
    if (alias && command) pairs.push({ alias, command });
  }
  return pairs;
}

class Collector {
  readonly entries: Entry[] = [];
  readonly skipped: string[] = [];
  private readonly seen = new Set<string>();

  constructor(private readonly fallbackCreatedAt: string) {}

  add(label: string, candidate: unknown): void {
    const parsed = fromRecord(candidate, this.fallbackCreatedAt);
    if (!parsed.ok) {
      this.skipped.push(`${label}: ${parsed.error}`);
      return;
    }
    if (this.seen.has(parsed.entry.alias)) {
      this.skipped.push(`${label}: duplicate alias '${parsed.entry.alias}'`);
      return;
    }
    this.seen.add(parsed.entry.alias);
    this.entries.push(parsed.entry);
  }

  result(fatal: string | null = null): DecodeResult {
    return { entries: this.entries, skipped: this.skipped, fatal };
  }
}

function decodeJson(data: unknown, out: Collector): DecodeResult {
  if (!isPlainObject(data)) {
    return out.result('expected a JSON object');
  }

  if ('version' in data && 'entries' in data) {
    const doc = StoreDocumentSchema.safeParse(data);
    if (!doc.success) {
      return out.result(doc.error.issues.map((i) => `${i.path.join('.') || 'document'}: ${i.message}`).join('; '));
    }
    doc.data.entries.forEach((record, i) => out.add(`entry ${i + 1}`, record));
    return out.result();
  }

  const map = 'commands' in data && isPlainObject(data.commands) ? data.commands : data;
  for (const [alias, value] of Object.entries(map)) {
    out.add(`'${alias}'`, recordCandidate(alias, value));
  }
  return out.result();
}

/**
 * Decode a stored or imported document. Invalid records are skipped and
 * reported; only an unreadable document sets `fatal`.
 */
export function decodeDocument(content: string, fallbackCreatedAt: string): DecodeResult {
  const out = new Collector(fallbackCreatedAt);
  const text = content.trim();
  if (text === '') return out.result();

  if (text.startsWith('{') || text.startsWith('[')) {
    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (err) {
      return out.result(`invalid JSON: ${err instanceof Error ? err.message : String(err)}`);
    }
    return decodeJson(data, out);
  }

  for (const { alias, command } of parseLines(text)) {
    out.add(`'${alias}'`, { alias, kind: 'link', command });
  }
  return out.result();
}
