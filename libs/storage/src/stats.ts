/**
 * Usage statistics
 *
 * Per-alias run counts and last-run timestamps, kept beside the entry store.
 * Statistics are informational: read and write failures are logged and
 * never interrupt a run.
 */

import * as fs from 'node:fs';
import { z } from 'zod';
import { noopLogger } from '@quicklaunch/core';
import type { Logger } from '@quicklaunch/core';
import { writeJsonAtomic } from './atomic-write.js';

const StatsDocumentSchema = z.object({
  usageCount: z.record(z.string(), z.number().int().nonnegative()).default({}),
  lastUsed: z.record(z.string(), z.string()).default({}),
});
export type StatsDocument = z.infer<typeof StatsDocumentSchema>;

/** Key names written by older installs. */
const LegacyStatsSchema = z.object({
  usage_count: z.record(z.string(), z.number().int().nonnegative()),
  last_used: z.record(z.string(), z.string()).default({}),
});

export interface UsageSummary {
  alias: string;
  count: number;
  lastUsed: string | null;
}

function emptyStats(): StatsDocument {
  return { usageCount: {}, lastUsed: {} };
}

export class UsageStats {
  // Maps, so aliases such as `constructor` never read an inherited member.
  private readonly counts: Map<string, number>;
  private readonly lastRuns: Map<string, string>;

  constructor(
    private readonly filePath: string,
    private readonly logger: Logger = noopLogger,
  ) {
    const data = this.read();
    this.counts = new Map(Object.entries(data.usageCount));
    this.lastRuns = new Map(Object.entries(data.lastUsed));
  }

  usage(alias: string): number {
    return this.counts.get(alias) ?? 0;
  }

  lastUsed(alias: string): string | null {
    return this.lastRuns.get(alias) ?? null;
  }

  totalUses(): number {
    let total = 0;
    for (const n of this.counts.values()) total += n;
    return total;
  }

  /** Most used first; ties by alias. */
  summary(): UsageSummary[] {
    return [...this.counts]
      .map(([alias, count]) => ({ alias, count, lastUsed: this.lastUsed(alias) }))
      .sort((a, b) => b.count - a.count || a.alias.localeCompare(b.alias));
  }

  record(alias: string, now: Date = new Date()): void {
    this.counts.set(alias, this.usage(alias) + 1);
    this.lastRuns.set(alias, now.toISOString());
    this.write();
  }

  remove(alias: string): void {
    const hadCount = this.counts.delete(alias);
    const hadLast = this.lastRuns.delete(alias);
    if (hadCount || hadLast) this.write();
  }

  private read(): StatsDocument {
    if (!fs.existsSync(this.filePath)) return emptyStats();

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
    } catch (err) {
      this.logger.warn(`ignoring unreadable stats file ${this.filePath}: ${err instanceof Error ? err.message : String(err)}`);
      return emptyStats();
    }

    const legacy = LegacyStatsSchema.safeParse(raw);
    if (legacy.success) {
      return { usageCount: legacy.data.usage_count, lastUsed: legacy.data.last_used };
    }

    const current = StatsDocumentSchema.safeParse(raw);
    if (current.success) return current.data;

    this.logger.warn(`ignoring malformed stats file ${this.filePath}`);
    return emptyStats();
  }

  private write(): void {
    try {
      const document: StatsDocument = {
        usageCount: Object.fromEntries(this.counts),
        lastUsed: Object.fromEntries(this.lastRuns),
      };
      writeJsonAtomic(this.filePath, document);
    } catch (err) {
      this.logger.warn(`could not save usage statistics: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
}
