/**
 * Entry record schemas: zod validation of persisted and imported entries
 */

import { z } from 'zod';

export const ALIAS_PATTERN = /^[a-zA-Z0-9_-]+$/;

export const PlaceholderSchema = z.object({
  name: z.string().regex(/^[A-Za-z0-9_]+$/),
  default: z.string().optional(),
});

const EntryBaseSchema = z.object({
  alias: z.string().min(1).regex(ALIAS_PATTERN),
  command: z.string().min(1),
  description: z.string().default(''),
  tags: z.array(z.string()).default([]),
  createdAt: z.string().optional(),
});

export const LinkRecordSchema = EntryBaseSchema.extend({
  kind: z.literal('link'),
});

export const ChainRecordSchema = EntryBaseSchema.extend({
  kind: z.literal('chain'),
});

export const TemplateRecordSchema = EntryBaseSchema.extend({
  kind: z.literal('template'),
  placeholders: z.array(z.union([z.string(), PlaceholderSchema])).default([]),
});

export const EntryRecordSchema = z.discriminatedUnion('kind', [
  LinkRecordSchema,
  ChainRecordSchema,
  TemplateRecordSchema,
]);
export type EntryRecord = z.infer<typeof EntryRecordSchema>;

export const StoreDocumentSchema = z.object({
  version: z.literal(1),
  entries: z.array(z.unknown()),
});
export type StoreDocument = z.infer<typeof StoreDocumentSchema>;
