/**
 * Conversion between in-memory items and the snake_case metadata block
 * written at the top of each item file.
 */

import { z } from "zod";
import { FileFormatError } from "./errors.js";
import { FORMATS, type FileExt } from "./formats.js";
import { ITEM_TYPES, type Item, type ItemRelations } from "./models.js";
import { sourceFromRecord, sourceToRecord, type SourceRecord } from "./operations.js";

const dateValue = z.union([
  z.date(),
  z
    .string()
    .refine((s) => !Number.isNaN(Date.parse(s)), "invalid date")
    .transform((s) => new Date(s)),
]);

const sourceRecordSchema = z.object({
  operation: z.object({
    action_name: z.string(),
    arguments: z.array(z.string()).default([]),
    options: z.record(z.string()).optional(),
  }),
  output_num: z.number().int().nonnegative(),
});

export const itemMetadataSchema = z.object({
  type: z.enum(ITEM_TYPES),
  title: z.string().optional(),
  url: z.string().optional(),
  description: z.string().optional(),
  format: z.enum(FORMATS).optional(),
  created_at: dateValue.optional(),
  modified_at: dateValue.optional(),
  state: z.enum(["normal", "transient"]).optional(),
  relations: z
    .object({
      derived_from: z.array(z.string()).optional(),
      diff_of: z.array(z.string()).optional(),
    })
    .optional(),
  history: z.array(sourceRecordSchema).optional(),
  thumbnail_url: z.string().optional(),
  extra: z.record(z.unknown()).optional(),
});

export type ItemMetadata = z.input<typeof itemMetadataSchema>;

/**
 * Ordered metadata for an item. Empty values are omitted; body, file
 * extension, external path and store path are never part of the block.
 */
export function itemToMetadata(item: Item): Record<string, unknown> {
  const data: Record<string, unknown> = { type: item.type };
  if (item.title) data.title = item.title;
  if (item.url) data.url = item.url;
  if (item.description) data.description = item.description;
  if (item.format) data.format = item.format;
  data.created_at = item.createdAt.toISOString();
  data.modified_at = item.modifiedAt.toISOString();
  if (item.state === "transient") data.state = item.state;

  const relations: Record<string, string[]> = {};
  if (item.relations.derivedFrom?.length) {
    relations.derived_from = [...item.relations.derivedFrom];
  }
  if (item.relations.diffOf?.length) {
    relations.diff_of = [...item.relations.diffOf];
  }
  if (Object.keys(relations).length > 0) data.relations = relations;

  if (item.history.length > 0) {
    const records: SourceRecord[] = item.history.map(sourceToRecord);
    data.history = records;
  }
  if (item.thumbnailUrl) data.thumbnail_url = item.thumbnailUrl;
  if (item.extra && Object.keys(item.extra).length > 0) {
    data.extra = { ...item.extra };
  }
  return data;
}

export interface MetadataExtras {
  body?: string;
  storePath?: string;
  externalPath?: string;
  fileExt?: FileExt;
  modifiedAt?: Date;
}

/**
 * Validate a parsed metadata block and build the item from it.
 */
export function itemFromMetadata(data: unknown, extras: MetadataExtras = {}): Item {
  const parsed = itemMetadataSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.join(".") || "metadata";
    throw new FileFormatError(
      `Invalid item metadata at ${where}: ${issue?.message ?? "unknown error"}`,
    );
  }
  const meta = parsed.data;
  const now = new Date();
  const createdAt = meta.created_at ?? extras.modifiedAt ?? now;

  const relations: ItemRelations = {};
  if (meta.relations?.derived_from) relations.derivedFrom = meta.relations.derived_from;
  if (meta.relations?.diff_of) relations.diffOf = meta.relations.diff_of;

  const item: Item = {
    type: meta.type,
    createdAt,
    modifiedAt: extras.modifiedAt ?? meta.modified_at ?? createdAt,
    relations,
    history: (meta.history ?? []).map(sourceFromRecord),
    state: meta.state ?? "normal",
  };
  if (meta.title !== undefined) item.title = meta.title;
  if (meta.url !== undefined) item.url = meta.url;
  if (meta.description !== undefined) item.description = meta.description;
  if (meta.format !== undefined) item.format = meta.format;
  if (meta.thumbnail_url !== undefined) item.thumbnailUrl = meta.thumbnail_url;
  if (meta.extra !== undefined) item.extra = meta.extra;
  if (extras.body !== undefined) item.body = extras.body;
  if (extras.storePath !== undefined) item.storePath = extras.storePath;
  if (extras.externalPath !== undefined) item.externalPath = extras.externalPath;
  if (extras.fileExt !== undefined) item.fileExt = extras.fileExt;
  return item;
}
