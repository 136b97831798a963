/**
 * zod schemas for everything read back from disk.
 */

import { z } from 'zod';

export const sidebarItemSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  level: z.number().int().nonnegative(),
  parentId: z.string().nullable(),
  children: z.array(z.string()),
  isExpandable: z.boolean(),
  targetRef: z.string(),
});

export const sidebarStructureSchema = z.object({
  items: z.record(sidebarItemSchema),
  roots: z.array(z.string()),
  sourceUrl: z.string().min(1),
  capturedAt: z.string().min(1),
  totalItemCount: z.number().int().nonnegative(),
  validItemCount: z.number().int().nonnegative(),
});

export const cacheRecordSchema = z.object({
  schemaVersion: z.number().int().positive(),
  sourceUrl: z.string().min(1),
  capturedAt: z.string().min(1),
  integrity: z.object({
    itemCount: z.number().int().nonnegative(),
    checksum: z.string().regex(/^[0-9a-f]{64}$/),
  }),
  structure: sidebarStructureSchema,
});

export type CacheRecord = z.infer<typeof cacheRecordSchema>;

const schemaFieldSchema = z.object({
  name: z.string(),
  type: z.string(),
  required: z.boolean(),
  description: z.string(),
});

export const pageContentSchema = z.object({
  title: z.string().min(1, 'page has no title'),
  url: z.string(),
  description: z.string().nullable(),
  parameters: z.array(
    z.object({
      name: z.string().min(1),
      location: z.string(),
      type: z.string(),
      required: z.boolean(),
      description: z.string(),
    }),
  ),
  responses: z.array(
    z.object({
      statusCode: z.string().min(1),
      description: z.string(),
      fields: z.array(schemaFieldSchema),
    }),
  ),
  schemaFields: z.array(schemaFieldSchema),
});

export const extractedPageSchema = pageContentSchema.extend({
  itemId: z.string().min(1),
  breadcrumbs: z.array(z.string()),
  extractedAt: z.string().min(1),
});

export type ExtractedPage = z.infer<typeof extractedPageSchema>;
