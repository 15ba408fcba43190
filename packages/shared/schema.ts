import { z } from "zod";

// Numbers arrive as JSON; positivity and count rules are enforced by the
// engine so that callers get coded input issues.
const finiteNumber = z.number().finite();

// Container configuration
export const containerSpecSchema = z.object({
  name: z.string().min(1),
  width: finiteNumber,
  height: finiteNumber,
  depth: finiteNumber,
  max_weight: finiteNumber,
});

export type ContainerSpecInput = z.infer<typeof containerSpecSchema>;

// Catalog item record (one row, expanded into `count` units)
export const itemRecordSchema = z.object({
  name: z.string().min(1),
  width: finiteNumber,
  height: finiteNumber,
  depth: finiteNumber,
  weight: finiteNumber,
  count: finiteNumber.default(1),
});

export type ItemRecordInput = z.infer<typeof itemRecordSchema>;

// Pack request; the configured default container is used when omitted
export const packRequestSchema = z.object({
  container: containerSpecSchema.optional(),
  items: z.array(itemRecordSchema),
});

export type PackRequest = z.infer<typeof packRequestSchema>;

// Catalog upload as raw CSV text
export const parseCatalogRequestSchema = z.object({
  csv: z.string().min(1),
});

export type ParseCatalogRequest = z.infer<typeof parseCatalogRequestSchema>;
