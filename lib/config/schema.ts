/**
 * Configuration schema
 */

import { z } from 'zod';

const nonEmpty = z.string().trim().min(1);

export const blockSchema = z.object({
  label: nonEmpty,
  range: nonEmpty,
});

export const appConfigSchema = z.object({
  mode: z.enum(['columns', 'range']),
  namedColumns: z.object({
    requiredColumns: z.array(nonEmpty).min(1),
  }),
  range: z.object({
    headerPresent: z.boolean(),
    blocks: z.array(blockSchema),
    conditions: z.array(nonEmpty),
  }),
  provenance: z.object({
    fileColumn: nonEmpty,
    conditionColumn: nonEmpty,
  }),
  output: z.object({
    directory: nonEmpty,
    baseName: nonEmpty,
  }),
});

/** Shape accepted from a JSON config file: every section and field optional */
export const configFileSchema = z
  .object({
    mode: appConfigSchema.shape.mode,
    namedColumns: appConfigSchema.shape.namedColumns.partial(),
    range: appConfigSchema.shape.range.partial(),
    provenance: appConfigSchema.shape.provenance.partial(),
    output: appConfigSchema.shape.output.partial(),
  })
  .partial()
  .strict();

export type AppConfig = z.infer<typeof appConfigSchema>;
export type ConfigOverrides = z.infer<typeof configFileSchema>;
