/**
 * Zod validation schemas for the project configuration file
 * Ensures configuration integrity at load time
 */

import { z } from 'zod';

export const LanguageSchema = z.enum(['typescript', 'javascript', 'python']);

export const GranularitySchema = z.enum(['file', 'package']);

export const ThresholdSchema = z
  .number({ invalid_type_error: 'must be a number' })
  .finite()
  .min(0, 'must be between 0 and 1')
  .max(1, 'must be between 0 and 1');

/**
 * Schema for one architecture layer
 */
export const LayerSchema = z.object({
  name: z.string().min(1),
  level: z.number().int(),
  description: z.string().optional(),
  patterns: z.array(z.string().min(1)).min(1),
});

export const AnalysisSectionSchema = z
  .object({
    godModuleThreshold: ThresholdSchema.optional(),
    granularity: GranularitySchema.optional(),
    sourceRoots: z.array(z.string()).optional(),
    languages: z.array(LanguageSchema).min(1).optional(),
    concurrency: z.number().int().positive().optional(),
  })
  .strict();

/**
 * Schema for `.modgraph.yaml`. Every section is optional.
 */
export const ProjectConfigSchema = z
  .object({
    analysis: AnalysisSectionSchema.optional(),
    ignore: z.array(z.string().min(1)).optional(),
    architecture: z
      .object({
        layers: z.array(LayerSchema).default([]),
      })
      .refine(data => new Set(data.layers.map(layer => layer.name)).size === data.layers.length, {
        message: 'layer names must be unique',
      })
      .optional(),
  })
  .strict();

export type ProjectConfigFile = z.infer<typeof ProjectConfigSchema>;
export type LayerConfig = z.infer<typeof LayerSchema>;
