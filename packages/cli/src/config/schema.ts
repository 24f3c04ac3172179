import { z } from 'zod';
import { DEFAULT_GRAPH_LABEL } from '@depdot/core';

export const RANKDIRS = ['TB', 'LR', 'BT', 'RL'] as const;
export type Rankdir = (typeof RANKDIRS)[number];

export const DEFAULT_SOURCE_TIMEOUT_MS = 60_000;

const attributesSchema = z
  .record(z.string(), z.union([z.string(), z.number(), z.boolean()]))
  .default({});

const sourceConfigSchema = z
  .object({
    /** Command printing the `name:deps` listing on stdout */
    command: z.string().min(1).optional(),
    timeoutMs: z.number().int().positive().default(DEFAULT_SOURCE_TIMEOUT_MS),
  })
  .default({});

const graphConfigSchema = z
  .object({
    label: z.string().default(DEFAULT_GRAPH_LABEL),
    rankdir: z.enum(RANKDIRS).optional(),
    attributes: attributesSchema,
    nodeDefaults: attributesSchema,
    edgeDefaults: attributesSchema,
    clusterSeparator: z.string().min(1).optional(),
    highlight: z.array(z.string()).default([]),
  })
  .default({});

const inputConfigSchema = z
  .object({
    onMalformed: z.enum(['fail', 'skip']).default('fail'),
  })
  .default({});

export const depdotConfigSchema = z.object({
  source: sourceConfigSchema,
  graph: graphConfigSchema,
  input: inputConfigSchema,
});

export type DepdotConfig = z.infer<typeof depdotConfigSchema>;

export const defaultConfig: DepdotConfig = depdotConfigSchema.parse({});
