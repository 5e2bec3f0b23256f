// tabulationConfig.ts
// Loads a tabulation from plain JSON (a parsed config file, a request body).
// Structural checks are done by the zod schema below; column checks happen
// later, against the dataset, in the engine's own validation.

import { z } from "zod";
import { ConfigurationError } from "./errors";
import { ALL, AGGREGATION_OPERATORS, Members } from "./tabulationEngine";
import type {
  AggregationMap,
  CategoryMappings,
  MembershipSpec,
  TabulationOptions,
  TabulationSpec,
} from "./tabulationEngine";

const rawValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const membershipSchema = z.union([
  z.literal(ALL),
  z.array(rawValueSchema),
  z.object({ range: z.tuple([z.number().int(), z.number().int()]) }).strict(),
]);

const mappingSchema = z.union([
  z.record(z.string(), membershipSchema),
  z.array(z.tuple([z.string(), membershipSchema])),
]);

const aggregationSchema = z.enum(AGGREGATION_OPERATORS);

export const tabulationConfigSchema = z
  .object({
    groupcols: z.array(z.string()).default([]),
    categoryMappings: z.record(z.string(), mappingSchema).default({}),
    valuecols: z.array(z.string()).min(1),
    aggregations: z
      .record(z.string(), z.union([aggregationSchema, z.array(aggregationSchema).min(1)]))
      .optional(),
    totalCodes: z.record(z.string(), z.string()).optional(),
    keepEmpty: z.union([z.boolean(), z.literal("declared")]).default(false),
    grandTotal: z.boolean().default(true),
    fillValues: z.record(z.string(), z.number()).optional(),
  })
  .strict();

type MembershipConfig = z.infer<typeof membershipSchema>;
type MappingConfig = z.infer<typeof mappingSchema>;

function toMembership(config: MembershipConfig): MembershipSpec {
  if (config === ALL || Array.isArray(config)) return config;
  const [from, to] = config.range;
  return Members.range(from, to);
}

function toEntries(config: MappingConfig): Array<[string, MembershipSpec]> {
  const entries = Array.isArray(config) ? config : Object.entries(config);
  return entries.map(([label, members]): [string, MembershipSpec] => [
    label,
    toMembership(members),
  ]);
}

export interface TabulationConfig {
  spec: TabulationSpec;
  options: TabulationOptions;
}

export function parseTabulationConfig(input: unknown): TabulationConfig {
  const parsed = tabulationConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => {
        const path = issue.path.map(String);
        return {
          kind: "invalid-config" as const,
          message: `${path.length ? path.join(".") : "<root>"}: ${issue.message}`,
          path,
        };
      })
    );
  }

  const config = parsed.data;

  const categoryMappings: CategoryMappings = {};
  for (const [dimension, mapping] of Object.entries(config.categoryMappings)) {
    categoryMappings[dimension] = toEntries(mapping);
  }

  const spec: TabulationSpec = {
    groupcols: config.groupcols,
    categoryMappings,
    valuecols: config.valuecols,
  };
  if (config.aggregations) {
    const aggregations: AggregationMap = {};
    for (const [column, ops] of Object.entries(config.aggregations)) {
      aggregations[column] = Array.isArray(ops) ? [...ops] : ops;
    }
    spec.aggregations = aggregations;
  }

  return {
    spec,
    options: {
      totalCodes: config.totalCodes,
      keepEmpty: config.keepEmpty,
      grandTotal: config.grandTotal,
      fillValues: config.fillValues,
    },
  };
}
