// tabulationEngine.ts
// Non-exclusive tabulation engine
//
// Key ideas:
//
// - A dimension is a set of labels, each label an independent membership
//   predicate over one raw column. Labels may overlap: one raw value can
//   satisfy several labels of the same dimension.
// - Every (dimension, label) pair becomes its own indicator column, so a row
//   can be marked under several labels at once.
// - Rows are bucketed by (group labels + every indicator column), then each
//   dimension's indicators are exploded back into one label column and the
//   partial aggregates sharing a final key are merged. A row therefore counts
//   once under every label combination it satisfies, and never twice under
//   the same one.
// - Grand totals and empty-combination rows are separate passes over the
//   finished table.

import Enumerable from "linq";
import {
  AggregationError,
  ConfigurationError,
  DuplicateLabelError,
  EmptyDimensionError,
  TabulationError,
} from "./errors";
import type { ValidationIssue, ValidationResult } from "./errors";
import { compileTabulationDsl } from "./tabulationDsl";

/* --------------------------------------------------------------------------
 * BASIC TYPES
 * -------------------------------------------------------------------------- */

export type Row = Record<string, unknown>;

export function rowsToEnumerable(rows: Row[] = []) {
  return Enumerable.from(rows);
}

export interface Dataset {
  columns: string[];
  rows: Row[];
}

/** Columns of a bare row list are the union of the keys of its rows. */
export function datasetFromRows(rows: Row[]): Dataset {
  const columns = rowsToEnumerable(rows)
    .selectMany((row: Row) => Object.keys(row))
    .distinct()
    .toArray();
  return { columns, rows };
}

function normalizeDataset(input: Dataset | Row[]): Dataset {
  return Array.isArray(input) ? datasetFromRows(input) : input;
}

/* --------------------------------------------------------------------------
 * MEMBERSHIP SPECS + DIMENSIONS
 * -------------------------------------------------------------------------- */

/** Sentinel: every raw value observed in the column at call time. */
export const ALL = "__ALL__";
export type AllMembers = typeof ALL;

export type MembershipSpec = AllMembers | readonly unknown[];

export type LabelEntries = ReadonlyArray<readonly [string, MembershipSpec]>;

/**
 * Ordered label → membership mapping of one dimension.
 *
 * Plain objects put integer-like keys ("1", "2") first, whatever order they
 * were written in; use a Map or an entry list when the order matters.
 * Only an entry list can repeat a label, which is rejected.
 */
export type DimensionMapping =
  | Readonly<Record<string, MembershipSpec>>
  | ReadonlyMap<string, MembershipSpec>
  | LabelEntries;

export type CategoryMappings = Record<string, DimensionMapping>;

export interface LabelDefinition {
  label: string;
  members: MembershipSpec;
}

export interface DimensionDefinition {
  /** Dimension name, which is also the raw column it classifies. */
  name: string;
  labels: LabelDefinition[];
}

function isEntryList(mapping: DimensionMapping): mapping is LabelEntries {
  return Array.isArray(mapping);
}

function isMapping(mapping: DimensionMapping): mapping is ReadonlyMap<string, MembershipSpec> {
  return mapping instanceof Map;
}

export function mappingEntries(mapping: DimensionMapping): LabelDefinition[] {
  if (isEntryList(mapping)) {
    return mapping.map(([label, members]) => ({ label, members }));
  }
  if (isMapping(mapping)) {
    return Array.from(mapping.entries(), ([label, members]) => ({ label, members }));
  }
  return Object.entries(mapping).map(([label, members]) => ({ label, members }));
}

export function defineDimension(name: string, mapping: DimensionMapping): DimensionDefinition {
  return { name, labels: mappingEntries(mapping) };
}

const BAND_LABEL = /^\s*(\d+)\s*-\s*(\d+)\s*$/;

export const Members = {
  of(...values: unknown[]): unknown[] {
    return values;
  },

  /** Inclusive integer range; a reversed range matches nothing. */
  range(from: number, to: number): number[] {
    if (!Number.isInteger(from) || !Number.isInteger(to)) {
      throw ConfigurationError.single(`Range bounds must be integers (got ${from}..${to})`);
    }
    const values: number[] = [];
    for (let v = from; v <= to; v++) values.push(v);
    return values;
  },

  all(): AllMembers {
    return ALL;
  },

  /** Turns "15-24"-style band labels into label → inclusive range entries. */
  bands(...labels: string[]): Array<[string, number[]]> {
    return labels.map((label) => {
      const match = BAND_LABEL.exec(label);
      if (!match) {
        throw ConfigurationError.single(`Band label "${label}" is not of the form "<from>-<to>"`);
      }
      return [label, Members.range(Number(match[1]), Number(match[2]))];
    });
  },
};

/* --------------------------------------------------------------------------
 * AGGREGATES
 * -------------------------------------------------------------------------- */

export const AGGREGATION_OPERATORS = ["sum", "count", "mean", "avg", "min", "max"] as const;

export type AggregationOperator = (typeof AGGREGATION_OPERATORS)[number];

export interface CustomAggregation {
  name: string;
  reduce: (values: number[]) => number | null;
}

export type AggregationSpec = AggregationOperator | CustomAggregation;

export type AggregationMap = Record<string, AggregationSpec | AggregationSpec[]>;

export interface MeasureDefinition {
  /** Result column. */
  output: string;
  /** Value column the measure reads. */
  column: string;
  aggregate: string;
  numeric: boolean;
  reduce: (values: unknown[]) => number | null;
}

export function isAggregationOperator(value: string): value is AggregationOperator {
  return AGGREGATION_OPERATORS.some((op) => op === value);
}

function isMissing(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === "number" && Number.isNaN(value));
}

function numbersOf(values: unknown[]): number[] {
  return values.filter((v): v is number => typeof v === "number");
}

function reducerFor(spec: AggregationSpec): (values: unknown[]) => number | null {
  if (typeof spec !== "string") {
    return (values) => spec.reduce(numbersOf(values));
  }

  switch (spec) {
    case "count":
      return (values) => values.length;
    case "sum":
      return (values) => numbersOf(values).reduce((a, b) => a + b, 0);
    case "mean":
    case "avg":
      return (values) => {
        const nums = numbersOf(values);
        return nums.length ? nums.reduce((a, b) => a + b, 0) / nums.length : null;
      };
    case "min":
      return (values) => {
        const nums = numbersOf(values);
        return nums.length ? nums.reduce((a, b) => (b < a ? b : a)) : null;
      };
    case "max":
      return (values) => {
        const nums = numbersOf(values);
        return nums.length ? nums.reduce((a, b) => (b > a ? b : a)) : null;
      };
  }
}

export function buildMeasures(
  valuecols: string[],
  aggregations: AggregationMap = {}
): MeasureDefinition[] {
  return valuecols.flatMap((column) => {
    const configured = aggregations[column] ?? "sum";
    const specs = Array.isArray(configured) ? configured : [configured];
    return specs.map((spec) => {
      const aggregate = typeof spec === "string" ? spec : spec.name;
      return {
        output: specs.length === 1 ? column : `${column}_${aggregate}`,
        column,
        aggregate,
        numeric: spec !== "count",
        reduce: reducerFor(spec),
      };
    });
  });
}

/** Multiset of non-missing values per value column. */
export type PartialAggregate = Record<string, unknown[]>;

function emptyPartial(columns: string[]): PartialAggregate {
  const partial: PartialAggregate = {};
  columns.forEach((c) => (partial[c] = []));
  return partial;
}

function collectValues(partial: PartialAggregate, row: Row, measures: MeasureDefinition[]): void {
  const seen = new Set<string>();
  for (const measure of measures) {
    const value = row[measure.column];
    if (isMissing(value)) continue;
    if (measure.numeric && typeof value !== "number") {
      throw AggregationError.nonNumeric(measure.column, measure.aggregate, value);
    }
    if (seen.has(measure.column)) continue;
    seen.add(measure.column);
    partial[measure.column].push(value);
  }
}

function mergePartials(partials: PartialAggregate[], columns: string[]): PartialAggregate {
  const merged = emptyPartial(columns);
  for (const partial of partials) {
    columns.forEach((c) => merged[c].push(...partial[c]));
  }
  return merged;
}

/* --------------------------------------------------------------------------
 * QUERY SPEC + PLAN
 * -------------------------------------------------------------------------- */

export interface TabulationSpec {
  groupcols: string[];
  categoryMappings: CategoryMappings;
  valuecols: string[];
  aggregations?: AggregationMap;
}

export type KeepEmptyMode = boolean | "declared";

export interface TabulationOptions {
  /** Total label per group/dimension column; defaults to "Total". */
  totalCodes?: Record<string, string>;
  /** Materialize absent label combinations with null measures. */
  keepEmpty?: KeepEmptyMode;
  /** Append one whole-slice row under the total labels (default true). */
  grandTotal?: boolean;
  /** Replacement for the nulls of rows added by keepEmpty, per measure. */
  fillValues?: Record<string, number>;
}

export const DEFAULT_TOTAL_LABEL = "Total";

export interface TabulationPlan {
  /** Group columns without a mapping; their raw values are their labels. */
  identityColumns: string[];
  dimensions: DimensionDefinition[];
  /** Result key columns: groupcols, then the remaining dimensions. */
  keyColumns: string[];
  measures: MeasureDefinition[];
  valueColumns: string[];
  /** Definition order of the labels of every mapped column. */
  labelOrder: Map<string, Map<string, number>>;
}

export function planTabulation(spec: TabulationSpec): TabulationPlan {
  const mapped = new Set(Object.keys(spec.categoryMappings));
  const identityColumns = spec.groupcols.filter((c) => !mapped.has(c));
  const keyColumns = Array.from(new Set([...spec.groupcols, ...Object.keys(spec.categoryMappings)]));
  const dimensions = keyColumns
    .filter((c) => mapped.has(c))
    .map((c) => defineDimension(c, spec.categoryMappings[c]));

  const labelOrder = new Map<string, Map<string, number>>();
  dimensions.forEach((d) => {
    labelOrder.set(d.name, new Map(d.labels.map((l, i) => [l.label, i])));
  });

  const measures = buildMeasures(spec.valuecols, spec.aggregations);

  return {
    identityColumns,
    dimensions,
    keyColumns,
    measures,
    valueColumns: Array.from(new Set(measures.map((m) => m.column))),
    labelOrder,
  };
}

const naturalCollator = new Intl.Collator(undefined, { numeric: true });

function compareLabels(plan: TabulationPlan, column: string, a: string, b: string): number {
  const order = plan.labelOrder.get(column);
  if (order) {
    return (order.get(a) ?? order.size) - (order.get(b) ?? order.size);
  }
  return naturalCollator.compare(a, b);
}

function compareKeys(plan: TabulationPlan, a: string[], b: string[]): number {
  for (let i = 0; i < plan.keyColumns.length; i++) {
    const cmp = compareLabels(plan, plan.keyColumns[i], a[i], b[i]);
    if (cmp !== 0) return cmp;
  }
  return 0;
}

function buildRow(
  plan: TabulationPlan,
  key: string[],
  measureValue: (measure: MeasureDefinition) => number | null
): Row {
  const row: Row = {};
  plan.keyColumns.forEach((column, i) => (row[column] = key[i]));
  plan.measures.forEach((m) => (row[m.output] = measureValue(m)));
  return row;
}

function finalizeRow(plan: TabulationPlan, key: string[], partial: PartialAggregate): Row {
  return buildRow(plan, key, (m) => {
    try {
      return m.reduce(partial[m.column]);
    } catch (err) {
      if (err instanceof TabulationError) throw err;
      throw AggregationError.reducerFailed(m.column, m.aggregate, err);
    }
  });
}

function labelOf(row: Row, column: string): string {
  const value = row[column];
  return typeof value === "string" ? value : String(value);
}

/* --------------------------------------------------------------------------
 * STATIC ANALYSIS + VALIDATION
 * -------------------------------------------------------------------------- */

export function validateTabulation(
  dataset: Dataset | Row[],
  spec: TabulationSpec
): ValidationResult {
  const { columns, rows } = normalizeDataset(dataset);
  const known = new Set(columns);
  const issues: ValidationIssue[] = [];

  // a bare empty row list has no columns to check against
  const unknownColumns = rows.length === 0 && columns.length === 0;

  const checkColumn = (column: string, role: string, path: string[]) => {
    if (unknownColumns || known.has(column)) return;
    issues.push({
      kind: "missing-column",
      message: `${role} "${column}" is not a column of the dataset`,
      path,
      suggestion: "Correct the column name or add the column to the dataset.",
    });
  };

  spec.groupcols.forEach((c, i) => checkColumn(c, "Group column", ["groupcols", String(i)]));
  Object.keys(spec.categoryMappings).forEach((d) =>
    checkColumn(d, "Dimension", ["categoryMappings", d])
  );
  spec.valuecols.forEach((c, i) => checkColumn(c, "Value column", ["valuecols", String(i)]));

  const keyColumns = new Set([...spec.groupcols, ...Object.keys(spec.categoryMappings)]);
  spec.valuecols.forEach((c, i) => {
    buildMeasures([c], spec.aggregations).forEach(({ output }) => {
      if (!keyColumns.has(output)) return;
      issues.push({
        kind: "invalid-aggregation",
        message: `Measure "${output}" of value column "${c}" would overwrite the key column "${output}"`,
        path: ["valuecols", String(i)],
        suggestion: "List several aggregates for the column, or tabulate a copy of it.",
      });
    });
  });

  for (const [column, configured] of Object.entries(spec.aggregations ?? {})) {
    if (!spec.valuecols.includes(column)) {
      issues.push({
        kind: "invalid-aggregation",
        message: `Aggregation targets "${column}", which is not listed in valuecols`,
        path: ["aggregations", column],
        suggestion: "Add the column to valuecols or remove its aggregation.",
      });
    }
    const specs = Array.isArray(configured) ? configured : [configured];
    if (specs.length === 0) {
      issues.push({
        kind: "invalid-aggregation",
        message: `Aggregation list for "${column}" is empty`,
        path: ["aggregations", column],
      });
    }
    specs.forEach((agg) => {
      const valid =
        typeof agg === "string" ? isAggregationOperator(agg) : typeof agg.reduce === "function";
      if (!valid) {
        issues.push({
          kind: "invalid-aggregation",
          message: `Unsupported aggregate for "${column}": ${typeof agg === "string" ? agg : agg.name}`,
          path: ["aggregations", column],
          suggestion: `Use one of ${AGGREGATION_OPERATORS.join(", ")} or a { name, reduce } object.`,
        });
      }
    });
  }

  for (const [dimension, mapping] of Object.entries(spec.categoryMappings)) {
    const labels = mappingEntries(mapping);

    labels.forEach(({ label, members }) => {
      if (members !== ALL && !Array.isArray(members)) {
        issues.push({
          kind: "invalid-membership",
          message: `Label "${label}" of dimension "${dimension}" must map to a list of values or "${ALL}"`,
          path: ["categoryMappings", dimension, label],
          dimension,
          label,
        });
      }
    });

    if (labels.length === 0) {
      issues.push({
        kind: "empty-dimension",
        message: `Dimension "${dimension}" has no labels`,
        path: ["categoryMappings", dimension],
        dimension,
      });
    }

    const seen = new Set<string>();
    labels.forEach(({ label }) => {
      if (seen.has(label)) {
        issues.push({
          kind: "duplicate-label",
          message: `Dimension "${dimension}" defines label "${label}" more than once`,
          path: ["categoryMappings", dimension, label],
          dimension,
          label,
        });
      }
      seen.add(label);
    });
  }

  return { ok: issues.length === 0, issues };
}

/**
 * Throws the typed error for the first class of problem found:
 * configuration issues, then empty dimensions, then duplicate labels.
 */
export function assertValidTabulation(dataset: Dataset | Row[], spec: TabulationSpec): void {
  const { issues } = validateTabulation(dataset, spec);

  const config = issues.filter(
    (i) => i.kind !== "empty-dimension" && i.kind !== "duplicate-label"
  );
  if (config.length) throw new ConfigurationError(config);

  for (const issue of issues) {
    if (issue.kind === "empty-dimension" && issue.dimension !== undefined) {
      throw new EmptyDimensionError(issue.dimension);
    }
  }

  for (const issue of issues) {
    if (
      issue.kind === "duplicate-label" &&
      issue.dimension !== undefined &&
      issue.label !== undefined
    ) {
      throw new DuplicateLabelError(issue.dimension, issue.label);
    }
  }
}

/* --------------------------------------------------------------------------
 * MAPPING RESOLVER
 * -------------------------------------------------------------------------- */

/**
 * Concrete raw values a label matches. "ALL" is resolved against the column
 * passed in on every call; explicit values absent from the data are kept and
 * simply match nothing.
 */
export function resolveMembership(spec: MembershipSpec, rawColumn: readonly unknown[]): Set<unknown> {
  if (spec === ALL) return new Set(rawColumn);
  return new Set(spec);
}

/* --------------------------------------------------------------------------
 * PIVOT EXPANDER
 * -------------------------------------------------------------------------- */

export const NO_MATCH = null;
export type IndicatorMark = string | typeof NO_MATCH;

export interface IndicatorColumn {
  label: string;
  marks: IndicatorMark[];
}

export interface DimensionExpansion {
  dimension: string;
  /** One indicator column per label, in definition order. */
  indicators: IndicatorColumn[];
}

export function expandDimension(dimension: DimensionDefinition, rows: Row[]): DimensionExpansion {
  const rawColumn = rows.map((row) => row[dimension.name]);

  const indicators = dimension.labels.map(({ label, members }) => {
    const matching = resolveMembership(members, rawColumn);
    const marks: IndicatorMark[] = rawColumn.map(() => NO_MATCH);
    rawColumn.forEach((value, i) => {
      if (matching.has(value)) marks[i] = label;
    });
    return { label, marks };
  });

  return { dimension: dimension.name, indicators };
}

/* --------------------------------------------------------------------------
 * AGGREGATOR
 * -------------------------------------------------------------------------- */

export interface IndicatorBucket {
  /** Labels of the identity group columns. */
  groupLabels: string[];
  /** Indicator marks per dimension, per label. */
  marks: IndicatorMark[][];
  values: PartialAggregate;
}

interface IndicatorEntry {
  row: Row;
  groupLabels: string[];
  marks: IndicatorMark[][];
}

function identityLabels(row: Row, columns: string[]): string[] | null {
  const labels: string[] = [];
  for (const column of columns) {
    const value = row[column];
    if (isMissing(value)) return null;
    labels.push(String(value));
  }
  return labels;
}

export function aggregateIndicators(
  rows: Row[],
  plan: TabulationPlan,
  expansions: DimensionExpansion[]
): IndicatorBucket[] {
  return rowsToEnumerable(rows)
    .selectMany((row: Row, index: number): IndicatorEntry[] => {
      const groupLabels = identityLabels(row, plan.identityColumns);
      if (!groupLabels) return [];
      const marks = expansions.map((e) => e.indicators.map((ind) => ind.marks[index]));
      return [{ row, groupLabels, marks }];
    })
    .groupBy(
      (entry: IndicatorEntry) => JSON.stringify([entry.groupLabels, entry.marks]),
      (entry: IndicatorEntry) => entry
    )
    .select((group) => {
      const sample = group.first();
      const values = emptyPartial(plan.valueColumns);
      group.forEach((entry: IndicatorEntry) => collectValues(values, entry.row, plan.measures));
      return { groupLabels: sample.groupLabels, marks: sample.marks, values };
    })
    .toArray();
}

/* --------------------------------------------------------------------------
 * LONG-FORMAT REDUCER
 * -------------------------------------------------------------------------- */

interface LongEntry {
  groupLabels: string[];
  /** Resolved label per dimension processed so far. */
  labels: string[];
  marks: IndicatorMark[][];
  values: PartialAggregate;
}

function keyInColumnOrder(plan: TabulationPlan, entry: LongEntry): string[] {
  const byColumn = new Map<string, string>();
  plan.identityColumns.forEach((c, i) => byColumn.set(c, entry.groupLabels[i]));
  plan.dimensions.forEach((d, i) => byColumn.set(d.name, entry.labels[i]));
  return plan.keyColumns.map((c) => byColumn.get(c) ?? "");
}

export function reduceToLongFormat(buckets: IndicatorBucket[], plan: TabulationPlan): Row[] {
  let entries = Enumerable.from(
    buckets.map((b): LongEntry => ({ ...b, labels: [] }))
  );

  plan.dimensions.forEach((_, d) => {
    entries = entries.selectMany((entry: LongEntry): LongEntry[] =>
      entry.marks[d]
        .filter((mark): mark is string => mark !== NO_MATCH)
        .map((label) => ({ ...entry, labels: [...entry.labels, label] }))
    );
  });

  const merged = entries
    .groupBy(
      (entry: LongEntry) => JSON.stringify(keyInColumnOrder(plan, entry)),
      (entry: LongEntry) => entry
    )
    .select((group) => ({
      key: keyInColumnOrder(plan, group.first()),
      values: mergePartials(
        group.select((e: LongEntry) => e.values).toArray(),
        plan.valueColumns
      ),
    }))
    .toArray();

  merged.sort((a, b) => compareKeys(plan, a.key, b.key));
  return merged.map(({ key, values }) => finalizeRow(plan, key, values));
}

/* --------------------------------------------------------------------------
 * TOTALS INJECTOR
 * -------------------------------------------------------------------------- */

export function appendGrandTotal(
  result: Row[],
  rows: Row[],
  plan: TabulationPlan,
  totalCodes: Record<string, string> = {}
): Row[] {
  const values = emptyPartial(plan.valueColumns);
  rows.forEach((row) => collectValues(values, row, plan.measures));
  const key = plan.keyColumns.map((c) => totalCodes[c] ?? DEFAULT_TOTAL_LABEL);
  return [...result, finalizeRow(plan, key, values)];
}

/* --------------------------------------------------------------------------
 * COMPLETION FILLER
 * -------------------------------------------------------------------------- */

export interface FillOptions {
  /** "observed": labels present in the result; "declared": every mapped label. */
  vocabulary?: "observed" | "declared";
  fillValues?: Record<string, number>;
}

function cartesian(sets: string[][]): string[][] {
  return sets.reduce<string[][]>(
    (acc, set) => acc.flatMap((prefix) => set.map((label) => [...prefix, label])),
    [[]]
  );
}

export function fillEmptyCombinations(
  result: Row[],
  plan: TabulationPlan,
  options: FillOptions = {}
): Row[] {
  const declared = options.vocabulary === "declared";
  if (result.length === 0 && !declared) return [];

  const vocabulary = plan.keyColumns.map((column) => {
    const dimension = plan.dimensions.find((d) => d.name === column);
    if (declared && dimension) return dimension.labels.map((l) => l.label);
    return Enumerable.from(result)
      .select((row: Row) => labelOf(row, column))
      .distinct()
      .toArray()
      .sort((a, b) => compareLabels(plan, column, a, b));
  });

  const lookup = new Map<string, Row>();
  result.forEach((row) => {
    lookup.set(JSON.stringify(plan.keyColumns.map((c) => labelOf(row, c))), row);
  });

  return cartesian(vocabulary).map(
    (key) =>
      lookup.get(JSON.stringify(key)) ??
      buildRow(plan, key, (m) => options.fillValues?.[m.output] ?? null)
  );
}

/* --------------------------------------------------------------------------
 * MAIN ENTRY POINT
 * -------------------------------------------------------------------------- */

export function aggregateNonExclusive(
  input: Dataset | Row[],
  spec: TabulationSpec,
  options: TabulationOptions = {}
): Row[] {
  const dataset = normalizeDataset(input);
  assertValidTabulation(dataset, spec);

  const plan = planTabulation(spec);
  const expansions = plan.dimensions.map((d) => expandDimension(d, dataset.rows));
  const buckets = aggregateIndicators(dataset.rows, plan, expansions);

  let result = reduceToLongFormat(buckets, plan);

  if (options.keepEmpty) {
    result = fillEmptyCombinations(result, plan, {
      vocabulary: options.keepEmpty === "declared" ? "declared" : "observed",
      fillValues: options.fillValues,
    });
  }

  if (options.grandTotal ?? true) {
    result = appendGrandTotal(result, dataset.rows, plan, options.totalCodes);
  }

  return result;
}

/* --------------------------------------------------------------------------
 * ENGINE FACADE
 * -------------------------------------------------------------------------- */

export interface TableDefinition {
  spec: TabulationSpec;
  options: TabulationOptions;
}

export class TabulationEngine {
  private dataset: Dataset;
  private dimensions: CategoryMappings = {};
  private tables: Record<string, TableDefinition> = {};

  private constructor(dataset: Dataset) {
    this.dataset = dataset;
  }

  static fromDataset(dataset: Dataset | Row[]): TabulationEngine {
    return new TabulationEngine(normalizeDataset(dataset));
  }

  useDslFile(text: string): this {
    const { dimensions, tables } = compileTabulationDsl(text, this.dimensions);
    this.dimensions = dimensions;
    this.tables = { ...this.tables, ...tables };
    return this;
  }

  registerDimension(name: string, mapping: DimensionMapping): this {
    this.dimensions[name] = mapping;
    return this;
  }

  registerTable(name: string, spec: TabulationSpec, options: TabulationOptions = {}): this {
    this.tables[name] = { spec, options };
    return this;
  }

  getDimensions(): CategoryMappings {
    return { ...this.dimensions };
  }

  getTable(name: string): TableDefinition {
    const table = this.tables[name];
    if (!table) {
      throw ConfigurationError.single(`Unknown table: ${name}`, ["tables", name]);
    }
    return table;
  }

  /** Runs a registered table by name, or an ad-hoc spec. Options given here win over the table's. */
  runTable(nameOrSpec: string | TabulationSpec, options: TabulationOptions = {}): Row[] {
    const table: TableDefinition =
      typeof nameOrSpec === "string"
        ? this.getTable(nameOrSpec)
        : { spec: nameOrSpec, options: {} };
    return aggregateNonExclusive(this.dataset, table.spec, { ...table.options, ...options });
  }
}
