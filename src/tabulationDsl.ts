import {
  ConfigurationError,
  DslParseError,
  DuplicateLabelError,
  EmptyDimensionError,
} from "./errors";
import { ALL, Members, isAggregationOperator } from "./tabulationEngine";
import type {
  AggregationMap,
  AggregationSpec,
  CategoryMappings,
  KeepEmptyMode,
  MembershipSpec,
  TableDefinition,
  TabulationOptions,
  TabulationSpec,
} from "./tabulationEngine";

export type ParseResult<T> = { value: T; nextPos: number };
export type Parser<T> = (input: string, pos: number) => ParseResult<T> | null;

// whitespace and "#" line comments
function skipWs(input: string, pos: number): number {
  const match = /^(?:\s|#[^\n]*)*/.exec(input.slice(pos));
  return pos + (match ? match[0].length : 0);
}

function map<A, B>(parser: Parser<A>, fn: (value: A) => B): Parser<B> {
  return (input, pos) => {
    const result = parser(input, pos);
    if (!result) return null;
    return { value: fn(result.value), nextPos: result.nextPos };
  };
}

function seq<T extends unknown[]>(
  ...parsers: { [K in keyof T]: Parser<T[K]> }
): Parser<T> {
  return (input, pos) => {
    const values: unknown[] = [];
    let nextPos = pos;
    for (const p of parsers) {
      const result = p(input, nextPos);
      if (!result) return null;
      values.push(result.value);
      nextPos = result.nextPos;
    }
    return { value: values as T, nextPos };
  };
}

function choice<T>(...parsers: Parser<T>[]): Parser<T> {
  return (input, pos) => {
    for (const p of parsers) {
      const result = p(input, pos);
      if (result) return result;
    }
    return null;
  };
}

function many<T>(parser: Parser<T>): Parser<T[]> {
  return (input, pos) => {
    const values: T[] = [];
    let nextPos = pos;
    // eslint-disable-next-line no-constant-condition
    while (true) {
      const result = parser(input, nextPos);
      if (!result) break;
      values.push(result.value);
      nextPos = result.nextPos;
    }
    return { value: values, nextPos };
  };
}

function regex(re: RegExp): Parser<string> {
  const anchored = new RegExp("^(?:" + re.source + ")", re.flags);
  return (input, pos) => {
    const start = skipWs(input, pos);
    const slice = input.slice(start);
    const match = anchored.exec(slice);
    if (!match) return null;
    const nextPos = skipWs(input, start + match[0].length);
    return { value: match[0], nextPos };
  };
}

function token(text: string): Parser<string> {
  return (input, pos) => {
    const start = skipWs(input, pos);
    if (input.slice(start).startsWith(text)) {
      const nextPos = skipWs(input, start + text.length);
      return { value: text, nextPos };
    }
    return null;
  };
}

function symbol(text: string): Parser<string> {
  return token(text);
}

function keyword(word: string): Parser<string> {
  const re = new RegExp(word + "(?![A-Za-z0-9_])");
  return regex(re);
}

/** One or more items; never consumes a trailing separator. */
function sepBy1<T>(parser: Parser<T>, separator: Parser<string>): Parser<T[]> {
  return (input, pos) => {
    const first = parser(input, pos);
    if (!first) return null;
    const values: T[] = [first.value];
    let nextPos = first.nextPos;
    // eslint-disable-next-line no-constant-condition
    while (true) {
      const sep = separator(input, nextPos);
      if (!sep) break;
      const next = parser(input, sep.nextPos);
      if (!next) break;
      values.push(next.value);
      nextPos = next.nextPos;
    }
    return { value: values, nextPos };
  };
}

/* --------------------------------------------------------------------------
 * AST TYPES
 * -------------------------------------------------------------------------- */

export interface LabelAst {
  label: string;
  members: MembershipSpec;
}

export interface DimensionAst {
  name: string;
  labels: LabelAst[];
}

export type TableLineAst =
  | { kind: "group"; columns: string[] }
  | { kind: "dimensions"; names: string[] }
  | { kind: "values"; columns: string[] }
  | { kind: "aggregate"; items: Array<[string, string]> }
  | { kind: "totals"; items: Array<[string, string]> }
  | { kind: "keep_empty"; mode: KeepEmptyMode }
  | { kind: "grand_total"; enabled: boolean };

export interface TableAst {
  name: string;
  lines: TableLineAst[];
}

export interface DslFileAst {
  dimensions: DimensionAst[];
  tables: TableAst[];
}

/* --------------------------------------------------------------------------
 * LEXER HELPERS
 * -------------------------------------------------------------------------- */

const identifier: Parser<string> = regex(/[\p{L}_][\p{L}\p{N}_]*/u);
const numberToken: Parser<string> = regex(/-?\d+(?:\.\d+)?/);
const numberLiteral: Parser<number> = map(numberToken, (v) => Number(v));

function unquote(raw: string): string {
  const parsed: unknown = JSON.parse(raw);
  return typeof parsed === "string" ? parsed : raw;
}

// JSON-compatible escapes only, so unquote() never sees an invalid literal
const stringLiteral: Parser<string> = map(
  regex(/"(?:[^"\\\u0000-\u001f]|\\["\\/bfnrt]|\\u[0-9a-fA-F]{4})*"/),
  unquote
);

/* --------------------------------------------------------------------------
 * DIMENSION PARSER
 * -------------------------------------------------------------------------- */

const labelName: Parser<string> = choice(stringLiteral, numberToken, identifier);

const rangeMember: Parser<unknown[]> = map(
  seq(numberLiteral, symbol(".."), numberLiteral),
  ([from, , to]) => Members.range(from, to)
);

const member: Parser<unknown[]> = choice(
  rangeMember,
  map(numberLiteral, (n): unknown[] => [n]),
  map(stringLiteral, (s): unknown[] => [s])
);

const membersExpr: Parser<MembershipSpec> = choice<MembershipSpec>(
  map(keyword("ALL"), (): MembershipSpec => ALL),
  map(keyword("NONE"), (): MembershipSpec => []),
  map(sepBy1(member, symbol(",")), (lists): MembershipSpec => lists.flat())
);

export const labelDecl: Parser<LabelAst> = map(
  seq(labelName, symbol("="), membersExpr),
  ([label, , members]) => ({ label, members })
);

export const dimensionDecl: Parser<DimensionAst> = map(
  seq(keyword("dimension"), identifier, symbol("{"), many(labelDecl), symbol("}")),
  ([, name, , labels]) => ({ name, labels })
);

/* --------------------------------------------------------------------------
 * TABLE PARSER
 * -------------------------------------------------------------------------- */

const identList = sepBy1(identifier, symbol(","));

const booleanLiteral: Parser<boolean> = map(
  choice(keyword("true"), keyword("false")),
  (v) => v === "true"
);

const groupLine: Parser<TableLineAst> = map(
  seq(keyword("group"), symbol(":"), identList),
  ([, , columns]): TableLineAst => ({ kind: "group", columns })
);

const dimensionsLine: Parser<TableLineAst> = map(
  seq(keyword("dimensions"), symbol(":"), identList),
  ([, , names]): TableLineAst => ({ kind: "dimensions", names })
);

const valuesLine: Parser<TableLineAst> = map(
  seq(keyword("values"), symbol(":"), identList),
  ([, , columns]): TableLineAst => ({ kind: "values", columns })
);

const aggregateLine: Parser<TableLineAst> = map(
  seq(keyword("aggregate"), symbol(":"), sepBy1(seq(identifier, identifier), symbol(","))),
  ([, , items]): TableLineAst => ({ kind: "aggregate", items })
);

const totalsLine: Parser<TableLineAst> = map(
  seq(keyword("totals"), symbol(":"), sepBy1(seq(identifier, labelName), symbol(","))),
  ([, , items]): TableLineAst => ({ kind: "totals", items })
);

const keepEmptyLine: Parser<TableLineAst> = map(
  seq(
    keyword("keep_empty"),
    symbol(":"),
    choice(keyword("true"), keyword("false"), keyword("declared"))
  ),
  ([, , mode]): TableLineAst => ({ kind: "keep_empty", mode: mode === "declared" ? "declared" : mode === "true" })
);

const grandTotalLine: Parser<TableLineAst> = map(
  seq(keyword("grand_total"), symbol(":"), booleanLiteral),
  ([, , enabled]): TableLineAst => ({ kind: "grand_total", enabled })
);

const tableLine: Parser<TableLineAst> = choice(
  groupLine,
  dimensionsLine,
  valuesLine,
  aggregateLine,
  totalsLine,
  keepEmptyLine,
  grandTotalLine
);

export const tableDecl: Parser<TableAst> = map(
  seq(keyword("table"), identifier, symbol("{"), many(tableLine), symbol("}")),
  ([, name, , lines]) => ({ name, lines })
);

/* --------------------------------------------------------------------------
 * FILE PARSER + COMPILATION ENTRY POINTS
 * -------------------------------------------------------------------------- */

const fileParser: Parser<DslFileAst> = (input, pos) => {
  let nextPos = skipWs(input, pos);
  const dimensions: DimensionAst[] = [];
  const tables: TableAst[] = [];

  while (nextPos < input.length) {
    const dimension = dimensionDecl(input, nextPos);
    if (dimension) {
      dimensions.push(dimension.value);
      nextPos = dimension.nextPos;
      continue;
    }
    const table = tableDecl(input, nextPos);
    if (table) {
      tables.push(table.value);
      nextPos = table.nextPos;
      continue;
    }
    break;
  }

  nextPos = skipWs(input, nextPos);
  return { value: { dimensions, tables }, nextPos };
};

function failAt(input: string, pos: number): DslParseError {
  const offset = skipWs(input, pos);
  return new DslParseError(offset, input.slice(offset, offset + 20));
}

export function parseTabulationDsl(text: string): DslFileAst {
  const result = fileParser(text, 0);
  if (!result) throw failAt(text, 0);
  if (result.nextPos !== text.length) throw failAt(text, result.nextPos);
  return result.value;
}

export function parseAll<T>(parser: Parser<T>, input: string): T {
  const result = parser(input, 0);
  if (!result) throw failAt(input, 0);
  if (skipWs(input, result.nextPos) !== input.length) {
    throw failAt(input, result.nextPos);
  }
  return result.value;
}

export interface DslCompileResult {
  dimensions: CategoryMappings;
  tables: Record<string, TableDefinition>;
}

function compileTable(table: TableAst, dimensions: CategoryMappings): TableDefinition {
  const spec: TabulationSpec = { groupcols: [], categoryMappings: {}, valuecols: [] };
  const options: TabulationOptions = {};
  const aggregations: AggregationMap = {};

  for (const line of table.lines) {
    switch (line.kind) {
      case "group":
        spec.groupcols = line.columns;
        break;
      case "dimensions":
        line.names.forEach((name) => {
          if (!(name in dimensions)) {
            throw ConfigurationError.single(
              `Table "${table.name}" references unknown dimension "${name}"`,
              ["tables", table.name, "dimensions", name]
            );
          }
          spec.categoryMappings[name] = dimensions[name];
        });
        break;
      case "values":
        spec.valuecols = line.columns;
        break;
      case "aggregate":
        line.items.forEach(([column, op]) => {
          if (!isAggregationOperator(op)) {
            throw ConfigurationError.single(
              `Table "${table.name}" uses unknown aggregate "${op}" for "${column}"`,
              ["tables", table.name, "aggregate", column]
            );
          }
          const existing = aggregations[column];
          const previous: AggregationSpec[] =
            existing === undefined ? [] : Array.isArray(existing) ? existing : [existing];
          aggregations[column] = previous.length ? [...previous, op] : op;
        });
        break;
      case "totals":
        options.totalCodes = { ...options.totalCodes, ...Object.fromEntries(line.items) };
        break;
      case "keep_empty":
        options.keepEmpty = line.mode;
        break;
      case "grand_total":
        options.grandTotal = line.enabled;
        break;
    }
  }

  if (spec.valuecols.length === 0) {
    throw ConfigurationError.single(`Table "${table.name}" must list its values`, [
      "tables",
      table.name,
      "values",
    ]);
  }
  if (Object.keys(aggregations).length) spec.aggregations = aggregations;

  return { spec, options };
}

export function compileTabulationDsl(
  text: string,
  baseDimensions: CategoryMappings = {}
): DslCompileResult {
  const ast = parseTabulationDsl(text);
  const dimensions: CategoryMappings = { ...baseDimensions };

  ast.dimensions.forEach((dim) => {
    if (dim.labels.length === 0) throw new EmptyDimensionError(dim.name);
    const seen = new Set<string>();
    dim.labels.forEach(({ label }) => {
      if (seen.has(label)) throw new DuplicateLabelError(dim.name, label);
      seen.add(label);
    });
    dimensions[dim.name] = dim.labels.map(({ label, members }): [string, MembershipSpec] => [
      label,
      members,
    ]);
  });

  const tables: Record<string, TableDefinition> = {};
  ast.tables.forEach((table) => {
    tables[table.name] = compileTable(table, dimensions);
  });

  return { dimensions, tables };
}
