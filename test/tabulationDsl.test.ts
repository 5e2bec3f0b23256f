import { expect } from "chai";
import {
  ConfigurationError,
  DslParseError,
  DuplicateLabelError,
  EmptyDimensionError,
} from "../src/errors";
import {
  compileTabulationDsl,
  dimensionDecl,
  labelDecl,
  parseAll,
  parseTabulationDsl,
  tableDecl,
} from "../src/tabulationDsl";
import { ALL, Members, TabulationEngine, aggregateNonExclusive } from "../src/tabulationEngine";
import type { LabelEntries, TabulationSpec } from "../src/tabulationEngine";
import { captureError, loadRows } from "./support";

const labourForceDsl = `
# overlapping age bands
dimension Alder {
  "15-24" = 15..24
  "15-21" = 15..21
  "25-66" = 25..66
  Alle = ALL
}

dimension syss_student {
  "01" = "01", "02"
  "03" = "02"
}

table employed {
  group: Tid
  dimensions: Alder, syss_student
  values: n, timer
  aggregate: n sum, n count, timer mean
  totals: Alder "Alle", Tid "I alt"
  keep_empty: declared
  grand_total: false
}
`;

describe("mapping DSL parser", () => {
  it("parses label declarations", () => {
    expect(parseAll(labelDecl, `"15-24" = 15..24`)).to.deep.equal({
      label: "15-24",
      members: Members.range(15, 24),
    });
    expect(parseAll(labelDecl, `"01" = "01", "02"`)).to.deep.equal({
      label: "01",
      members: ["01", "02"],
    });
    expect(parseAll(labelDecl, "low = 1..3, 7")).to.deep.equal({
      label: "low",
      members: [1, 2, 3, 7],
    });
    expect(parseAll(labelDecl, "Alle = ALL").members).to.equal(ALL);
    expect(parseAll(labelDecl, "nothing = NONE").members).to.deep.equal([]);
  });

  it("parses dimensions with comments and unicode names", () => {
    const dimension = parseAll(
      dimensionDecl,
      `dimension Kjønn {
        # both sexes first
        Begge = "1", "2"
        1 = "1"
        2 = "2"
      }`
    );

    expect(dimension.name).to.equal("Kjønn");
    expect(dimension.labels).to.deep.equal([
      { label: "Begge", members: ["1", "2"] },
      { label: "1", members: ["1"] },
      { label: "2", members: ["2"] },
    ]);
  });

  it("parses every table line", () => {
    const table = parseAll(
      tableDecl,
      `table employed {
        group: Tid
        dimensions: Alder, syss_student
        values: n, timer
        aggregate: n sum, n count, timer mean
        totals: Alder "Alle", Tid "I alt"
        keep_empty: declared
        grand_total: false
      }`
    );

    expect(table.name).to.equal("employed");
    expect(table.lines).to.deep.equal([
      { kind: "group", columns: ["Tid"] },
      { kind: "dimensions", names: ["Alder", "syss_student"] },
      { kind: "values", columns: ["n", "timer"] },
      {
        kind: "aggregate",
        items: [
          ["n", "sum"],
          ["n", "count"],
          ["timer", "mean"],
        ],
      },
      {
        kind: "totals",
        items: [
          ["Alder", "Alle"],
          ["Tid", "I alt"],
        ],
      },
      { kind: "keep_empty", mode: "declared" },
      { kind: "grand_total", enabled: false },
    ]);
  });

  it("reads keep_empty flags as booleans", () => {
    const table = parseAll(tableDecl, "table t { values: n keep_empty: true }");
    expect(table.lines[1]).to.deep.equal({ kind: "keep_empty", mode: true });
  });

  it("splits a file into dimensions and tables", () => {
    const ast = parseTabulationDsl(labourForceDsl);
    expect(ast.dimensions.map((d) => d.name)).to.deep.equal(["Alder", "syss_student"]);
    expect(ast.tables.map((t) => t.name)).to.deep.equal(["employed"]);
  });

  it("reports the offset where parsing stopped", () => {
    const err = captureError(
      () => parseTabulationDsl("dimension A { x = 1 }\nbogus"),
      DslParseError
    );
    expect(err.offset).to.equal(22);
    expect(err.message).to.equal('DSL parse error at offset 22: unexpected "bogus"');

    const incomplete = captureError(
      () => parseTabulationDsl("dimension A { x = }"),
      DslParseError
    );
    expect(incomplete.offset).to.equal(0);
  });
});

describe("mapping DSL compiler", () => {
  it("compiles dimensions and tables", () => {
    const { dimensions, tables } = compileTabulationDsl(labourForceDsl);

    expect(dimensions.syss_student).to.deep.equal([
      ["01", ["01", "02"]],
      ["03", ["02"]],
    ]);
    expect(tables.employed.spec).to.deep.equal({
      groupcols: ["Tid"],
      categoryMappings: { Alder: dimensions.Alder, syss_student: dimensions.syss_student },
      valuecols: ["n", "timer"],
      aggregations: { n: ["sum", "count"], timer: "mean" },
    });
    expect(tables.employed.options).to.deep.equal({
      totalCodes: { Alder: "Alle", Tid: "I alt" },
      keepEmpty: "declared",
      grandTotal: false,
    });
  });

  it("rejects repeated labels", () => {
    const err = captureError(
      () => compileTabulationDsl("dimension A { x = 1  x = 2 }"),
      DuplicateLabelError
    );
    expect(err.dimension).to.equal("A");
    expect(err.label).to.equal("x");
  });

  it("rejects dimensions without labels", () => {
    const err = captureError(() => compileTabulationDsl("dimension A { }"), EmptyDimensionError);
    expect(err.dimension).to.equal("A");
  });

  it("rejects tables that reference undeclared dimensions", () => {
    const err = captureError(
      () => compileTabulationDsl("table t { dimensions: Nope values: n }"),
      ConfigurationError
    );
    expect(err.message).to.equal('Table "t" references unknown dimension "Nope"');
  });

  it("rejects unknown aggregates", () => {
    const err = captureError(
      () => compileTabulationDsl("table t { values: n aggregate: n median }"),
      ConfigurationError
    );
    expect(err.message).to.equal('Table "t" uses unknown aggregate "median" for "n"');
  });

  it("requires a values line", () => {
    const err = captureError(
      () => compileTabulationDsl("table t { group: Tid }"),
      ConfigurationError
    );
    expect(err.message).to.equal('Table "t" must list its values');
  });

  it("produces the same table as the equivalent programmatic spec", () => {
    const rows = loadRows("labourForce.json");

    const alder: LabelEntries = [...Members.bands("15-24", "15-21", "25-66"), ["Alle", ALL]];
    const syssStudent: LabelEntries = [
      ["01", ["01", "02"]],
      ["03", ["02"]],
    ];
    const spec: TabulationSpec = {
      groupcols: ["Tid"],
      categoryMappings: { Alder: alder, syss_student: syssStudent },
      valuecols: ["n", "timer"],
      aggregations: { n: ["sum", "count"], timer: "mean" },
    };

    const fromDsl = TabulationEngine.fromDataset(rows).useDslFile(labourForceDsl).runTable("employed");
    const direct = aggregateNonExclusive(rows, spec, {
      totalCodes: { Alder: "Alle", Tid: "I alt" },
      keepEmpty: "declared",
      grandTotal: false,
    });

    expect(fromDsl).to.have.length(3 * 4 * 2);
    expect(fromDsl).to.deep.equal(direct);
  });
});
