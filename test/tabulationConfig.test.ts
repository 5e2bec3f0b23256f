import { expect } from "chai";
import { ConfigurationError } from "../src/errors";
import { parseTabulationConfig } from "../src/tabulationConfig";
import { ALL, Members, aggregateNonExclusive } from "../src/tabulationEngine";
import type { LabelEntries, Row, TabulationSpec } from "../src/tabulationEngine";
import { captureError, loadFixture, loadRows } from "./support";

const people: Row[] = [
  { region: "N", status: "01", age: 20, income: 100 },
  { region: "N", status: "02", age: 30, income: 200 },
  { region: "S", status: "02", age: 40, income: 300 },
  { region: "S", status: "03", age: 50, income: 400 },
];

describe("JSON tabulation config", () => {
  it("builds a spec with default options", () => {
    const { spec, options } = parseTabulationConfig({
      groupcols: ["region"],
      categoryMappings: {
        status: [
          ["working", ["01", "02"]],
          ["student", ["02"]],
        ],
      },
      valuecols: ["income"],
    });

    expect(spec).to.deep.equal({
      groupcols: ["region"],
      categoryMappings: {
        status: [
          ["working", ["01", "02"]],
          ["student", ["02"]],
        ],
      },
      valuecols: ["income"],
    });
    expect(options.keepEmpty).to.equal(false);
    expect(options.grandTotal).to.equal(true);
    expect(options.totalCodes).to.equal(undefined);

    expect(aggregateNonExclusive(people, spec, options)).to.deep.equal([
      { region: "N", status: "working", income: 300 },
      { region: "N", status: "student", income: 200 },
      { region: "S", status: "working", income: 300 },
      { region: "S", status: "student", income: 300 },
      { region: "Total", status: "Total", income: 1000 },
    ]);
  });

  it("expands ranges and keeps the ALL sentinel", () => {
    const { spec } = parseTabulationConfig({
      categoryMappings: {
        age: { "20-39": { range: [20, 39] }, "40+": { range: [40, 99] }, all: "__ALL__" },
      },
      valuecols: ["income"],
      aggregations: { income: ["sum", "max"] },
    });

    expect(spec.groupcols).to.deep.equal([]);
    expect(spec.categoryMappings.age).to.deep.equal([
      ["20-39", Members.range(20, 39)],
      ["40+", Members.range(40, 99)],
      ["all", ALL],
    ]);
    expect(spec.aggregations).to.deep.equal({ income: ["sum", "max"] });
  });

  it("reports a missing valuecols list", () => {
    const err = captureError(
      () => parseTabulationConfig({ categoryMappings: {} }),
      ConfigurationError
    );

    expect(err.issues).to.deep.equal([
      { kind: "invalid-config", message: "valuecols: Required", path: ["valuecols"] },
    ]);
    expect(err.message).to.equal("valuecols: Required");
  });

  it("rejects unknown keys", () => {
    const err = captureError(
      () => parseTabulationConfig({ valuecols: ["n"], colour: "red" }),
      ConfigurationError
    );
    expect(err.message).to.equal("<root>: Unrecognized key(s) in object: 'colour'");
  });

  it("rejects unknown aggregates and fractional ranges", () => {
    const err = captureError(
      () =>
        parseTabulationConfig({
          valuecols: ["n"],
          aggregations: { n: "median" },
          categoryMappings: { Alder: { young: { range: [15.5, 24] } } },
        }),
      ConfigurationError
    );

    const paths = err.issues.map((i) => (i.path ?? []).slice(0, 2).join("."));
    expect(paths).to.have.members(["categoryMappings.Alder", "aggregations.n"]);
    err.issues.forEach((i) => expect(i.kind).to.equal("invalid-config"));
  });

  it("loads the same table as the equivalent programmatic spec", () => {
    const rows = loadRows("labourForce.json");
    const { spec, options } = parseTabulationConfig(loadFixture("labourForce.config.json"));

    const kjonn: LabelEntries = [
      ["Begge", ["1", "2"]],
      ["Menn", ["1"]],
      ["Kvinner", ["2"]],
    ];
    const alder: LabelEntries = [...Members.bands("15-24", "15-21", "25-66"), ["Alle", ALL]];
    const syssStudent: LabelEntries = [
      ["01", ["01", "02"]],
      ["03", ["02"]],
      ["05", ["03", "04"]],
    ];
    const programmatic: TabulationSpec = {
      groupcols: ["Kjonn", "Alder", "syss_student"],
      categoryMappings: { Kjonn: kjonn, Alder: alder, syss_student: syssStudent },
      valuecols: ["n", "timer"],
      aggregations: { n: "sum", timer: "mean" },
    };

    const fromConfig = aggregateNonExclusive(rows, spec, options);
    const direct = aggregateNonExclusive(rows, programmatic, {
      keepEmpty: true,
      totalCodes: { Kjonn: "Begge kjønn" },
    });

    expect(fromConfig).to.deep.equal(direct);
    expect(fromConfig).to.have.length(37);
    expect(fromConfig[36]).to.include({ Kjonn: "Begge kjønn", Alder: "Total", n: 100 });
  });
});
