import {
  ALL,
  CategoryMappings,
  LabelEntries,
  Members,
  Row,
  TabulationEngine,
  TabulationSpec,
  aggregateNonExclusive,
} from "./tabulationEngine";

function runTabulationDemo() {
  const survey: Row[] = [
    { year: 2023, sex: "1", age: 17, status: "01", hours: 12 },
    { year: 2023, sex: "2", age: 19, status: "02", hours: 20 },
    { year: 2023, sex: "1", age: 34, status: "03", hours: 37.5 },
    { year: 2023, sex: "2", age: 45, status: "04", hours: 0 },
    { year: 2024, sex: "1", age: 22, status: "02", hours: 15 },
    { year: 2024, sex: "2", age: 23, status: "01", hours: 30 },
    { year: 2024, sex: "2", age: 51, status: "03", hours: 40 },
    { year: 2024, sex: "1", age: 63, status: "04", hours: null },
  ];

  const ageBands: LabelEntries = [...Members.bands("15-24", "25-66"), ["all", ALL]];

  // "02" (working students) is both employed and in education.
  const mappings: CategoryMappings = {
    sex: [
      ["both", ["1", "2"]],
      ["men", ["1"]],
      ["women", ["2"]],
    ],
    age: ageBands,
    status: [
      ["employed", ["01", "02", "03"]],
      ["in education", ["02", "04"]],
    ],
  };

  const spec: TabulationSpec = {
    groupcols: ["year"],
    categoryMappings: mappings,
    valuecols: ["hours"],
    aggregations: { hours: ["count", "sum", "mean"] },
  };

  const rows = aggregateNonExclusive(survey, spec, {
    totalCodes: { year: "all years" },
  });
  console.log("Non-exclusive tabulation:", rows);

  const engine = TabulationEngine.fromDataset(survey).registerTable(
    "bySexAndStatus",
    {
      groupcols: [],
      categoryMappings: { sex: mappings.sex, status: mappings.status },
      valuecols: ["hours"],
    },
    { keepEmpty: "declared", fillValues: { hours: 0 } }
  );

  console.log("With every declared label:", engine.runTable("bySexAndStatus"));
}

if (require.main === module) {
  runTabulationDemo();
}

export { runTabulationDemo };
