import { Row, TabulationEngine } from "./tabulationEngine";

function runDslDemo() {
  const mappingText = `
# overlapping age bands
dimension age {
  "15-19" = 15..19
  "15-24" = 15..24
  "25-74" = 25..74
  all = ALL
}

dimension status {
  employed = "01", "02"
  students = "02", "03"
}
`;

  const tableText = `
table employment {
  group: region
  dimensions: age, status
  values: persons
  totals: region "Norway"
  keep_empty: true
}
`;

  const census: Row[] = [
    { region: "East", age: 16, status: "03", persons: 410 },
    { region: "East", age: 21, status: "02", persons: 620 },
    { region: "East", age: 47, status: "01", persons: 2300 },
    { region: "West", age: 18, status: "02", persons: 150 },
    { region: "West", age: 33, status: "01", persons: 1800 },
    { region: "West", age: 70, status: "04", persons: 90 },
  ];

  const engine = TabulationEngine.fromDataset(census)
    .useDslFile(mappingText)
    .useDslFile(tableText);

  console.log("DSL demo output:", engine.runTable("employment"));
  console.log("Without empty combinations:", engine.runTable("employment", { keepEmpty: false }));
}

if (require.main === module) {
  runDslDemo();
}

export { runDslDemo };
