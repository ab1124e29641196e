/**
 * Basic Usage Example
 *
 * Builds a small engine, queries it through both indexes and shows how the
 * comparison counts change with insertion order.
 */

import { createEngine } from "@heapdex/sdk";

interface Student {
  id: number;
  first: string;
  last: string;
  major: string;
}

function main(): void {
  const engine = createEngine<Student>();

  console.log("Inserting records...");
  engine.insertRecord({ id: 3, first: "Ann", last: "Smith", major: "Math" });
  engine.insertRecord({ id: 1, first: "Bob", last: "smith", major: "Physics" });
  engine.insertRecord({ id: 2, first: "Cy", last: "Jones", major: "History" });

  // Point lookup
  const found = engine.findById(2);
  console.log(`findById(2): ${found.record?.first} ${found.record?.last} in ${found.comparisons} comparisons`);

  // Range over ids
  const range = engine.rangeById(1, 3);
  console.log(`rangeById(1, 3): ids ${range.records.map((r) => r.id).join(", ")} in ${range.comparisons} comparisons`);

  // Case-insensitive prefix over last names
  const prefix = engine.prefixByLast("SM");
  console.log(`prefixByLast("SM"): ids ${prefix.records.map((r) => r.id).join(", ")}`);

  // Soft delete
  engine.deleteById(1);
  console.log(`after deleteById(1): prefix "sm" -> ${engine.prefixByLast("sm").records.length} record(s)`);
  console.log("stats:", engine.stats());

  // Sorted insertion degrades the id index to a chain
  const chain = createEngine<Student>();
  for (let id = 1; id <= 1000; id++) {
    chain.insertRecord({ id, first: "F", last: `L${id}`, major: "Undeclared" });
  }
  console.log(`sorted inserts: findById(1000) takes ${chain.findById(1000).comparisons} comparisons`);
}

main();
