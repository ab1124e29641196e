/**
 * Shared test records
 */

import type { StudentRecord } from "../src/lib/records.js";

// Inserted in this order the id index is 3 -> 1 -> 2 (height 3) and the
// last-name index holds "smith" with "jones" on its left.
export const SAMPLE_RECORDS: StudentRecord[] = [
  { id: 3, first: "Ann", last: "Smith", major: "Math", gpa: 3.5 },
  { id: 1, first: "Bob", last: "smith", major: "Physics", gpa: 2.75 },
  { id: 2, first: "Cy", last: "Jones", major: "History", gpa: 4 },
];
