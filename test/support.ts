import { readFileSync } from "fs";
import path from "path";
import { expect } from "chai";
import type { Row } from "../src/tabulationEngine";

function isRow(value: unknown): value is Row {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function loadFixture(fixture: string): unknown {
  return JSON.parse(readFileSync(path.join(__dirname, "fixtures", fixture), "utf8"));
}

export function loadRows(fixture: string): Row[] {
  const parsed = loadFixture(fixture);
  if (!Array.isArray(parsed)) throw new Error(`${fixture} does not hold an array`);
  return parsed.filter(isRow);
}

export function captureError<E extends Error>(
  fn: () => unknown,
  type: new (...args: never[]) => E
): E {
  try {
    fn();
  } catch (err) {
    expect(err).to.be.instanceOf(type);
    if (err instanceof type) return err;
  }
  throw new Error(`expected ${type.name} to be thrown`);
}
