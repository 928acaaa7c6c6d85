import { describe, it } from "node:test";
import assert from "node:assert";
import { readFileSync, readdirSync } from "node:fs";
import path from "node:path";

const root = process.cwd();

function scriptedTestFiles(): string[] {
  const pkg: unknown = JSON.parse(readFileSync(path.join(root, "package.json"), "utf8"));
  if (typeof pkg !== "object" || pkg === null || !("scripts" in pkg)) return [];
  const { scripts } = pkg;
  if (typeof scripts !== "object" || scripts === null || !("test" in scripts) || typeof scripts.test !== "string") return [];
  return scripts.test.split(/\s+/).filter((arg) => arg.endsWith(".test.ts"));
}

describe("npm test script", () => {
  it("names every test file under src/", () => {
    const onDisk = readdirSync(path.join(root, "src"), { recursive: true, encoding: "utf8" })
      .filter((f) => f.endsWith(".test.ts"))
      .map((f) => `src/${f.split(path.sep).join("/")}`)
      .sort();
    assert.deepStrictEqual([...scriptedTestFiles()].sort(), onDisk);
  });
});
