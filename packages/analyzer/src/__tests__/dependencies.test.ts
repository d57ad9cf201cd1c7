import { describe, it, expect } from "vitest";
import { UnparseableFileError } from "@diffscribe/model";
import { classifyBump, diffDependencies } from "../dependencies.js";

const BEFORE = JSON.stringify({
  name: "procurement-portal",
  dependencies: { next: "^13.5.0", zod: "^3.22.0", lodash: "^4.17.21" },
  devDependencies: { vitest: "^1.0.0" },
});

const AFTER = JSON.stringify({
  name: "procurement-portal",
  dependencies: { next: "^14.1.0", zod: "^3.23.8", "date-fns": "^3.0.0" },
  devDependencies: { vitest: "^1.0.1" },
});

describe("diffDependencies", () => {
  it("lists changes per section, sorted by name", () => {
    expect(diffDependencies("package.json", BEFORE, AFTER)).toEqual([
      { manifest: "package.json", name: "date-fns", section: "dependencies", after: "^3.0.0", bump: "added" },
      { manifest: "package.json", name: "lodash", section: "dependencies", before: "^4.17.21", bump: "removed" },
      { manifest: "package.json", name: "next", section: "dependencies", before: "^13.5.0", after: "^14.1.0", bump: "major" },
      { manifest: "package.json", name: "zod", section: "dependencies", before: "^3.22.0", after: "^3.23.8", bump: "minor" },
      { manifest: "package.json", name: "vitest", section: "devDependencies", before: "^1.0.0", after: "^1.0.1", bump: "patch" },
    ]);
  });

  it("treats a missing side as an empty manifest", () => {
    expect(diffDependencies("apps/web/package.json", undefined, AFTER).map((c) => c.bump)).toEqual([
      "added",
      "added",
      "added",
      "added",
    ]);
  });

  it("treats names shared with Object.prototype as ordinary packages", () => {
    const before = JSON.stringify({ dependencies: { constructor: "^1.0.0" } });
    const after = '{"dependencies":{"__proto__":"^2.0.0"}}';
    expect(diffDependencies("package.json", before, after)).toEqual([
      { manifest: "package.json", name: "__proto__", section: "dependencies", after: "^2.0.0", bump: "added" },
      { manifest: "package.json", name: "constructor", section: "dependencies", before: "^1.0.0", bump: "removed" },
    ]);
  });

  it("rejects a manifest that is not JSON", () => {
    expect(() => diffDependencies("package.json", "{", AFTER)).toThrow(UnparseableFileError);
  });
});

describe("classifyBump", () => {
  it.each([
    ["^1.2.0", "^2.0.0", "major"],
    ["~1.2.0", "~1.3.0", "minor"],
    ["1.2.0", "1.2.5", "patch"],
    ["^1.2.0", ">=1.2.0", "other"],
    ["workspace:*", "^1.0.0", "other"],
  ])("%s → %s is %s", (from, to, bump) => {
    expect(classifyBump(from, to)).toBe(bump);
  });
});
