import { describe, it, expect } from "vitest";
import type { FieldSpec } from "@diffscribe/model";
import { assessBreaking } from "../api/breaking.js";
import type { EndpointSignature, FieldShape } from "../types.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function field(name: string, overrides: Partial<FieldSpec> = {}): FieldSpec {
  return { name, type: "string", required: true, hasDefault: false, ...overrides };
}

const optional = (name: string): FieldSpec => field(name, { required: false });

function known(...fields: FieldSpec[]): FieldShape {
  return { kind: "known", fields };
}

function makeSig(overrides: Partial<EndpointSignature> = {}): EndpointSignature {
  return {
    method: "PATCH",
    path: "/api/packages/[id]",
    request: known(field("title")),
    response: known(field("id"), field("title")),
    authGuards: [],
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// (a) required request field removed
// ---------------------------------------------------------------------------

describe("assessBreaking — removed request fields", () => {
  it("breaks when a required field disappears", () => {
    const before = makeSig({ request: known(field("title"), field("owner")) });
    const after = makeSig({ request: known(field("title")) });
    expect(assessBreaking(before, after)).toEqual({
      breaking: true,
      reasons: ["required request field `owner` removed"],
    });
  });

  it("does not break when an optional field disappears", () => {
    const before = makeSig({ request: known(field("title"), optional("notes")) });
    const after = makeSig({ request: known(field("title")) });
    expect(assessBreaking(before, after)).toEqual({ breaking: false, reasons: [] });
  });

  it("treats a rename as a removal plus an addition", () => {
    const before = makeSig({ request: known(field("title")) });
    const after = makeSig({ request: known(field("name")) });
    expect(assessBreaking(before, after)).toEqual({
      breaking: true,
      reasons: [
        "required request field `title` removed",
        "required request field `name` added without a default",
      ],
    });
  });
});

// ---------------------------------------------------------------------------
// (b) required request field added
// ---------------------------------------------------------------------------

describe("assessBreaking — added request fields", () => {
  it("breaks when a required field without default is added", () => {
    const after = makeSig({ request: known(field("title"), field("fiscalYear")) });
    expect(assessBreaking(makeSig(), after)).toEqual({
      breaking: true,
      reasons: ["required request field `fiscalYear` added without a default"],
    });
  });

  it("does not break when the new field is optional or defaulted", () => {
    const after = makeSig({
      request: known(
        field("title"),
        optional("notes"),
        field("status", { required: false, hasDefault: true }),
      ),
    });
    expect(assessBreaking(makeSig(), after).breaking).toBe(false);
  });

  it("breaks when an optional field becomes required", () => {
    const before = makeSig({ request: known(field("title"), optional("notes")) });
    const after = makeSig({ request: known(field("title"), field("notes")) });
    expect(assessBreaking(before, after)).toEqual({
      breaking: true,
      reasons: ["request field `notes` is now required"],
    });
  });

  it("does not break when a required field gains a default", () => {
    const after = makeSig({
      request: known(field("title", { required: false, hasDefault: true })),
    });
    expect(assessBreaking(makeSig(), after).breaking).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// (c) response field removed
// ---------------------------------------------------------------------------

describe("assessBreaking — response fields", () => {
  it("breaks when a response field disappears", () => {
    const after = makeSig({ response: known(field("id")) });
    expect(assessBreaking(makeSig(), after)).toEqual({
      breaking: true,
      reasons: ["response field `title` removed"],
    });
  });

  it("does not break when a response field is added", () => {
    const after = makeSig({ response: known(field("id"), field("title"), field("status")) });
    expect(assessBreaking(makeSig(), after).breaking).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// (d) method or path change
// ---------------------------------------------------------------------------

describe("assessBreaking — method and path", () => {
  it("breaks when the method disappears", () => {
    expect(assessBreaking(makeSig(), undefined)).toEqual({
      breaking: true,
      reasons: ["PATCH removed from /api/packages/[id]"],
    });
  });

  it("breaks when the route moves", () => {
    const after = makeSig({ path: "/api/acquisitions/[id]" });
    expect(assessBreaking(makeSig(), after)).toEqual({
      breaking: true,
      reasons: ["route moved from /api/packages/[id] to /api/acquisitions/[id]"],
    });
  });

  it("does not break for a new endpoint or an unchanged one", () => {
    expect(assessBreaking(undefined, makeSig())).toEqual({ breaking: false, reasons: [] });
    expect(assessBreaking(makeSig(), makeSig())).toEqual({ breaking: false, reasons: [] });
  });
});

// ---------------------------------------------------------------------------
// Ambiguity
// ---------------------------------------------------------------------------

describe("assessBreaking — ambiguous shapes", () => {
  const dynamic: FieldShape = { kind: "unknown", reason: "request body is read without a schema or destructuring" };

  it("reports unknown when no condition can be decided", () => {
    const after = makeSig({ request: dynamic });
    expect(assessBreaking(makeSig(), after)).toEqual({
      breaking: "unknown",
      reasons: ["request: request body is read without a schema or destructuring"],
    });
  });

  it("still decides a condition that holds on the readable side", () => {
    const after = makeSig({ request: dynamic, response: known(field("id")) });
    expect(assessBreaking(makeSig(), after)).toEqual({
      breaking: true,
      reasons: ["response field `title` removed"],
    });
  });

  it("lists one reason per distinct ambiguity", () => {
    const before = makeSig({ request: dynamic });
    const after = makeSig({ request: dynamic, response: { kind: "unknown", reason: "response spreads `pkg`" } });
    expect(assessBreaking(before, after)).toEqual({
      breaking: "unknown",
      reasons: [
        "request: request body is read without a schema or destructuring",
        "response: response spreads `pkg`",
      ],
    });
  });
});
