import { describe, it, expect } from "vitest";
import type { FieldSpec } from "@diffscribe/model";
import { diffEndpoints, describeAuthChange } from "../api/differ.js";
import { extractEndpoints } from "../api/extract.js";
import type { EndpointSignature } from "../types.js";

const ROUTE = "app/api/packages/[id]/route.ts";

function routeSource(schemaFields: string): string {
  return `
import { NextResponse } from "next/server";
import { z } from "zod";

const updateSchema = z.object({
${schemaFields}
});

export async function PATCH(request: Request, { params }: { params: { id: string } }) {
  const body = updateSchema.parse(await request.json());
  return NextResponse.json({ id: params.id, updated: true });
}
`;
}

const BASE = routeSource("  title: z.string(),");

const str = (name: string, overrides: Partial<FieldSpec> = {}): FieldSpec => ({
  name,
  type: "string",
  required: true,
  hasDefault: false,
  ...overrides,
});

describe("diffEndpoints — package update route", () => {
  it("flags removing `title` and requiring `name` as breaking", () => {
    const head = routeSource("  name: z.string(),");
    const [delta] = diffEndpoints(
      ROUTE,
      extractEndpoints(ROUTE, BASE),
      extractEndpoints(ROUTE, head),
    );

    expect(delta).toEqual({
      file: ROUTE,
      method: "PATCH",
      path: "/api/packages/[id]",
      changeType: "Modified",
      requestFieldDiffs: [
        { field: "title", before: str("title"), after: null },
        { field: "name", before: null, after: str("name") },
      ],
      responseFieldDiffs: [],
      breaking: true,
      breakingReasons: [
        "required request field `title` removed",
        "required request field `name` added without a default",
      ],
    });
  });

  it("treats a new optional `notes` field as non-breaking", () => {
    const head = routeSource("  title: z.string(),\n  notes: z.string().optional(),");
    const [delta] = diffEndpoints(
      ROUTE,
      extractEndpoints(ROUTE, BASE),
      extractEndpoints(ROUTE, head),
    );

    expect(delta?.breaking).toBe(false);
    expect(delta?.requestFieldDiffs).toEqual([
      { field: "notes", before: null, after: str("notes", { required: false }) },
    ]);
  });
});

describe("diffEndpoints — pairing", () => {
  const sig = (method: EndpointSignature["method"], authGuards: string[] = []): EndpointSignature => ({
    method,
    path: "/api/packages",
    request: { kind: "known", fields: [] },
    response: { kind: "known", fields: [str("id")] },
    authGuards,
  });

  it("lists head methods first, then removed ones", () => {
    const deltas = diffEndpoints(
      "app/api/packages/route.ts",
      [sig("GET"), sig("DELETE")],
      [sig("POST"), sig("GET")],
    );
    expect(deltas.map((d) => [d.method, d.changeType, d.breaking])).toEqual([
      ["POST", "New", false],
      ["GET", "Modified", false],
      ["DELETE", "Deleted", true],
    ]);
  });

  it("reports every endpoint of an added file as new, with its fields", () => {
    const [delta] = diffEndpoints("app/api/packages/route.ts", undefined, [sig("GET")]);
    expect(delta?.changeType).toBe("New");
    expect(delta?.responseFieldDiffs).toEqual([{ field: "id", before: null, after: str("id") }]);
  });

  it("describes guard changes", () => {
    const [delta] = diffEndpoints(
      "app/api/packages/route.ts",
      [sig("GET")],
      [sig("GET", ['requireRole("approver")'])],
    );
    expect(delta?.authChange).toBe('added requireRole("approver")');
  });

  it("omits field diffs for an unreadable side", () => {
    const unknown: EndpointSignature = {
      ...sig("GET"),
      response: { kind: "unknown", reason: "response spreads `pkg`" },
    };
    const [delta] = diffEndpoints("app/api/packages/route.ts", [sig("GET")], [unknown]);
    expect(delta?.responseFieldDiffs).toEqual([]);
    expect(delta?.breaking).toBe("unknown");
  });
});

describe("describeAuthChange", () => {
  it.each([
    [[], [], undefined],
    [["auth()"], ["auth()"], undefined],
    [[], ["auth()"], "added auth()"],
    [["auth()"], [], "removed auth()"],
    [['requireRole("editor")'], ['requireRole("approver")'], 'requireRole("editor") → requireRole("approver")'],
  ])("%j → %j", (before, after, expected) => {
    expect(describeAuthChange(before, after)).toBe(expected);
  });
});
