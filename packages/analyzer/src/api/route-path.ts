// ---------------------------------------------------------------------------
// File path → route pattern, for App Router and Pages Router layouts
// ---------------------------------------------------------------------------

export type RouterKind = "app" | "pages";

export interface RouteLocation {
  router: RouterKind;
  /** e.g. "/api/packages/[id]" */
  path: string;
}

const SCRIPT_EXT = /\.(?:ts|tsx|js|jsx|mjs|cjs)$/;

/**
 * Derive the route a handler file serves. Route groups (`(admin)`) and
 * parallel-route slots (`@modal`) do not appear in URLs and are dropped.
 * Returns undefined for paths outside an `app/` or `pages/` tree.
 */
export function routeFromFile(file: string): RouteLocation | undefined {
  const segments = file.split("/");
  const rootIdx = segments.findIndex((s) => s === "app" || s === "pages");
  if (rootIdx === -1) return undefined;
  if (rootIdx > 0 && !(rootIdx === 1 && segments[0] === "src")) return undefined;

  const router: RouterKind = segments[rootIdx] === "app" ? "app" : "pages";
  let rest = segments.slice(rootIdx + 1);
  if (rest.length === 0) return undefined;

  if (router === "app") {
    const last = rest[rest.length - 1] ?? "";
    if (!/^route\./.test(last)) return undefined;
    rest = rest.slice(0, -1);
  } else {
    const last = (rest[rest.length - 1] ?? "").replace(SCRIPT_EXT, "");
    rest = [...rest.slice(0, -1), last];
    if (last === "index") rest = rest.slice(0, -1);
  }

  const visible = rest.filter(
    (s) => s.length > 0 && !/^\(.*\)$/.test(s) && !s.startsWith("@"),
  );
  return { router, path: "/" + visible.join("/") };
}

/** Display form used in reports and test cases, e.g. "PATCH /api/packages/[id]". */
export function endpointLabel(method: string, path: string): string {
  return `${method} ${path}`;
}
