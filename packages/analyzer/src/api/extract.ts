import ts from "typescript";
import { UnparseableFileError } from "@diffscribe/model";
import type { FieldSpec, HttpMethod } from "@diffscribe/model";
import type { EndpointSignature, ExtractOptions, FieldShape } from "../types.js";
import { routeFromFile } from "./route-path.js";

export const DEFAULT_AUTH_GUARDS: readonly string[] = [
  "getServerSession",
  "auth",
  "requireAuth",
  "requireRole",
  "requireSession",
  "withAuth",
  "getCurrentUser",
];

const HTTP_METHODS: readonly HttpMethod[] = [
  "GET",
  "POST",
  "PUT",
  "PATCH",
  "DELETE",
  "HEAD",
  "OPTIONS",
];

const PARSE_METHODS = new Set(["parse", "safeParse", "parseAsync", "safeParseAsync"]);
const OPTIONAL_MODIFIERS = new Set(["optional", "nullish"]);
const DEFAULT_MODIFIERS = new Set(["default", "catch"]);
const SHAPE_PRESERVING = new Set([
  "strict",
  "passthrough",
  "strip",
  "refine",
  "superRefine",
  "transform",
  "describe",
  "brand",
]);
const MAX_RESOLVE_DEPTH = 8;

type FunctionLike =
  | ts.FunctionDeclaration
  | ts.FunctionExpression
  | ts.ArrowFunction;

type Scope = Map<string, ts.Expression>;

interface Handler {
  method: HttpMethod;
  fn: FunctionLike;
  /** Guards applied by a wrapper around the handler */
  wrapperGuards: string[];
}

function isHttpMethod(name: string): name is HttpMethod {
  return HTTP_METHODS.some((m) => m === name);
}

function isFunctionLike(node: ts.Node): node is FunctionLike {
  return (
    ts.isFunctionDeclaration(node) ||
    ts.isFunctionExpression(node) ||
    ts.isArrowFunction(node)
  );
}

function hasModifier(node: ts.Node, kind: ts.SyntaxKind): boolean {
  return ts.canHaveModifiers(node)
    ? (ts.getModifiers(node) ?? []).some((m) => m.kind === kind)
    : false;
}

function walk(node: ts.Node, visit: (n: ts.Node) => void): void {
  visit(node);
  ts.forEachChild(node, (child) => walk(child, visit));
}

function calleeName(call: ts.CallExpression): string | undefined {
  const e = call.expression;
  if (ts.isIdentifier(e)) return e.text;
  if (ts.isPropertyAccessExpression(e)) return e.name.text;
  return undefined;
}

function propertyName(name: ts.PropertyName): string | undefined {
  if (ts.isIdentifier(name) || ts.isStringLiteral(name) || ts.isNumericLiteral(name)) {
    return name.text;
  }
  return undefined;
}

// Source text on one line, for table cells
function sourceText(node: ts.Node): string {
  return node.getText().replace(/\s+/g, " ");
}

function unwrapExpression(expr: ts.Expression): ts.Expression {
  let e = expr;
  while (
    ts.isParenthesizedExpression(e) ||
    ts.isAsExpression(e) ||
    ts.isSatisfiesExpression(e) ||
    ts.isAwaitExpression(e) ||
    ts.isNonNullExpression(e)
  ) {
    e = e.expression;
  }
  return e;
}

function renderGuard(call: ts.CallExpression, name: string): string {
  const args = call.arguments.map((a) =>
    ts.isStringLiteralLike(a) ? JSON.stringify(a.text) : "…",
  );
  return `${name}(${args.join(", ")})`;
}

function scriptKind(file: string): ts.ScriptKind {
  if (file.endsWith(".tsx")) return ts.ScriptKind.TSX;
  if (file.endsWith(".jsx")) return ts.ScriptKind.JSX;
  if (/\.[cm]?js$/.test(file)) return ts.ScriptKind.JS;
  return ts.ScriptKind.TS;
}

// ---------------------------------------------------------------------------
// Syntax check: transpileModule reports syntactic diagnostics only
// ---------------------------------------------------------------------------

function firstSyntaxError(file: string, source: string): string | undefined {
  const { diagnostics = [] } = ts.transpileModule(source, {
    fileName: file,
    reportDiagnostics: true,
    compilerOptions: { jsx: ts.JsxEmit.Preserve, allowJs: true },
  });
  const error = diagnostics.find(
    (d) => d.file !== undefined && d.category === ts.DiagnosticCategory.Error,
  );
  return error ? ts.flattenDiagnosticMessageText(error.messageText, " ") : undefined;
}

// ---------------------------------------------------------------------------
// Scope — variable initializers and function declarations by name
// ---------------------------------------------------------------------------

function collectScope(root: ts.Node, into: Scope = new Map()): Scope {
  walk(root, (n) => {
    if (ts.isVariableDeclaration(n) && ts.isIdentifier(n.name) && n.initializer) {
      into.set(n.name.text, n.initializer);
    }
  });
  return into;
}

function topLevelFunctions(sf: ts.SourceFile): Map<string, FunctionLike> {
  const fns = new Map<string, FunctionLike>();
  for (const stmt of sf.statements) {
    if (ts.isFunctionDeclaration(stmt) && stmt.name) {
      fns.set(stmt.name.text, stmt);
    } else if (ts.isVariableStatement(stmt)) {
      for (const decl of stmt.declarationList.declarations) {
        const init = decl.initializer && unwrapExpression(decl.initializer);
        if (ts.isIdentifier(decl.name) && init && isFunctionLike(init)) {
          fns.set(decl.name.text, init);
        }
      }
    }
  }
  return fns;
}

// ---------------------------------------------------------------------------
// Handler discovery
// ---------------------------------------------------------------------------

/**
 * Peel wrapper calls such as `withAuth(async (req) => …)` down to the
 * function that handles the request.
 */
function unwrapHandler(
  expr: ts.Expression,
  functions: Map<string, FunctionLike>,
  guardNames: ReadonlySet<string>,
  guards: string[] = [],
  depth = 0,
): { fn: FunctionLike; guards: string[] } | undefined {
  const e = unwrapExpression(expr);
  if (isFunctionLike(e)) return { fn: e, guards };
  if (ts.isIdentifier(e)) {
    const fn = functions.get(e.text);
    return fn ? { fn, guards } : undefined;
  }
  if (ts.isCallExpression(e) && depth < MAX_RESOLVE_DEPTH) {
    const name = calleeName(e);
    const next = name && guardNames.has(name) ? [...guards, renderGuard(e, name)] : guards;
    for (const arg of e.arguments) {
      const found = unwrapHandler(arg, functions, guardNames, next, depth + 1);
      if (found) return found;
    }
  }
  return undefined;
}

function appRouterHandlers(
  sf: ts.SourceFile,
  functions: Map<string, FunctionLike>,
  guardNames: ReadonlySet<string>,
): Handler[] {
  const handlers: Handler[] = [];

  for (const stmt of sf.statements) {
    if (ts.isFunctionDeclaration(stmt) && stmt.name && isHttpMethod(stmt.name.text)) {
      if (hasModifier(stmt, ts.SyntaxKind.ExportKeyword)) {
        handlers.push({ method: stmt.name.text, fn: stmt, wrapperGuards: [] });
      }
    } else if (
      ts.isVariableStatement(stmt) &&
      hasModifier(stmt, ts.SyntaxKind.ExportKeyword)
    ) {
      for (const decl of stmt.declarationList.declarations) {
        if (!ts.isIdentifier(decl.name) || !decl.initializer) continue;
        const method = decl.name.text;
        if (!isHttpMethod(method)) continue;
        const found = unwrapHandler(decl.initializer, functions, guardNames);
        if (found) handlers.push({ method, fn: found.fn, wrapperGuards: found.guards });
      }
    } else if (
      ts.isExportDeclaration(stmt) &&
      !stmt.moduleSpecifier &&
      stmt.exportClause &&
      ts.isNamedExports(stmt.exportClause)
    ) {
      // export { handler as GET, handler as POST }
      for (const spec of stmt.exportClause.elements) {
        const method = spec.name.text;
        const local = (spec.propertyName ?? spec.name).text;
        const fn = functions.get(local);
        if (isHttpMethod(method) && fn) {
          handlers.push({ method, fn, wrapperGuards: [] });
        }
      }
    }
  }

  return handlers;
}

function firstParamName(fn: FunctionLike, index = 0): string | undefined {
  const param = fn.parameters[index];
  return param && ts.isIdentifier(param.name) ? param.name.text : undefined;
}

function pagesRouterHandlers(
  sf: ts.SourceFile,
  functions: Map<string, FunctionLike>,
  guardNames: ReadonlySet<string>,
): Handler[] {
  let found: { fn: FunctionLike; guards: string[] } | undefined;

  for (const stmt of sf.statements) {
    if (
      ts.isFunctionDeclaration(stmt) &&
      hasModifier(stmt, ts.SyntaxKind.ExportKeyword) &&
      hasModifier(stmt, ts.SyntaxKind.DefaultKeyword)
    ) {
      found = { fn: stmt, guards: [] };
    } else if (ts.isExportAssignment(stmt) && !stmt.isExportEquals) {
      found = unwrapHandler(stmt.expression, functions, guardNames);
    }
  }
  if (!found) return [];

  const { fn, guards } = found;
  const reqName = firstParamName(fn);
  const methods = new Set<HttpMethod>();

  const isMethodAccess = (e: ts.Expression): boolean =>
    ts.isPropertyAccessExpression(e) &&
    e.name.text === "method" &&
    ts.isIdentifier(e.expression) &&
    e.expression.text === reqName;

  const addLiteral = (e: ts.Expression): void => {
    if (ts.isStringLiteralLike(e)) {
      const m = e.text.toUpperCase();
      if (isHttpMethod(m)) methods.add(m);
    }
  };

  if (reqName && fn.body) {
    walk(fn.body, (n) => {
      if (ts.isBinaryExpression(n)) {
        const op = n.operatorToken.kind;
        if (
          op === ts.SyntaxKind.EqualsEqualsEqualsToken ||
          op === ts.SyntaxKind.EqualsEqualsToken ||
          op === ts.SyntaxKind.ExclamationEqualsEqualsToken ||
          op === ts.SyntaxKind.ExclamationEqualsToken
        ) {
          if (isMethodAccess(n.left)) addLiteral(n.right);
          else if (isMethodAccess(n.right)) addLiteral(n.left);
        }
      } else if (ts.isSwitchStatement(n) && isMethodAccess(n.expression)) {
        for (const clause of n.caseBlock.clauses) {
          if (ts.isCaseClause(clause)) addLiteral(clause.expression);
        }
      }
    });
  }

  const list: HttpMethod[] = methods.size > 0 ? [...methods] : ["ANY"];
  return list.map((method) => ({ method, fn, wrapperGuards: guards }));
}

// ---------------------------------------------------------------------------
// Zod schemas → request fields
// ---------------------------------------------------------------------------

const ZOD_NAMESPACES = new Set(["z", "zod"]);

// z.string(), z.coerce.number()
function isZodConstructor(target: ts.Expression): boolean {
  if (ts.isIdentifier(target)) return ZOD_NAMESPACES.has(target.text);
  return (
    ts.isPropertyAccessExpression(target) &&
    ts.isIdentifier(target.expression) &&
    ZOD_NAMESPACES.has(target.expression.text)
  );
}

function zodField(name: string, expr: ts.Expression, scope: Scope, depth = 0): FieldSpec {
  let e = unwrapExpression(expr);
  let optional = false;
  let hasDefault = false;
  let type = "unknown";

  for (let step = 0; step < 32; step++) {
    if (ts.isCallExpression(e) && ts.isPropertyAccessExpression(e.expression)) {
      const method = e.expression.name.text;
      const target = e.expression.expression;
      if (isZodConstructor(target)) {
        type = method;
        break;
      }
      if (OPTIONAL_MODIFIERS.has(method)) optional = true;
      if (DEFAULT_MODIFIERS.has(method)) hasDefault = true;
      e = target;
      continue;
    }
    if (ts.isIdentifier(e)) {
      const init = depth < MAX_RESOLVE_DEPTH ? scope.get(e.text) : undefined;
      if (init) {
        const shared = zodField(name, init, scope, depth + 1);
        type = shared.type;
        optional ||= !shared.required && !shared.hasDefault;
        hasDefault ||= shared.hasDefault;
      } else {
        type = e.text;
      }
    }
    break;
  }

  return { name, type, required: !optional && !hasDefault, hasDefault };
}

function objectLiteralFields(obj: ts.ObjectLiteralExpression, scope: Scope): FieldShape {
  const fields: FieldSpec[] = [];
  for (const prop of obj.properties) {
    if (ts.isPropertyAssignment(prop)) {
      const name = propertyName(prop.name);
      if (name === undefined) return { kind: "unknown", reason: "schema has a computed key" };
      fields.push(zodField(name, prop.initializer, scope));
    } else if (ts.isShorthandPropertyAssignment(prop)) {
      const name = prop.name.text;
      fields.push(
        scope.has(name)
          ? zodField(name, prop.name, scope)
          : { name, type: "unknown", required: true, hasDefault: false },
      );
    } else {
      return { kind: "unknown", reason: "schema shape is built dynamically" };
    }
  }
  return { kind: "known", fields };
}

function mergeFields(base: FieldSpec[], extra: FieldSpec[]): FieldSpec[] {
  const names = new Set(extra.map((f) => f.name));
  return [...base.filter((f) => !names.has(f.name)), ...extra];
}

function keysOfMask(arg: ts.Expression | undefined): Set<string> | undefined {
  if (!arg || !ts.isObjectLiteralExpression(arg)) return undefined;
  const keys = new Set<string>();
  for (const prop of arg.properties) {
    const name = prop.name && propertyName(prop.name);
    if (name !== undefined) keys.add(name);
  }
  return keys;
}

function schemaShape(expr: ts.Expression, scope: Scope, depth = 0): FieldShape {
  if (depth > MAX_RESOLVE_DEPTH) {
    return { kind: "unknown", reason: "schema references are nested too deeply" };
  }
  const e = unwrapExpression(expr);

  if (ts.isIdentifier(e)) {
    const init = scope.get(e.text);
    if (!init) {
      return { kind: "unknown", reason: `schema \`${e.text}\` is defined outside this file` };
    }
    return schemaShape(init, scope, depth + 1);
  }

  if (!ts.isCallExpression(e) || !ts.isPropertyAccessExpression(e.expression)) {
    return { kind: "unknown", reason: "request schema is not a z.object()" };
  }

  const method = e.expression.name.text;
  const target = e.expression.expression;
  const [arg] = e.arguments;

  if (method === "object" && ts.isIdentifier(target)) {
    if (!arg || !ts.isObjectLiteralExpression(arg)) {
      return { kind: "unknown", reason: "z.object() shape is not an object literal" };
    }
    return objectLiteralFields(arg, scope);
  }

  const inner = schemaShape(target, scope, depth + 1);
  if (inner.kind === "unknown") return inner;

  switch (method) {
    case "partial":
      return {
        kind: "known",
        fields: inner.fields.map((f) => ({ ...f, required: false })),
      };
    case "required":
      return {
        kind: "known",
        fields: inner.fields.map((f) => ({ ...f, required: true, hasDefault: false })),
      };
    case "extend": {
      if (!arg || !ts.isObjectLiteralExpression(arg)) {
        return { kind: "unknown", reason: "extend() shape is not an object literal" };
      }
      const extra = objectLiteralFields(arg, scope);
      if (extra.kind === "unknown") return extra;
      return { kind: "known", fields: mergeFields(inner.fields, extra.fields) };
    }
    case "merge": {
      if (!arg) return inner;
      const extra = schemaShape(arg, scope, depth + 1);
      if (extra.kind === "unknown") return extra;
      return { kind: "known", fields: mergeFields(inner.fields, extra.fields) };
    }
    case "pick":
    case "omit": {
      const keys = keysOfMask(arg);
      if (!keys) return { kind: "unknown", reason: `${method}() mask is not an object literal` };
      const keep = method === "pick";
      return {
        kind: "known",
        fields: inner.fields.filter((f) => keys.has(f.name) === keep),
      };
    }
    default:
      if (SHAPE_PRESERVING.has(method)) return inner;
      return { kind: "unknown", reason: `schema uses .${method}()` };
  }
}

// ---------------------------------------------------------------------------
// Request shape
// ---------------------------------------------------------------------------

function requestShape(fn: FunctionLike, scope: Scope): FieldShape {
  const reqName = firstParamName(fn);
  if (!reqName || !fn.body) return { kind: "known", fields: [] };

  const isBodyRead = (expr: ts.Expression): boolean => {
    const e = unwrapExpression(expr);
    if (
      ts.isCallExpression(e) &&
      ts.isPropertyAccessExpression(e.expression) &&
      e.expression.name.text === "json" &&
      ts.isIdentifier(e.expression.expression) &&
      e.expression.expression.text === reqName
    ) {
      return true;
    }
    return (
      ts.isPropertyAccessExpression(e) &&
      e.name.text === "body" &&
      ts.isIdentifier(e.expression) &&
      e.expression.text === reqName
    );
  };

  const bodyVars = new Set<string>();
  walk(fn.body, (n) => {
    if (
      ts.isVariableDeclaration(n) &&
      ts.isIdentifier(n.name) &&
      n.initializer &&
      isBodyRead(n.initializer)
    ) {
      bodyVars.add(n.name.text);
    }
  });

  const isBodyExpr = (expr: ts.Expression): boolean => {
    const e = unwrapExpression(expr);
    return isBodyRead(e) || (ts.isIdentifier(e) && bodyVars.has(e.text));
  };

  const found: { schema?: FieldShape; destructure?: FieldShape; readsBody: boolean } = {
    readsBody: false,
  };

  walk(fn.body, (n) => {
    if (ts.isCallExpression(n) && ts.isPropertyAccessExpression(n.expression)) {
      const method = n.expression.name.text;
      const target = n.expression.expression;
      if (
        ["json", "formData", "text", "arrayBuffer", "blob"].includes(method) &&
        ts.isIdentifier(target) &&
        target.text === reqName
      ) {
        found.readsBody = true;
      }
      const [arg] = n.arguments;
      if (!found.schema && PARSE_METHODS.has(method) && arg && isBodyExpr(arg)) {
        found.schema = schemaShape(target, scope);
      }
    } else if (ts.isPropertyAccessExpression(n) && isBodyRead(n)) {
      found.readsBody = true;
    }

    if (
      !found.destructure &&
      ts.isVariableDeclaration(n) &&
      ts.isObjectBindingPattern(n.name) &&
      n.initializer &&
      isBodyExpr(n.initializer)
    ) {
      found.destructure = bindingFields(n.name);
    }
  });

  if (found.schema) return found.schema;
  if (found.destructure) return found.destructure;
  if (found.readsBody) {
    return {
      kind: "unknown",
      reason: "request body is read without a schema or destructuring",
    };
  }
  return { kind: "known", fields: [] };
}

function bindingFields(pattern: ts.ObjectBindingPattern): FieldShape {
  const fields: FieldSpec[] = [];
  for (const el of pattern.elements) {
    if (el.dotDotDotToken) {
      return { kind: "unknown", reason: "request body is destructured with a rest element" };
    }
    const key = el.propertyName
      ? propertyName(el.propertyName)
      : ts.isIdentifier(el.name)
        ? el.name.text
        : undefined;
    if (key === undefined) {
      return { kind: "unknown", reason: "request body is destructured with a computed key" };
    }
    const hasDefault = el.initializer !== undefined;
    fields.push({ name: key, type: "unknown", required: !hasDefault, hasDefault });
  }
  return { kind: "known", fields };
}

// ---------------------------------------------------------------------------
// Response shape
// ---------------------------------------------------------------------------

function literalType(expr: ts.Expression): string {
  const e = unwrapExpression(expr);
  if (ts.isStringLiteralLike(e) || ts.isTemplateExpression(e)) return "string";
  if (ts.isNumericLiteral(e)) return "number";
  if (e.kind === ts.SyntaxKind.TrueKeyword || e.kind === ts.SyntaxKind.FalseKeyword) {
    return "boolean";
  }
  if (e.kind === ts.SyntaxKind.NullKeyword) return "null";
  if (ts.isArrayLiteralExpression(e)) return "array";
  if (ts.isObjectLiteralExpression(e)) return "object";
  return "unknown";
}

function statusOf(init: ts.Expression | undefined): number | undefined {
  if (!init || !ts.isObjectLiteralExpression(init)) return undefined;
  for (const prop of init.properties) {
    if (
      ts.isPropertyAssignment(prop) &&
      propertyName(prop.name) === "status" &&
      ts.isNumericLiteral(prop.initializer)
    ) {
      return Number(prop.initializer.text);
    }
  }
  return undefined;
}

function responseShape(fn: FunctionLike): FieldShape {
  if (!fn.body) return { kind: "known", fields: [] };
  const resName = firstParamName(fn, 1);
  const fields: FieldSpec[] = [];
  const seen = new Set<string>();
  const state: { unknownReason?: string } = {};

  walk(fn.body, (n) => {
    if (state.unknownReason) return;
    if (!ts.isCallExpression(n) || !ts.isPropertyAccessExpression(n.expression)) return;
    if (n.expression.name.text !== "json") return;

    const target = n.expression.expression;
    let status: number | undefined;
    if (ts.isIdentifier(target) && (target.text === "NextResponse" || target.text === "Response")) {
      status = statusOf(n.arguments[1]);
    } else if (ts.isIdentifier(target) && target.text === resName) {
      status = undefined;
    } else if (
      ts.isCallExpression(target) &&
      ts.isPropertyAccessExpression(target.expression) &&
      target.expression.name.text === "status" &&
      ts.isIdentifier(target.expression.expression) &&
      target.expression.expression.text === resName
    ) {
      const [code] = target.arguments;
      status = code && ts.isNumericLiteral(code) ? Number(code.text) : undefined;
    } else {
      return;
    }
    if (status !== undefined && status >= 400) return;

    const [payload] = n.arguments;
    if (!payload) return;
    const body = unwrapExpression(payload);
    if (!ts.isObjectLiteralExpression(body)) {
      state.unknownReason = `response body \`${sourceText(body)}\` is not an object literal`;
      return;
    }
    for (const prop of body.properties) {
      let name: string | undefined;
      let type = "unknown";
      if (ts.isPropertyAssignment(prop)) {
        name = propertyName(prop.name);
        type = literalType(prop.initializer);
      } else if (ts.isShorthandPropertyAssignment(prop)) {
        name = prop.name.text;
      } else if (ts.isSpreadAssignment(prop)) {
        state.unknownReason = `response spreads \`${sourceText(prop.expression)}\``;
        return;
      }
      if (name === undefined) {
        state.unknownReason = "response has a computed key";
        return;
      }
      if (!seen.has(name)) {
        seen.add(name);
        fields.push({ name, type, required: true, hasDefault: false });
      }
    }
  });

  return state.unknownReason
    ? { kind: "unknown", reason: state.unknownReason }
    : { kind: "known", fields };
}

// ---------------------------------------------------------------------------
// Auth guards
// ---------------------------------------------------------------------------

function guardCalls(fn: FunctionLike, guardNames: ReadonlySet<string>): string[] {
  const found: string[] = [];
  if (!fn.body) return found;
  walk(fn.body, (n) => {
    if (!ts.isCallExpression(n)) return;
    const name = calleeName(n);
    if (name && guardNames.has(name)) found.push(renderGuard(n, name));
  });
  return found;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Read every endpoint a route handler file serves.
 *
 * @throws {UnparseableFileError} when the file is not under a route tree,
 *   has syntax errors, or exports no handler
 */
export function extractEndpoints(
  file: string,
  source: string,
  options: ExtractOptions = {},
): EndpointSignature[] {
  const route = routeFromFile(file);
  if (!route) {
    throw new UnparseableFileError(file, "not a route handler under app/ or pages/");
  }

  const syntaxError = firstSyntaxError(file, source);
  if (syntaxError) {
    throw new UnparseableFileError(file, syntaxError);
  }

  const sf = ts.createSourceFile(file, source, ts.ScriptTarget.Latest, true, scriptKind(file));
  const guardNames = new Set(options.authGuards ?? DEFAULT_AUTH_GUARDS);
  const functions = topLevelFunctions(sf);
  const topScope = new Map<string, ts.Expression>();
  for (const stmt of sf.statements) {
    if (ts.isVariableStatement(stmt)) collectScope(stmt, topScope);
  }

  const handlers =
    route.router === "app"
      ? appRouterHandlers(sf, functions, guardNames)
      : pagesRouterHandlers(sf, functions, guardNames);
  if (handlers.length === 0) {
    throw new UnparseableFileError(file, "no exported HTTP method handler");
  }

  return handlers.map(({ method, fn, wrapperGuards }) => {
    const scope = collectScope(fn, new Map(topScope));
    const guards = [...wrapperGuards, ...guardCalls(fn, guardNames)];
    return {
      method,
      path: route.path,
      request: requestShape(fn, scope),
      response: responseShape(fn),
      authGuards: [...new Set(guards)],
    };
  });
}
