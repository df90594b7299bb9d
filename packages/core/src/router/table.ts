/**
 * Route lists and their compilation into a route table.
 *
 * A route table is built once at startup from an ordered list and never
 * changes afterwards. Order is priority: the first route that matches a
 * request handles it.
 */

import type { Logger } from "../app/types.ts";
import { ImproperlyConfiguredError } from "../errors/framework.ts";
import type { StandardSchema } from "../schema/standard.ts";
import { converters, isConverterName } from "./converters.ts";
import type {
  CompiledRoute,
  ConverterName,
  Handler,
  HttpMethod,
  ParamSpec,
  PathOptions,
  PatternPart,
  ResolvedParams,
  RouteDefinition,
  RouteTable,
} from "./types.ts";

const DEFAULT_METHODS: readonly HttpMethod[] = Object.freeze(["GET", "HEAD"]);
const PARAM_TOKEN = /:([a-zA-Z_][a-zA-Z0-9_]*)/g;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Declare a route.
 *
 * @example
 * ```typescript
 * path("/event/:eventId/", (ctx) => `Event ${ctx.params.eventId + 1n}`, {
 *   name: "event_detail",
 *   params: { eventId: "int" },
 * });
 * ```
 */
export function path<
  TPath extends string,
  TSpec extends ParamSpec<TPath> = ParamSpec<TPath>,
  TSchema extends StandardSchema | undefined = undefined,
>(
  pattern: TPath,
  handler: Handler<ResolvedParams<TPath, TSpec, TSchema>>,
  options: PathOptions<TPath, TSpec, TSchema> = {},
): RouteDefinition<ResolvedParams<TPath, TSpec, TSchema>> {
  const params: Record<string, ConverterName> = {};
  if (options.params) {
    const entries: [string, unknown][] = Object.entries(options.params);
    for (const [key, value] of entries) {
      if (value === undefined) continue;
      if (!isConverterName(value)) {
        throw new ImproperlyConfiguredError(
          `Unknown converter "${String(value)}" for :${key} in ${pattern}`,
        );
      }
      params[key] = value;
    }
  }

  return {
    pattern,
    name: options.name,
    params,
    methods: options.methods ?? DEFAULT_METHODS,
    schema: options.schema,
    handler,
  };
}

/**
 * Mount a list of routes under a prefix.
 *
 * @example
 * ```typescript
 * include("/courses", [path("/", courseList), path("/:pk/", courseDetail)]);
 * // patterns "/courses/" and "/courses/:pk/"
 * ```
 */
export function include(
  prefix: string,
  routes: readonly RouteDefinition[],
): RouteDefinition[] {
  return routes.map((route) => ({
    ...route,
    pattern: joinPattern(prefix, route.pattern),
  }));
}

export function joinPattern(base: string, pattern: string): string {
  if (base === "/" || base === "") {
    return pattern.startsWith("/") ? pattern : `/${pattern}`;
  }
  const normalizedBase = base.endsWith("/") ? base.slice(0, -1) : base;
  const normalizedPattern = pattern.startsWith("/") ? pattern : `/${pattern}`;
  return `${normalizedBase}${normalizedPattern}`;
}

function parsePattern(route: RouteDefinition): PatternPart[] {
  const { pattern } = route;
  const parts: PatternPart[] = [];
  const seen = new Set<string>();
  let last = 0;

  for (const token of pattern.matchAll(PARAM_TOKEN)) {
    const start = token.index ?? 0;
    const name = token[1];
    if (seen.has(name)) {
      throw new ImproperlyConfiguredError(
        `Parameter :${name} appears twice in ${pattern}`,
      );
    }
    seen.add(name);

    if (start > last) {
      parts.push({ kind: "static", value: pattern.slice(last, start) });
    }
    const converterName = route.params[name] ?? "str";
    parts.push({ kind: "param", name, converter: converters[converterName] });
    last = start + token[0].length;
  }

  if (last < pattern.length) {
    parts.push({ kind: "static", value: pattern.slice(last) });
  }

  for (const name of Object.keys(route.params)) {
    if (!seen.has(name)) {
      throw new ImproperlyConfiguredError(
        `Converter given for :${name}, which ${pattern} does not have`,
      );
    }
  }

  return parts;
}

function compile(route: RouteDefinition, index: number): CompiledRoute {
  if (!route.pattern.startsWith("/")) {
    throw new ImproperlyConfiguredError(
      `Route path must start with /: ${route.pattern}`,
    );
  }

  const parts = parsePattern(route);
  const source = parts
    .map((part) =>
      part.kind === "static"
        ? escapeRegExp(part.value)
        : `(${part.converter.regex})`
    )
    .join("");

  return Object.freeze({
    definition: route,
    regex: new RegExp(`^${source}$`),
    parts,
    index,
  });
}

function overlaps(a: readonly HttpMethod[], b: readonly HttpMethod[]): boolean {
  return a.some((method) => b.includes(method));
}

export interface RouteTableOptions {
  /** Receives a warning for every route an earlier one shadows */
  logger?: Logger;
}

/**
 * Compile and freeze a route list.
 *
 * Registering the same pattern twice is allowed. The earlier route keeps
 * winning and the later one is reported as shadowed.
 *
 * @throws {ImproperlyConfiguredError} On a malformed pattern, a converter
 * for a missing parameter, or a route name used twice
 */
export function createRouteTable(
  routes: readonly RouteDefinition[],
  options: RouteTableOptions = {},
): RouteTable {
  const compiled: CompiledRoute[] = [];
  const names = new Map<string, CompiledRoute>();

  routes.forEach((route, index) => {
    const entry = compile(route, index);

    const earlier = compiled.find((other) =>
      other.definition.pattern === route.pattern &&
      overlaps(other.definition.methods, route.methods)
    );
    if (earlier) {
      options.logger?.warn("Route shadowed by an earlier registration", {
        pattern: route.pattern,
        name: route.name,
        shadowedBy: earlier.definition.name ?? earlier.index,
      });
    }

    if (route.name !== undefined) {
      if (names.has(route.name)) {
        throw new ImproperlyConfiguredError(
          `Route name already used: ${route.name}`,
        );
      }
      names.set(route.name, entry);
    }

    compiled.push(entry);
  });

  return Object.freeze({
    routes: Object.freeze(compiled),
    names,
  });
}
