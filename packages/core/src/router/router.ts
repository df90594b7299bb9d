/**
 * Router over a compiled route table.
 *
 * Design:
 * - Routes are tried in table order; the first full match wins
 * - A typed segment that fails conversion makes its route not match, and
 *   the walk moves on to the next route
 * - Routes whose pattern matches but whose methods do not are remembered,
 *   so a miss can be told apart as "method not allowed"
 */

import { NoReverseMatchError } from "../errors/framework.ts";
import { validateStandard } from "../schema/standard.ts";
import type {
  CompiledRoute,
  HttpMethod,
  Resolution,
  RouteParamValues,
  RouteTable,
} from "./types.ts";

function decodeSegment(segment: string): string | undefined {
  try {
    return decodeURIComponent(segment);
  } catch {
    return undefined;
  }
}

function describeValue(value: unknown): string {
  return typeof value === "bigint" ? `${value}n` : JSON.stringify(value);
}

/**
 * Router class for resolving request paths against a route table.
 *
 * @example
 * ```typescript
 * const router = new Router(createRouteTable([
 *   path("/event/:eventId/", eventDetail, { params: { eventId: "int" } }),
 * ]));
 *
 * const resolution = await router.resolve("GET", "/event/7/");
 * if (resolution.status === "matched") {
 *   resolution.params; // { eventId: 7n }
 * }
 * ```
 */
export class Router {
  private readonly table: RouteTable;

  constructor(table: RouteTable) {
    this.table = table;
  }

  /**
   * Find the route for a method and path.
   */
  async resolve(method: string, pathname: string): Promise<Resolution> {
    const allowed: HttpMethod[] = [];

    for (const route of this.table.routes) {
      const params = await this.matchPath(route, pathname);
      if (!params) continue;

      const methods = route.definition.methods;
      if (!methods.some((m) => m === method)) {
        for (const m of methods) {
          if (!allowed.includes(m)) allowed.push(m);
        }
        continue;
      }

      return { status: "matched", route, params };
    }

    if (allowed.length > 0) {
      return { status: "method_not_allowed", allowed };
    }
    return { status: "not_found" };
  }

  /**
   * Build the path of a named route.
   *
   * @throws {NoReverseMatchError} If the name is unknown, a parameter is
   * missing or extra, or a value does not fit its converter
   */
  reverse(name: string, params: RouteParamValues = {}): string {
    const route = this.table.names.get(name);
    if (!route) {
      throw new NoReverseMatchError(`No route named "${name}"`);
    }

    const expected = new Set<string>();
    let result = "";

    for (const part of route.parts) {
      if (part.kind === "static") {
        result += part.value;
        continue;
      }

      expected.add(part.name);
      const value = params[part.name];
      if (value === undefined) {
        throw new NoReverseMatchError(
          `Missing parameter :${part.name} for route "${name}"`,
        );
      }

      const segment = part.converter.toUrl(value);
      if (segment === undefined) {
        throw new NoReverseMatchError(
          `Value ${describeValue(value)} does not fit :${part.name} of route "${name}"`,
        );
      }
      result += segment;
    }

    const extra = Object.keys(params).filter((key) => !expected.has(key));
    if (extra.length > 0) {
      throw new NoReverseMatchError(
        `Unexpected parameter(s) ${extra.join(", ")} for route "${name}"`,
      );
    }

    return result;
  }

  private async matchPath(
    route: CompiledRoute,
    pathname: string,
  ): Promise<RouteParamValues | null> {
    const match = route.regex.exec(pathname);
    if (!match) return null;

    const params: RouteParamValues = Object.create(null);
    let group = 1;
    for (const part of route.parts) {
      if (part.kind !== "param") continue;
      const raw = decodeSegment(match[group++]);
      if (raw === undefined) return null;
      const value = part.converter.toValue(raw);
      if (value === undefined) return null;
      params[part.name] = value;
    }

    const schema = route.definition.schema;
    if (!schema) return params;

    const result = await validateStandard(schema, params);
    if (!result.success) return null;

    const data: unknown = result.data;
    return typeof data === "object" && data !== null
      ? Object.assign(Object.create(null), data)
      : null;
  }
}
