/**
 * Type definitions for the router module.
 */

import type { Context } from "../context/context.ts";
import type { Infer, StandardSchema } from "../schema/standard.ts";

export type HttpMethod =
  | "GET"
  | "HEAD"
  | "POST"
  | "PUT"
  | "PATCH"
  | "DELETE"
  | "OPTIONS";

/**
 * Value types produced by each built-in converter.
 */
export interface ConverterTypes {
  /** Unbounded, so ids past Number.MAX_SAFE_INTEGER still match */
  int: bigint;
  str: string;
  slug: string;
  uuid: string;
  path: string;
}

export type ConverterName = keyof ConverterTypes;

/**
 * Turns one captured path segment into a typed value and back.
 */
export interface Converter<T = unknown> {
  /** Regex source matching a whole segment, without anchors or groups */
  readonly regex: string;
  /** Returns undefined when the segment cannot become a value */
  toValue(segment: string): T | undefined;
  /**
   * Percent-encoded path text for a value, or undefined when the value
   * cannot be written into a path
   */
  toUrl(value: unknown): string | undefined;
}

/**
 * Extract path parameter names from a path pattern.
 *
 * @example
 * ExtractPathParams<"/event/:eventId/"> // "eventId"
 */
export type ExtractPathParams<T extends string> = T extends
  `${string}:${infer Param}/${infer Rest}` ? Param | ExtractPathParams<`/${Rest}`>
  : T extends `${string}:${infer Param}` ? Param
  : never;

/**
 * Converter choice per parameter. Parameters left out use `str`.
 */
export type ParamSpec<TPath extends string> = {
  [K in ExtractPathParams<TPath>]?: ConverterName;
};

/**
 * Params object a handler receives for a pattern and its converters.
 *
 * @example
 * RouteParams<"/event/:eventId/", { eventId: "int" }> // { eventId: bigint }
 */
export type RouteParams<
  TPath extends string,
  TSpec extends ParamSpec<TPath>,
> = {
  [K in ExtractPathParams<TPath>]: TSpec[K] extends ConverterName
    ? ConverterTypes[TSpec[K]]
    : string;
};

export type ResolvedParams<
  TPath extends string,
  TSpec extends ParamSpec<TPath>,
  TSchema extends StandardSchema | undefined,
> = TSchema extends StandardSchema ? Infer<TSchema>
  : RouteParams<TPath, TSpec>;

export type RouteParamValues = Record<string, unknown>;

export type HandlerResult = string | Response;

export type Handler<TParams = RouteParamValues> = (
  ctx: Context<TParams>,
) => HandlerResult | Promise<HandlerResult>;

export interface PathOptions<
  TPath extends string,
  TSpec extends ParamSpec<TPath>,
  TSchema extends StandardSchema | undefined,
> {
  /** Name used by `Router.reverse()` */
  name?: string;
  params?: TSpec;
  /** Defaults to GET and HEAD */
  methods?: readonly HttpMethod[];
  /**
   * Checked against the converted params. A failing check makes the route
   * not match, as a failed conversion does.
   */
  schema?: TSchema;
}

/**
 * A route as written in a route list, before compilation.
 */
export interface RouteDefinition<TParams = RouteParamValues> {
  readonly pattern: string;
  readonly name?: string;
  readonly params: Readonly<Record<string, ConverterName>>;
  readonly methods: readonly HttpMethod[];
  readonly schema?: StandardSchema;
  handler(ctx: Context<TParams>): HandlerResult | Promise<HandlerResult>;
}

export type PatternPart =
  | { readonly kind: "static"; readonly value: string }
  | {
    readonly kind: "param";
    readonly name: string;
    readonly converter: Converter;
  };

/**
 * A route compiled into a matcher.
 */
export interface CompiledRoute {
  readonly definition: RouteDefinition;
  readonly regex: RegExp;
  readonly parts: readonly PatternPart[];
  /** Position in the table; lower wins */
  readonly index: number;
}

export interface RouteTable {
  readonly routes: readonly CompiledRoute[];
  readonly names: ReadonlyMap<string, CompiledRoute>;
}

export type Resolution =
  | {
    readonly status: "matched";
    readonly route: CompiledRoute;
    readonly params: RouteParamValues;
  }
  | {
    readonly status: "method_not_allowed";
    readonly allowed: readonly HttpMethod[];
  }
  | { readonly status: "not_found" };
