/**
 * Routing engine for Tracker.
 *
 * @module
 */

export { Router } from "./router.ts";
export { createRouteTable, include, joinPattern, path } from "./table.ts";
export type { RouteTableOptions } from "./table.ts";
export { dispatch } from "./dispatch.ts";
export { converters, isConverterName } from "./converters.ts";
export type {
  CompiledRoute,
  Converter,
  ConverterName,
  ConverterTypes,
  ExtractPathParams,
  Handler,
  HandlerResult,
  HttpMethod,
  ParamSpec,
  PathOptions,
  Resolution,
  RouteDefinition,
  RouteParams,
  RouteParamValues,
  RouteTable,
} from "./types.ts";
