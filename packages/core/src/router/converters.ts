/**
 * Built-in path converters.
 */

import type { Converter, ConverterName, ConverterTypes } from "./types.ts";

const DIGITS = /^[0-9]+$/;

const UUID_REGEX =
  "[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}";

function encodePath(value: string): string {
  return value.split("/").map(encodeURIComponent).join("/");
}

function stringConverter(
  regex: string,
  encode: (value: string) => string = encodeURIComponent,
): Converter<string> {
  const whole = new RegExp(`^(?:${regex})$`);
  return {
    regex,
    toValue: (segment) => segment,
    toUrl: (value) => {
      if (typeof value !== "string" && typeof value !== "number") {
        return undefined;
      }
      const str = String(value);
      return whole.test(str) ? encode(str) : undefined;
    },
  };
}

const intConverter: Converter<bigint> = {
  regex: "[0-9]+",
  toValue: (segment) => DIGITS.test(segment) ? BigInt(segment) : undefined,
  toUrl(value) {
    if (typeof value === "bigint") {
      return value >= 0n ? value.toString() : undefined;
    }
    if (typeof value === "number") {
      return Number.isSafeInteger(value) && value >= 0
        ? String(value)
        : undefined;
    }
    if (typeof value === "string" && DIGITS.test(value)) {
      return value;
    }
    return undefined;
  },
};

export const converters: {
  readonly [K in ConverterName]: Converter<ConverterTypes[K]>;
} = {
  int: intConverter,
  str: stringConverter("[^/]+"),
  slug: stringConverter("[-a-zA-Z0-9_]+"),
  uuid: stringConverter(UUID_REGEX),
  path: stringConverter(".+", encodePath),
};

export function isConverterName(value: unknown): value is ConverterName {
  return typeof value === "string" && Object.hasOwn(converters, value);
}
