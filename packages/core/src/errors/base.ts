/**
 * Root of the Tracker error hierarchy.
 */

import type { ErrorResponse } from "./types.ts";

const JSON_CONTENT_TYPE = "application/json; charset=utf-8";

export interface TrackerErrorOptions {
  /** HTTP status of the error response; 500 when left out */
  status?: number;
  /** Machine-readable code; "INTERNAL_ERROR" when left out */
  code?: string;
  /** Shown only in development bodies */
  details?: unknown;
  /**
   * false marks a programming or setup error. Those are logged when they
   * reach a response; operational ones (a 404, a 405) are not.
   */
  operational?: boolean;
  /** Sent with the error response, e.g. `Allow` on a 405 */
  headers?: Record<string, string>;
}

/**
 * An error that knows the HTTP response it becomes.
 *
 * @example
 * ```typescript
 * throw new TrackerError("Gone for good", { status: 410, code: "GONE" });
 * ```
 */
export class TrackerError extends Error {
  readonly status: number;
  readonly code: string;
  readonly details?: unknown;
  readonly isOperational: boolean;
  readonly headers: Readonly<Record<string, string>>;

  constructor(message: string, options: TrackerErrorOptions = {}) {
    super(message);
    this.name = "TrackerError";
    this.status = options.status ?? 500;
    this.code = options.code ?? "INTERNAL_ERROR";
    this.details = options.details;
    this.isOperational = options.operational ?? true;
    this.headers = Object.freeze({ ...options.headers });
    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * The JSON error body. Development bodies add details and the stack.
   */
  toBody(development = false): ErrorResponse {
    const body: ErrorResponse = {
      error: { message: this.message, code: this.code, status: this.status },
    };
    if (!development) return body;

    if (this.details !== undefined) body.error.details = this.details;
    if (this.stack) {
      body.error.stack = this.stack.split("\n").map((line) => line.trim());
    }
    return body;
  }

  toResponse(development = false): Response {
    return new Response(JSON.stringify(this.toBody(development)), {
      status: this.status,
      headers: { ...this.headers, "Content-Type": JSON_CONTENT_TYPE },
    });
  }
}
