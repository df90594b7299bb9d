import type { HandlerResult } from "../router/types.ts";

const TEXT_CONTENT_TYPE = "text/plain; charset=utf-8";
const TEXT_INIT_200: ResponseInit = {
  headers: { "Content-Type": TEXT_CONTENT_TYPE },
};

export function resultToResponse(result: HandlerResult): Response {
  if (result instanceof Response) {
    return result;
  }
  return new Response(result, TEXT_INIT_200);
}

/**
 * Same status and headers, no body.
 */
export function withoutBody(response: Response): Response {
  if (!response.body) return response;
  return new Response(null, {
    status: response.status,
    statusText: response.statusText,
    headers: response.headers,
  });
}

/**
 * `/event/5` -> `/event/5/`, or null when the path already ends in a slash.
 */
export function appendSlash(pathname: string): string | null {
  return pathname.endsWith("/") ? null : `${pathname}/`;
}
