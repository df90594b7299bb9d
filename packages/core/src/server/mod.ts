export {
  requestUrl,
  serve,
  toWebRequest,
  writeWebResponse,
} from "./node.ts";
export type { FetchHandler, ServeOptions, ServerHandle } from "./node.ts";
