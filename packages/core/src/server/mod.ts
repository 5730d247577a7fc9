export {
  createRequestListener,
  requestUrl,
  serve,
  toWebRequest,
  writeWebResponse,
} from "./node.ts";
export type {
  FetchHandler,
  NodeRequestLike,
  NodeResponseLike,
  RequestListenerOptions,
  ResponseDefaults,
} from "./node.ts";
