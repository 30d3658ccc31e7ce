export {
  formatFilterDate,
  GRAPH_BASE_URL,
  GraphMailClient,
  toRemoteFolder,
  toRemoteItem,
} from "./client.js";
export type {
  FetchLike,
  GraphMailClientOptions,
  TokenProvider,
} from "./types.js";
