export { TtrssClient, normalizeApiEndpoint } from "./client";
export type { ConnInfo, Session, TtrssClientHooks, TtrssClientOptions } from "./client";
export {
  API_STATUS_ERR,
  API_STATUS_OK,
  NO_ERROR_TEXT,
  decodeResponse,
  encodeRequest,
  getArray,
  getNumber,
  getObject,
  getString,
  isJsonObject,
} from "./codec";
export type { JsonObject, JsonValue, RequestParams, ResponseEnvelope } from "./codec";
export {
  AmbiguousPathError,
  ApiError,
  AuthError,
  CatPathError,
  NotFoundError,
  ProtocolError,
  TransportError,
  TtrssError,
  describeError,
} from "./errors";
export { FetchHttpTransport, InMemoryHttpTransport } from "./transports";
export type {
  FetchHttpTransportOptions,
  FetchLike,
  HttpHandler,
  HttpRequest,
  HttpResponse,
  HttpTransport,
} from "./transports";
export {
  CAT_ALL_EXCLUDING_VIRTUAL,
  CAT_ALL_FEEDS,
  CAT_LABELS,
  CAT_SPECIAL,
  ROOT_ID,
  compositeId,
  decodeFeedTree,
  fetchFeedTree,
  isPseudoCategory,
  isVirtualFeed,
  walkFeedTree,
} from "./feed_tree";
export type {
  CategoryItem,
  FeedItem,
  FeedTreeItem,
  FeedTreeKind,
  FeedTreeVisitor,
  FetchFeedTreeOptions,
  WalkAction,
} from "./feed_tree";
export {
  CATPATH_ESCAPE,
  CATPATH_SEPARATOR,
  escapeComponent,
  formatCatPath,
  isTerminalOnly,
  parseCatPath,
  pathComponents,
  resolveCatPath,
  resolveInTree,
} from "./catpath";
export type { CatPathResolution, ParsedCatPath, ResolveCatPathOptions } from "./catpath";
export {
  SubscribeStatus,
  decodeSubscribeOutcome,
  describeSubscribeStatus,
  isSubscribeStatusCode,
  isSubscribed,
  subscribe,
  unsubscribe,
} from "./subscribe";
export type {
  SubscribeOutcome,
  SubscribeRequest,
  SubscribeResult,
  SubscribeStatusCode,
} from "./subscribe";
