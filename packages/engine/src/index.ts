// Node adapters
export { NodeFileSystem } from "./adapters/node/node-filesystem.js";
export {
  NodeSocketFactory,
  NodeTcpServer,
  NodeTcpSocket,
} from "./adapters/node/node-socket.js";
// Config
export type { ServerConfig } from "./config/server-config.js";
export { defaultConfig } from "./config/server-config.js";
// HTTP
export type { HttpRequestParseErrorCode } from "./http/request-parser.js";
export {
  HttpRequestParseError,
  parseHttpRequest,
  parseHttpRequestStrict,
} from "./http/request-parser.js";
export type { RawRequest, ReadRequestOptions } from "./http/request-reader.js";
export {
  DEFAULT_READ_BUFFER_SIZE,
  HttpRequestReader,
  readRawRequest,
} from "./http/request-reader.js";
export type { SerializeResponseOptions } from "./http/response-writer.js";
export {
  reasonPhrase,
  sendResponse,
  serializeResponse,
  UnsupportedStatusError,
} from "./http/response-writer.js";
export type {
  HttpRequest,
  HttpResponse,
  HttpStatus,
  LineEnding,
} from "./http/types.js";
export { STATUS_TEXT } from "./http/types.js";
// Interfaces
export type { IFileSystem } from "./interfaces/filesystem.js";
export type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
  ListenOptions,
} from "./interfaces/socket.js";
// Logging
export type { LogEntry, LogEvent, Logger, LogLevel } from "./logging/logger.js";
export {
  basicLogger,
  ComponentLogger,
  filteredLogger,
  formatLogEvent,
  isLogLevel,
  LOG_LEVELS,
  LogStore,
  storeLogger,
} from "./logging/logger.js";
// Presets
export type { NodeServerOptions } from "./presets/node.js";
export { createNodeServer } from "./presets/node.js";
// Routing
export { createDefaultRouteTable } from "./routing/default-routes.js";
export type { RequestRouterOptions } from "./routing/request-router.js";
export { RequestRouter, resolveContentPath } from "./routing/request-router.js";
export type {
  RouteDefinitions,
  RouteEntry,
  RouteTableErrorCode,
} from "./routing/route-table.js";
export { RouteTable, RouteTableError } from "./routing/route-table.js";
// Server
export { DEFAULT_MIME_TYPE, getMimeType } from "./server/mime-types.js";
export type { WebServerOptions } from "./server/web-server.js";
export { WebServer } from "./server/web-server.js";
// Testing
export { InMemoryFileSystem } from "./testing/in-memory-filesystem.js";
export { InMemorySocketFactory } from "./testing/in-memory-socket-factory.js";
// Utils
export { concat, decodeToString, fromString } from "./utils/buffer.js";
export { EventEmitter } from "./utils/event-emitter.js";
