import type { LineEnding } from "../http/types.js";

export interface ServerConfig {
  /** Port to listen on. Default: 8080 */
  port: number;
  /** Host/IP to bind. Default: '0.0.0.0' */
  host: string;
  /** Pending-connection queue length. Default: 10 */
  backlog: number;
  /** Site directory that relative route file paths resolve against. */
  root: string;
  /** Hard cap on the bytes read for one request; the rest is dropped. Default: 3000 */
  readBufferSize: number;
  /** Max time allowed for receiving a full HTTP request. Default: 5000ms */
  requestTimeoutMs: number;
  /** Response line terminator. Default: "\r\n" */
  lineEnding: LineEnding;
  /** Close malformed requests instead of routing what could be parsed. Default: false */
  strictParsing: boolean;
  /** Suppress per-connection logging. Default: false */
  quiet: boolean;
}

export function defaultConfig(root: string): ServerConfig {
  return {
    port: 8080,
    host: "0.0.0.0",
    backlog: 10,
    root,
    readBufferSize: 3000,
    requestTimeoutMs: 5000,
    lineEnding: "\r\n",
    strictParsing: false,
    quiet: false,
  };
}
