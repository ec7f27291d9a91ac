import type { ServerConfig } from "../config/server-config.js";
import {
  HttpRequestParseError,
  parseHttpRequest,
  parseHttpRequestStrict,
} from "../http/request-parser.js";
import { HttpRequestReader } from "../http/request-reader.js";
import { sendResponse } from "../http/response-writer.js";
import type { HttpRequest } from "../http/types.js";
import type { IFileSystem } from "../interfaces/filesystem.js";
import type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "../interfaces/socket.js";
import type { Logger } from "../logging/logger.js";
import { ComponentLogger, basicLogger, filteredLogger } from "../logging/logger.js";
import { createDefaultRouteTable } from "../routing/default-routes.js";
import { RequestRouter } from "../routing/request-router.js";
import type { RouteTable } from "../routing/route-table.js";
import { EventEmitter } from "../utils/event-emitter.js";

export interface WebServerOptions {
  socketFactory: ISocketFactory;
  fileSystem: IFileSystem;
  config: ServerConfig;
  /** Defaults to the stock route table. */
  routes?: RouteTable;
  logger?: Logger;
}

type WebServerEvents = {
  listening: [port: number];
  close: [];
  error: [err: Error];
};

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function describePeer(socket: ITcpSocket): string {
  return `${socket.remoteAddress ?? "?"}:${socket.remotePort ?? "?"}`;
}

export class WebServer extends EventEmitter<WebServerEvents> {
  private socketFactory: ISocketFactory;
  private config: ServerConfig;
  private log: ComponentLogger;
  private tcpServer: ITcpServer | null = null;
  private boundPort: number | null = null;
  private router: RequestRouter;
  private activeConnections: Set<ITcpSocket> = new Set();

  constructor(options: WebServerOptions) {
    super();
    this.socketFactory = options.socketFactory;
    this.config = options.config;

    const base = options.logger ?? basicLogger();
    const logger = this.config.quiet ? filteredLogger("warn", base) : base;
    this.log = new ComponentLogger("WebServer", logger);

    this.router = new RequestRouter({
      routes: options.routes ?? createDefaultRouteTable(),
      fs: options.fileSystem,
      root: this.config.root,
      logger,
    });
  }

  /** Bind and listen. Resolves with the bound port; rejects if binding fails. */
  start(): Promise<number> {
    if (this.tcpServer) {
      return Promise.reject(new Error("Server is already started"));
    }

    return new Promise((resolve, reject) => {
      const server = this.socketFactory.createTcpServer();
      this.tcpServer = server;

      let settled = false;

      server.on("connection", (rawSocket) => {
        let socket: ITcpSocket;
        try {
          socket = this.socketFactory.wrapTcpSocket(rawSocket);
        } catch (err) {
          this.log.error("accept", "Accepting connection failed", describeError(err));
          return;
        }
        this.handleConnection(socket).catch((err: unknown) => {
          this.log.error("handleConnection", "Unhandled failure", describeError(err));
        });
      });

      server.on("error", (err) => {
        if (!settled) {
          settled = true;
          this.tcpServer = null;
          this.log.error("start", "Listening on socket failed", err.message);
          reject(err);
          return;
        }

        this.log.error("run", "TCP server error", err.message);
        this.emit("error", err);
      });

      server.listen(
        {
          port: this.config.port,
          host: this.config.host,
          backlog: this.config.backlog,
        },
        () => {
          if (settled) return;
          settled = true;
          const addr = server.address();
          const port = addr?.port ?? this.config.port;
          this.boundPort = port;
          this.log.info(
            "start",
            "Server initialization successful",
            `Port: ${port}, backlog: ${this.config.backlog}`,
          );
          this.emit("listening", port);
          resolve(port);
        },
      );
    });
  }

  stop(): Promise<void> {
    return new Promise((resolve) => {
      const server = this.tcpServer;
      this.tcpServer = null;

      for (const socket of this.activeConnections) {
        socket.close();
      }
      this.activeConnections.clear();

      const port = this.boundPort ?? this.config.port;
      this.boundPort = null;

      const finish = () => {
        this.log.info("stop", "Server shutdown", `Port: ${port}`);
        this.emit("close");
        resolve();
      };

      if (!server) {
        finish();
        return;
      }

      server.close(finish);
    });
  }

  private async handleConnection(socket: ITcpSocket): Promise<void> {
    this.activeConnections.add(socket);

    socket.onClose(() => {
      this.activeConnections.delete(socket);
    });

    socket.onError(() => {
      this.activeConnections.delete(socket);
    });

    const peer = describePeer(socket);
    this.log.info("handleConnection", "Connection established", peer);
    const reader = new HttpRequestReader(socket);

    try {
      let raw: Uint8Array;
      try {
        const result = await reader.read({
          maxBytes: this.config.readBufferSize,
          timeoutMs: this.config.requestTimeoutMs,
        });
        raw = result.bytes;
        if (result.truncated) {
          this.log.warn(
            "handleConnection",
            "Request truncated",
            `kept first ${raw.length} bytes`,
          );
        }
      } catch (err) {
        if (err instanceof HttpRequestParseError) {
          this.log.warn("handleConnection", "No data received", err.message);
          return;
        }
        throw err;
      }

      const request = this.parse(raw);
      if (!request) {
        return;
      }
      this.log.info(
        "handleConnection",
        "Request received",
        `${request.method} ${request.path}`,
      );

      const response = await this.router.route(request);
      const sent = await sendResponse(socket, response, {
        lineEnding: this.config.lineEnding,
      });
      this.log.info(
        "handleConnection",
        "Response sent",
        `Status: ${response.status}, Content Length: ${sent}`,
      );
    } catch (err) {
      this.log.error("handleConnection", "Request handling failed", describeError(err));
    } finally {
      socket.close();
      this.activeConnections.delete(socket);
      this.log.info("handleConnection", "Connection closed", peer);
    }
  }

  private parse(raw: Uint8Array): HttpRequest | null {
    if (!this.config.strictParsing) {
      return parseHttpRequest(raw);
    }

    try {
      return parseHttpRequestStrict(raw);
    } catch (err) {
      if (err instanceof HttpRequestParseError) {
        this.log.warn("handleConnection", "Malformed request", err.message);
        return null;
      }
      throw err;
    }
  }
}
