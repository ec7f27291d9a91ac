import { NodeFileSystem, NodeSocketFactory } from "../adapters/node/index.js";
import type { ServerConfig } from "../config/server-config.js";
import type { Logger } from "../logging/logger.js";
import type { RouteTable } from "../routing/route-table.js";
import { WebServer } from "../server/web-server.js";

export interface NodeServerOptions {
  config: ServerConfig;
  routes?: RouteTable;
  logger?: Logger;
}

export function createNodeServer(options: NodeServerOptions): WebServer {
  const socketFactory = new NodeSocketFactory();
  const fileSystem = new NodeFileSystem();
  return new WebServer({
    socketFactory,
    fileSystem,
    config: options.config,
    routes: options.routes,
    logger: options.logger,
  });
}
