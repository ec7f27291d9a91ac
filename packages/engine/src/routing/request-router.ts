import type { HttpRequest, HttpResponse } from "../http/types.js";
import type { IFileSystem } from "../interfaces/filesystem.js";
import { ComponentLogger, type Logger } from "../logging/logger.js";
import { getMimeType } from "../server/mime-types.js";
import { fromString } from "../utils/buffer.js";
import type { RouteEntry, RouteTable } from "./route-table.js";

export interface RequestRouterOptions {
  routes: RouteTable;
  fs: IFileSystem;
  /** Directory that relative route file paths are resolved against. */
  root: string;
  logger?: Logger;
}

function htmlPage(text: string): Uint8Array {
  return fromString(`<html><body>${text}</body></html>`);
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function resolveContentPath(root: string, content: string): string {
  if (content.startsWith("/")) {
    return content;
  }
  const base = root.replace(/\/+$/, "");
  return `${base}/${content.replace(/^(\.\/)+/, "")}`;
}

/**
 * Turns a parsed request into a response using a fixed route table.
 * Unknown paths, disallowed methods and unreadable files all become normal
 * 404/405 responses; `route` does not reject for any of them.
 */
export class RequestRouter {
  private readonly routes: RouteTable;
  private readonly fs: IFileSystem;
  private readonly root: string;
  private readonly log: ComponentLogger;
  private readonly mimeLog: ComponentLogger;

  constructor(options: RequestRouterOptions) {
    this.routes = options.routes;
    this.fs = options.fs;
    this.root = options.root;
    this.log = new ComponentLogger("RequestRouter", options.logger);
    this.mimeLog = new ComponentLogger("ContentType", options.logger);
  }

  async route(request: HttpRequest): Promise<HttpResponse> {
    const route = this.routes.lookup(request.path);
    if (!route) {
      this.log.error("route", "No route for", request.path);
      return {
        status: 404,
        body: htmlPage(`404 Route Not Found: ${request.path}`),
        contentType: "text/html",
      };
    }

    if (!route.allowedMethods.includes(request.method)) {
      const allowed = route.allowedMethods.join(" ");
      this.log.error(
        "route",
        "Method not allowed",
        `${request.method} for ${request.path}, allowed: ${allowed}`,
      );
      return {
        status: 405,
        body: htmlPage(
          `405 Method Not Allowed: ${request.method} not allowed for ${request.path}. Allowed methods: ${allowed}`,
        ),
        contentType: "text/html",
      };
    }

    if (!route.isFile) {
      return {
        status: 200,
        body: fromString(route.content),
        contentType: "text/html",
      };
    }

    return this.serveFile(request, route);
  }

  private async serveFile(
    request: HttpRequest,
    route: RouteEntry,
  ): Promise<HttpResponse> {
    const filePath = resolveContentPath(this.root, route.content);

    let content: Uint8Array;
    try {
      content = await this.fs.readFile(filePath);
    } catch (err) {
      this.log.error(
        "serveFile",
        "Failed to open",
        `${filePath}: ${errorMessage(err)}`,
      );
      return {
        status: 404,
        body: htmlPage(`404 Resource Not Found: ${request.path}`),
        contentType: "text/html",
      };
    }

    const contentType = getMimeType(route.content, this.mimeLog);
    this.log.info("serveFile", "Serving content from", filePath);
    return { status: 200, body: content, contentType };
  }
}
