export interface RouteEntry {
  /** Order is kept; it is the order listed in 405 responses. */
  readonly allowedMethods: readonly string[];
  /** A file path when `isFile`, otherwise the literal HTML body. */
  readonly content: string;
  readonly isFile: boolean;
}

export type RouteTableErrorCode = "NO_ALLOWED_METHODS" | "INVALID_ROUTE_PATH";

export class RouteTableError extends Error {
  constructor(
    readonly code: RouteTableErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "RouteTableError";
  }
}

export type RouteDefinitions = Readonly<Record<string, RouteEntry>>;

function freezeEntry(path: string, entry: RouteEntry): RouteEntry {
  if (!path.startsWith("/")) {
    throw new RouteTableError(
      "INVALID_ROUTE_PATH",
      `Route path must start with "/": ${path}`,
    );
  }
  if (entry.allowedMethods.length === 0) {
    throw new RouteTableError(
      "NO_ALLOWED_METHODS",
      `Route ${path} allows no methods`,
    );
  }
  return Object.freeze({
    allowedMethods: Object.freeze([...entry.allowedMethods]),
    content: entry.content,
    isFile: entry.isFile,
  });
}

/**
 * Exact-match mapping from request path to route entry. Built once and never
 * changed, so connections can share one instance freely.
 */
export class RouteTable {
  private readonly routes: ReadonlyMap<string, RouteEntry>;

  private constructor(routes: Map<string, RouteEntry>) {
    this.routes = routes;
  }

  static from(definitions: RouteDefinitions): RouteTable {
    const routes = new Map<string, RouteEntry>();
    for (const [path, entry] of Object.entries(definitions)) {
      routes.set(path, freezeEntry(path, entry));
    }
    return new RouteTable(routes);
  }

  /** No normalization: trailing slashes and query strings must match too. */
  lookup(path: string): RouteEntry | undefined {
    return this.routes.get(path);
  }

  paths(): string[] {
    return Array.from(this.routes.keys());
  }

  get size(): number {
    return this.routes.size;
  }
}
