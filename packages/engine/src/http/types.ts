export interface HttpRequest {
  readonly method: string;
  readonly path: string;
  readonly httpVersion: string;
  /** Header names exactly as received; a repeated name keeps the last value. */
  readonly headers: ReadonlyMap<string, string>;
  readonly body: string;
}

export type HttpStatus = 200 | 404 | 405;

export interface HttpResponse {
  status: HttpStatus;
  body: Uint8Array;
  contentType: string;
}

export const STATUS_TEXT: Record<HttpStatus, string> = {
  200: "OK",
  404: "Not Found",
  405: "Method Not Allowed",
};

export type LineEnding = "\r\n" | "\n";
