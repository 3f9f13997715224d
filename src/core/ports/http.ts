/**
 * Port: the slice of an HTTP exchange the CORS engine touches.
 */

/** Read-only view of an inbound request. `header` yields "" when absent. */
export interface RequestView {
  readonly method: string;
  header(name: string): string;
}

/**
 * Where response headers go. `append` adds another value (Vary),
 * `set` replaces. A WHATWG `Headers` instance fits as-is.
 */
export interface HeaderSink {
  set(name: string, value: string): void;
  append(name: string, value: string): void;
}

/** Shape of a Node `IncomingMessage` the adapters read from. */
export interface IncomingRequest {
  readonly method?: string | undefined;
  readonly headers: Readonly<Record<string, string | readonly string[] | undefined>>;
}

/** Shape of a Node `ServerResponse` the adapters write to. */
export interface OutgoingResponse {
  statusCode: number;
  setHeader(name: string, value: string): unknown;
  appendHeader(name: string, value: string): unknown;
  end(): unknown;
}

export type RequestHandler<Req extends IncomingRequest, Res extends OutgoingResponse> = (
  req: Req,
  res: Res,
) => void;

/** Connect / Express continuation. */
export type NextFunction = () => void;
