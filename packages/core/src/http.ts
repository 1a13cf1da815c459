/**
 * HTTP request/response model
 *
 * Minimal request record and handler/middleware types that the
 * authentication and authorization layers are written against.
 * Responses are plain Fetch API `Response` objects.
 *
 * @module http
 */

/**
 * Incoming request as seen by handlers and middleware.
 *
 * Requests are immutable: middleware that attaches data produces a new
 * request via {@link withContext} instead of mutating this one.
 */
export interface HttpRequest {
    /** Upper-case HTTP method (e.g., "GET") */
    readonly method: string;
    /** Full request URL; matching uses `url.pathname` */
    readonly url: URL;
    /** Request headers */
    readonly header: Headers;
    /** Session map loaded by the host, if any */
    readonly session?: Readonly<Record<string, unknown>> | undefined;
    /** Per-request values attached by middleware */
    readonly context: Readonly<Record<string, unknown>>;
}

/**
 * Request handler
 */
export type Handler = (req: HttpRequest) => Promise<Response>;

/**
 * Middleware wraps a handler and returns a new handler.
 */
export type Middleware = (next: Handler) => Handler;

/**
 * Anything the `Headers` constructor accepts
 */
export type HeaderInit = ConstructorParameters<typeof Headers>[0];

/**
 * Options for {@link createRequest}
 */
export interface HttpRequestInit {
    /** @default "GET" */
    readonly method?: string | undefined;
    readonly headers?: HeaderInit | undefined;
    readonly session?: Readonly<Record<string, unknown>> | undefined;
    readonly context?: Readonly<Record<string, unknown>> | undefined;
}

/**
 * Build an {@link HttpRequest}.
 *
 * @example
 * ```typescript
 * const req = createRequest("http://localhost/admin/users", {
 *   method: "delete",
 *   headers: { authorization: "Token abc" },
 * });
 * req.method; // "DELETE"
 * ```
 */
export function createRequest(url: string | URL, init: HttpRequestInit = {}): HttpRequest {
    return {
        method: (init.method ?? "GET").toUpperCase(),
        url: new URL(url),
        header: new Headers(init.headers),
        session: init.session,
        context: init.context ?? {},
    };
}

/**
 * Return a copy of the request with `values` merged into its context.
 */
export function withContext(req: HttpRequest, values: Readonly<Record<string, unknown>>): HttpRequest {
    return { ...req, context: { ...req.context, ...values } };
}

/**
 * Compose middleware into one. The first middleware is the outermost.
 *
 * @example
 * ```typescript
 * const app = composeMiddleware(errorHandler, authentication, authorization)(handler);
 * ```
 */
export function composeMiddleware(...middlewares: Middleware[]): Middleware {
    return (handler) => middlewares.reduceRight<Handler>((next, middleware) => middleware(next), handler);
}

/**
 * Host hooks for adapting Fetch API requests.
 */
export interface FetchAdapterOptions {
    /** Resolve the session map for an incoming request */
    readonly loadSession?: ((request: Request) => Readonly<Record<string, unknown>> | undefined | Promise<Readonly<Record<string, unknown>> | undefined>) | undefined;
}

/**
 * Convert a Fetch API request into an {@link HttpRequest}.
 */
export async function fromFetchRequest(request: Request, options: FetchAdapterOptions = {}): Promise<HttpRequest> {
    const session = options.loadSession ? await options.loadSession(request) : undefined;
    return createRequest(request.url, {
        method: request.method,
        headers: request.headers,
        session,
    });
}

/**
 * Expose a handler as a Fetch-style `(request) => Promise<Response>` function.
 *
 * @example
 * ```typescript
 * const fetchHandler = toFetchHandler(app, { loadSession: (request) => sessions.read(request) });
 * ```
 */
export function toFetchHandler(handler: Handler, options: FetchAdapterOptions = {}): (request: Request) => Promise<Response> {
    return async (request) => handler(await fromFetchRequest(request, options));
}

/**
 * Plain text response.
 */
export function textResponse(status: number, body: string, headers?: HeaderInit): Response {
    const init = new Headers(headers);
    if (!init.has("content-type")) {
        init.set("content-type", "text/plain; charset=utf-8");
    }
    return new Response(body, { status, headers: init });
}

/**
 * Redirect response. `location` may be relative.
 */
export function redirectResponse(location: string, status = 302): Response {
    return new Response(null, { status, headers: { location } });
}
