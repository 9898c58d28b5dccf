import { DataFormatError, HarnessError, TimeoutError, toError } from '@core/errors.ts';
import { type LogHelpers, type Logger, createLogHelpers } from '@services/logger/index.ts';
import type { z } from 'zod';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'HEAD' | 'OPTIONS';

/**
 * Anything that turns a Request into a Response
 * Global fetch by default; an in-process app in tests.
 */
export type FetchLike = (request: Request) => Response | Promise<Response>;

export interface HttpSessionOptions {
  baseUrl: string;
  timeoutMs: number;
  headers?: Record<string, string>;
  fetch?: FetchLike;
  logger: Logger;
}

export interface RequestOptions {
  params?: Record<string, string | number | boolean>;
  /** Serialized as the JSON request body */
  json?: unknown;
  headers?: Record<string, string>;
  /** Overrides the session timeout for this request */
  timeoutMs?: number;
}

const DEFAULT_HEADERS = {
  'Content-Type': 'application/json',
  Accept: 'application/json',
} as const;

/**
 * A fully read response
 */
export class HttpResponse {
  constructor(
    readonly method: HttpMethod,
    readonly url: string,
    readonly status: number,
    readonly headers: Headers,
    readonly text: string,
    readonly elapsedMs: number
  ) {}

  get ok(): boolean {
    return this.status >= 200 && this.status < 300;
  }

  /**
   * Decode the body as JSON
   */
  json(): unknown {
    try {
      return JSON.parse(this.text);
    } catch (error) {
      throw new DataFormatError(
        `Response of ${this.method} ${this.url} is not valid JSON`,
        this.url,
        { cause: error }
      );
    }
  }

  /**
   * Decode the body as JSON and validate it
   */
  parse<S extends z.ZodTypeAny>(schema: S): z.infer<S> {
    const result = schema.safeParse(this.json());
    if (!result.success) {
      const details = result.error.errors
        .map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`)
        .join(', ');
      throw new DataFormatError(
        `Unexpected response of ${this.method} ${this.url}: ${details}`,
        this.url,
        { cause: result.error }
      );
    }
    return result.data;
  }
}

/**
 * HttpSession
 * Shared HTTP client for API tests: base URL, default JSON headers, timeout and logging
 */
export class HttpSession {
  readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly inFlight = new Set<AbortController>();
  private readonly logger: Logger;
  private readonly log: LogHelpers;
  private closed = false;

  constructor(options: HttpSessionOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.headers = { ...DEFAULT_HEADERS, ...options.headers };
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetch ?? ((request) => fetch(request));
    this.logger = options.logger.child({ component: 'HttpSession' });
    this.log = createLogHelpers(this.logger);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get defaultHeaders(): Readonly<Record<string, string>> {
    return this.headers;
  }

  /**
   * Absolute URLs are used as given, anything else is appended to the base URL
   */
  resolveUrl(endpoint: string, params?: RequestOptions['params']): string {
    const url = new URL(
      /^https?:\/\//i.test(endpoint)
        ? endpoint
        : `${this.baseUrl}${endpoint.startsWith('/') ? '' : '/'}${endpoint}`
    );

    for (const [key, value] of Object.entries(params ?? {})) {
      url.searchParams.set(key, String(value));
    }

    return url.toString();
  }

  async request(
    method: HttpMethod,
    endpoint: string,
    options: RequestOptions = {}
  ): Promise<HttpResponse> {
    if (this.closed) {
      throw new HarnessError(`HTTP session is closed; cannot send ${method} ${endpoint}`);
    }

    const url = this.resolveUrl(endpoint, options.params);
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const controller = new AbortController();
    const timer = setTimeout(
      () =>
        controller.abort(
          new TimeoutError(`${method} ${url} timed out after ${timeoutMs}ms`, timeoutMs)
        ),
      timeoutMs
    );
    const aborted = new Promise<never>((_, reject) => {
      controller.signal.addEventListener('abort', () => reject(controller.signal.reason), {
        once: true,
      });
    });

    const request = new Request(url, {
      method,
      headers: { ...this.headers, ...options.headers },
      signal: controller.signal,
      ...(options.json !== undefined ? { body: JSON.stringify(options.json) } : {}),
    });

    this.logger.info(`API Request: ${method} ${url}`);
    this.inFlight.add(controller);
    const started = Date.now();

    try {
      const response = await Promise.race([this.fetchImpl(request), aborted]);
      const text = await Promise.race([response.text(), aborted]);
      const elapsedMs = Date.now() - started;

      this.log.api({ method, url, statusCode: response.status, duration: elapsedMs, body: text });
      return new HttpResponse(method, url, response.status, response.headers, text, elapsedMs);
    } catch (error) {
      if (controller.signal.aborted) {
        const reason: unknown = controller.signal.reason;
        throw reason;
      }
      this.logger.error({ err: toError(error) }, `API Request failed: ${method} ${url}`);
      throw error;
    } finally {
      clearTimeout(timer);
      this.inFlight.delete(controller);
    }
  }

  get(endpoint: string, options?: RequestOptions): Promise<HttpResponse> {
    return this.request('GET', endpoint, options);
  }

  post(endpoint: string, json?: unknown, options?: RequestOptions): Promise<HttpResponse> {
    return this.request('POST', endpoint, { ...options, json });
  }

  put(endpoint: string, json?: unknown, options?: RequestOptions): Promise<HttpResponse> {
    return this.request('PUT', endpoint, { ...options, json });
  }

  patch(endpoint: string, json?: unknown, options?: RequestOptions): Promise<HttpResponse> {
    return this.request('PATCH', endpoint, { ...options, json });
  }

  delete(endpoint: string, options?: RequestOptions): Promise<HttpResponse> {
    return this.request('DELETE', endpoint, options);
  }

  head(endpoint: string, options?: RequestOptions): Promise<HttpResponse> {
    return this.request('HEAD', endpoint, options);
  }

  options(endpoint: string, options?: RequestOptions): Promise<HttpResponse> {
    return this.request('OPTIONS', endpoint, options);
  }

  /**
   * Abort in-flight requests and refuse new ones
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    if (this.inFlight.size > 0) {
      this.logger.warn(`Aborting ${this.inFlight.size} in-flight request(s)`);
    }
    for (const controller of this.inFlight) {
      controller.abort(new HarnessError('HTTP session closed'));
    }
    this.inFlight.clear();
    this.logger.debug('HTTP session closed');
  }
}
