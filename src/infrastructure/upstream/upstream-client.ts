export type QueryParams = Record<string, string | number | boolean | undefined>;

export interface UpstreamClient {
  get(path: string, params?: QueryParams): Promise<string>;
}

export interface UpstreamClientOptions {
  baseUrl: string;
  apiKey?: string;
  timeoutMs: number;
}

/**
 * Failed upstream call. `status` is the HTTP status of a non-2xx
 * response, or null when no response arrived (network error, timeout).
 */
export class UpstreamError extends Error {
  constructor(
    message: string,
    readonly path: string,
    readonly status: number | null,
    readonly body = '',
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'UpstreamError';
  }
}

const MAX_ERROR_BODY = 500;

/** Joins `path` onto `baseUrl`, keeping any path prefix the base carries. */
export function buildUrl(baseUrl: string, path: string, params: QueryParams = {}): URL {
  const base = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
  const url = new URL(path.replace(/^\/+/, ''), base);

  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      url.searchParams.set(key, String(value));
    }
  }

  return url;
}

/**
 * Thin GET forwarder for the upstream talent API.
 *
 * Returns the raw response text. Sends `X-API-Key` when a key is
 * configured. Each request is aborted after `timeoutMs`.
 */
export function createUpstreamClient(options: UpstreamClientOptions): UpstreamClient {
  return {
    async get(path: string, params?: QueryParams): Promise<string> {
      const headers: Record<string, string> = { Accept: 'application/json' };
      if (options.apiKey) {
        headers['X-API-Key'] = options.apiKey;
      }

      let response: Response;
      let text: string;
      try {
        response = await fetch(buildUrl(options.baseUrl, path, params), {
          method: 'GET',
          headers,
          signal: AbortSignal.timeout(options.timeoutMs),
        });
        text = await response.text();
      } catch (err: unknown) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new UpstreamError(`Upstream GET ${path} failed: ${reason}`, path, null, '', { cause: err });
      }

      if (!response.ok) {
        throw new UpstreamError(
          `Upstream GET ${path} failed with status ${response.status}`,
          path,
          response.status,
          text.slice(0, MAX_ERROR_BODY),
        );
      }

      return text;
    },
  };
}
