import { request } from 'undici';

export interface HttpResult {
  body: string;
  status: number;
}

export interface HttpBytesResult {
  body: Uint8Array;
  status: number;
}

export interface FetchOptions {
  /** Applied to both headers and body; omitted means undici's defaults */
  timeoutMs?: number;
  accept?: string;
}

export class HttpStatusError extends Error {
  constructor(
    readonly url: string,
    readonly status: number,
  ) {
    super(`GET ${url} failed with HTTP ${status}`);
    this.name = 'HttpStatusError';
  }
}

const DEFAULT_HEADERS: Record<string, string> = {
  'User-Agent': 'dataset-refresh/0.1 (catalog sync)',
  'Accept-Language': 'en-US,en;q=0.5',
};

async function openBody(url: string, options: FetchOptions) {
  const { statusCode, body } = await request(url, {
    method: 'GET',
    headers: { ...DEFAULT_HEADERS, Accept: options.accept ?? '*/*' },
    maxRedirections: 3,
    ...(options.timeoutMs !== undefined
      ? { headersTimeout: options.timeoutMs, bodyTimeout: options.timeoutMs }
      : {}),
  });

  if (statusCode >= 400) {
    await body.dump();
    throw new HttpStatusError(url, statusCode);
  }

  return { statusCode, body };
}

export async function fetchHttp(url: string, options: FetchOptions = {}): Promise<HttpResult> {
  const { statusCode, body } = await openBody(url, options);
  const text = await body.text();

  return {
    body: text,
    status: statusCode,
  };
}

/** Same as {@link fetchHttp} but leaves decoding to the caller. */
export async function fetchBytes(url: string, options: FetchOptions = {}): Promise<HttpBytesResult> {
  const { statusCode, body } = await openBody(url, options);
  const bytes = new Uint8Array(await body.arrayBuffer());

  return {
    body: bytes,
    status: statusCode,
  };
}
