import type { IssueOptions, IssuedResponse, RequestIssuer, ServiceHandle } from './types.js';

async function readBody(response: Response): Promise<unknown> {
  const text = await response.text();
  const contentType = response.headers.get('content-type') ?? '';
  if (contentType.includes('application/json')) {
    try {
      return JSON.parse(text);
    } catch {
      return text;
    }
  }
  return text;
}

/**
 * Issues GET requests against one running service.
 *
 * Node's fetch keeps connections alive through its global dispatcher, so
 * consecutive requests reuse sockets the way a client session would. The
 * dispatcher is shared by every caller, which is fine for stateless GETs.
 */
export class HttpRequestIssuer implements RequestIssuer {
  private baseUrl: string;
  private timeout: number;

  constructor(options: { baseUrl: string; timeout: number }) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeout = options.timeout;
  }

  async issue(path: string, options: IssueOptions = {}): Promise<IssuedResponse | null> {
    const url = `${this.baseUrl}/${path.replace(/^\/+/, '')}`;
    const start = performance.now();

    try {
      const response = await fetch(url, {
        headers: options.headers,
        signal: AbortSignal.timeout(options.timeout ?? this.timeout),
      });
      const elapsed = performance.now() - start;
      const body = await readBody(response);
      return {
        url,
        status: response.status,
        ok: response.ok,
        elapsed,
        body,
      };
    } catch {
      // Timed out or never reached the service: the caller records a failed sample.
      return null;
    }
  }
}

export function createRequestIssuer(handle: ServiceHandle): RequestIssuer {
  return new HttpRequestIssuer({ baseUrl: handle.baseUrl, timeout: handle.requestTimeout });
}
