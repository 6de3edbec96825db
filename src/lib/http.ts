import axios, { AxiosInstance, AxiosRequestConfig, AxiosResponse } from 'axios';
import { AppConfig } from './config';
import { UpstreamUnavailableError } from './errors';

export const USER_AGENT = 'river-graphs/0.1 (+gage hydrograph collector)';

export function createHttpClient(config: Pick<AppConfig, 'requestTimeoutMs'>): AxiosInstance {
  return axios.create({
    timeout: config.requestTimeoutMs,
    headers: { 'User-Agent': USER_AGENT },
    // Status codes are checked by requestUpstream so every source reports them the same way
    validateStatus: () => true,
  });
}

// Hide api keys and tokens before a URL lands in a log line
export function maskUrl(url: string): string {
  return url.replace(/([?&](?:api_key|token|key)=)[^&]*/gi, '$1***');
}

/**
 * Issue a request and insist on a 200. Network failures and any other status
 * become UpstreamUnavailableError.
 */
export async function requestUpstream<T>(
  http: AxiosInstance,
  request: AxiosRequestConfig & { url: string }
): Promise<AxiosResponse<T>> {
  let response: AxiosResponse<T>;
  try {
    response = await http.request<T>(request);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new UpstreamUnavailableError(
      `Request to ${maskUrl(request.url)} failed: ${reason}`,
      request.url,
      undefined,
      error
    );
  }

  if (response.status !== 200) {
    const body = typeof response.data === 'string' ? response.data.slice(0, 200) : '';
    throw new UpstreamUnavailableError(
      `Bad response (${response.status}) from ${maskUrl(request.url)}${body ? `, got: "${body}"` : ''}`,
      request.url,
      response.status
    );
  }

  return response;
}

/** Cookie header echoing the Set-Cookie values of a previous response. */
export function cookieHeader(response: AxiosResponse): string | undefined {
  const setCookie: unknown = response.headers['set-cookie'];
  if (!Array.isArray(setCookie) || setCookie.length === 0) return undefined;
  return setCookie
    .filter((cookie): cookie is string => typeof cookie === 'string')
    .map(cookie => cookie.split(';')[0])
    .join('; ');
}
