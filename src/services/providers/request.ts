import type { AxiosInstance, AxiosRequestConfig } from 'axios';
import type { ProviderId } from '../../types/music';
import { ProviderUnavailable, errorMessage } from '../../errors';
import { httpStatusOf, isTransportError } from '../../utils/http';
import { describeUrl, logWarning } from '../../utils/logger';

type RequestOptions = Pick<AxiosRequestConfig, 'params' | 'headers'> & { signal?: AbortSignal | undefined };

async function providerGet(
  http: AxiosInstance,
  provider: ProviderId,
  url: string,
  responseType: 'text' | 'json',
  options: RequestOptions
): Promise<unknown> {
  try {
    const response = await http.get<unknown>(url, {
      responseType,
      ...(options.params ? { params: options.params } : {}),
      ...(options.headers ? { headers: options.headers } : {}),
      ...(options.signal ? { signal: options.signal } : {}),
    });
    return response.data;
  } catch (error) {
    if (isTransportError(error)) {
      throw new ProviderUnavailable(provider, errorMessage(error), { cause: error });
    }
    logWarning('provider_request_failed', {
      provider,
      ...describeUrl(url),
      status: httpStatusOf(error),
      error: errorMessage(error),
    });
    return null;
  }
}

/**
 * GETs a page as text. HTTP errors resolve to null; transport failures throw
 * ProviderUnavailable.
 */
export async function fetchText(
  http: AxiosInstance,
  provider: ProviderId,
  url: string,
  options: RequestOptions = {}
): Promise<string | null> {
  const data = await providerGet(http, provider, url, 'text', options);
  return typeof data === 'string' ? data : null;
}

/** Like fetchText, for JSON endpoints. Strings are parsed when the server sent no JSON content type. */
export async function fetchJson(
  http: AxiosInstance,
  provider: ProviderId,
  url: string,
  options: RequestOptions = {}
): Promise<unknown> {
  const data = await providerGet(http, provider, url, 'json', options);
  if (typeof data !== 'string') return data;
  try {
    const parsed: unknown = JSON.parse(data);
    return parsed;
  } catch {
    logWarning('provider_response_not_json', { provider, ...describeUrl(url) });
    return null;
  }
}
