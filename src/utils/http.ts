import axios, { AxiosInstance } from 'axios';

const USER_AGENTS = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
];

export function createHttpClient(timeoutMs: number): AxiosInstance {
  const userAgent = USER_AGENTS[Math.floor(Math.random() * USER_AGENTS.length)] ?? USER_AGENTS[0];
  return axios.create({
    timeout: timeoutMs,
    maxRedirects: 5,
    headers: {
      ...(userAgent ? { 'User-Agent': userAgent } : {}),
      'Accept-Language': 'en-US,en;q=0.5',
    },
  });
}

/** True for failures where no HTTP response arrived (timeouts, refused/reset connections, aborts). */
export function isTransportError(error: unknown): boolean {
  if (!axios.isAxiosError(error)) return false;
  return error.response === undefined;
}

export function httpStatusOf(error: unknown): number | undefined {
  return axios.isAxiosError(error) ? error.response?.status : undefined;
}
