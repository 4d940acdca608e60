import 'dotenv/config';

const port = Number(process.env.PORT ?? 5000);

const trustProxyEnv = process.env.TRUST_PROXY;
let trustProxy: boolean | number | string =
  process.env.NODE_ENV === 'production' ? 1 : false;

if (trustProxyEnv !== undefined) {
  const normalized = trustProxyEnv.trim().toLowerCase();
  if (normalized === 'true') {
    trustProxy = true;
  } else if (normalized === 'false') {
    trustProxy = false;
  } else if (/^\d+$/.test(normalized)) {
    trustProxy = Number(normalized);
  } else {
    trustProxy = trustProxyEnv;
  }
}

export const config = {
  port,
  host: process.env.HOST ?? '0.0.0.0',
  baseUrl: process.env.BASE_URL ?? `http://localhost:${port}`,
  corsOrigin: process.env.CORS_ORIGIN ?? '*',
  trustProxy
};

// Outbound settings are constants, not read from the environment.
export const upstream = {
  baseUrl: 'https://www.terabox.com',
  timeoutMs: 30_000,
  headers: {
    'User-Agent':
      'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36',
    Accept: 'application/json, text/plain, */*',
    'Accept-Language': 'en-US,en;q=0.9',
    Origin: 'https://www.terabox.com',
    Referer: 'https://www.terabox.com/'
  }
} as const;
