import { createHmac } from 'node:crypto';

/**
 * Request signature: lowercase hex HMAC-SHA256 over
 * `timestamp + method + path + body`. GET requests sign an empty body.
 */
export function signRequest(
  secret: string,
  timestamp: string,
  method: string,
  path: string,
  body: string = '',
): string {
  return createHmac('sha256', secret).update(timestamp + method + path + body).digest('hex');
}

export function buildAuthHeaders(
  apiKey: string,
  secret: string,
  method: string,
  path: string,
  body: string,
  timestampMs: number,
): Record<string, string> {
  const timestamp = String(timestampMs);
  return {
    'API-KEY': apiKey,
    'API-TIMESTAMP': timestamp,
    'API-SIGN': signRequest(secret, timestamp, method, path, body),
  };
}
