import crypto from 'node:crypto';

/**
 * Signs OKX V5 private requests: Base64 HMAC-SHA256 over
 * `timestamp + METHOD + requestPath + body`.
 */
export class OkxSigner {
  readonly #apiKey: string;
  readonly #secretKey: string;
  readonly #passphrase: string;

  constructor(apiKey: string, secretKey: string, passphrase: string) {
    this.#apiKey = apiKey;
    this.#secretKey = secretKey;
    this.#passphrase = passphrase;
  }

  sign(timestamp: string, method: string, requestPath: string, body = ''): string {
    const preSign = timestamp + method.toUpperCase() + requestPath + body;
    return crypto
      .createHmac('sha256', this.#secretKey)
      .update(preSign)
      .digest('base64');
  }

  headers(
    method: 'GET' | 'POST',
    requestPath: string,
    body: string,
    timestamp: string,
    simulated: boolean
  ): Record<string, string> {
    const headers: Record<string, string> = {
      'OK-ACCESS-KEY': this.#apiKey,
      'OK-ACCESS-SIGN': this.sign(timestamp, method, requestPath, body),
      'OK-ACCESS-TIMESTAMP': timestamp,
      'OK-ACCESS-PASSPHRASE': this.#passphrase,
      'Content-Type': 'application/json',
    };

    // Demo trading
    if (simulated) {
      headers['x-simulated-trading'] = '1';
    }

    return headers;
  }
}

export function buildQueryString(
  params: Record<string, string | number | undefined>
): string {
  const entries: string[] = [];
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      entries.push(`${key}=${encodeURIComponent(String(value))}`);
    }
  }
  return entries.join('&');
}
