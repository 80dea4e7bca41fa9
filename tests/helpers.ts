import jwt from "jsonwebtoken";
import type { AuthRequest, CookieAdapter, CookieSetOptions, QueryParams } from "../src/loginProtection";

export const API_KEY = "test-api-key";
export const API_SECRET = "test-secret";

export const UA = {
  safari17: "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.1 Safari/605.1.15",
  safari10: "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_12_6) AppleWebKit/603.3.8 (KHTML, like Gecko) Version/10.1.2 Safari/603.3.8",
  iosSafari:
    "Mozilla/5.0 (iPhone; CPU iPhone OS 17_0 like Mac OS X) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.0 Mobile/15E148 Safari/604.1",
  iosChrome:
    "Mozilla/5.0 (iPhone; CPU iPhone OS 17_0 like Mac OS X) AppleWebKit/605.1.15 (KHTML, like Gecko) CriOS/118.0.5993.69 Mobile/15E148 Safari/604.1",
  chrome: "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/118.0.0.0 Safari/537.36",
  edge: "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/118.0.0.0 Safari/537.36 Edg/118.0.2088.46",
  firefox: "Mozilla/5.0 (X11; Linux x86_64; rv:109.0) Gecko/20100101 Firefox/119.0",
  androidChrome:
    "Mozilla/5.0 (Linux; Android 14; Pixel 8) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/118.0.0.0 Mobile Safari/537.36",
  samsung:
    "Mozilla/5.0 (Linux; Android 14; SM-S918B) AppleWebKit/537.36 (KHTML, like Gecko) SamsungBrowser/23.0 Chrome/115.0.0.0 Mobile Safari/537.36",
} as const;

export interface TokenClaims {
  shop?: string;
  iss?: string;
  sub?: string;
  sid?: string;
  aud?: string;
  /** Segundos desde ahora. */
  expiresIn?: number;
}

/** Firma un session token como los que emite el admin embebido. */
export function signSessionToken(claims: TokenClaims = {}, secret: string = API_SECRET): string {
  const shop = claims.shop ?? "shop1.myshopify.com";
  const now = Math.floor(Date.now() / 1000);
  return jwt.sign(
    {
      iss: claims.iss ?? `https://${shop}/admin`,
      dest: `https://${shop}`,
      aud: claims.aud ?? API_KEY,
      sub: claims.sub ?? "42",
      sid: claims.sid ?? "admin-session-1",
      exp: now + (claims.expiresIn ?? 60),
      iat: now,
    },
    secret,
    { algorithm: "HS256" }
  );
}

export class FakeCookies implements CookieAdapter {
  readonly jar = new Map<string, string>();
  readonly setCalls: Array<{ name: string; value: string; options?: CookieSetOptions }> = [];
  readonly cleared: string[] = [];

  constructor(initial: Record<string, string> = {}) {
    for (const [name, value] of Object.entries(initial)) this.jar.set(name, value);
  }

  get(name: string): string | undefined {
    return this.jar.get(name);
  }

  set(name: string, value: string, options?: CookieSetOptions): void {
    this.jar.set(name, value);
    this.setCalls.push({ name, value, options });
  }

  clear(name: string): void {
    this.jar.delete(name);
    this.cleared.push(name);
  }
}

export interface FakeRequestInit {
  method?: string;
  path?: string;
  query?: QueryParams;
  headers?: Record<string, string>;
  xhr?: boolean;
  cookies?: FakeCookies;
}

export function makeRequest(init: FakeRequestInit = {}): AuthRequest & { cookies: FakeCookies } {
  const headers = new Map(Object.entries(init.headers ?? {}).map(([k, v]) => [k.toLowerCase(), v]));
  return {
    method: init.method ?? "GET",
    path: init.path ?? "/",
    query: init.query ?? {},
    header: (name) => headers.get(name.toLowerCase()),
    xhr: init.xhr ?? false,
    cookies: init.cookies ?? new FakeCookies(),
  };
}
