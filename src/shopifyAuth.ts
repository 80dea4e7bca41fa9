import { createHmac, randomBytes, timingSafeEqual } from "node:crypto";
import { createOfflineSession, createOnlineSession, type AssociatedUser, type Session } from "./session";
import type { QueryParams } from "./loginProtection";
import { logInfo, logError } from "../shared/logger";

const STATE_TTL_MS = 10 * 60 * 1000; // 10 min
const MAX_PENDING_STATES = 1000;

interface PendingState {
  shop: string;
  expiresAt: number;
}

// state → tienda, de un solo uso
const pendingStates = new Map<string, PendingState>();

export interface OAuthOptions {
  apiKey: string;
  apiSecret: string;
  appUrl: string;
  scopes: readonly string[];
  /** true: token online (por usuario, grant_options[]=per-user). */
  online: boolean;
}

interface AccessTokenResponse {
  accessToken: string;
  scope: string;
  expiresIn?: number;
  associatedUserScope?: string;
  associatedUser?: AssociatedUser;
}

function prunePendingStates(now: number): void {
  for (const [state, pending] of pendingStates) {
    if (pending.expiresAt <= now) pendingStates.delete(state);
  }
}

/** Genera la URL de autorización OAuth (redirect a Shopify). */
export function getOAuthRedirectUrl(shop: string, options: OAuthOptions): string {
  const now = Date.now();
  if (pendingStates.size >= MAX_PENDING_STATES) prunePendingStates(now);
  const state = randomBytes(16).toString("hex");
  pendingStates.set(state, { shop, expiresAt: now + STATE_TTL_MS });
  const redirectUri = `${options.appUrl}/auth/callback`;
  const params = new URLSearchParams({
    client_id: options.apiKey,
    scope: options.scopes.join(","),
    redirect_uri: redirectUri,
    state
  });
  if (options.online) params.append("grant_options[]", "per-user");
  const url = `https://${shop}/admin/oauth/authorize?${params.toString()}`;
  logInfo("shopify auth redirect", { shop, redirectUri, online: options.online });
  return url;
}

/** Consume el state: devuelve su tienda una sola vez, o null si no existe o caducó. */
export function verifyState(state: string, now: number = Date.now()): string | null {
  const pending = pendingStates.get(state);
  pendingStates.delete(state);
  if (!pending || pending.expiresAt <= now) return null;
  return pending.shop;
}

/**
 * Valida el hmac del callback OAuth.
 * Parámetros (excepto hmac y signature) ordenados por clave, key=value unidos con "&".
 * HMAC-SHA256 con el API secret, comparación hexadecimal (timing-safe).
 */
export function validateOAuthHmac(query: QueryParams, secret: string): boolean {
  const hmac = query.hmac;
  if (typeof hmac !== "string" || !hmac || !secret) return false;

  const rest: Record<string, string> = {};
  for (const [k, v] of Object.entries(query)) {
    if (k === "hmac" || k === "signature") continue;
    rest[k] = Array.isArray(v) ? v.join(",") : (v ?? "");
  }
  const message = Object.keys(rest)
    .sort()
    .map((k) => `${k}=${rest[k]}`)
    .join("&");
  const expected = createHmac("sha256", secret).update(message).digest("hex");
  if (expected.length !== hmac.length) return false;
  try {
    return timingSafeEqual(Buffer.from(expected, "hex"), Buffer.from(hmac, "hex"));
  } catch {
    return false;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value ? value : undefined;
}

function parseAssociatedUser(value: unknown): AssociatedUser | undefined {
  if (!isRecord(value)) return undefined;
  if (typeof value.id !== "number" && typeof value.id !== "string") return undefined;
  return {
    id: String(value.id),
    email: optionalString(value.email),
    firstName: optionalString(value.first_name),
    lastName: optionalString(value.last_name),
    accountOwner: typeof value.account_owner === "boolean" ? value.account_owner : undefined,
    locale: optionalString(value.locale),
  };
}

function parseAccessTokenResponse(body: unknown): AccessTokenResponse | null {
  if (!isRecord(body) || typeof body.access_token !== "string" || !body.access_token) return null;
  return {
    accessToken: body.access_token,
    scope: typeof body.scope === "string" ? body.scope : "",
    expiresIn: typeof body.expires_in === "number" ? body.expires_in : undefined,
    associatedUserScope: optionalString(body.associated_user_scope),
    associatedUser: parseAssociatedUser(body.associated_user),
  };
}

function splitScope(scope: string): string[] {
  return scope.split(",").map((s) => s.trim()).filter(Boolean);
}

/**
 * URL de la app dentro del admin. Tras un OAuth a nivel superior (ITP) el
 * callback devuelve al comerciante al iframe en lugar de quedarse fuera.
 */
export function embeddedAppUrl(shop: string, apiKey: string, returnAddress: string): string {
  const base = `https://${shop}/admin/apps/${encodeURIComponent(apiKey)}`;
  if (!returnAddress.startsWith("/") || returnAddress === "/") return base;
  return `${base}${returnAddress}`;
}

/** Intercambia code por access_token y construye la sesión (online u offline). */
export async function exchangeCodeForToken(
  shop: string,
  code: string,
  options: OAuthOptions,
  fetchImpl: typeof fetch = fetch
): Promise<Session> {
  const url = `https://${shop}/admin/oauth/access_token`;
  const body = JSON.stringify({
    client_id: options.apiKey,
    client_secret: options.apiSecret,
    code
  });
  logInfo("shopify exchange token", { shop, url });
  const res = await fetchImpl(url, {
    method: "POST",
    headers: { "Content-Type": "application/json", Accept: "application/json" },
    body
  });
  if (!res.ok) {
    const text = await res.text();
    logError("shopify exchange token failed", { shop, status: res.status, body: text });
    throw new Error(`OAuth token exchange failed: ${res.status} ${text}`);
  }
  const data = parseAccessTokenResponse(await res.json());
  if (!data) {
    logError("shopify exchange token invalid response", { shop });
    throw new Error("OAuth token exchange returned no access_token");
  }

  const scope = splitScope(data.scope || options.scopes.join(","));
  if (options.online && data.associatedUser && data.expiresIn !== undefined) {
    return createOnlineSession({
      shop,
      accessToken: data.accessToken,
      scope: data.associatedUserScope ? splitScope(data.associatedUserScope) : scope,
      user: data.associatedUser,
      expiresAt: new Date(Date.now() + data.expiresIn * 1000),
    });
  }
  return createOfflineSession({ shop, accessToken: data.accessToken, scope });
}
