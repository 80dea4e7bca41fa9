import jwt, { type JwtPayload } from "jsonwebtoken";
import { InvalidJwtTokenError, toMessage } from "./errors";
import { DEFAULT_MYSHOPIFY_DOMAINS, sanitizeShopDomain } from "./shopDomain";

/** Margen para empezar a pedir un token nuevo antes de que expire. */
const EXPIRE_AT_GAP_MS = 5_000;
const DEFAULT_CLOCK_TOLERANCE_SEC = 5;

export interface DecodedSessionToken {
  shop: string;
  /** Claim sub: id del usuario del admin. */
  userId?: string;
  expiresAt: Date;
  /** Claim sid: sesión del admin que emitió el token. */
  sessionId?: string;
}

export type SessionTokenResult =
  | { ok: true; token: DecodedSessionToken }
  | { ok: false; error: InvalidJwtTokenError };

export interface SessionTokenOptions {
  apiKey: string;
  apiSecret: string;
  clockToleranceSec?: number;
  myshopifyDomains?: readonly string[];
}

function fail(message: string): SessionTokenResult {
  return { ok: false, error: new InvalidJwtTokenError(message) };
}

export function extractBearerToken(header: string | null | undefined): string | null {
  if (!header) return null;
  const m = header.match(/^Bearer\s+(\S+)\s*$/i);
  return m ? m[1] : null;
}

/**
 * Verifica un session token del admin embebido (JWT HS256 firmado con el API secret)
 * y extrae la tienda y el usuario.
 */
export function decodeSessionToken(token: string, options: SessionTokenOptions): SessionTokenResult {
  if (!options.apiSecret) return fail("API secret is not configured");
  const domains = options.myshopifyDomains ?? DEFAULT_MYSHOPIFY_DOMAINS;

  let payload: string | JwtPayload;
  try {
    payload = jwt.verify(token, options.apiSecret, {
      algorithms: ["HS256"],
      audience: options.apiKey || undefined,
      clockTolerance: options.clockToleranceSec ?? DEFAULT_CLOCK_TOLERANCE_SEC,
    });
  } catch (err: unknown) {
    return fail(`Failed to verify session token: ${toMessage(err)}`);
  }
  if (typeof payload === "string") return fail("Session token payload is not an object");

  const dest: unknown = payload.dest;
  const iss: unknown = payload.iss;
  const sub: unknown = payload.sub;
  const sid: unknown = payload.sid;
  const { exp } = payload;

  const shop = sanitizeShopDomain(dest, domains);
  if (!shop) return fail("Session token has no valid dest claim");
  if (typeof iss === "string" && sanitizeShopDomain(iss, domains) !== shop) {
    return fail("Session token issuer does not match its destination");
  }
  if (typeof exp !== "number") return fail("Session token has no exp claim");

  return {
    ok: true,
    token: {
      shop,
      userId: typeof sub === "string" && sub ? sub : undefined,
      expiresAt: new Date(exp * 1000),
      sessionId: typeof sid === "string" && sid ? sid : undefined,
    },
  };
}

/** Momento en que el cliente debería pedir un token nuevo (exp - 5 s). */
export function jwtExpireAt(token: DecodedSessionToken): Date {
  return new Date(token.expiresAt.getTime() - EXPIRE_AT_GAP_MS);
}
