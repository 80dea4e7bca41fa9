import type express from "express";
import { shouldSetTestCookie, TEST_COOKIE_NAME } from "./itp";
import type {
  AuthRequest,
  AuthResponse,
  CookieAdapter,
  LoginProtection,
  QueryParams,
  RequestGuard,
} from "./loginProtection";
import type { ActiveSession } from "./platformContext";
import { extractBearerToken } from "./sessionToken";

export interface CookieSecurity {
  secureCookies: boolean;
  embeddedApp: boolean;
}

export type ShopifySessionHandler = (
  req: express.Request,
  res: express.Response,
  active: ActiveSession,
  guard: RequestGuard
) => Promise<void>;

/**
 * Cookies firmadas (cookie-parser). Dentro del iframe del admin las cookies
 * necesitan SameSite=None; Secure.
 */
export function createCookieAdapter(
  req: express.Request,
  res: express.Response,
  security: CookieSecurity
): CookieAdapter {
  const sameSite = security.embeddedApp ? "none" : "lax";
  const secure = security.secureCookies || sameSite === "none";
  return {
    get(name) {
      const signed: unknown = req.signedCookies?.[name];
      return typeof signed === "string" && signed ? signed : undefined;
    },
    set(name, value, options = {}) {
      res.cookie(name, value, {
        signed: true,
        httpOnly: options.httpOnly ?? true,
        maxAge: options.maxAge,
        sameSite,
        secure,
        path: "/",
      });
    },
    clear(name) {
      res.clearCookie(name, { path: "/", sameSite, secure });
    },
  };
}

/** req.query de Express admite objetos anidados; aquí solo valen strings y arrays de strings. */
export function normalizeQuery(query: unknown): QueryParams {
  const out: QueryParams = {};
  if (typeof query !== "object" || query === null) return out;
  for (const [key, value] of Object.entries(query)) {
    if (typeof value === "string") {
      out[key] = value;
    } else if (Array.isArray(value)) {
      const strings = value.filter((v): v is string => typeof v === "string");
      if (strings.length > 0) out[key] = strings;
    }
  }
  return out;
}

export function toAuthRequest(
  req: express.Request,
  res: express.Response,
  security: CookieSecurity
): AuthRequest {
  return {
    method: req.method,
    path: req.path,
    query: normalizeQuery(req.query),
    header: (name) => req.get(name),
    // Las llamadas con session token (fetch desde App Bridge) son programáticas.
    xhr: req.xhr || extractBearerToken(req.get("authorization")) !== null,
    cookies: createCookieAdapter(req, res, security),
  };
}

export function sendAuthResponse(res: express.Response, response: AuthResponse): void {
  for (const [name, value] of Object.entries(response.headers)) {
    res.setHeader(name, value);
  }
  if (response.kind === "unauthorized") {
    res.status(401).json({ error: "UNAUTHORIZED", message: "Shopify session required" });
    return;
  }
  res.redirect(response.status, response.location);
}

/**
 * Ejecuta handler con la sesión activada. Si la petición no está autorizada
 * responde 401 o redirect a login; errores no-401 van al error handler.
 */
export function withShopifySession(
  protection: LoginProtection,
  security: CookieSecurity,
  handler: ShopifySessionHandler
): express.RequestHandler {
  return (req, res, next) => {
    const guard = protection.forRequest(toAuthRequest(req, res, security));
    guard
      .activate((active) => handler(req, res, active, guard))
      .then((result) => {
        if (result.state !== "authorized") sendAuthResponse(res, result.response);
      })
      .catch(next);
  };
}

/** Cookie de prueba para navegadores con ITP en apps embebidas. */
export function setTestCookie(security: CookieSecurity): express.RequestHandler {
  return (req, res, next) => {
    if (shouldSetTestCookie(req.get("user-agent"), security.embeddedApp)) {
      createCookieAdapter(req, res, security).set(TEST_COOKIE_NAME, "true");
    }
    next();
  };
}
