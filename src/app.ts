import express from "express";
import cookieParser from "cookie-parser";
import { HttpResponseError, toMessage } from "./errors";
import {
  createCookieAdapter,
  normalizeQuery,
  setTestCookie,
  toAuthRequest,
  withShopifySession,
  type CookieSecurity,
} from "./expressAdapter";
import { TOP_LEVEL_OAUTH_COOKIE_NAME } from "./itp";
import { SESSION_COOKIE_NAME, type LoginProtection } from "./loginProtection";
import type { SessionStore } from "./sessionStore";
import {
  embeddedAppUrl,
  exchangeCodeForToken,
  getOAuthRedirectUrl,
  validateOAuthHmac,
  verifyState,
  type OAuthOptions,
} from "./shopifyAuth";
import { DEFAULT_MYSHOPIFY_DOMAINS, sanitizeShopDomain } from "./shopDomain";
import { logInfo, logError } from "../shared/logger";

const SESSION_COOKIE_MAX_AGE_MS = 24 * 60 * 60 * 1000; // 1 día

export interface AppOptions extends CookieSecurity {
  protection: LoginProtection;
  store: SessionStore;
  cookieSecret: string;
  /** Sin OAuth configurado no se registran /auth ni /auth/callback. */
  oauth?: OAuthOptions;
  myshopifyDomains?: readonly string[];
  fetch?: typeof fetch;
}

function shopNameFromGraphql(body: unknown): string | null {
  if (typeof body !== "object" || body === null || !("data" in body)) return null;
  const { data } = body;
  if (typeof data !== "object" || data === null || !("shop" in data)) return null;
  const { shop } = data;
  if (typeof shop !== "object" || shop === null || !("name" in shop)) return null;
  return typeof shop.name === "string" ? shop.name : null;
}

export function createApp(options: AppOptions): express.Express {
  if (!options.cookieSecret) {
    throw new Error("COOKIE_SECRET or SHOPIFY_API_SECRET is required to sign session cookies");
  }
  const { protection, store } = options;
  const domains = options.myshopifyDomains ?? DEFAULT_MYSHOPIFY_DOMAINS;
  const security: CookieSecurity = {
    secureCookies: options.secureCookies,
    embeddedApp: options.embeddedApp,
  };

  const app = express();
  app.use(cookieParser(options.cookieSecret));

  // --- Logging ---
  app.use((req, _res, next) => {
    logInfo("Request", { method: req.method, path: req.path });
    next();
  });
  app.use(setTestCookie(security));

  app.get("/health", (_req, res) => {
    res.status(200).send("ok");
  });

  // GET /login?shop=xxx.myshopify.com → /auth (el return_to pendiente sigue en su cookie).
  // top_level=true marca el OAuth como de nivel superior para que el callback vuelva al admin.
  app.get("/login", (req, res) => {
    const shop = sanitizeShopDomain(req.query.shop, domains);
    if (!shop) {
      return res.status(400).json({ error: "MISSING_SHOP", message: "Missing or invalid query parameter: shop" });
    }
    if (req.query.top_level === "true") {
      createCookieAdapter(req, res, security).set(TOP_LEVEL_OAUTH_COOKIE_NAME, "true");
    }
    return res.redirect(302, `/auth?${new URLSearchParams({ shop }).toString()}`);
  });

  // --- Shopify OAuth (instalación / re-autorización) ---
  const { oauth } = options;
  if (oauth) {
    app.get("/auth", (req, res) => {
      const shop = sanitizeShopDomain(req.query.shop, domains);
      if (!shop) {
        logError("shopify auth missing shop", {});
        return res.status(400).send("Missing query parameter: shop");
      }
      return res.redirect(302, getOAuthRedirectUrl(shop, oauth));
    });

    // GET /auth/callback?code=...&shop=...&state=...&hmac=... → guardar sesión, cookie, redirect
    app.get("/auth/callback", async (req, res, next) => {
      const query = normalizeQuery(req.query);
      const code = typeof query.code === "string" ? query.code : "";
      const shop = sanitizeShopDomain(query.shop, domains);
      const state = typeof query.state === "string" ? query.state : "";
      if (!code || !shop || !state) {
        logError("shopify auth callback missing params", { hasCode: !!code, hasShop: !!shop, hasState: !!state });
        return res.status(400).send("Missing code, shop or state");
      }
      if (!validateOAuthHmac(query, oauth.apiSecret)) {
        logError("shopify auth callback invalid hmac", { shop });
        return res.status(400).send("Invalid hmac");
      }
      if (verifyState(state) !== shop) {
        logError("shopify auth callback invalid state", { shop });
        return res.status(400).send("Invalid state");
      }
      try {
        const session = await exchangeCodeForToken(shop, code, oauth, options.fetch);
        await store.store(session);
        const guard = protection.forRequest(toAuthRequest(req, res, security));
        const { cookies } = guard.request;
        const topLevel = security.embeddedApp && cookies.get(TOP_LEVEL_OAUTH_COOKIE_NAME) === "true";
        cookies.set(SESSION_COOKIE_NAME, session.id, { maxAge: SESSION_COOKIE_MAX_AGE_MS });
        cookies.clear(TOP_LEVEL_OAUTH_COOKIE_NAME);
        logInfo("shopify session saved", { shop, id: session.id, online: session.isOnline, topLevel });
        const returnAddress = await guard.returnAddress();
        return res.redirect(302, topLevel ? embeddedAppUrl(shop, oauth.apiKey, returnAddress) : returnAddress);
      } catch (err: unknown) {
        logError("shopify auth callback failed", { shop, error: toMessage(err) });
        return next(err);
      }
    });
  }

  app.post("/logout", async (req, res, next) => {
    try {
      const guard = protection.forRequest(toAuthRequest(req, res, security));
      await guard.clearSession({ deleteStored: true });
      res.status(204).end();
    } catch (err: unknown) {
      next(err);
    }
  });

  app.get(
    "/api/session",
    withShopifySession(protection, security, async (_req, res, active, guard) => {
      const { session } = active;
      const tokenExpiresAt = await guard.jwtExpireAt();
      res.status(200).json({
        shop: session.shop,
        scope: session.scope,
        isOnline: session.isOnline,
        expiresAt: session.expiresAt?.toISOString() ?? null,
        tokenExpiresAt: tokenExpiresAt?.toISOString() ?? null,
      });
    })
  );

  app.get(
    "/api/shop",
    withShopifySession(protection, security, async (_req, res, active) => {
      const body = await active.adminGraphql("query { shop { name } }");
      res.status(200).json({ shop: active.session.shop, name: shopNameFromGraphql(body) });
    })
  );

  // 404
  app.use((req, res) => {
    logError("Route not found", { method: req.method, path: req.path });
    res.status(404).json({ error: "NOT_FOUND", path: req.path });
  });

  app.use((err: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (err instanceof HttpResponseError) {
      logError("shopify upstream error", { path: req.path, status: err.status });
      res.status(502).json({ error: "UPSTREAM_ERROR", status: err.status });
      return;
    }
    logError("request failed", { path: req.path, error: toMessage(err) });
    res.status(500).json({ error: "INTERNAL_ERROR", message: toMessage(err) });
  });

  return app;
}
