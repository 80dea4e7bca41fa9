import { HostNotFoundError, HttpResponseError, ShopDomainNotFoundError } from "./errors";
import { isItpAffected, TEST_COOKIE_NAME } from "./itp";
import type { ActiveSession, PlatformContext } from "./platformContext";
import { makeSafe } from "./safeRedirect";
import { isScopeSufficient, needsReauth, resolveRequestedShop } from "./scopeValidator";
import type { Session } from "./session";
import type { SessionCredentials, SessionLookupFailure, SessionResolution, SessionResolver } from "./sessionResolver";
import type { SessionStore } from "./sessionStore";
import { jwtExpireAt, type DecodedSessionToken } from "./sessionToken";
import { DEFAULT_MYSHOPIFY_DOMAINS, sanitizeHost, sanitizeShopDomain } from "./shopDomain";
import { logInfo } from "../shared/logger";

export const ACCESS_TOKEN_REQUIRED_HEADER = "X-Shopify-API-Request-Failure-Unauthorized";
export const SESSION_COOKIE_NAME = "shopify_app_session";
export const RETURN_TO_COOKIE_NAME = "shopify_app_return_to";

/** Parámetros que añade Shopify a cada petición; no justifican un return_to por sí solos. */
export const NATIVE_PARAMS: readonly string[] = ["shop", "hmac", "timestamp", "locale", "protocol", "return_to"];
/** Credenciales que nunca se guardan en return_to. */
const CREDENTIAL_PARAMS: readonly string[] = ["id_token"];

const RETURN_TO_MAX_AGE_MS = 10 * 60 * 1000; // 10 min
// Base para parsear rutas relativas y referers; nunca aparece en la salida.
const PLACEHOLDER_ORIGIN = "http://placeholder.invalid";

export type QueryParams = Record<string, string | string[] | undefined>;

export interface CookieSetOptions {
  httpOnly?: boolean;
  /** Milisegundos. */
  maxAge?: number;
}

/** Cookies de la petición actual. Cada framework implementa su adaptador. */
export interface CookieAdapter {
  get(name: string): string | undefined;
  set(name: string, value: string, options?: CookieSetOptions): void;
  clear(name: string): void;
}

export interface AuthRequest {
  method: string;
  path: string;
  query: QueryParams;
  header(name: string): string | undefined;
  /** Petición programática (XHR/fetch): recibe 401 en lugar de redirect. */
  xhr: boolean;
  cookies: CookieAdapter;
}

export type AuthResponse =
  | { kind: "unauthorized"; status: 401; headers: Record<string, string> }
  | { kind: "redirect"; status: 302; location: string; headers: Record<string, string> };

export type ReauthReason = SessionLookupFailure | "shop-mismatch" | "scope-insufficient" | "unauthorized-upstream";

export type AccessDecision =
  | { state: "authorized"; session: Session }
  | { state: "reauth-required"; reason: ReauthReason; response: AuthResponse };

export type ReauthDecision = Extract<AccessDecision, { state: "reauth-required" }>;

export type ActivationResult<T> = { state: "authorized"; value: T } | ReauthDecision;

export interface LoginProtectionOptions {
  resolver: SessionResolver;
  store: SessionStore;
  platform: PlatformContext;
  loginUrl: string;
  rootUrl: string;
  embeddedApp: boolean;
  /** true cuando se guardan sesiones online: el token se busca por usuario. */
  userSessionExpected: boolean;
  myshopifyDomains?: readonly string[];
}

function queryString(query: QueryParams, key: string): string | undefined {
  const value = query[key];
  return typeof value === "string" && value.trim() ? value : undefined;
}

/** Query con claves ordenadas; los arrays se repiten como key=a&key=b. */
function toQuery(params: Record<string, string | readonly string[]>): string {
  const search = new URLSearchParams();
  for (const key of Object.keys(params).sort()) {
    const value = params[key];
    for (const v of typeof value === "string" ? [value] : value) search.append(key, v);
  }
  return search.toString();
}

function searchToRecord(search: URLSearchParams): Record<string, string | string[]> {
  const out: Record<string, string | string[]> = {};
  for (const key of new Set(search.keys())) {
    const values = search.getAll(key);
    out[key] = values.length === 1 ? values[0] : values;
  }
  return out;
}

function unauthorizedHeaders(): Record<string, string> {
  return { [ACCESS_TOKEN_REQUIRED_HEADER]: "true" };
}

export class LoginProtection {
  constructor(private readonly options: LoginProtectionOptions) {}

  forRequest(request: AuthRequest): RequestGuard {
    return new RequestGuard(this.options, request);
  }
}

/**
 * Decide, para una petición, si sigue autenticada como una tienda/usuario o a
 * dónde mandarla. La sesión resuelta se memoriza solo durante esta petición.
 */
export class RequestGuard {
  private resolution: Promise<SessionResolution> | null = null;
  private pendingReturnTo: string | undefined;

  constructor(
    private readonly options: LoginProtectionOptions,
    readonly request: AuthRequest
  ) {}

  resolve(): Promise<SessionResolution> {
    if (!this.resolution) {
      this.resolution = this.options.resolver.resolve(this.credentials(), this.options.userSessionExpected);
    }
    return this.resolution;
  }

  async currentSession(): Promise<Session | null> {
    const resolution = await this.resolve();
    return resolution.status === "found" ? resolution.session : null;
  }

  async decide(): Promise<AccessDecision> {
    const resolution = await this.resolve();
    if (resolution.status === "absent") {
      return this.reauth(resolution.reason, this.redirectToLogin());
    }

    const mismatch = await this.loginAgainIfDifferentUserOrShop();
    if (mismatch) return this.reauth("shop-mismatch", mismatch);

    if (!isScopeSufficient(resolution.session, this.options.platform.configuredScope())) {
      return this.reauth("scope-insufficient", this.redirectToLogin());
    }
    return { state: "authorized", session: resolution.session };
  }

  /**
   * Activa la sesión solo mientras corre handler; la desactivación va en finally.
   * Un 401 de Shopify cierra la sesión; cualquier otro error se relanza.
   */
  async activate<T>(handler: (active: ActiveSession) => Promise<T>): Promise<ActivationResult<T>> {
    const decision = await this.decide();
    if (decision.state !== "authorized") return decision;

    const { platform } = this.options;
    const active = platform.activateSession(decision.session);
    try {
      return { state: "authorized", value: await handler(active) };
    } catch (err: unknown) {
      const response = await this.handleHttpError(err);
      return this.reauth("unauthorized-upstream", response);
    } finally {
      platform.deactivateSession(active);
    }
  }

  /**
   * Redirect si la petición pide otra tienda, o si el parámetro session no es la
   * sesión del admin (claim sid) que firmó el token; null si la sesión sirve.
   */
  async loginAgainIfDifferentUserOrShop(): Promise<AuthResponse | null> {
    const resolution = await this.resolve();
    if (resolution.status !== "found") return null;
    const shopChanged = needsReauth(resolution.session, this.requestedShop());
    if (!shopChanged && !this.adminSessionChanged(resolution.token)) return null;
    await this.clearSession({ deleteStored: false });
    return this.redirectToLogin();
  }

  private adminSessionChanged(token: DecodedSessionToken | undefined): boolean {
    const requested = queryString(this.request.query, "session");
    if (!requested || !token?.sessionId) return false;
    return token.sessionId !== requested;
  }

  async handleHttpError(err: unknown): Promise<AuthResponse> {
    if (err instanceof HttpResponseError && err.status === 401) {
      return this.closeSession();
    }
    throw err;
  }

  async closeSession(): Promise<AuthResponse> {
    await this.clearSession({ deleteStored: true });
    if (this.request.xhr) return this.unauthorized();
    return this.redirect(this.loginUrlWithOptionalShop(this.topLevelRequired()));
  }

  /**
   * Borra la cookie de sesión. deleteStored también elimina la sesión guardada
   * (token revocado); en un cambio de tienda la sesión de la otra tienda sigue valiendo.
   */
  async clearSession(options: { deleteStored: boolean }): Promise<void> {
    this.request.cookies.clear(SESSION_COOKIE_NAME);
    if (!options.deleteStored) return;
    const session = await this.currentSession();
    if (session) {
      await this.options.store.delete(session.id);
      logInfo("shopify session deleted", { shop: session.shop, id: session.id });
    }
  }

  redirectToLogin(): AuthResponse {
    if (this.request.xhr) return this.unauthorized();
    this.storeReturnTo(this.currentReturnPath());
    return this.redirect(this.loginUrlWithOptionalShop(this.topLevelRequired()));
  }

  loginUrlWithOptionalShop(topLevel = false): string {
    const { loginUrl } = this.options;
    const query = toQuery(this.loginUrlParams(topLevel));
    if (!query) return loginUrl;
    return `${loginUrl}${loginUrl.includes("?") ? "&" : "?"}${query}`;
  }

  loginUrlParams(topLevel: boolean): Record<string, string> {
    const params: Record<string, string> = {};
    if (queryString(this.request.query, "shop")) {
      const shop = this.sanitizedShopName();
      if (shop) params.shop = shop;
    }

    const returnTo = makeSafe(this.storedReturnTo() ?? queryString(this.request.query, "return_to"), null);
    if (returnTo && this.returnToParamRequired()) {
      params.return_to = returnTo;
    }

    if (!params.shop) {
      const refererShop = this.refererSanitizedShopName();
      if (refererShop) params.shop = refererShop;
    }
    if (topLevel) params.top_level = "true";
    return params;
  }

  returnToParamRequired(): boolean {
    if (this.request.path !== "/") return true;
    return Object.keys(this.sanitizedParams()).some((key) => !NATIVE_PARAMS.includes(key));
  }

  /** Dirección post-login: return_to pendiente (o rootUrl) con shop y host. */
  async returnAddress(): Promise<string> {
    try {
      const shop = await this.currentShopifyDomain();
      const host = this.host();
      return this.returnAddressWithParams({ shop, host });
    } catch (err: unknown) {
      if (err instanceof ShopDomainNotFoundError || err instanceof HostNotFoundError) {
        return this.baseReturnAddress();
      }
      throw err;
    }
  }

  baseReturnAddress(): string {
    const stored = makeSafe(this.storedReturnTo(), null);
    this.pendingReturnTo = undefined;
    this.request.cookies.clear(RETURN_TO_COOKIE_NAME);
    return stored ?? this.options.rootUrl;
  }

  returnAddressWithParams(params: Record<string, string>): string {
    const base = this.baseReturnAddress();
    const absolute = /^https?:\/\//i.test(base);
    const url = new URL(base, PLACEHOLDER_ORIGIN);
    const query = toQuery({ ...searchToRecord(url.searchParams), ...params });
    const prefix = absolute ? url.origin : "";
    return `${prefix}${url.pathname}${query ? `?${query}` : ""}`;
  }

  async currentShopifyDomain(): Promise<string> {
    const shop = this.sanitizedShopName() ?? (await this.currentSession())?.shop;
    if (shop) return shop;
    throw new ShopDomainNotFoundError();
  }

  host(): string {
    const host = sanitizeHost(queryString(this.request.query, "host"), this.domains());
    if (host) return host;
    throw new HostNotFoundError();
  }

  async jwtExpireAt(): Promise<Date | null> {
    const resolution = await this.resolve();
    return resolution.token ? jwtExpireAt(resolution.token) : null;
  }

  requestedShop(): string | null {
    return resolveRequestedShop({
      queryShop: this.sanitizedShopName(),
      refererShop: this.refererSanitizedShopName(),
    });
  }

  sanitizedShopName(): string | null {
    return sanitizeShopDomain(queryString(this.request.query, "shop"), this.domains());
  }

  refererSanitizedShopName(): string | null {
    const referer = this.refererUrl();
    if (!referer) return null;
    return sanitizeShopDomain(referer.searchParams.get("shop"), this.domains());
  }

  /** Query actual sin credenciales y con shop normalizado (o sin shop si no es válido). */
  sanitizedParams(): Record<string, string | string[]> {
    const out: Record<string, string | string[]> = {};
    for (const [key, value] of Object.entries(this.request.query)) {
      if (value === undefined || CREDENTIAL_PARAMS.includes(key)) continue;
      out[key] = value;
    }
    if (typeof this.request.query.shop === "string") {
      const shop = this.sanitizedShopName();
      if (shop) out.shop = shop;
      else delete out.shop;
    }
    return out;
  }

  private currentReturnPath(): string {
    const sanitized = toQuery(this.sanitizedParams());
    if (this.request.method.toUpperCase() === "GET") {
      return sanitized ? `${this.request.path}?${sanitized}` : this.request.path;
    }
    const referer = this.refererUrl() ?? new URL("/", PLACEHOLDER_ORIGIN);
    const query = [referer.search.replace(/^\?/, ""), sanitized].filter(Boolean).join("&");
    return query ? `${referer.pathname}?${query}` : referer.pathname;
  }

  private storeReturnTo(path: string): void {
    this.pendingReturnTo = path;
    this.request.cookies.set(RETURN_TO_COOKIE_NAME, path, { httpOnly: true, maxAge: RETURN_TO_MAX_AGE_MS });
  }

  private storedReturnTo(): string | undefined {
    return this.pendingReturnTo ?? this.request.cookies.get(RETURN_TO_COOKIE_NAME);
  }

  // Un navegador con ITP dentro del iframe necesita navegar fuera para recibir cookies.
  private topLevelRequired(): boolean {
    return (
      this.options.embeddedApp &&
      isItpAffected(this.request.header("user-agent")) &&
      this.request.cookies.get(TEST_COOKIE_NAME) !== "true"
    );
  }

  private refererUrl(): URL | null {
    const referer = this.request.header("referer");
    if (!referer) return null;
    try {
      return new URL(referer, PLACEHOLDER_ORIGIN);
    } catch {
      return null;
    }
  }

  private credentials(): SessionCredentials {
    const { request } = this;
    return {
      authorization: request.header("authorization"),
      sessionToken: queryString(request.query, "id_token"),
      cookieSessionId: request.cookies.get(SESSION_COOKIE_NAME),
      userAgent: request.header("user-agent"),
      testCookiePersisted: request.cookies.get(TEST_COOKIE_NAME) === "true",
    };
  }

  private domains(): readonly string[] {
    return this.options.myshopifyDomains ?? DEFAULT_MYSHOPIFY_DOMAINS;
  }

  private unauthorized(): AuthResponse {
    return { kind: "unauthorized", status: 401, headers: unauthorizedHeaders() };
  }

  private redirect(location: string): AuthResponse {
    return { kind: "redirect", status: 302, location, headers: unauthorizedHeaders() };
  }

  private reauth(reason: ReauthReason, response: AuthResponse): ReauthDecision {
    logInfo("shopify session reauth required", {
      path: this.request.path,
      reason,
      response: response.kind,
    });
    return { state: "reauth-required", reason, response };
  }
}
