export type SessionErrorCode =
  | "COOKIE_NOT_FOUND"
  | "INVALID_JWT_TOKEN"
  | "SHOP_DOMAIN_NOT_FOUND"
  | "HOST_NOT_FOUND"
  | "HTTP_RESPONSE_ERROR";

export class ShopifySessionError extends Error {
  readonly code: SessionErrorCode;

  constructor(code: SessionErrorCode, message: string) {
    super(message);
    this.name = "ShopifySessionError";
    this.code = code;
  }
}

export class CookieNotFoundError extends ShopifySessionError {
  constructor(message = "Session cookie not found") {
    super("COOKIE_NOT_FOUND", message);
    this.name = "CookieNotFoundError";
  }
}

export class InvalidJwtTokenError extends ShopifySessionError {
  constructor(message = "Invalid session token") {
    super("INVALID_JWT_TOKEN", message);
    this.name = "InvalidJwtTokenError";
  }
}

export class ShopDomainNotFoundError extends ShopifySessionError {
  constructor() {
    super("SHOP_DOMAIN_NOT_FOUND", "Shop domain not found in request or session");
    this.name = "ShopDomainNotFoundError";
  }
}

export class HostNotFoundError extends ShopifySessionError {
  constructor() {
    super("HOST_NOT_FOUND", "Missing query parameter: host");
    this.name = "HostNotFoundError";
  }
}

/** Respuesta no-2xx de la API de Shopify. */
export class HttpResponseError extends ShopifySessionError {
  readonly status: number;
  readonly body: string;

  constructor(status: number, body: string) {
    super("HTTP_RESPONSE_ERROR", `Shopify API request failed: ${status}`);
    this.name = "HttpResponseError";
    this.status = status;
    this.body = body;
  }
}

export function toMessage(err: unknown): string {
  if (err instanceof Error) return err.message || "Unknown error";
  if (typeof err === "string") return err || "Unknown error";
  try {
    return JSON.stringify(err);
  } catch {
    return "Unknown error";
  }
}
