import { createHmac } from "node:crypto";
import { describe, expect, it, vi } from "vitest";
import {
  embeddedAppUrl,
  exchangeCodeForToken,
  getOAuthRedirectUrl,
  validateOAuthHmac,
  verifyState,
  type OAuthOptions,
} from "../src/shopifyAuth";
import { API_KEY, API_SECRET } from "./helpers";

const SHOP = "shop1.myshopify.com";
const options: OAuthOptions = {
  apiKey: API_KEY,
  apiSecret: API_SECRET,
  appUrl: "https://app.example.com",
  scopes: ["read_products", "write_orders"],
  online: false,
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

function sign(message: string): string {
  return createHmac("sha256", API_SECRET).update(message).digest("hex");
}

describe("getOAuthRedirectUrl", () => {
  it("should point at the shop's authorize endpoint with a one-time state", () => {
    const url = new URL(getOAuthRedirectUrl(SHOP, options));
    const state = url.searchParams.get("state") ?? "";

    expect(url.origin).toBe("https://shop1.myshopify.com");
    expect(url.pathname).toBe("/admin/oauth/authorize");
    expect(url.searchParams.get("client_id")).toBe(API_KEY);
    expect(url.searchParams.get("scope")).toBe("read_products,write_orders");
    expect(url.searchParams.get("redirect_uri")).toBe("https://app.example.com/auth/callback");
    expect(url.searchParams.has("grant_options[]")).toBe(false);
    expect(state).toMatch(/^[0-9a-f]{32}$/);
    expect(verifyState(state)).toBe(SHOP);
    expect(verifyState(state)).toBeNull();
  });

  it("should request a per-user token in online mode", () => {
    const url = new URL(getOAuthRedirectUrl(SHOP, { ...options, online: true }));

    expect(url.searchParams.get("grant_options[]")).toBe("per-user");
  });

  it("should reject a state older than ten minutes", () => {
    const state = new URL(getOAuthRedirectUrl(SHOP, options)).searchParams.get("state") ?? "";

    expect(verifyState(state, Date.now() + 10 * 60 * 1000 + 1)).toBeNull();
    expect(verifyState(state)).toBeNull();
  });

  it("should reject an unknown state", () => {
    expect(verifyState("unknown-state")).toBeNull();
  });
});

describe("validateOAuthHmac", () => {
  const message = "code=abc&shop=shop1.myshopify.com&state=xyz&timestamp=1700000000";
  const query = { shop: SHOP, code: "abc", timestamp: "1700000000", state: "xyz" };

  it("should accept the hmac of the sorted remaining params", () => {
    expect(validateOAuthHmac({ ...query, hmac: sign(message) }, API_SECRET)).toBe(true);
  });

  it("should ignore the signature param", () => {
    expect(validateOAuthHmac({ ...query, signature: "ignored", hmac: sign(message) }, API_SECRET)).toBe(true);
  });

  it("should reject tampered params, a wrong secret or a missing hmac", () => {
    expect(validateOAuthHmac({ ...query, code: "abd", hmac: sign(message) }, API_SECRET)).toBe(false);
    expect(validateOAuthHmac({ ...query, hmac: sign(message) }, "other-secret")).toBe(false);
    expect(validateOAuthHmac(query, API_SECRET)).toBe(false);
    expect(validateOAuthHmac({ ...query, hmac: "zz" }, API_SECRET)).toBe(false);
  });
});

describe("exchangeCodeForToken", () => {
  it("should build an offline session from the token response", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () =>
      jsonResponse({ access_token: "offline-token", scope: "read_products,write_orders" })
    );

    const session = await exchangeCodeForToken(SHOP, "auth-code", options, fetchMock);

    expect(session).toEqual({
      id: SHOP,
      shop: SHOP,
      accessToken: "offline-token",
      scope: ["read_products", "write_orders"],
      isOnline: false,
    });
    expect(fetchMock).toHaveBeenCalledWith("https://shop1.myshopify.com/admin/oauth/access_token", {
      method: "POST",
      headers: { "Content-Type": "application/json", Accept: "application/json" },
      body: JSON.stringify({ client_id: API_KEY, client_secret: API_SECRET, code: "auth-code" }),
    });
  });

  it("should build an online session bound to the associated user", async () => {
    const now = Date.parse("2026-01-01T00:00:00.000Z");
    vi.spyOn(Date, "now").mockReturnValue(now);
    const fetchMock = vi.fn<typeof fetch>(async () =>
      jsonResponse({
        access_token: "online-token",
        scope: "read_products,write_orders",
        expires_in: 86_399,
        associated_user_scope: "read_products",
        associated_user: { id: 902541635, email: "owner@example.com", first_name: "Ada", account_owner: true },
      })
    );

    const session = await exchangeCodeForToken(SHOP, "auth-code", { ...options, online: true }, fetchMock);

    expect(session.id).toBe("shop1.myshopify.com_902541635");
    expect(session.isOnline).toBe(true);
    expect(session.scope).toEqual(["read_products"]);
    expect(session.associatedUser).toEqual({
      id: "902541635",
      email: "owner@example.com",
      firstName: "Ada",
      accountOwner: true,
    });
    expect(session.expiresAt?.toISOString()).toBe("2026-01-01T23:59:59.000Z");
  });

  it("should fall back to an offline session when the response has no user", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => jsonResponse({ access_token: "offline-token", scope: "" }));

    const session = await exchangeCodeForToken(SHOP, "auth-code", { ...options, online: true }, fetchMock);

    expect(session.isOnline).toBe(false);
    expect(session.scope).toEqual(["read_products", "write_orders"]);
  });

  it("should fail on a rejected exchange", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => new Response("invalid code", { status: 400 }));

    await expect(exchangeCodeForToken(SHOP, "auth-code", options, fetchMock)).rejects.toThrow(
      "OAuth token exchange failed: 400 invalid code"
    );
  });

  it("should fail when the response carries no access token", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => jsonResponse({ scope: "read_products" }));

    await expect(exchangeCodeForToken(SHOP, "auth-code", options, fetchMock)).rejects.toThrow(
      "OAuth token exchange returned no access_token"
    );
  });
});

describe("embeddedAppUrl", () => {
  it("should point at the app inside the shop's admin", () => {
    expect(embeddedAppUrl(SHOP, API_KEY, "/")).toBe("https://shop1.myshopify.com/admin/apps/test-api-key");
  });

  it("should keep the return path and its query", () => {
    expect(embeddedAppUrl(SHOP, API_KEY, "/products?page=2&shop=shop1.myshopify.com")).toBe(
      "https://shop1.myshopify.com/admin/apps/test-api-key/products?page=2&shop=shop1.myshopify.com"
    );
  });

  it("should ignore absolute return addresses", () => {
    expect(embeddedAppUrl(SHOP, API_KEY, "https://app.example.com/products")).toBe(
      "https://shop1.myshopify.com/admin/apps/test-api-key"
    );
  });
});
