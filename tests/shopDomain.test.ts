import { describe, expect, it } from "vitest";
import { sanitizeHost, sanitizeShopDomain } from "../src/shopDomain";

const toBase64 = (value: string) => Buffer.from(value, "utf8").toString("base64");

describe("sanitizeShopDomain", () => {
  it("should accept a full shop domain", () => {
    expect(sanitizeShopDomain("shop1.myshopify.com")).toBe("shop1.myshopify.com");
  });

  it("should append the primary domain to a bare handle", () => {
    expect(sanitizeShopDomain("shop1")).toBe("shop1.myshopify.com");
    expect(sanitizeShopDomain("shop1", ["myshopify.io"])).toBe("shop1.myshopify.io");
  });

  it("should strip protocol, path and case", () => {
    expect(sanitizeShopDomain("  https://Shop1.MyShopify.com/admin  ")).toBe("shop1.myshopify.com");
  });

  it("should map unified admin URLs to the shop domain", () => {
    expect(sanitizeShopDomain("https://admin.shopify.com/store/shop1/products")).toBe("shop1.myshopify.com");
  });

  it("should reject domains outside the allowed list", () => {
    expect(sanitizeShopDomain("shop1.example.com")).toBeNull();
    expect(sanitizeShopDomain("evil.com/shop1.myshopify.com")).toBeNull();
    expect(sanitizeShopDomain("shop1.myshopify.io", ["myshopify.com"])).toBeNull();
  });

  it("should reject empty and non-string values", () => {
    expect(sanitizeShopDomain("")).toBeNull();
    expect(sanitizeShopDomain("   ")).toBeNull();
    expect(sanitizeShopDomain(42)).toBeNull();
    expect(sanitizeShopDomain(["shop1.myshopify.com"])).toBeNull();
  });
});

describe("sanitizeHost", () => {
  it("should return the encoded host when it decodes to the admin host", () => {
    const host = toBase64("admin.shopify.com/store/shop1");

    expect(sanitizeHost(host)).toBe(host);
  });

  it("should accept hosts that decode to a shop domain", () => {
    const host = toBase64("shop1.myshopify.com/admin");

    expect(sanitizeHost(host)).toBe(host);
  });

  it("should reject hosts that decode to another domain", () => {
    expect(sanitizeHost(toBase64("evil.com/admin"))).toBeNull();
  });

  it("should reject values that are not base64", () => {
    expect(sanitizeHost("not base64!")).toBeNull();
    expect(sanitizeHost(undefined)).toBeNull();
  });
});
