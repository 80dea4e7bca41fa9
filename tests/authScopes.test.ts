import { describe, expect, it } from "vitest";
import { AuthScopes } from "../src/authScopes";

describe("AuthScopes", () => {
  it("should parse a comma list, trimming and de-duplicating", () => {
    const scopes = new AuthScopes("read_products, write_orders,read_products");

    expect(scopes.toArray()).toEqual(["read_products", "write_orders"]);
    expect(scopes.toString()).toBe("read_products,write_orders");
  });

  it("should treat write scopes as implying read scopes", () => {
    const scopes = new AuthScopes("write_products");

    expect(scopes.has("read_products")).toBe(true);
    expect(scopes.covers(["read_products", "write_products"])).toBe(true);
    expect(scopes.toArray()).toEqual(["write_products"]);
  });

  it("should expand unauthenticated write scopes", () => {
    const scopes = new AuthScopes(["unauthenticated_write_checkouts"]);

    expect(scopes.has("unauthenticated_read_checkouts")).toBe(true);
    expect(scopes.has("read_checkouts")).toBe(false);
  });

  it("should not cover a scope that is missing", () => {
    const scopes = new AuthScopes("read_products");

    expect(scopes.covers("read_products,write_orders")).toBe(false);
    expect(scopes.covers(new AuthScopes("write_products"))).toBe(false);
  });

  it("should report empty scope sets", () => {
    expect(new AuthScopes("").isEmpty()).toBe(true);
    expect(new AuthScopes().isEmpty()).toBe(true);
    expect(new AuthScopes(" , ").isEmpty()).toBe(true);
  });

  it("should compare sets including implied scopes", () => {
    expect(new AuthScopes("write_products").equals(new AuthScopes("write_products,read_products"))).toBe(true);
    expect(new AuthScopes("read_products").equals(new AuthScopes("write_products"))).toBe(false);
  });
});
