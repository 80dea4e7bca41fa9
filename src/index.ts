import { createApp } from "./app";
import { config } from "./config";
import { LoginProtection } from "./loginProtection";
import { createPlatformContext } from "./platformContext";
import { createSessionResolver } from "./sessionResolver";
import { createSessionStore } from "./storage";
import { logInfo, logWarn } from "../shared/logger";

const store = createSessionStore(config);

const resolver = createSessionResolver({
  store,
  apiKey: config.shopifyApiKey,
  apiSecret: config.shopifyApiSecret,
  embeddedApp: config.embeddedApp,
  myshopifyDomains: config.myshopifyDomains,
});

const platform = createPlatformContext({
  scopes: config.scopes,
  apiVersion: config.apiVersion,
});

const protection = new LoginProtection({
  resolver,
  store,
  platform,
  loginUrl: config.loginUrl,
  rootUrl: config.rootUrl,
  embeddedApp: config.embeddedApp,
  userSessionExpected: config.userSessionStorage,
  myshopifyDomains: config.myshopifyDomains,
});

if (!config.shopifyEnabled) {
  logWarn("shopify OAuth disabled: set SHOPIFY_API_KEY, SHOPIFY_API_SECRET and SHOPIFY_APP_URL");
}

const app = createApp({
  protection,
  store,
  cookieSecret: config.cookieSecret,
  secureCookies: config.secureCookies,
  embeddedApp: config.embeddedApp,
  myshopifyDomains: config.myshopifyDomains,
  oauth: config.shopifyEnabled
    ? {
        apiKey: config.shopifyApiKey,
        apiSecret: config.shopifyApiSecret,
        appUrl: config.shopifyAppUrl,
        scopes: config.scopes,
        online: config.userSessionStorage,
      }
    : undefined,
});

const port = config.port;
app.listen(port, "0.0.0.0", () => {
  logInfo("server listening", { url: `http://0.0.0.0:${port}`, sessionStorage: config.sessionStorage });
});
