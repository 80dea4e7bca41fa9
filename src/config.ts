import { getBoolEnv, getEnv, getListEnv } from "../shared/env";
import { logWarn } from "../shared/logger";

export type SessionStorageKind = "memory" | "supabase";

const SESSION_STORAGE_KINDS: readonly SessionStorageKind[] = ["memory", "supabase"];

function parseSessionStorage(value: string): SessionStorageKind {
  const normalized = value.trim().toLowerCase();
  const kind = SESSION_STORAGE_KINDS.find((k) => k === normalized);
  if (kind) return kind;
  logWarn("unknown SESSION_STORAGE, using memory", { value });
  return "memory";
}

/** Shopify app: obligatorios para OAuth y sesiones. */
const shopifyApiKey = getEnv("SHOPIFY_API_KEY", "");
const shopifyApiSecret = getEnv("SHOPIFY_API_SECRET", "");
const shopifyAppUrl = getEnv("SHOPIFY_APP_URL", "");

export const config = {
  port: Number(getEnv("PORT", "8080")),
  shopifyApiKey,
  shopifyApiSecret,
  shopifyAppUrl: shopifyAppUrl.replace(/\/$/, ""),
  /** Scopes que la app necesita. Env: SCOPES separados por coma. */
  scopes: getListEnv("SCOPES", "read_products"),
  apiVersion: getEnv("SHOPIFY_API_VERSION", "2024-10"),
  /** Ruta a la que se manda al usuario para (re)autenticarse. */
  loginUrl: getEnv("LOGIN_URL", "/login"),
  rootUrl: getEnv("ROOT_URL", "/"),
  embeddedApp: getBoolEnv("EMBEDDED_APP", true),
  /** true: sesiones online (por usuario) con índice userId → sesión. */
  userSessionStorage: getBoolEnv("USER_SESSION_STORAGE", false),
  /** "memory" (por defecto) o "supabase". Env: SESSION_STORAGE */
  sessionStorage: parseSessionStorage(getEnv("SESSION_STORAGE", "memory")),
  supabaseUrl: getEnv("SUPABASE_URL", ""),
  supabaseServiceKey: getEnv("SUPABASE_SERVICE_ROLE_KEY", ""),
  sessionTable: getEnv("SESSION_TABLE", "shopify_sessions"),
  /** Firma de cookies (cookie-parser). Si está vacío se usa el API secret. */
  cookieSecret: getEnv("COOKIE_SECRET", "") || shopifyApiSecret,
  secureCookies: getBoolEnv("SECURE_COOKIES", true),
  myshopifyDomains: getListEnv("MYSHOPIFY_DOMAINS", "myshopify.com,myshopify.io"),
  /** true si OAuth está configurado */
  shopifyEnabled: Boolean(shopifyApiKey && shopifyApiSecret && shopifyAppUrl),
};

export type AppConfig = typeof config;
