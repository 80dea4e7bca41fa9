export const DEFAULT_MYSHOPIFY_DOMAINS: readonly string[] = ["myshopify.com", "myshopify.io"];

const ADMIN_HOST = "admin.shopify.com";
// admin.shopify.com/store/<handle> (URL del admin unificado)
const ADMIN_STORE_PATH = /^admin\.shopify\.com\/store\/([a-z0-9][a-z0-9-]*[a-z0-9])(?:[/?#]|$)/;
const BASE64_CHARS = /^[A-Za-z0-9+/_-]+={0,2}$/;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function isShopHostname(hostname: string, domains: readonly string[]): boolean {
  return domains.some((domain) =>
    new RegExp(`^[a-z0-9][a-z0-9-]*[a-z0-9]\\.${escapeRegExp(domain)}$`).test(hostname)
  );
}

function hostnameOf(value: string): string | null {
  try {
    return new URL(`https://${value}`).hostname;
  } catch {
    return null;
  }
}

/**
 * Normaliza un parámetro shop a "<handle>.myshopify.com".
 * Acepta handle suelto, URL con protocolo/ruta y admin.shopify.com/store/<handle>.
 * Devuelve null si el resultado no es un dominio de tienda.
 */
export function sanitizeShopDomain(
  raw: unknown,
  domains: readonly string[] = DEFAULT_MYSHOPIFY_DOMAINS
): string | null {
  if (typeof raw !== "string") return null;
  const primary = domains[0] ?? "myshopify.com";
  let name = raw.trim().toLowerCase().replace(/^https?:\/\//, "");
  if (!name) return null;

  const adminStore = name.match(ADMIN_STORE_PATH);
  if (adminStore) name = `${adminStore[1]}.${primary}`;
  if (!name.includes(".")) name = `${name}.${primary}`;

  const hostname = hostnameOf(name);
  if (!hostname || !isShopHostname(hostname, domains)) return null;
  return hostname;
}

/** El parámetro host es el host del admin en base64; se devuelve tal cual si decodifica a uno válido. */
export function sanitizeHost(
  host: unknown,
  domains: readonly string[] = DEFAULT_MYSHOPIFY_DOMAINS
): string | null {
  if (typeof host !== "string" || !BASE64_CHARS.test(host)) return null;
  const decoded = Buffer.from(host, "base64").toString("utf8");
  const hostname = hostnameOf(decoded);
  if (!hostname) return null;
  if (hostname === ADMIN_HOST || isShopHostname(hostname, domains)) return host;
  return null;
}
