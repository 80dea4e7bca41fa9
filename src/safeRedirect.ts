export const DANGEROUS_REDIRECT_PATTERNS: RegExp[] = [
  /javascript:/i,
  /data:/i,
  /vbscript:/i,
  /<script/i,
  /%3cscript/i,
  /\\/,
  /\0/,
  /[\r\n\t]/,
];

export function containsDangerousRedirectCharacters(url: string): boolean {
  return DANGEROUS_REDIRECT_PATTERNS.some((pattern) => pattern.test(url));
}

/** Solo rutas relativas al mismo origen: "/x", nunca "//host" ni "https://host". */
export function isSafeRelativePath(path: string): boolean {
  if (!path.startsWith("/") || path.startsWith("//")) return false;
  if (containsDangerousRedirectCharacters(path)) return false;

  let decoded = path;
  try {
    decoded = decodeURIComponent(path);
  } catch {
    return false;
  }
  if (decoded.startsWith("//")) return false;
  return !containsDangerousRedirectCharacters(decoded);
}

/**
 * Devuelve candidate si es una ruta relativa segura; si no, fallback.
 * Una URL absoluta se rechaza aunque apunte al propio origen.
 */
export function makeSafe<T extends string | null>(
  candidate: string | null | undefined,
  fallback: T
): string | T {
  if (typeof candidate !== "string") return fallback;
  const trimmed = candidate.trim();
  if (!trimmed) return fallback;
  return isSafeRelativePath(trimmed) ? trimmed : fallback;
}
