/** Cookie de prueba: si vuelve en la siguiente petición, el navegador acepta cookies de la app. */
export const TEST_COOKIE_NAME = "shopify.cookies_persist";
export const TOP_LEVEL_OAUTH_COOKIE_NAME = "shopify.top_level_oauth";

export type BrowserName = "edge" | "opera" | "samsung" | "chrome" | "firefox" | "safari" | "unknown";

export interface DetectedBrowser {
  name: BrowserName;
  majorVersion: number | null;
  ios: boolean;
}

interface BrowserSignature {
  name: Exclude<BrowserName, "unknown">;
  /** El primer grupo es la versión mayor. */
  pattern: RegExp;
}

// El orden importa: Edge/Opera/Samsung incluyen "Chrome/" y Chrome incluye "Safari/".
const SIGNATURES: readonly BrowserSignature[] = [
  { name: "edge", pattern: /Edg(?:e|A|iOS)?\/(\d+)/ },
  { name: "opera", pattern: /(?:OPR|OPiOS)\/(\d+)/ },
  { name: "samsung", pattern: /SamsungBrowser\/(\d+)/ },
  { name: "chrome", pattern: /(?:Chrome|CriOS)\/(\d+)/ },
  { name: "firefox", pattern: /(?:Firefox|FxiOS)\/(\d+)/ },
  { name: "safari", pattern: /Version\/(\d+)[^ ]* (?:Mobile\/\S+ )?Safari\// },
];

const IOS_DEVICE = /\b(?:iPhone|iPad|iPod)\b/;

/** Safari de escritorio bloquea cookies de terceros desde la versión 11 (ITP). */
const SAFARI_ITP_MIN_VERSION = 11;

export function detectBrowser(userAgent: string | null | undefined): DetectedBrowser {
  const ua = userAgent ?? "";
  const ios = IOS_DEVICE.test(ua);
  for (const signature of SIGNATURES) {
    const m = ua.match(signature.pattern);
    if (m) {
      return { name: signature.name, majorVersion: Number(m[1]), ios };
    }
  }
  return { name: "unknown", majorVersion: null, ios };
}

/**
 * true si el navegador bloquea cookies de terceros por defecto: Safari >= 11 y
 * cualquier navegador en iOS/iPadOS (todos usan WebKit).
 */
export function isItpAffected(userAgent: string | null | undefined): boolean {
  if (!userAgent) return false;
  const browser = detectBrowser(userAgent);
  if (browser.ios) return true;
  return (
    browser.name === "safari" &&
    browser.majorVersion !== null &&
    browser.majorVersion >= SAFARI_ITP_MIN_VERSION
  );
}

export function shouldSetTestCookie(userAgent: string | null | undefined, embeddedApp: boolean): boolean {
  return embeddedApp && isItpAffected(userAgent);
}
