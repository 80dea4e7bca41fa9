export function getEnv(name: string, fallback: string): string {
  return process.env[name] ?? fallback;
}

/** "true"/"1"/"yes" → true, "false"/"0"/"no" → false; cualquier otro valor usa fallback. */
export function getBoolEnv(name: string, fallback: boolean): boolean {
  const v = process.env[name]?.trim().toLowerCase();
  if (v === "true" || v === "1" || v === "yes") return true;
  if (v === "false" || v === "0" || v === "no") return false;
  return fallback;
}

export function getListEnv(name: string, fallback: string): string[] {
  return getEnv(name, fallback)
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}
