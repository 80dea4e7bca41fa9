import { AuthScopes } from "./authScopes";
import type { Session } from "./session";

/**
 * Una sesión sin scopes registrados (anterior al seguimiento de scopes) se da por
 * suficiente para no forzar un re-OAuth innecesario.
 */
export function isScopeSufficient(
  session: Session,
  required: AuthScopes | string | readonly string[]
): boolean {
  const granted = new AuthScopes(session.scope);
  if (granted.isEmpty()) return true;
  return granted.covers(required);
}

/** true si la petición pide otra tienda distinta de la de la sesión. */
export function needsReauth(session: Session | null, requestedShop: string | null): boolean {
  if (!session || !requestedShop) return false;
  return session.shop !== requestedShop;
}

/** Precedencia: parámetro shop explícito > shop del referer. */
export function resolveRequestedShop(sources: {
  queryShop: string | null;
  refererShop: string | null;
}): string | null {
  return sources.queryShop ?? sources.refererShop ?? null;
}
