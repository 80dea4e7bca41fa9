import { AuthScopes } from "./authScopes";
import { HttpResponseError } from "./errors";
import type { Session } from "./session";
import { logInfo } from "../shared/logger";

/**
 * Sesión activada para una petición. Se pasa explícitamente al handler en lugar
 * de vivir en estado global; deja de funcionar al desactivarse.
 */
export interface ActiveSession {
  readonly session: Session;
  readonly apiVersion: string;
  isActive(): boolean;
  /** POST al Admin GraphQL API con el access token de la sesión. */
  adminGraphql(query: string, variables?: Record<string, unknown>): Promise<unknown>;
}

export interface PlatformContext {
  configuredScope(): AuthScopes;
  activateSession(session: Session): ActiveSession;
  deactivateSession(active: ActiveSession): void;
}

export interface PlatformContextOptions {
  scopes: string | readonly string[];
  apiVersion: string;
  fetch?: typeof fetch;
}

export function createPlatformContext(options: PlatformContextOptions): PlatformContext {
  const scope = new AuthScopes(options.scopes);
  const fetchImpl = options.fetch ?? fetch;
  const deactivated = new WeakSet<ActiveSession>();

  return {
    configuredScope: () => scope,

    activateSession(session) {
      const active: ActiveSession = {
        session,
        apiVersion: options.apiVersion,
        isActive: () => !deactivated.has(active),
        async adminGraphql(query, variables) {
          if (deactivated.has(active)) {
            throw new Error("Session is no longer active for this request");
          }
          if (!session.accessToken) {
            throw new HttpResponseError(401, "Session has no access token");
          }
          const url = `https://${session.shop}/admin/api/${options.apiVersion}/graphql.json`;
          const res = await fetchImpl(url, {
            method: "POST",
            headers: {
              "Content-Type": "application/json",
              "X-Shopify-Access-Token": session.accessToken,
            },
            body: JSON.stringify({ query, variables: variables ?? {} }),
          });
          if (!res.ok) {
            const text = await res.text();
            logInfo("shopify admin request failed", { shop: session.shop, status: res.status });
            throw new HttpResponseError(res.status, text);
          }
          return res.json();
        },
      };
      return active;
    },

    deactivateSession(active) {
      deactivated.add(active);
    },
  };
}
