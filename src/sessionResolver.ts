import { CookieNotFoundError, type ShopifySessionError } from "./errors";
import { isItpAffected } from "./itp";
import { isSessionExpired, offlineSessionId, onlineSessionId, type Session } from "./session";
import {
  decodeSessionToken,
  extractBearerToken,
  type DecodedSessionToken,
  type SessionTokenOptions,
} from "./sessionToken";
import { isUserSessionStore, type SessionStore } from "./sessionStore";

/** Credenciales que trae una petición. Todas son opcionales. */
export interface SessionCredentials {
  /** Cabecera Authorization ("Bearer <session token>"). */
  authorization?: string;
  /** Session token recibido como parámetro id_token. */
  sessionToken?: string;
  /** Id de sesión leído de la cookie firmada. */
  cookieSessionId?: string;
  userAgent?: string;
  /** true si la cookie de prueba de ITP volvió en esta petición. */
  testCookiePersisted?: boolean;
}

export type SessionLookupFailure = "cookie-not-found" | "invalid-token" | "not-found" | "expired";

export type SessionResolution =
  | { status: "found"; session: Session; source: "token" | "cookie"; token?: DecodedSessionToken }
  | {
      status: "absent";
      reason: SessionLookupFailure;
      token?: DecodedSessionToken;
      error?: ShopifySessionError;
    };

export interface SessionResolverOptions extends SessionTokenOptions {
  store: SessionStore;
  embeddedApp: boolean;
}

export interface SessionResolver {
  /**
   * Resuelve la sesión actual: primero session token (cabecera o id_token),
   * después cookie. Un fallo de búsqueda se devuelve como "absent", no se lanza.
   */
  resolve(credentials: SessionCredentials, wantsOnlineSession: boolean): Promise<SessionResolution>;
}

function absent(
  reason: SessionLookupFailure,
  extra: { token?: DecodedSessionToken; error?: ShopifySessionError } = {}
): SessionResolution {
  return { status: "absent", reason, ...extra };
}

export function createSessionResolver(options: SessionResolverOptions): SessionResolver {
  const { store } = options;

  function accept(
    session: Session | null,
    source: "token" | "cookie",
    token?: DecodedSessionToken
  ): SessionResolution {
    if (!session) return absent("not-found", { token });
    if (token && session.shop !== token.shop) return absent("not-found", { token });
    if (session.isOnline && isSessionExpired(session)) return absent("expired", { token });
    return { status: "found", session, source, token };
  }

  async function resolveByToken(
    token: DecodedSessionToken,
    wantsOnlineSession: boolean
  ): Promise<SessionResolution> {
    if (!wantsOnlineSession) {
      return accept(await store.retrieve(offlineSessionId(token.shop)), "token", token);
    }
    if (!token.userId) return absent("not-found", { token });
    const indexed = isUserSessionStore(store) ? await store.retrieveByUserId(token.userId, token.shop) : null;
    if (indexed?.shop === token.shop) return accept(indexed, "token", token);
    return accept(await store.retrieve(onlineSessionId(token.shop, token.userId)), "token", token);
  }

  // En apps embebidas, un navegador con ITP no devuelve la cookie dentro del iframe
  // salvo que la cookie de prueba haya persistido.
  function cookieTrusted(credentials: SessionCredentials): boolean {
    return (
      !options.embeddedApp ||
      credentials.testCookiePersisted === true ||
      !isItpAffected(credentials.userAgent)
    );
  }

  return {
    async resolve(credentials, wantsOnlineSession) {
      const raw = extractBearerToken(credentials.authorization) ?? credentials.sessionToken ?? null;
      if (raw) {
        const decoded = decodeSessionToken(raw, options);
        if (!decoded.ok) return absent("invalid-token", { error: decoded.error });
        return resolveByToken(decoded.token, wantsOnlineSession);
      }

      if (!cookieTrusted(credentials)) {
        return absent("cookie-not-found", {
          error: new CookieNotFoundError("Session cookie is not available for this browser"),
        });
      }
      const id = credentials.cookieSessionId;
      if (!id) return absent("cookie-not-found", { error: new CookieNotFoundError() });
      return accept(await store.retrieve(id), "cookie");
    },
  };
}
