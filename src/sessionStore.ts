import { onlineSessionId, type Session } from "./session";

/**
 * Repositorio de sesiones OAuth. Guardar con un id existente sobrescribe (upsert);
 * un id desconocido devuelve null, nunca una excepción.
 */
export interface SessionStore {
  store(session: Session): Promise<string>;
  retrieve(id: string): Promise<Session | null>;
  delete(id: string): Promise<boolean>;
}

/**
 * Store con índice secundario userId → sesión (sesiones online). Con shop,
 * solo devuelve la sesión del usuario en esa tienda.
 */
export interface UserSessionStore extends SessionStore {
  retrieveByUserId(userId: string, shop?: string): Promise<Session | null>;
}

export function isUserSessionStore(store: SessionStore): store is UserSessionStore {
  return "retrieveByUserId" in store && typeof store.retrieveByUserId === "function";
}

/**
 * Almacén in-memory. Para producción con múltiples instancias usar
 * SupabaseSessionStore (SESSION_STORAGE=supabase).
 */
export class InMemorySessionStore implements SessionStore {
  protected readonly sessions = new Map<string, Session>();

  async store(session: Session): Promise<string> {
    this.sessions.set(session.id, session);
    return session.id;
  }

  async retrieve(id: string): Promise<Session | null> {
    return this.sessions.get(id) ?? null;
  }

  async delete(id: string): Promise<boolean> {
    return this.sessions.delete(id);
  }

  get size(): number {
    return this.sessions.size;
  }
}

export class InMemoryUserSessionStore extends InMemorySessionStore implements UserSessionStore {
  private readonly sessionIdByUser = new Map<string, string>();

  // Sin await entre las dos escrituras: el índice y el mapa principal cambian juntos.
  async store(session: Session): Promise<string> {
    const previous = this.sessions.get(session.id);
    if (previous?.associatedUser && previous.associatedUser.id !== session.associatedUser?.id) {
      this.sessionIdByUser.delete(previous.associatedUser.id);
    }
    this.sessions.set(session.id, session);
    if (session.associatedUser) {
      this.sessionIdByUser.set(session.associatedUser.id, session.id);
    }
    return session.id;
  }

  // El índice apunta a la última tienda del usuario; otra tienda se busca por id compuesto.
  async retrieveByUserId(userId: string, shop?: string): Promise<Session | null> {
    const id = this.sessionIdByUser.get(userId);
    const indexed = id === undefined ? null : (this.sessions.get(id) ?? null);
    if (!shop || indexed?.shop === shop) return indexed;
    return this.sessions.get(onlineSessionId(shop, userId)) ?? null;
  }

  async delete(id: string): Promise<boolean> {
    const session = this.sessions.get(id);
    if (session?.associatedUser && this.sessionIdByUser.get(session.associatedUser.id) === id) {
      this.sessionIdByUser.delete(session.associatedUser.id);
    }
    return this.sessions.delete(id);
  }

  get indexedUsers(): number {
    return this.sessionIdByUser.size;
  }
}
