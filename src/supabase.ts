import { createClient, SupabaseClient } from "@supabase/supabase-js";
import type { AssociatedUser, Session } from "./session";
import type { UserSessionStore } from "./sessionStore";
import { logError, logWarn } from "../shared/logger";

let client: SupabaseClient | null = null;

export interface SupabaseClientOptions {
  supabaseUrl: string;
  supabaseServiceKey: string;
}

/**
 * Devuelve el cliente de Supabase (singleton). null si URL o key no están configurados.
 */
export function getSupabaseClient(options: SupabaseClientOptions): SupabaseClient | null {
  if (!options.supabaseUrl || !options.supabaseServiceKey) {
    return null;
  }
  if (!client) {
    client = createClient(options.supabaseUrl, options.supabaseServiceKey, {
      auth: { persistSession: false },
    });
  }
  return client;
}

/** Una fila de la tabla de sesiones (ver supabase/shopify_sessions.sql). */
export interface SessionRow {
  id: string;
  shop: string;
  state: string | null;
  access_token: string | null;
  scope: string;
  is_online: boolean;
  user_id: string | null;
  associated_user: AssociatedUser | null;
  expires_at: string | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value ? value : undefined;
}

function parseAssociatedUser(value: unknown): AssociatedUser | undefined {
  if (!isRecord(value)) return undefined;
  const id = value.id;
  if (typeof id !== "string" && typeof id !== "number") return undefined;
  return {
    id: String(id),
    email: optionalString(value.email),
    firstName: optionalString(value.firstName),
    lastName: optionalString(value.lastName),
    accountOwner: typeof value.accountOwner === "boolean" ? value.accountOwner : undefined,
    locale: optionalString(value.locale),
  };
}

export function sessionToRow(session: Session): SessionRow {
  return {
    id: session.id,
    shop: session.shop,
    state: session.state ?? null,
    access_token: session.accessToken ?? null,
    scope: session.scope.join(","),
    is_online: session.isOnline,
    user_id: session.associatedUser?.id ?? null,
    associated_user: session.associatedUser ? { ...session.associatedUser } : null,
    expires_at: session.expiresAt ? session.expiresAt.toISOString() : null,
  };
}

/** Valida una fila devuelta por Supabase; null si le faltan columnas obligatorias. */
export function rowToSession(row: unknown): Session | null {
  if (!isRecord(row)) return null;
  const { id, shop, scope, is_online: isOnline } = row;
  if (typeof id !== "string" || typeof shop !== "string" || typeof isOnline !== "boolean") {
    return null;
  }
  const expiresAt = typeof row.expires_at === "string" ? new Date(row.expires_at) : undefined;
  if (expiresAt && Number.isNaN(expiresAt.getTime())) return null;
  const associatedUser = isOnline ? parseAssociatedUser(row.associated_user) : undefined;
  return Object.freeze({
    id,
    shop,
    state: optionalString(row.state),
    accessToken: optionalString(row.access_token),
    scope: Object.freeze(
      typeof scope === "string" ? scope.split(",").map((s) => s.trim()).filter(Boolean) : [],
    ),
    isOnline,
    associatedUser: associatedUser ? Object.freeze(associatedUser) : undefined,
    expiresAt,
  });
}

/**
 * Store persistente sobre una tabla de Supabase. El índice por usuario es la
 * columna user_id de la misma fila, así que se actualiza en el mismo upsert.
 */
export class SupabaseSessionStore implements UserSessionStore {
  constructor(
    private readonly supabase: SupabaseClient,
    private readonly table: string = "shopify_sessions"
  ) {}

  async store(session: Session): Promise<string> {
    const { error } = await this.supabase
      .from(this.table)
      .upsert(sessionToRow(session), { onConflict: "id" });
    if (error) {
      logError("session store failed", { id: session.id, shop: session.shop, error: error.message });
      throw new Error(`Session store failed: ${error.message}`);
    }
    return session.id;
  }

  async retrieve(id: string): Promise<Session | null> {
    const { data, error } = await this.supabase
      .from(this.table)
      .select("*")
      .eq("id", id)
      .maybeSingle();
    return this.toSession(data, error, { id });
  }

  async retrieveByUserId(userId: string, shop?: string): Promise<Session | null> {
    let query = this.supabase.from(this.table).select("*").eq("user_id", userId).eq("is_online", true);
    if (shop) query = query.eq("shop", shop);
    const { data, error } = await query
      .order("expires_at", { ascending: false, nullsFirst: false })
      .limit(1)
      .maybeSingle();
    return this.toSession(data, error, { userId, shop });
  }

  async delete(id: string): Promise<boolean> {
    const { error, count } = await this.supabase
      .from(this.table)
      .delete({ count: "exact" })
      .eq("id", id);
    if (error) {
      logError("session delete failed", { id, error: error.message });
      throw new Error(`Session delete failed: ${error.message}`);
    }
    return (count ?? 0) > 0;
  }

  private toSession(
    data: unknown,
    error: { message: string } | null,
    lookup: Record<string, unknown>
  ): Session | null {
    if (error) {
      logError("session retrieve failed", { ...lookup, error: error.message });
      throw new Error(`Session retrieve failed: ${error.message}`);
    }
    if (!data) return null;
    const session = rowToSession(data);
    if (!session) logWarn("session row ignored: invalid shape", lookup);
    return session;
  }
}
