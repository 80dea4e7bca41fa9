import type { SessionStorageKind } from "./config";
import { InMemorySessionStore, InMemoryUserSessionStore, type SessionStore } from "./sessionStore";
import { getSupabaseClient, SupabaseSessionStore } from "./supabase";
import { logInfo } from "../shared/logger";

export interface SessionStorageOptions {
  sessionStorage: SessionStorageKind;
  userSessionStorage: boolean;
  supabaseUrl: string;
  supabaseServiceKey: string;
  sessionTable: string;
}

/** Elige el store al arrancar. Supabase sin URL/key es un error de configuración. */
export function createSessionStore(options: SessionStorageOptions): SessionStore {
  if (options.sessionStorage === "supabase") {
    const supabase = getSupabaseClient(options);
    if (!supabase) {
      throw new Error("SESSION_STORAGE=supabase requires SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY");
    }
    logInfo("session storage", { kind: "supabase", table: options.sessionTable });
    return new SupabaseSessionStore(supabase, options.sessionTable);
  }
  logInfo("session storage", { kind: "memory", userIndex: options.userSessionStorage });
  return options.userSessionStorage ? new InMemoryUserSessionStore() : new InMemorySessionStore();
}
