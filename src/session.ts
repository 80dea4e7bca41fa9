export interface AssociatedUser {
  id: string;
  email?: string;
  firstName?: string;
  lastName?: string;
  accountOwner?: boolean;
  locale?: string;
}

/**
 * Sesión OAuth de una tienda. Offline: una por shop, sin usuario ni expiración.
 * Online: ligada a un usuario del admin, con expiresAt.
 */
export interface Session {
  readonly id: string;
  readonly shop: string;
  readonly state?: string;
  /** Ausente mientras el OAuth no ha terminado. */
  readonly accessToken?: string;
  readonly scope: readonly string[];
  readonly isOnline: boolean;
  readonly associatedUser?: Readonly<AssociatedUser>;
  readonly expiresAt?: Date;
}

export function offlineSessionId(shop: string): string {
  return shop;
}

export function onlineSessionId(shop: string, userId: string): string {
  return `${shop}_${userId}`;
}

export interface OfflineSessionParams {
  shop: string;
  accessToken?: string;
  scope: readonly string[];
  state?: string;
}

export interface OnlineSessionParams extends OfflineSessionParams {
  user: AssociatedUser;
  expiresAt: Date;
}

export function createOfflineSession(params: OfflineSessionParams): Session {
  return Object.freeze({
    id: offlineSessionId(params.shop),
    shop: params.shop,
    state: params.state,
    accessToken: params.accessToken,
    scope: Object.freeze([...params.scope]),
    isOnline: false,
  });
}

export function createOnlineSession(params: OnlineSessionParams): Session {
  return Object.freeze({
    id: onlineSessionId(params.shop, params.user.id),
    shop: params.shop,
    state: params.state,
    accessToken: params.accessToken,
    scope: Object.freeze([...params.scope]),
    isOnline: true,
    associatedUser: Object.freeze({ ...params.user }),
    expiresAt: params.expiresAt,
  });
}

/** withinMs > 0 considera expirada una sesión que vence dentro de ese margen. */
export function isSessionExpired(session: Session, now: number = Date.now(), withinMs = 0): boolean {
  if (!session.expiresAt) return false;
  return session.expiresAt.getTime() - withinMs <= now;
}
