const WRITE_PREFIX = /^(unauthenticated_)?write_(.+)$/;

function impliedScope(scope: string): string | null {
  const m = scope.match(WRITE_PREFIX);
  if (!m) return null;
  return `${m[1] ?? ""}read_${m[2]}`;
}

function parseScopes(input: string | readonly string[] | undefined): string[] {
  const raw = typeof input === "string" ? input.split(",") : input ?? [];
  const out: string[] = [];
  for (const s of raw) {
    const scope = s.trim();
    if (scope && !out.includes(scope)) out.push(scope);
  }
  return out;
}

/**
 * Conjunto de scopes OAuth. `write_x` implica `read_x`, así que una sesión con
 * `write_products` cubre un requisito de `read_products`.
 */
export class AuthScopes {
  private readonly granted: readonly string[];
  private readonly expanded: ReadonlySet<string>;

  constructor(scopes?: string | readonly string[]) {
    this.granted = parseScopes(scopes);
    const expanded = new Set(this.granted);
    for (const scope of this.granted) {
      const implied = impliedScope(scope);
      if (implied) expanded.add(implied);
    }
    this.expanded = expanded;
  }

  has(scope: string): boolean {
    return this.expanded.has(scope.trim());
  }

  covers(required: AuthScopes | string | readonly string[]): boolean {
    const other = required instanceof AuthScopes ? required : new AuthScopes(required);
    return other.granted.every((scope) => this.expanded.has(scope));
  }

  isEmpty(): boolean {
    return this.granted.length === 0;
  }

  equals(other: AuthScopes): boolean {
    return this.covers(other) && other.covers(this);
  }

  /** Scopes tal como se concedieron, sin los implícitos. */
  toArray(): string[] {
    return [...this.granted];
  }

  toString(): string {
    return this.granted.join(",");
  }
}
