import type { KeycloakClaims, VerifiedIdentity } from "../types";

export function bearerFromAuthHeader(header: string | undefined): string | null {
  const [scheme, token, ...rest] = (header || "").trim().split(/\s+/);
  if (rest.length > 0) return null;
  return scheme?.toLowerCase() === "bearer" && token ? token : null;
}

export function realmRolesOf(claims: KeycloakClaims | undefined): string[] {
  const roles = claims?.realm_access?.roles;
  return Array.isArray(roles) ? roles : [];
}

export function clientRolesOf(
  claims: KeycloakClaims | undefined
): Map<string, Set<string>> {
  const result = new Map<string, Set<string>>();
  for (const [clientId, access] of Object.entries(claims?.resource_access || {})) {
    const roles = access?.roles;
    if (Array.isArray(roles)) result.set(clientId, new Set(roles));
  }
  return result;
}

/**
 * Realm roles plus the roles of every client in `resource_access`.
 */
export function collectRoles(claims: KeycloakClaims | undefined): Set<string> {
  const roles = new Set(realmRolesOf(claims));
  for (const clientRoles of clientRolesOf(claims).values()) {
    for (const role of clientRoles) roles.add(role);
  }
  return roles;
}

export function hasClientRole(
  claims: KeycloakClaims | undefined,
  clientId: string,
  role: string
): boolean {
  const roles = claims?.resource_access?.[clientId]?.roles || [];
  return roles.includes(role);
}

export function hasRealmRole(
  claims: KeycloakClaims | undefined,
  role: string
): boolean {
  return realmRolesOf(claims).includes(role);
}

// any-of: an empty requirement always passes
export function hasAnyRole(
  claims: KeycloakClaims | undefined,
  required: Iterable<string>
): boolean {
  const wanted = [...required];
  if (wanted.length === 0) return true;
  const held = collectRoles(claims);
  return wanted.some((role) => held.has(role));
}

export function toVerifiedIdentity(claims: KeycloakClaims): VerifiedIdentity {
  return {
    sub: claims.sub,
    username: claims.preferred_username || claims.name || "unknown",
    email: claims.email,
    emailVerified: claims.email_verified,
    name: claims.name,
    givenName: claims.given_name,
    familyName: claims.family_name,
    realmRoles: new Set(realmRolesOf(claims)),
    clientRoles: clientRolesOf(claims),
    claims,
  };
}
