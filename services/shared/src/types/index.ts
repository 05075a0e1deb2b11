export interface KeycloakResourceAccess {
  [clientId: string]: { roles: string[] } | undefined;
}

export interface KeycloakClaims {
  sub: string;
  preferred_username?: string;
  name?: string;
  given_name?: string;
  family_name?: string;
  email?: string;
  email_verified?: boolean;
  azp?: string;
  scope?: string;
  resource_access?: KeycloakResourceAccess;
  realm_access?: { roles: string[] };
  iss?: string;
  aud?: string | string[];
  exp?: number;
  iat?: number;
  [claim: string]: unknown;
}

/**
 * Identity extracted from a verified access token. Lives for one request.
 */
export interface VerifiedIdentity {
  sub: string;
  username: string;
  email?: string;
  emailVerified?: boolean;
  name?: string;
  givenName?: string;
  familyName?: string;
  realmRoles: ReadonlySet<string>;
  clientRoles: ReadonlyMap<string, ReadonlySet<string>>;
  claims: KeycloakClaims;
}

// Admin REST representations, trimmed to the fields this service touches.

export interface KeycloakUser {
  id: string;
  username: string;
  email?: string;
  firstName?: string;
  lastName?: string;
  enabled?: boolean;
  attributes?: Record<string, string[]>;
  [field: string]: unknown;
}

export interface KeycloakRole {
  id?: string;
  name: string;
  description?: string;
  composite?: boolean;
  clientRole?: boolean;
  containerId?: string;
}

export interface TokenSet {
  access_token: string;
  refresh_token?: string;
  token_type: string;
  expires_in: number;
}

export interface UpdateUserInfoDTO {
  firstName?: string;
  lastName?: string;
  email?: string;
  phoneNumber?: string;
}
