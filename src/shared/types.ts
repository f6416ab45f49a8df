export type Role = string;

export type RolePolicy = 'any' | 'all';

export interface Service {
  id: string;
  name: string; // first path segment of proxied calls
  baseUrl: string;
}

export interface Resource {
  id: string;
  serviceId: string;
  path: string; // literal segments, `:param` for one segment, trailing `*` for the rest
  method: string; // HTTP method, or '*' for any
  requiredRoles: Role[];
}

export interface RegistryRecords {
  services: Service[];
  resources: Resource[];
}

export interface AccessTokenPayload {
  sub: string;
  roles: Role[];
  fid: string; // refresh family id
  jti: string;
  iss: string;
  aud: string;
  exp: number;
  iat: number;
}

export interface AccessClaims {
  subjectId: string;
  roles: Role[];
  familyId: string;
  tokenId: string;
  issuedAt: number; // epoch seconds
  expiresAt: number; // epoch seconds
}

export interface RefreshTokenRecord {
  tokenHash: string;
  subjectId: string;
  // Roles are fixed at login and carried through every rotation - clients never supply them
  roles: Role[];
  familyId: string;
  issuedAt: number; // epoch ms
  expiresAt: number; // epoch ms
  consumed: boolean;
  revoked: boolean;
}

export interface IssuedTokens {
  accessToken: string;
  refreshToken: string;
  accessExpiresAt: number; // epoch ms
  refreshExpiresAt: number; // epoch ms
  claims: AccessClaims;
  record: RefreshTokenRecord;
}
