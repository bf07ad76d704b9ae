/**
 * Tenant: an isolated customer namespace that owns users, tokens and mappings
 */
export interface Tenant {
  id: string;
  name: string; // Globally unique
  isActive: boolean;
  settings: Record<string, string>; // e.g. RefreshToken.ExpirationDays, Mfa.Required
  createdAt: Date;
}

/**
 * Maps an email domain (e.g. `example.com`) to a tenant
 */
export interface EmailDomainMapping {
  id: string;
  tenantId: string;
  domain: string; // Stored lowercase
  isActive: boolean;
}

/**
 * Maps a vanity host (`auth.example.com` or `auth.example.com:8443`) to a tenant
 */
export interface VanityHostMapping {
  id: string;
  tenantId: string;
  host: string; // Stored lowercase, optionally with `:port`
  isActive: boolean;
}
