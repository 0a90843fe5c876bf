import type { RateScopeKind } from "@ratewarden/schemas";

const KEY_PREFIX: Record<RateScopeKind, string> = {
  address: "ip",
  token: "token",
};

export function addressKey(address: string): string {
  return `${KEY_PREFIX.address}:${address}`;
}

export function tokenKey(token: string): string {
  return `${KEY_PREFIX.token}:${token}`;
}

export function scopeOfKey(key: string): RateScopeKind {
  return key.startsWith(`${KEY_PREFIX.token}:`) ? "token" : "address";
}
