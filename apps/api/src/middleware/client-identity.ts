import type { FastifyRequest } from "fastify";
import type { ClientIdentity } from "@ratewarden/core";

export interface IdentityOptions {
  /** Header carrying the access token, e.g. "API_KEY". Case-insensitive. */
  tokenHeader: string;
  /** Honor X-Forwarded-For / X-Real-IP before the socket peer address. */
  trustProxyHeaders: boolean;
}

type RequestLike = Pick<FastifyRequest, "headers" | "ip">;

function headerValue(request: RequestLike, name: string): string | undefined {
  const raw = request.headers[name.toLowerCase()];
  const value = Array.isArray(raw) ? raw[0] : raw;
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * First X-Forwarded-For entry, then X-Real-IP, then the peer address.
 * Forwarding headers are only read when `trustProxyHeaders` is set.
 */
export function resolveClientAddress(request: RequestLike, trustProxyHeaders: boolean): string {
  if (trustProxyHeaders) {
    const forwardedFor = headerValue(request, "x-forwarded-for");
    const first = forwardedFor?.split(",")[0]?.trim();
    if (first) return first;

    const realIp = headerValue(request, "x-real-ip");
    if (realIp) return realIp;
  }
  return request.ip;
}

export function extractToken(request: RequestLike, tokenHeader: string): string | undefined {
  return headerValue(request, tokenHeader);
}

export function resolveClientIdentity(request: RequestLike, options: IdentityOptions): ClientIdentity {
  return {
    address: resolveClientAddress(request, options.trustProxyHeaders),
    token: extractToken(request, options.tokenHeader),
  };
}
