import { z } from "zod";

export const RateScopeKindSchema = z.enum(["address", "token"]);
export type RateScopeKind = z.infer<typeof RateScopeKindSchema>;

/**
 * Limits for one scope. Durations are whole milliseconds so they can be
 * handed to the store's expiry commands unchanged.
 */
export const ScopeConfigSchema = z.object({
  requestLimit: z.number().int().positive(),
  windowMs: z.number().int().positive(),
  blockMs: z.number().int().nonnegative(),
});
export type ScopeConfig = z.infer<typeof ScopeConfigSchema>;

export const ScopeTokenSchema = z.string().min(1);
