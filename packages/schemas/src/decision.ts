import { z } from "zod";
import { RateScopeKindSchema, ScopeConfigSchema } from "./scope.js";

export const RateDecisionSchema = z.object({
  allowed: z.boolean(),
  key: z.string().min(1),
  scope: RateScopeKindSchema,
  config: ScopeConfigSchema,
});
export type RateDecision = z.infer<typeof RateDecisionSchema>;

export const DecisionOutcomeSchema = z.enum(["allowed", "denied", "error"]);
export type DecisionOutcome = z.infer<typeof DecisionOutcomeSchema>;
