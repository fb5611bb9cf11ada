// lib/config.ts
import { z } from "zod";
import { ConfigError } from "./errors";

export type ScoringConfig = {
  /** Successful substitutions allowed per fixture. */
  maxSubstitutions: number;
  /** Points a team must exceed to earn its first goal. */
  goalThreshold: number;
  /** Extra points needed for every further goal. */
  goalGap: number;
};

export const DEFAULT_SCORING_CONFIG: Readonly<ScoringConfig> = Object.freeze({
  maxSubstitutions: 5,
  goalThreshold: 200,
  goalGap: 20,
});

// blank env values ("", "  ") fall back to the default
const blankToUndefined = (v: unknown) =>
  typeof v === "string" && v.trim() === "" ? undefined : v;

const envSchema = z.object({
  MAX_SUBSTITUTIONS: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().min(0).default(DEFAULT_SCORING_CONFIG.maxSubstitutions)
  ),
  GOAL_THRESHOLD: z.preprocess(
    blankToUndefined,
    z.coerce.number().finite().default(DEFAULT_SCORING_CONFIG.goalThreshold)
  ),
  GOAL_GAP: z.preprocess(
    blankToUndefined,
    z.coerce.number().finite().positive().default(DEFAULT_SCORING_CONFIG.goalGap)
  ),
});

export function loadScoringConfig(
  env: Record<string, string | undefined> = process.env
): ScoringConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
    );
  }

  return {
    maxSubstitutions: parsed.data.MAX_SUBSTITUTIONS,
    goalThreshold: parsed.data.GOAL_THRESHOLD,
    goalGap: parsed.data.GOAL_GAP,
  };
}

export function resolveConfig(overrides?: Partial<ScoringConfig>): ScoringConfig {
  return {
    maxSubstitutions: overrides?.maxSubstitutions ?? DEFAULT_SCORING_CONFIG.maxSubstitutions,
    goalThreshold: overrides?.goalThreshold ?? DEFAULT_SCORING_CONFIG.goalThreshold,
    goalGap: overrides?.goalGap ?? DEFAULT_SCORING_CONFIG.goalGap,
  };
}
