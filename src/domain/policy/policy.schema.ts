import { z } from "zod";
import { RATING_MAX, RATING_MIN, RISK_CATEGORIES, RiskCategorySchema } from "@/domain/risk/risk.schema";
import { CriticalDecisionSchema, HighDecisionSchema } from "@/domain/decision/decision.types";
import type { DeepReadonly } from "@/lib/deepFreeze";

/**
 * Linear normalization of a 1–5 rating onto [0,1]: (raw - min) / (max - min).
 * The parameters are recorded (and hashed) with the policy but must span the full rating scale.
 */
export const NormalizationSchema = z
  .object({
    method: z.literal("linear"),
    min: z.number().int(),
    max: z.number().int(),
  })
  .refine((n) => n.min === RATING_MIN && n.max === RATING_MAX, {
    message: `Normalization must map ratings ${RATING_MIN}..${RATING_MAX} onto [0,1]`,
  });
export type Normalization = z.infer<typeof NormalizationSchema>;

export const AggregationSchema = z.literal("product");
export type Aggregation = z.infer<typeof AggregationSchema>;

/** Half-open band [min, max); the top band is closed at 1. */
export const BandSchema = z.object({
  category: RiskCategorySchema,
  min: z.number().min(0).max(1),
  max: z.number().min(0).max(1),
});
export type Band = z.infer<typeof BandSchema>;

/**
 * Band table: one band per category in ascending order, starting at 0, ending at 1,
 * each band starting where the previous one ends.
 */
export const BandTableSchema = z.array(BandSchema).superRefine((bands, ctx) => {
  if (bands.length !== RISK_CATEGORIES.length) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Expected ${RISK_CATEGORIES.length} bands, got ${bands.length}`,
    });
    return;
  }
  bands.forEach((band, i) => {
    if (band.category !== RISK_CATEGORIES[i]) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [i, "category"],
        message: `Band ${i} must be ${RISK_CATEGORIES[i]}, got ${band.category}`,
      });
    }
    if (band.min >= band.max) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: [i], message: "Band min must be below max" });
    }
    const expectedMin = i === 0 ? 0 : bands[i - 1]?.max;
    if (band.min !== expectedMin) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [i, "min"],
        message: i === 0 ? "First band must start at 0" : "Bands must be contiguous",
      });
    }
  });
  const last = bands[bands.length - 1];
  if (last && last.max !== 1) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: [bands.length - 1, "max"], message: "Last band must end at 1" });
  }
});

export const TieBreaksSchema = z.object({
  high: HighDecisionSchema,
  critical: CriticalDecisionSchema,
});

/** Display labels for each rating, keyed "1".."5". */
export const ScaleLabelsSchema = z.object({
  "1": z.string().min(1),
  "2": z.string().min(1),
  "3": z.string().min(1),
  "4": z.string().min(1),
  "5": z.string().min(1),
});
export type ScaleLabels = z.infer<typeof ScaleLabelsSchema>;

export const AuthorityRowSchema = z.object({
  role: z.string().min(1),
  maxScoreToAccept: z.number().min(0).max(1),
});
export type AuthorityRow = z.infer<typeof AuthorityRowSchema>;

/** Who may accept what: escalation above one threshold, no acceptance above another. */
export const AcceptancePolicySchema = z
  .object({
    escalationThreshold: z.number().min(0).max(1),
    hardBlockThreshold: z.number().min(0).max(1),
    authority: z.array(AuthorityRowSchema),
  })
  .refine((a) => a.escalationThreshold <= a.hardBlockThreshold, {
    message: "escalationThreshold must not exceed hardBlockThreshold",
  })
  .refine((a) => new Set(a.authority.map((row) => row.role)).size === a.authority.length, {
    message: "Authority roles must be unique",
  });
export type AcceptancePolicy = z.infer<typeof AcceptancePolicySchema>;

export const PolicySchema = z
  .object({
    policyVersion: z.string().trim().min(1),
    normalization: NormalizationSchema,
    aggregation: AggregationSchema,
    bands: BandTableSchema,
    tieBreaks: TieBreaksSchema,
    labels: z.object({
      likelihood: ScaleLabelsSchema,
      impact: ScaleLabelsSchema,
    }),
    /** Decimal places used when rendering numbers in the rationale. */
    precision: z.number().int().min(1).max(12),
    acceptance: AcceptancePolicySchema,
  })
  .strict();
export type PolicyConfig = z.infer<typeof PolicySchema>;

/** A parsed policy. Deep-frozen on load and shared read-only between evaluations. */
export type Policy = DeepReadonly<PolicyConfig>;
