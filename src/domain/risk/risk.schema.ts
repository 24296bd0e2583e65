import { z } from "zod";

/**
 * Enums (tight + explicit = consistency everywhere)
 */
export const LikelihoodBasisSchema = z.enum([
  "historical_data",
  "measured_data",
  "expert_judgement",
  "assumption",
]);
export type LikelihoodBasis = z.infer<typeof LikelihoodBasisSchema>;

export const ImpactDomainSchema = z.enum([
  "financial",
  "legal_or_compliance",
  "operational",
  "safety",
  "reputation",
  "strategic",
]);
export type ImpactDomain = z.infer<typeof ImpactDomainSchema>;

export const ReversibilitySchema = z.enum(["fully", "partially", "not_reversible"]);
export type Reversibility = z.infer<typeof ReversibilitySchema>;

export const AcceptabilityHintSchema = z.enum(["yes", "no", "only_under_conditions"]);
export type AcceptabilityHint = z.infer<typeof AcceptabilityHintSchema>;

/**
 * Scales (1–5). Ratings feed the score; confidence is carried as metadata only.
 */
export const RATING_MIN = 1;
export const RATING_MAX = 5;

export const RatingSchema = z.number().int().min(RATING_MIN).max(RATING_MAX);
export const ConfidenceSchema = z.number().int().min(RATING_MIN).max(RATING_MAX);

/** Free text must carry content, but is stored and hashed exactly as supplied. */
const NonBlankTextSchema = z.string().refine((s) => s.trim().length > 0, { message: "Must not be blank" });

export const LikelihoodInputSchema = z.object({
  rating: RatingSchema,
  confidence: ConfidenceSchema,
  basis: LikelihoodBasisSchema,
  /** Observed indicators behind the rating, in the order they were captured. */
  signals: z.array(NonBlankTextSchema),
});
export type LikelihoodInput = z.infer<typeof LikelihoodInputSchema>;

export const ImpactInputSchema = z.object({
  /** Set semantics: order is irrelevant, duplicates are rejected. */
  domains: z
    .array(ImpactDomainSchema)
    .min(1)
    .refine((domains) => new Set(domains).size === domains.length, {
      message: "Impact domains must not repeat",
    }),
  worstCredibleOutcome: NonBlankTextSchema,
  reversibility: ReversibilitySchema,
  severity: RatingSchema,
  confidence: ConfidenceSchema,
  acceptabilityHint: AcceptabilityHintSchema,
});
export type ImpactInput = z.infer<typeof ImpactInputSchema>;

/**
 * Risk input handed to the pipeline by an external collaborator.
 * Unknown keys are rejected so the fingerprint covers every field that was supplied.
 */
export const RiskInputSchema = z
  .object({
    likelihood: LikelihoodInputSchema.strict(),
    impact: ImpactInputSchema.strict(),
  })
  .strict();
export type RiskInput = z.infer<typeof RiskInputSchema>;

/** Categories, lowest to highest. */
export const RiskCategorySchema = z.enum(["Low", "Medium", "High", "Critical"]);
export type RiskCategory = z.infer<typeof RiskCategorySchema>;

export const RISK_CATEGORIES: readonly RiskCategory[] = RiskCategorySchema.options;
