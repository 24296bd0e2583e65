/**
 * Debug flags for development. Off unless RISK_DEBUG=1.
 * Evaluation pipeline logging is gated by DEBUG_EVALUATION.
 */
export const DEBUG_EVALUATION = process.env.RISK_DEBUG === "1";

/** When true, policy loading logs the parsed version and hash. */
export const DEBUG_POLICY = process.env.RISK_DEBUG === "1";
