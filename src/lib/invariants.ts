/**
 * Range predicates shared by the engine stages. Out-of-range values are defects,
 * never clamped.
 */

import { InvariantViolationError } from "@/lib/errors";

export function inClosed01(x: number): boolean {
  return Number.isFinite(x) && x >= 0 && x <= 1;
}

export function assertClosed01(label: string, x: number): void {
  if (!inClosed01(x)) {
    throw new InvariantViolationError(`${label} must lie in [0,1], got ${x}`, { label, value: x });
  }
}
