/**
 * Classifier — overall score → category via the policy's band table.
 * Bands are [min, max) except the top band, which is closed at 1.
 */

import type { Policy } from "@/domain/policy/policy.schema";
import { InvariantViolationError } from "@/lib/errors";
import { assertClosed01 } from "@/lib/invariants";
import type { BandMatch } from "./types";

export function classify(overall: number, bands: Policy["bands"]): BandMatch {
  assertClosed01("overall", overall);
  const lastIndex = bands.length - 1;
  for (const [i, band] of bands.entries()) {
    const upperClosed = i === lastIndex;
    const belowMax = upperClosed ? overall <= band.max : overall < band.max;
    if (overall >= band.min && belowMax) {
      return { category: band.category, min: band.min, max: band.max, upperClosed };
    }
  }
  throw new InvariantViolationError(`No band contains overall ${overall}`, { overall });
}
