/**
 * src/plan/reconcile.ts
 * Refresh-time reconciliation of a stored JSON attribute with the remote
 * representation: keep the stored text while it still means the same thing,
 * otherwise store the canonical form of what the API returned.
 */

import { semanticEqual } from "../engine/equal.js";
import type { NormalizationPolicy } from "../engine/policy.js";
import { ok, type Result } from "../types/value.js";
import { canonicalize } from "../utils/canonical.js";
import type { ParseOptions } from "../value/model.js";

export interface ReconcileOutcome {
  text: string;
  changed: boolean;
}

export function reconcileStoredJson(
  stored: string | null,
  remote: string,
  policy: NormalizationPolicy,
  options: ParseOptions = {}
): Result<ReconcileOutcome> {
  if (stored !== null && semanticEqual(stored, remote, policy, options)) {
    return ok({ text: stored, changed: false });
  }
  const canonical = canonicalize(remote, options);
  if (!canonical.ok) return canonical;
  return ok({ text: canonical.value, changed: stored !== canonical.value });
}
