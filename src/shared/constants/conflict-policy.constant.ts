/**
 * What a replayed idempotency key does when its payload differs from the
 * admitted payment.
 *
 * - `return-original`: replay the admitted payment and ignore the new payload.
 * - `reject`: refuse the request with an idempotency conflict.
 */
export const CONFLICT_POLICIES = ['return-original', 'reject'] as const;

export type ConflictPolicy = (typeof CONFLICT_POLICIES)[number];

export const DEFAULT_CONFLICT_POLICY: ConflictPolicy = 'return-original';

export function isConflictPolicy(value: string): value is ConflictPolicy {
  return CONFLICT_POLICIES.some((policy) => policy === value);
}
