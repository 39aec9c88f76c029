export const ANONYMOUS_IDENTITY = 'anonymous';

/**
 * Reduce an account handle to a storage-safe key: letters and digits from any script,
 * `_` and `-`, lower-cased. Idempotent; an input with nothing usable maps to `anonymous`.
 */
export function normalizeIdentity(identity: string): string {
    // Lower-case first: case mapping can emit marks that the filter then drops
    const safe = identity.toLowerCase().replace(/[^\p{L}\p{N}_-]/gu, '');
    return safe || ANONYMOUS_IDENTITY;
}
