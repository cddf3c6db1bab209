/** Envelope cost of a result collection before any item is added. */
export const BASE_OVERHEAD_TOKENS = 100;

export const DEFAULT_TOKEN_LIMIT = 25_000;

/**
 * Rough token estimate for a JSON-like value: about 4 characters per token,
 * never less than 1 per string or scalar. Undefined fields are skipped since
 * they do not survive serialization.
 */
export function estimateTokens(value: unknown): number {
  if (typeof value === "string") {
    return Math.max(1, Math.floor(value.length / 4));
  }
  if (Array.isArray(value)) {
    let total = 0;
    for (const item of value) total += estimateTokens(item);
    return total;
  }
  if (typeof value === "object" && value !== null) {
    let total = 0;
    for (const [key, field] of Object.entries(value)) {
      if (field === undefined) continue;
      total += estimateTokens(key) + estimateTokens(field);
    }
    return total;
  }
  return Math.max(1, Math.floor(String(value).length / 4));
}

export interface BudgetState<T> {
  limit: number;
  consumed: number;
  accepted: T[];
  truncated: boolean;
}

export interface ShapedResult<T> {
  items: T[];
  truncated: boolean;
  /** Estimated tokens of the returned items including the envelope. */
  consumed: number;
}

/**
 * Keeps the longest prefix of `items` whose estimated size, plus the envelope
 * overhead, fits in `limit`. Order is preserved; the first item that does not
 * fit ends the pass.
 *
 * @throws RangeError when `limit` is below {@link BASE_OVERHEAD_TOKENS}, since
 * not even an empty result fits.
 */
export function shapeToBudget<T>(
  items: readonly T[],
  limit: number,
  estimate: (item: T) => number = estimateTokens
): ShapedResult<T> {
  if (limit < BASE_OVERHEAD_TOKENS) {
    throw new RangeError(`Token limit ${limit} is below the ${BASE_OVERHEAD_TOKENS}-token envelope overhead`);
  }
  const state: BudgetState<T> = {
    limit,
    consumed: BASE_OVERHEAD_TOKENS,
    accepted: [],
    truncated: false,
  };

  for (const item of items) {
    const cost = estimate(item);
    if (state.consumed + cost > state.limit) {
      state.truncated = true;
      break;
    }
    state.accepted.push(item);
    state.consumed += cost;
  }

  return { items: state.accepted, truncated: state.truncated, consumed: state.consumed };
}
