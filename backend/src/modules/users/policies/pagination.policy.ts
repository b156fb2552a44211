/**
 * backend/src/modules/users/policies/pagination.policy.ts
 *
 * RULES:
 * - offset < 0 → 0
 * - limit <= 0 or limit > MAX_PAGE_LIMIT → DEFAULT_PAGE_LIMIT
 * - Out-of-range values are normalized, not rejected.
 */

export const DEFAULT_PAGE_LIMIT = 20;
export const MAX_PAGE_LIMIT = 100;

export type Page = Readonly<{ offset: number; limit: number }>;

export function normalizePage(input: { offset?: number; limit?: number }): Page {
  const offset = input.offset === undefined || input.offset < 0 ? 0 : input.offset;

  const limit =
    input.limit === undefined || input.limit <= 0 || input.limit > MAX_PAGE_LIMIT
      ? DEFAULT_PAGE_LIMIT
      : input.limit;

  return { offset, limit };
}
