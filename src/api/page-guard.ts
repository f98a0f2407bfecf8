// ---------------------------------------------------------------------------
// Page gating by dashboard profile.
// ---------------------------------------------------------------------------

import type { Context, Next } from "hono";
import type { DashboardProfile, PageId } from "../core/types.js";
import { PageDisabledError } from "../core/errors.js";

/**
 * Middleware that rejects every request to `page`'s routes with
 * {@link PageDisabledError} when the profile does not list the page.
 */
export function requirePage(
  profile: DashboardProfile,
  page: PageId,
): (c: Context, next: Next) => Promise<void> {
  const enabled = profile.pages.includes(page);

  return async (_c: Context, next: Next): Promise<void> => {
    if (!enabled) {
      throw new PageDisabledError(page);
    }
    await next();
  };
}
