// ═══════════════════════════════════════════════════════════════════════════════
// FAVORITE SCHEMAS — Validation for Items Entering the Store
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';
import type { FavoriteItem } from './types.js';
import { InvalidFavoriteError } from './errors.js';
import { err, ok, type Result } from '../types/result.js';

export const FavoriteItemSchema = z.object({
  id: z.string().refine(id => id.trim().length > 0, 'Item id is required'),
  url: z.string(),
  title: z.string().default(''),
  savedAtEpochSeconds: z.number().int().nonnegative(),
});

export type FavoriteItemInput = z.input<typeof FavoriteItemSchema>;

export function parseFavoriteItem(input: unknown): Result<FavoriteItem, InvalidFavoriteError> {
  const parsed = FavoriteItemSchema.safeParse(input);
  if (!parsed.success) {
    return err(new InvalidFavoriteError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    ));
  }
  return ok(parsed.data);
}
