import { z } from 'zod';
import { MalformedInputError } from '../../services/errors';

const Uuid = z.string().uuid();

/**
 * Identifiers are UUIDs; anything else is rejected before it reaches the
 * store.
 */
export function parseId(value: unknown, label: string): string {
  const result = Uuid.safeParse(value);
  if (!result.success) {
    throw new MalformedInputError(`Invalid ${label} ID format`);
  }
  return result.data.toLowerCase();
}

// POST /api/navigation/route body
export const RouteRequestBodySchema = z.object({
  from: z.object({
    floorId: z.string(),
    lat: z.number().min(-90).max(90),
    lng: z.number().min(-180).max(180),
  }),
  to: z.object({
    poiId: z.string(),
  }),
  options: z
    .object({
      accessible: z.boolean().default(true),
    })
    .default({}),
});

export type RouteRequestBody = z.infer<typeof RouteRequestBodySchema>;

export function parseRouteRequestBody(body: unknown): RouteRequestBody {
  const result = RouteRequestBodySchema.safeParse(body);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.join('.');
    throw new MalformedInputError(where ? `Invalid request body at ${where}: ${issue.message}` : `Invalid request body: ${issue.message}`);
  }
  return result.data;
}
