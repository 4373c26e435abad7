// ---------------------------------------------------------------------------
// Request validation for the HTTP routes.
// ---------------------------------------------------------------------------

import type { Context } from "hono";
import { z } from "zod";
import { ValidationError } from "../core/errors.js";
import type { DiscoveryInput } from "../recommendations/discovery-service.js";

const optionalNumber = z.coerce.number().finite().optional();

export const DiscoveryQuerySchema = z.object({
  take: optionalNumber,
  listsPerBook: optionalNumber,
  itemsPerList: optionalNumber,
  minRating: z.coerce.number().min(0).max(5).optional(),
  delayMs: optionalNumber,
});

export const TakeQuerySchema = z.object({
  take: z.coerce.number().int().optional(),
});

export const IdsBodySchema = z.object({
  ids: z.array(z.unknown()).default([]),
});

export const HideBodySchema = IdsBodySchema.extend({
  hidden: z.union([z.literal(1), z.literal(2)]).default(1),
});

// ── Helpers ─────────────────────────────────────────────────────────────────

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/** Parse `input` with `schema`, throwing {@link ValidationError} on failure. */
export function validate<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(describeIssues(parsed.error));
  }
  return parsed.data;
}

/** The request body as JSON; an empty body reads as `{}`. */
export async function readJsonBody(c: Context): Promise<unknown> {
  const text = await c.req.text();
  if (text.trim() === "") return {};
  try {
    const body: unknown = JSON.parse(text);
    return body;
  } catch {
    throw new ValidationError("Request body must be valid JSON.");
  }
}

/** Positive integer ids from a loosely typed list; at least one required. */
export function toValidIds(values: unknown[]): number[] {
  const ids = new Set<number>();
  for (const value of values) {
    const n = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
    if (typeof n === "number" && Number.isInteger(n) && n > 0) ids.add(n);
  }
  if (ids.size === 0) {
    throw new ValidationError("No valid ids provided.");
  }
  return [...ids];
}

export function toDiscoveryInput(query: z.output<typeof DiscoveryQuerySchema>): DiscoveryInput {
  return {
    take: query.take,
    listsPerBook: query.listsPerBook,
    itemsPerList: query.itemsPerList,
    minRating: query.minRating ?? null,
    delayMs: query.delayMs,
  };
}
