import { z } from "zod";
import { QueryFieldSchema, type QueryField } from "./enums.js";

const toList = (value: unknown): unknown => (Array.isArray(value) ? value : [value]);

// Strings stay strings so search can treat "020" as a prefix rather than the number 20.
const DecimalSchema = z.union([
  z.number().int().min(0),
  z.string().trim().regex(/^\d+$/, "must be a non-negative decimal number")
]);

const DecimalListSchema = z.preprocess(toList, z.array(DecimalSchema));
const TextListSchema = z.preprocess(toList, z.array(z.coerce.string()));

export const QueryCriteriaSchema = z
  .object({
    match: DecimalListSchema.optional(),
    team: DecimalListSchema.optional(),
    name: TextListSchema.optional(),
    board: TextListSchema.optional(),
    edited: TextListSchema.optional()
  })
  .strip();
export type QueryCriteria = z.infer<typeof QueryCriteriaSchema>;

/**
 * Builds typed criteria from a loosely keyed mapping such as `{ Match: [5], TEAM: "200" }`.
 * Keys are matched case-insensitively; anything that is not a query field is dropped.
 */
export function parseQueryCriteria(input: Record<string, unknown>): QueryCriteria {
  const normalized: Partial<Record<QueryField, unknown>> = {};
  for (const [key, value] of Object.entries(input)) {
    const field = QueryFieldSchema.safeParse(key.toLowerCase());
    if (field.success && value !== undefined) {
      normalized[field.data] = value;
    }
  }
  const parsed = QueryCriteriaSchema.safeParse(normalized);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid query criteria at ${issue.path.join(".")}: ${issue.message}`);
  }
  return parsed.data;
}
