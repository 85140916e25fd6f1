import { z } from "zod";

export const FieldKindSchema = z.enum(["checkbox", "counter", "rating", "time"]);
export type FieldKind = z.infer<typeof FieldKindSchema>;

export const QueryFieldSchema = z.enum(["match", "team", "name", "board", "edited"]);
export type QueryField = z.infer<typeof QueryFieldSchema>;

export const FIELD_KIND_MAX: Record<FieldKind, number> = {
  checkbox: 1,
  counter: 255,
  rating: 5,
  time: 255
};
