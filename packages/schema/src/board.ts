import { z } from "zod";
import { FieldKindSchema } from "./enums.js";

export const MAX_BOARD_FIELDS = 128;

export const BoardFieldSchema = z
  .object({
    name: z.string().min(1),
    kind: FieldKindSchema,
    max: z.number().int().min(0).max(255).optional()
  })
  .strict();
export type BoardField = z.infer<typeof BoardFieldSchema>;

export const BoardDefinitionSchema = z
  .object({
    id: z.number().int().min(0).max(0xffffffff),
    name: z.string().min(1),
    fields: z.array(BoardFieldSchema).max(MAX_BOARD_FIELDS)
  })
  .strict()
  .superRefine((board, context) => {
    const seen = new Set<string>();
    for (const [index, field] of board.fields.entries()) {
      if (seen.has(field.name)) {
        context.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["fields", index, "name"],
          message: `Duplicate field name "${field.name}"`
        });
      }
      seen.add(field.name);
    }
  });
export type BoardDefinition = z.infer<typeof BoardDefinitionSchema>;
