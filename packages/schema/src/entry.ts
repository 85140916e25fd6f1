import { z } from "zod";

export const DATA_TOKEN_REGEX = /^(?:[0-9a-fA-F]{4})*$/;

export const RawEntrySchema = z
  .object({
    match: z.number().int().min(0),
    team: z.number().int().min(0),
    name: z.string(),
    startTime: z.string(),
    board: z.string().min(1),
    data: z.string().regex(DATA_TOKEN_REGEX, "data must be a sequence of 4-digit hex words"),
    comments: z.string().default("")
  })
  .strict();
export type RawEntry = z.infer<typeof RawEntrySchema>;

/**
 * Match, team and name as the export line can carry them: at most 3 and 4 digits, and a
 * name without the `_` and `,` separators.
 */
export const EntryKeySchema = z.object({
  match: z.number().int().min(0).max(999),
  team: z.number().int().min(0).max(9999),
  name: z.string().regex(/^[^_,\r\n]+$/, "name must be non-empty and contain no '_', ',' or line breaks")
});
export type EntryKey = z.infer<typeof EntryKeySchema>;

/** Line breaks become spaces and commas are dropped, so comments stay inside the last column. */
export const EntryCommentsSchema = z.string().transform((value) => value.replace(/\r\n|[\r\n]/g, " ").replace(/,/g, ""));

export const EditedEntrySchema = RawEntrySchema.extend({
  id: z.number().int().min(0),
  rawIndex: z.number().int().min(0).nullable(),
  // Older stores wrote a single space for "never edited".
  edited: z
    .string()
    .default("")
    .transform((value) => value.trim())
}).strict();
export type EditedEntry = z.infer<typeof EditedEntrySchema>;

export const EntryStoreSchema = z
  .object({
    version: z.literal(1),
    nextId: z.number().int().min(0),
    rawEntries: z.array(RawEntrySchema).default([]),
    editedEntries: z.array(EditedEntrySchema).default([])
  })
  .strict()
  .superRefine((store, context) => {
    const seen = new Set<number>();
    for (const [index, entry] of store.editedEntries.entries()) {
      if (seen.has(entry.id)) {
        context.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["editedEntries", index, "id"],
          message: `Duplicate entry id ${entry.id}`
        });
      }
      seen.add(entry.id);
      if (entry.id >= store.nextId) {
        context.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["editedEntries", index, "id"],
          message: `Entry id ${entry.id} is not below nextId ${store.nextId}`
        });
      }
    }
  });
export type EntryStore = z.infer<typeof EntryStoreSchema>;
