/**
 * Zod schemas for metadata snapshot files
 */

import { z } from "zod";

const NameSchema = z.string().min(1, "names must be non-empty");
const NameListSchema = z.array(NameSchema).default([]);

export const RecipeEntrySchema = z.object({
  /** Recipe filename, unique across the snapshot */
  fn: NameSchema,
  /** Recipe name */
  pn: NameSchema,
  /** Recipe version, used to pick the preferred filename */
  pv: z.string().optional(),
  provides: NameListSchema,
  /** Build-time dependencies, as provide names */
  depends: NameListSchema,
  packages: NameListSchema,
  /** package → extra runtime provides */
  rprovides: z.record(NameSchema, NameListSchema).default({}),
  packagesDynamic: NameListSchema,
});

export const SnapshotSchema = z
  .object({
    recipes: z.array(RecipeEntrySchema),
    preferredVersions: z.record(NameSchema, z.string()).default({}),
  })
  .superRefine((snapshot, ctx) => {
    const seen = new Set<string>();
    snapshot.recipes.forEach((recipe, index) => {
      if (seen.has(recipe.fn)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["recipes", index, "fn"],
          message: `duplicate recipe filename "${recipe.fn}"`,
        });
      }
      seen.add(recipe.fn);
    });
  });

export type RecipeEntry = z.infer<typeof RecipeEntrySchema>;
export type Snapshot = z.infer<typeof SnapshotSchema>;
export type SnapshotInput = z.input<typeof SnapshotSchema>;
