/**
 * Category table schema
 *
 * The category table is external configuration: ordered keyword rules mapping
 * a free-text business type to a voice, tone, function set and response
 * templates. New categories are added in data, never in the orchestrator.
 */

import { z } from "zod";

export const FunctionEntrySchema = z.object({
  description: z.string().min(1),
  parameters: z.array(z.string()).default([]),
});

export type FunctionEntry = z.infer<typeof FunctionEntrySchema>;

export const CategorySchema = z.object({
  name: z.string().min(1),
  keywords: z.array(z.string().min(1)).default([]),
  voice: z.string().min(1),
  tone: z.string().min(1),
  functions: z.array(z.string()).default([]),
  responseTemplates: z.array(z.string()).default([]),
});

export type Category = z.infer<typeof CategorySchema>;

export const CategoryTableSchema = z
  .object({
    version: z.literal(1).default(1),
    defaultCategory: z.string().default("general"),
    sharedFunctions: z.array(z.string()).default([]),
    categories: z.array(CategorySchema).min(1),
    functionCatalog: z.record(z.string(), FunctionEntrySchema),
  })
  .superRefine((table, ctx) => {
    const names = new Set<string>();
    table.categories.forEach((category, index) => {
      if (names.has(category.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["categories", index, "name"],
          message: `Duplicate category '${category.name}'`,
        });
      }
      names.add(category.name);

      category.functions.forEach((fn, fnIndex) => {
        if (!(fn in table.functionCatalog)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["categories", index, "functions", fnIndex],
            message: `Unknown function '${fn}'`,
          });
        }
      });
    });

    if (!names.has(table.defaultCategory)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["defaultCategory"],
        message: `Default category '${table.defaultCategory}' is not defined`,
      });
    }

    table.sharedFunctions.forEach((fn, index) => {
      if (!(fn in table.functionCatalog)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["sharedFunctions", index],
          message: `Unknown function '${fn}'`,
        });
      }
    });
  });

export type CategoryTable = z.infer<typeof CategoryTableSchema>;
