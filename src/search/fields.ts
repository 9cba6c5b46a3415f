/**
 * Field registry: which keys users may search and how they map onto the
 * record source.
 */

import { z } from "zod";
import { AmbiguousFieldError } from "./errors";
import type { FieldDescriptor } from "./types";

export const fieldSchema = z
  .object({
    searchKey: z
      .string()
      .regex(
        /^\w+$/,
        "Search keys may only contain letters, digits and underscores",
      ),
    backingKey: z.string().min(1).optional(),
    type: z.enum(["string", "number", "date", "boolean"]),
    freeText: z.boolean().default(false),
    description: z.string().optional(),
  })
  .refine(
    (field) =>
      !field.freeText || field.type === "string" || field.type === "number",
    {
      message: "Only string and number fields can be searched as free text",
      path: ["freeText"],
    },
  );

export const registrySchema = z
  .array(fieldSchema)
  .superRefine((fields, ctx) => {
    const seen = new Set<string>();
    fields.forEach((field, index) => {
      const key = field.searchKey.toLowerCase();
      if (seen.has(key)) {
        ctx.addIssue({
          code: "custom",
          message: `Duplicate search key '${field.searchKey}'`,
          path: [index, "searchKey"],
        });
      }
      seen.add(key);
    });
  });

export type FieldInput = z.input<typeof fieldSchema>;

export class FieldRegistry {
  readonly fields: readonly FieldDescriptor[];
  readonly freeTextFields: readonly FieldDescriptor[];
  private readonly byKey: ReadonlyMap<string, FieldDescriptor>;

  constructor(fields: readonly FieldDescriptor[]) {
    this.fields = fields;
    this.freeTextFields = fields.filter((field) => field.freeText);
    this.byKey = new Map(
      fields.map((field) => [field.searchKey.toLowerCase(), field]),
    );
  }

  /**
   * Look up a field by its search key, ignoring case.
   */
  get(searchKey: string): FieldDescriptor | undefined {
    return this.byKey.get(searchKey.toLowerCase());
  }

  /**
   * Resolve a key typed by the user.  With `partial`, a key that is part of
   * exactly one search key also matches that field.
   *
   * @throws {AmbiguousFieldError} If a partial key matches several fields.
   */
  find(
    key: string,
    options: { partial?: boolean; position?: number } = {},
  ): FieldDescriptor | null {
    const exact = this.get(key);
    if (exact != null) return exact;
    if (!options.partial) return null;
    const lowered = key.toLowerCase();
    const matches = this.fields.filter((field) =>
      field.searchKey.toLowerCase().includes(lowered),
    );
    if (matches.length > 1) {
      throw new AmbiguousFieldError(
        key,
        matches.map((field) => field.searchKey),
        { position: options.position },
      );
    }
    return matches[0] ?? null;
  }

  /**
   * Human readable summary of every field, keyed by search key.
   */
  describe(): Record<string, string> {
    const result: Record<string, string> = {};
    for (const field of this.fields) {
      result[field.searchKey] =
        `${field.description ?? field.searchKey} (${field.type})`;
    }
    return result;
  }
}

/**
 * Validate field definitions and build a registry from them.
 *
 * @throws {z.ZodError} If a definition is malformed or a search key is
 *   registered twice.
 *
 * @example
 * ```typescript
 * const registry = createFieldRegistry([
 *   { searchKey: "name", type: "string", freeText: true },
 *   { searchKey: "age", type: "number" },
 *   { searchKey: "date", backingKey: "created_at", type: "date" },
 * ]);
 * ```
 */
export function createFieldRegistry(
  fields: readonly FieldInput[],
): FieldRegistry {
  const parsed = registrySchema.parse(fields);
  return new FieldRegistry(
    parsed.map((field) => ({
      searchKey: field.searchKey,
      backingKey: field.backingKey ?? field.searchKey,
      type: field.type,
      freeText: field.freeText,
      ...(field.description == null ? {} : { description: field.description }),
    })),
  );
}
