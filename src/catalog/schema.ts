import { readFile } from "node:fs/promises";
import { z } from "zod";

import { HTTP_METHODS } from "../bridge/client.js";

/** Error code reported when the catalog file cannot be read or validated. */
export const ERROR_CATALOG_INVALID = "E-CATALOG-INVALID" as const;

/** Location of the catalog shipped with the package (resolved from `src/` and `dist/` alike). */
export const DEFAULT_CATALOG_URL = new URL("../../catalog/operations.json", import.meta.url);

/** Matches `{slot}` placeholders inside a path template. */
export const PATH_SLOT_PATTERN = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

const QueryScalarSchema = z.union([z.string(), z.number(), z.boolean()]);

const DescriptorBaseSchema = z.object({
  name: z.string().regex(/^[a-z][a-z0-9_]*$/, "tool names are lower snake case"),
  title: z.string().min(1),
  description: z.string().min(1),
  method: z.enum(HTTP_METHODS),
  path: z.string().startsWith("/"),
  destructive: z.boolean().optional(),
});

const OperationDescriptorSchema = z
  .discriminatedUnion("placement", [
    DescriptorBaseSchema.extend({
      placement: z.literal("query"),
      /** Keys forwarded in the query string, with their default values. */
      defaults: z.record(QueryScalarSchema),
    }).strict(),
    DescriptorBaseSchema.extend({
      placement: z.literal("body"),
      /** Values merged under the caller's parameters. */
      defaults: z.record(z.unknown()).optional(),
    }).strict(),
    DescriptorBaseSchema.extend({
      placement: z.literal("path"),
      /** One entry per `{slot}` of the path template. */
      defaults: z.record(QueryScalarSchema),
    }).strict(),
    DescriptorBaseSchema.extend({
      placement: z.literal("none"),
    }).strict(),
  ])
  .superRefine((descriptor, ctx) => {
    const slots = listPathSlots(descriptor.path);
    if (descriptor.placement === "path") {
      if (slots.length === 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "path placement requires a {slot} in the path" });
      }
      for (const slot of slots) {
        if (!(slot in descriptor.defaults)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: `path slot {${slot}} has no default` });
        }
      }
    } else if (slots.length > 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "only path placement may use {slot} templates" });
    }
  });

const OperationCatalogSchema = z
  .object({
    version: z.number().int().positive(),
    operations: z.array(OperationDescriptorSchema).min(1),
  })
  .strict()
  .superRefine((catalog, ctx) => {
    const seen = new Set<string>();
    catalog.operations.forEach((operation, index) => {
      if (seen.has(operation.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["operations", index, "name"],
          message: `duplicate operation name ${operation.name}`,
        });
      }
      seen.add(operation.name);
    });
  });

export type OperationDescriptor = z.infer<typeof OperationDescriptorSchema>;

/** Immutable, validated set of operations exposed to callers. */
export interface OperationCatalog {
  readonly version: number;
  readonly operations: readonly OperationDescriptor[];
}

/** Raised at start-up when the catalog file is missing or malformed. */
export class CatalogLoadError extends Error {
  public readonly code = ERROR_CATALOG_INVALID;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CatalogLoadError";
  }
}

/** Lists the `{slot}` names of a path template in order of appearance. */
export function listPathSlots(path: string): string[] {
  return Array.from(path.matchAll(PATH_SLOT_PATTERN), (match) => match[1]);
}

/** Validates a decoded catalog document and freezes the result. */
export function parseOperationCatalog(raw: unknown): OperationCatalog {
  const result = OperationCatalogSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new CatalogLoadError(`Operation catalog is invalid: ${details}`, { cause: result.error });
  }
  return deepFreeze(result.data);
}

/** Reads and validates the catalog file. */
export async function loadOperationCatalog(location: URL | string = DEFAULT_CATALOG_URL): Promise<OperationCatalog> {
  let text: string;
  try {
    text = await readFile(location, "utf8");
  } catch (error) {
    throw new CatalogLoadError(`Unable to read operation catalog at ${String(location)}`, { cause: error });
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(text);
  } catch (error) {
    throw new CatalogLoadError(`Operation catalog at ${String(location)} is not valid JSON`, { cause: error });
  }
  return parseOperationCatalog(decoded);
}

/** Looks an operation up by its caller-visible name. */
export function findOperation(catalog: OperationCatalog, name: string): OperationDescriptor | undefined {
  return catalog.operations.find((operation) => operation.name === name);
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const entry of Object.values(value)) {
      deepFreeze(entry);
    }
  }
  return value;
}
