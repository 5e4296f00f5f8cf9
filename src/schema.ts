import { z } from "zod";
import { ManifestError } from "./errors.js";

/**
 * Treat YAML `null` (an empty key) the same as a missing key.
 */
export function optional<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => value ?? undefined, schema.optional());
}

// YAML happily turns "80" or "true" into scalars of other types
function scalarText(value: unknown) {
  return typeof value === "number" || typeof value === "boolean"
    ? String(value)
    : value;
}

function scalarNumber(value: unknown) {
  return typeof value === "string" && value.trim() !== ""
    ? Number(value)
    : value;
}

export const text = z.preprocess(
  scalarText,
  z
    .string({ required_error: "is required", invalid_type_error: "must be a string" })
    .min(1, "is required"),
);

export const optionalText = optional(
  z.preprocess(
    scalarText,
    z.string({ invalid_type_error: "must be a string" }),
  ),
);

export const number = z.preprocess(
  scalarNumber,
  z
    .number({ required_error: "is required", invalid_type_error: "must be a number" })
    .finite("must be a number"),
);

export const optionalNumber = optional(number);

export function mapping<T extends z.ZodRawShape>(shape: T) {
  return z.object(shape, {
    required_error: "is required",
    invalid_type_error: "must be a mapping",
  });
}

/**
 * Validate a parsed YAML document, reporting the first problem together with
 * the dotted path of the offending field.
 */
export function parseDocument<T extends z.ZodTypeAny>(
  schema: T,
  document: unknown,
  file: string,
): z.output<T> {
  const result = schema.safeParse(document);

  if (!result.success) {
    const [issue] = result.error.issues;

    throw new ManifestError(
      file,
      `${issuePath(issue.path) || "document"} ${issue.message}`,
      { cause: result.error },
    );
  }

  return result.data;
}

function issuePath(path: (string | number)[]) {
  return path.reduce<string>((result, key) => {
    if (typeof key === "number") {
      return `${result}[${key}]`;
    }

    return result ? `${result}.${key}` : key;
  }, "");
}
