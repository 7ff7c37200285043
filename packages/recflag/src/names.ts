import type { FieldDescriptor, FlagTag, ResolvedFlag } from "./types.js";

/** Name that opts a field out of both serialization and binding. */
export const OMIT = "-";

/**
 * Read the primary annotation. The string form splits on `,` into name,
 * description and default; missing segments are empty and extra segments
 * are ignored.
 */
export function parseFlagTag(tag: FieldDescriptor["flag"]): FlagTag {
  if (tag === undefined) {
    return { name: "", description: "", defaultValue: "" };
  }
  if (typeof tag !== "string") {
    return {
      name: tag.name ?? "",
      description: tag.description ?? "",
      defaultValue: tag.defaultValue ?? "",
    };
  }
  const [name = "", description = "", defaultValue = ""] = tag.split(",");
  return { name, description, defaultValue };
}

/** Join a prefix and a flag name with `-`. */
export function makeFlagName(prefix: string, name: string): string {
  return prefix ? `${prefix}-${name}` : name;
}

/**
 * Resolve a field's external flag identity.
 *
 * The name comes from the `flag` annotation, then the first segment of the
 * `json` annotation, then the declared field name; underscores become
 * hyphens. Description and default only ever come from `flag`.
 */
export function resolveFlag(field: FieldDescriptor, prefix = ""): ResolvedFlag {
  const tag = parseFlagTag(field.flag);
  const jsonName = field.json?.split(",")[0] ?? "";
  const selected = tag.name || jsonName || field.name;
  const name = selected.replace(/_/g, "-");

  return {
    name,
    flagName: makeFlagName(prefix, name),
    description: tag.description,
    defaultValue: tag.defaultValue,
    omitted: name === OMIT,
  };
}
