/**
 * Field Types
 *
 * The attribute types an entity field can declare in a process definition.
 * Entities are descriptive here: the runtime never stores entity records,
 * it only tracks which entity a step affects.
 */

/**
 * All supported field types.
 * "enum" fields must also list their variants.
 */
export const FIELD_TYPES = [
  "string",
  "int",
  "float",
  "boolean",
  "enum",
] as const;

export type FieldType = (typeof FIELD_TYPES)[number];
