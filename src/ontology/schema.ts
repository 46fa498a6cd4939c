/**
 * Schema validation.
 *
 * Checks that an ontology schema is internally consistent before it
 * is registered with a store.
 */

import type { DataRange, OntologySchema } from "./types.js";

const DATA_RANGES: ReadonlySet<string> = new Set<DataRange>([
  "string",
  "number",
  "boolean",
  "date",
]);

/**
 * Validate that an ontology schema is internally consistent:
 * - No duplicate class or property names
 * - Superclasses and object property ranges reference known classes
 * - Data property ranges are known value types
 */
export function validateOntologySchema(schema: OntologySchema): string[] {
  const errors: string[] = [];
  const classNames = new Set(schema.classes.map((c) => c.name));
  const propertyNames = new Set(schema.properties.map((p) => p.name));

  if (classNames.size !== schema.classes.length) {
    errors.push(`Ontology "${schema.name}" has duplicate class names`);
  }
  if (propertyNames.size !== schema.properties.length) {
    errors.push(`Ontology "${schema.name}" has duplicate property names`);
  }

  for (const cls of schema.classes) {
    for (const parent of cls.subClassOf ?? []) {
      if (!classNames.has(parent)) {
        errors.push(
          `Class "${cls.name}" is a subclass of unknown class "${parent}"`
        );
      }
    }
  }

  for (const prop of schema.properties) {
    if (prop.range === undefined) continue;

    if (prop.kind === "object" && !classNames.has(prop.range)) {
      errors.push(
        `Object property "${prop.name}" has unknown range class "${prop.range}"`
      );
    }
    if (prop.kind === "data" && !DATA_RANGES.has(prop.range)) {
      errors.push(
        `Data property "${prop.name}" has unsupported range "${prop.range}"`
      );
    }
  }

  return errors;
}
