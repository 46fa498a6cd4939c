/**
 * Core ontology type system for ontobridge.
 *
 * These types describe the store side of the mapping: ontologies
 * declare classes and properties under a namespace IRI, and the
 * store holds individuals of those classes.
 */

/**
 * A unique handle for an individual in the store.
 * Format: namespace + lowercase class name + counter
 * (e.g., "http://example.org/pets#dog1")
 */
export type EntityId = string;

/**
 * A single stored value. Object properties carry EntityIds.
 */
export type ScalarValue = string | number | boolean | Date;

/**
 * What a property read returns and a property write accepts:
 * one value, no value, or many values.
 */
export type PropertyValue = ScalarValue | null | ScalarValue[];

/**
 * Range of a data property.
 */
export type DataRange = "string" | "number" | "boolean" | "date";

/**
 * Defines a class in an ontology.
 */
export interface ClassSchema {
  /** Local name, unique within the ontology */
  name: string;
  /** Human-readable label */
  label: string;
  /** Local names of the direct superclasses */
  subClassOf?: string[];
  /** Human-readable description */
  description: string;
}

/**
 * Defines a data or object property in an ontology.
 */
export interface PropertySchema {
  /** Local name, unique within the ontology */
  name: string;
  /** Human-readable label */
  label: string;
  /** Data properties hold scalars, object properties hold individuals */
  kind: "data" | "object";
  /** Single-valued when true */
  functional: boolean;
  /** For data properties, the value type; for object properties, the target class */
  range?: string;
  /** Human-readable description */
  description: string;
}

/**
 * A complete ontology definition living under one namespace.
 */
export interface OntologySchema {
  /** Short identifier (e.g., "pets") */
  name: string;
  /** Human-readable label */
  label: string;
  /** Version */
  version: string;
  /** Namespace IRI that prefixes every class and property name */
  iri: string;
  /** Class definitions */
  classes: ClassSchema[];
  /** Property definitions */
  properties: PropertySchema[];
  /** Human-readable description */
  description: string;
}

/**
 * A concrete individual in the store.
 */
export interface Entity {
  /** Unique identifier */
  id: EntityId;
  /** IRI of the class this individual was created as */
  type: string;
  /** Namespace IRI of that class */
  namespace: string;
  /** Data property values, keyed by property IRI */
  properties: Record<string, ScalarValue[]>;
  /** Object property targets, keyed by property IRI */
  relationships: Record<string, EntityId[]>;
}
