/**
 * Store Connector Interface
 *
 * The mapping core never touches a store implementation directly.
 * Everything it needs from an ontology store is listed here: name
 * resolution, individual creation, property reads and writes, and a
 * single-result equality search.
 *
 * The bundled OntologyEngine implements this contract in memory. Any
 * other backend can be plugged in by implementing the same methods.
 */

import type { EntityId, PropertyValue } from "./types.js";

/**
 * A resolved class or property of the store.
 */
export interface TermHandle {
  /** Full IRI (namespace + name) */
  iri: string;
  /** Local name */
  name: string;
  /** Namespace IRI */
  namespace: string;
  /** What the term names */
  kind: "class" | "data" | "object";
  /** Single-valued property; always false for classes */
  functional: boolean;
}

/**
 * One equality constraint of an identity search.
 */
export interface QueryFragment {
  property: TermHandle;
  value: PropertyValue;
}

export interface OntologyStore {
  /** Namespace used to resolve bare names */
  readonly defaultNamespace: string;

  /**
   * Resolve a name inside a namespace (the default one when omitted).
   * Throws when the name is unknown.
   */
  resolveName(name: string, namespace?: string): TermHandle;

  /**
   * Create a new, empty individual of a class.
   */
  createIndividual(cls: TermHandle): EntityId;

  /**
   * Read a property: a single value (or null) when the property is
   * functional, an array otherwise.
   */
  getProperty(individual: EntityId, property: TermHandle): PropertyValue;

  /**
   * Write a property, replacing any prior values.
   */
  setProperty(
    individual: EntityId,
    property: TermHandle,
    value: PropertyValue
  ): void;

  /**
   * Find one individual of a class matching every constraint.
   */
  searchOne(
    cls: TermHandle,
    constraints: QueryFragment[]
  ): EntityId | undefined;
}
