/**
 * Mapping contracts shared by the three field strategies and the Mapper.
 */

import type { EntityId } from "../ontology/types.js";
import type { QueryFragment } from "../ontology/store.js";
import type { Mapper } from "./mapper.js";
import type { ScalarMapping } from "./scalar.js";
import type { ReferenceMapping } from "./reference.js";
import type { ListMapping } from "./list.js";

/**
 * What every field strategy does for one named field of a domain object.
 */
export interface FieldMapping {
  readonly kind: "scalar" | "reference" | "list";

  /** Write obj[fieldName] onto the individual. */
  encode(individual: EntityId, obj: object, fieldName: string): void;

  /** Read the field value back from the individual. */
  decode(individual: EntityId): unknown;

  /**
   * Build the identity-search constraint for obj[fieldName].
   * Throws QueryNotSupportedError when the strategy has none.
   */
  toQueryFragment(obj: object, fieldName: string): QueryFragment;

  /** Whether this field locates existing individuals on its own. */
  isIdentityKey(): boolean;
}

/**
 * The closed set of field strategies.
 */
export type Mapping = ScalarMapping | ReferenceMapping | ListMapping;

/**
 * Builds a fresh nested Mapper on each call. Factories keep mapper
 * graphs lazy, so types may reference each other cyclically.
 */
export type MapperFactory = () => Mapper<object>;

/**
 * The constructor of a domain type: turns the decoded field set into
 * a domain object, throwing when the fields do not fit. Zod schemas
 * satisfy this directly.
 */
export interface DomainType<T> {
  parse(fields: unknown): T;
}

/**
 * Where non-fatal mapping warnings go.
 */
export interface Diagnostics {
  warn(message: string): void;
}
