/**
 * Mapper: encodes domain objects of one type into store individuals
 * and decodes them back.
 *
 * Encoding first looks for an existing individual: by the identity-key
 * field when the type has one, otherwise by every field that can build
 * a query fragment. A match is returned as it is, without writing the
 * object's fields onto it. Only a newly created individual is filled in.
 *
 * The search-then-create sequence takes no lock; two callers racing on
 * the same identity can both create an individual.
 */

import type { EntityId } from "../ontology/types.js";
import type {
  OntologyStore,
  QueryFragment,
  TermHandle,
} from "../ontology/store.js";
import type { Diagnostics, DomainType, Mapping } from "./types.js";
import { MappingConfigurationError, QueryNotSupportedError } from "./errors.js";
import {
  formatName,
  isQualifiedName,
  resolveClass,
  type QualifiedName,
} from "./names.js";

/**
 * One Mapping per field of T.
 */
export type MappingTable<T> = { readonly [K in keyof T & string]-?: Mapping };

export interface MapperOptions<T extends object> {
  /** Builds domain objects from decoded fields */
  source: DomainType<T>;
  /** Class of the individuals; names are resolved on every encode */
  target: QualifiedName | TermHandle;
  mappings: MappingTable<T>;
  store: OntologyStore;
  /** Receives non-fatal warnings (default: console) */
  diagnostics?: Diagnostics;
  /** Label used in diagnostics (default: the target name) */
  name?: string;
}

export class Mapper<T extends object> {
  readonly name: string;
  private readonly source: DomainType<T>;
  private readonly target: QualifiedName | TermHandle;
  private readonly fields: ReadonlyArray<readonly [string, Mapping]>;
  private readonly store: OntologyStore;
  private readonly diagnostics: Diagnostics;

  constructor(options: MapperOptions<T>) {
    this.source = options.source;
    this.target = options.target;
    this.fields = Object.entries<Mapping>(options.mappings);
    this.store = options.store;
    this.diagnostics = options.diagnostics ?? console;
    this.name =
      options.name ??
      (isQualifiedName(options.target)
        ? formatName(options.target)
        : options.target.iri);

    const keys = this.fields.filter(([, mapping]) => mapping.isIdentityKey());
    if (keys.length > 1) {
      throw new MappingConfigurationError(
        `Mapper [${this.name}]: only one identity key allowed, got ${keys.map(([field]) => field).join(", ")}`
      );
    }
  }

  /**
   * Find or create the individual for obj.
   */
  encode(obj: T): EntityId {
    const constraints = this.identityConstraints(obj);
    const cls = resolveClass(this.target, this.store);

    const existing = this.store.searchOne(cls, constraints);
    if (existing !== undefined) return existing;

    const individual = this.store.createIndividual(cls);
    for (const [fieldName, mapping] of this.fields) {
      mapping.encode(individual, obj, fieldName);
    }
    return individual;
  }

  /**
   * Rebuild a domain object from an individual. Errors from the domain
   * type's constructor propagate unchanged.
   */
  decode(individual: EntityId): T {
    const fields: Record<string, unknown> = {};
    for (const [fieldName, mapping] of this.fields) {
      fields[fieldName] = mapping.decode(individual);
    }
    return this.source.parse(fields);
  }

  private identityConstraints(obj: T): QueryFragment[] {
    const key = this.fields.find(([, mapping]) => mapping.isIdentityKey());
    if (key) {
      const [fieldName, mapping] = key;
      return [mapping.toQueryFragment(obj, fieldName)];
    }

    const constraints: QueryFragment[] = [];
    for (const [fieldName, mapping] of this.fields) {
      try {
        constraints.push(mapping.toQueryFragment(obj, fieldName));
      } catch (error) {
        if (!(error instanceof QueryNotSupportedError)) throw error;
        this.diagnostics.warn(
          `Mapper [${this.name}]: field "${fieldName}" left out of identity search (${error.message})`
        );
      }
    }
    return constraints;
  }
}
