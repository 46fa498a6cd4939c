/**
 * Reference mapping: binds a field holding a nested domain object
 * (or a Set of them) to an object property.
 *
 * Nested objects are always find-or-created through their own Mapper
 * before anything points at them, both when encoding and when building
 * an identity-search constraint. Searching for an outer individual can
 * therefore create inner individuals.
 */

import type { EntityId, PropertyValue } from "../ontology/types.js";
import type { OntologyStore, QueryFragment } from "../ontology/store.js";
import type { FieldMapping, MapperFactory } from "./types.js";
import { resolveName, type QualifiedName } from "./names.js";
import {
  readField,
  storedList,
  storedSingle,
  toDomainObject,
  toElements,
  toEntityId,
} from "./values.js";

export interface ReferenceMappingOptions {
  /** Target object property */
  relation: QualifiedName;
  /** Builds the Mapper of the referenced type */
  mapper: MapperFactory;
  /** Single-valued field (default true) */
  functional?: boolean;
  store: OntologyStore;
}

export class ReferenceMapping implements FieldMapping {
  readonly kind = "reference";
  readonly relation: QualifiedName;
  readonly functional: boolean;
  private readonly mapper: MapperFactory;
  private readonly store: OntologyStore;

  constructor(options: ReferenceMappingOptions) {
    this.relation = options.relation;
    this.mapper = options.mapper;
    this.functional = options.functional ?? true;
    this.store = options.store;
  }

  encode(individual: EntityId, obj: object, fieldName: string): void {
    const relation = resolveName(this.relation, this.store);
    this.store.setProperty(individual, relation, this.materialize(obj, fieldName));
  }

  decode(individual: EntityId): object | null | Set<object> {
    const relation = resolveName(this.relation, this.store);
    const stored = this.store.getProperty(individual, relation);
    const mapper = this.mapper();

    if (this.functional) {
      const target = storedSingle(stored);
      return target === null ? null : mapper.decode(toEntityId(target));
    }
    return new Set(storedList(stored).map((t) => mapper.decode(toEntityId(t))));
  }

  toQueryFragment(obj: object, fieldName: string): QueryFragment {
    return {
      property: resolveName(this.relation, this.store),
      value: this.materialize(obj, fieldName),
    };
  }

  isIdentityKey(): boolean {
    return false;
  }

  /**
   * Make sure the object(s) held by obj[fieldName] exist in the store,
   * finding or creating them through the nested Mapper, and return
   * their individuals.
   */
  materialize(obj: object, fieldName: string): PropertyValue {
    const value = readField(obj, fieldName);
    const mapper = this.mapper();

    if (this.functional) {
      if (value === undefined || value === null) return null;
      return mapper.encode(toDomainObject(value, fieldName));
    }
    return toElements(value, fieldName).map((e) =>
      mapper.encode(toDomainObject(e, fieldName))
    );
  }
}
