/**
 * List mapping: binds a field holding an ordered sequence of nested
 * domain objects to an object property.
 *
 * Object properties are unordered, so each element is reached through
 * a pivot individual that carries the element reference and its
 * position. Decoding sorts pivots by that position and never relies on
 * the order the store returns them in.
 */

import type { EntityId } from "../ontology/types.js";
import type {
  OntologyStore,
  QueryFragment,
  TermHandle,
} from "../ontology/store.js";
import type { FieldMapping, MapperFactory } from "./types.js";
import {
  MappingConfigurationError,
  MappingValueError,
  QueryNotSupportedError,
} from "./errors.js";
import { formatName, resolveName, type QualifiedName } from "./names.js";
import {
  readField,
  storedList,
  storedSingle,
  toDomainObject,
  toElements,
  toEntityId,
} from "./values.js";

export const DEFAULT_INDEX_PROPERTY = "sequence_number";

export interface ListMappingOptions {
  /** Object property from the owner to its pivots */
  relation: QualifiedName;
  /** Class of the pivot individuals */
  pivotClass: QualifiedName;
  /** Object property from a pivot to its element */
  pivotItem: QualifiedName;
  /** Data property holding a pivot's position (default "sequence_number") */
  indexProperty?: QualifiedName;
  /** Builds the Mapper of the element type */
  mapper: MapperFactory;
  /** Required: pivots are created through it */
  store?: OntologyStore;
}

interface ListTerms {
  relation: TermHandle;
  pivotClass: TermHandle;
  pivotItem: TermHandle;
  indexProperty: TermHandle;
}

export class ListMapping implements FieldMapping {
  readonly kind = "list";
  readonly relation: QualifiedName;
  readonly pivotClass: QualifiedName;
  readonly pivotItem: QualifiedName;
  readonly indexProperty: QualifiedName;
  private readonly mapper: MapperFactory;
  private readonly store: OntologyStore;

  constructor(options: ListMappingOptions) {
    if (!options.store) {
      throw new MappingConfigurationError(
        `List mapping on "${formatName(options.relation)}" needs a store connection to create pivot individuals`
      );
    }
    this.relation = options.relation;
    this.pivotClass = options.pivotClass;
    this.pivotItem = options.pivotItem;
    this.indexProperty = options.indexProperty ?? DEFAULT_INDEX_PROPERTY;
    this.mapper = options.mapper;
    this.store = options.store;
  }

  /**
   * Creates a fresh pivot per element and replaces the relation's
   * values with them. Pivots from an earlier encode stay in the store.
   */
  encode(individual: EntityId, obj: object, fieldName: string): void {
    const terms = this.resolveTerms();
    const mapper = this.mapper();
    const elements = toElements(readField(obj, fieldName), fieldName);

    const pivots = elements.map((element, i) => {
      const pivot = this.store.createIndividual(terms.pivotClass);
      const item = mapper.encode(toDomainObject(element, fieldName));
      this.store.setProperty(pivot, terms.pivotItem, item);
      this.store.setProperty(pivot, terms.indexProperty, i);
      return pivot;
    });

    this.store.setProperty(individual, terms.relation, pivots);
  }

  decode(individual: EntityId): object[] {
    const terms = this.resolveTerms();
    const mapper = this.mapper();

    const slots = storedList(this.store.getProperty(individual, terms.relation))
      .map(toEntityId)
      .map((pivot) => ({
        index: this.readIndex(pivot, terms.indexProperty),
        item: this.readItem(pivot, terms.pivotItem),
      }))
      .sort((a, b) => a.index - b.index);

    return slots.map((slot) => mapper.decode(slot.item));
  }

  toQueryFragment(_obj: object, _fieldName: string): QueryFragment {
    throw new QueryNotSupportedError(this.kind);
  }

  isIdentityKey(): boolean {
    return false;
  }

  private resolveTerms(): ListTerms {
    return {
      relation: resolveName(this.relation, this.store),
      pivotClass: resolveName(this.pivotClass, this.store),
      pivotItem: resolveName(this.pivotItem, this.store),
      indexProperty: resolveName(this.indexProperty, this.store),
    };
  }

  private readIndex(pivot: EntityId, indexProperty: TermHandle): number {
    const index = storedSingle(this.store.getProperty(pivot, indexProperty));
    if (typeof index !== "number") {
      throw new MappingValueError(
        `Pivot ${pivot} has no numeric ${indexProperty.name}`
      );
    }
    return index;
  }

  private readItem(pivot: EntityId, pivotItem: TermHandle): EntityId {
    const item = storedSingle(this.store.getProperty(pivot, pivotItem));
    if (item === null) {
      throw new MappingValueError(`Pivot ${pivot} has no ${pivotItem.name}`);
    }
    return toEntityId(item);
  }
}
