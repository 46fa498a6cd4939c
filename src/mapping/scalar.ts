/**
 * Scalar mapping: binds one domain field to one data property.
 *
 * Functional fields hold a single string, number, boolean or Date.
 * Multi-valued fields hold an array or Set of them and decode to a Set.
 */

import type { EntityId, PropertyValue, ScalarValue } from "../ontology/types.js";
import type { OntologyStore, QueryFragment } from "../ontology/store.js";
import type { FieldMapping } from "./types.js";
import { resolveName, type QualifiedName } from "./names.js";
import {
  readField,
  storedList,
  storedSingle,
  toElements,
  toScalar,
} from "./values.js";

export interface ScalarMappingOptions {
  /** Target data property */
  property: QualifiedName;
  /** Single-valued field (default true) */
  functional?: boolean;
  /** Use this field alone to find existing individuals (default false) */
  identityKey?: boolean;
  store: OntologyStore;
}

export class ScalarMapping implements FieldMapping {
  readonly kind = "scalar";
  readonly property: QualifiedName;
  readonly functional: boolean;
  private readonly identityKey: boolean;
  private readonly store: OntologyStore;

  constructor(options: ScalarMappingOptions) {
    this.property = options.property;
    this.functional = options.functional ?? true;
    this.identityKey = options.identityKey ?? false;
    this.store = options.store;
  }

  encode(individual: EntityId, obj: object, fieldName: string): void {
    const property = resolveName(this.property, this.store);
    this.store.setProperty(individual, property, this.valueOf(obj, fieldName));
  }

  decode(individual: EntityId): ScalarValue | null | Set<ScalarValue> {
    const property = resolveName(this.property, this.store);
    const stored = this.store.getProperty(individual, property);
    if (this.functional) return storedSingle(stored);
    return new Set(storedList(stored));
  }

  /**
   * Multi-valued fields produce one constraint on the whole list, so
   * matching depends on how the store compares multi-valued properties.
   */
  toQueryFragment(obj: object, fieldName: string): QueryFragment {
    return {
      property: resolveName(this.property, this.store),
      value: this.valueOf(obj, fieldName),
    };
  }

  isIdentityKey(): boolean {
    return this.identityKey;
  }

  private valueOf(obj: object, fieldName: string): PropertyValue {
    const value = readField(obj, fieldName);
    if (this.functional) {
      return value === undefined || value === null
        ? null
        : toScalar(value, fieldName);
    }
    return toElements(value, fieldName).map((e) => toScalar(e, fieldName));
  }
}
