/**
 * Mapper Registry
 *
 * Builds mappers from declarative definitions, keyed by type name.
 * Nested mappers are looked up by name only when a reference or list
 * field runs, so definitions may refer to each other in cycles.
 *
 * Decoded objects are plain records.
 */

import { z } from "zod";
import type { OntologyStore } from "../ontology/store.js";
import type { Diagnostics, DomainType, Mapping, MapperFactory } from "./types.js";
import type { FieldDefinition, MapperDefinition } from "./definitions.js";
import { MappingConfigurationError } from "./errors.js";
import { Mapper } from "./mapper.js";
import { ScalarMapping } from "./scalar.js";
import { ReferenceMapping } from "./reference.js";
import { ListMapping } from "./list.js";

export type DomainRecord = Record<string, unknown>;

const domainRecord: DomainType<DomainRecord> = z.record(z.string(), z.unknown());

export interface MapperRegistryOptions {
  diagnostics?: Diagnostics;
}

export class MapperRegistry {
  private definitions: Map<string, MapperDefinition>;

  constructor(
    definitions: Record<string, MapperDefinition>,
    private readonly store: OntologyStore,
    private readonly options: MapperRegistryOptions = {}
  ) {
    this.definitions = new Map(Object.entries(definitions));

    for (const [type, definition] of this.definitions) {
      for (const [field, fieldDefinition] of Object.entries(definition.fields)) {
        if (fieldDefinition.kind === "scalar") continue;
        if (!this.definitions.has(fieldDefinition.mapper)) {
          throw new MappingConfigurationError(
            `Mapper [${type}]: field "${field}" refers to undeclared mapper "${fieldDefinition.mapper}"`
          );
        }
      }
    }
  }

  /**
   * Names of all declared types.
   */
  types(): string[] {
    return Array.from(this.definitions.keys());
  }

  has(type: string): boolean {
    return this.definitions.has(type);
  }

  /**
   * Build a fresh mapper for a declared type.
   */
  get(type: string): Mapper<DomainRecord> {
    const definition = this.definitions.get(type);
    if (!definition) {
      throw new MappingConfigurationError(`Unknown mapper type "${type}"`);
    }

    const mappings: Record<string, Mapping> = {};
    for (const [field, fieldDefinition] of Object.entries(definition.fields)) {
      mappings[field] = this.buildMapping(fieldDefinition);
    }

    return new Mapper<DomainRecord>({
      source: domainRecord,
      target: definition.target,
      mappings,
      store: this.store,
      diagnostics: this.options.diagnostics,
      name: type,
    });
  }

  factory(type: string): MapperFactory {
    return () => this.get(type);
  }

  private buildMapping(definition: FieldDefinition): Mapping {
    switch (definition.kind) {
      case "scalar":
        return new ScalarMapping({
          property: definition.property,
          functional: definition.functional,
          identityKey: definition.identityKey,
          store: this.store,
        });
      case "reference":
        return new ReferenceMapping({
          relation: definition.relation,
          mapper: this.factory(definition.mapper),
          functional: definition.functional,
          store: this.store,
        });
      case "list":
        return new ListMapping({
          relation: definition.relation,
          pivotClass: definition.pivotClass,
          pivotItem: definition.pivotItem,
          indexProperty: definition.indexProperty,
          mapper: this.factory(definition.mapper),
          store: this.store,
        });
    }
  }
}
