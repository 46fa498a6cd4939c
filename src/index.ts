/**
 * ontobridge: map plain domain objects onto ontology individuals
 * and back.
 */

export type {
  ClassSchema,
  DataRange,
  Entity,
  EntityId,
  OntologySchema,
  PropertySchema,
  PropertyValue,
  ScalarValue,
} from "./ontology/types.js";
export type { OntologyStore, QueryFragment, TermHandle } from "./ontology/store.js";
export {
  OntologyEngine,
  UnknownEntityError,
  UnknownNameError,
  type OntologyEngineOptions,
} from "./ontology/engine.js";
export { validateOntologySchema } from "./ontology/schema.js";

export {
  formatName,
  resolveClass,
  resolveName,
  type QualifiedName,
} from "./mapping/names.js";
export type {
  Diagnostics,
  DomainType,
  FieldMapping,
  Mapping,
  MapperFactory,
} from "./mapping/types.js";
export {
  MappingConfigurationError,
  MappingValueError,
  QueryNotSupportedError,
} from "./mapping/errors.js";
export { ScalarMapping, type ScalarMappingOptions } from "./mapping/scalar.js";
export {
  ReferenceMapping,
  type ReferenceMappingOptions,
} from "./mapping/reference.js";
export {
  DEFAULT_INDEX_PROPERTY,
  ListMapping,
  type ListMappingOptions,
} from "./mapping/list.js";
export { Mapper, type MapperOptions, type MappingTable } from "./mapping/mapper.js";
export {
  MapperRegistry,
  type DomainRecord,
  type MapperRegistryOptions,
} from "./mapping/registry.js";
export type { FieldDefinition, MapperDefinition } from "./mapping/definitions.js";

export { loadMappersFromYaml, loadOntologyFromYaml } from "./loader.js";
