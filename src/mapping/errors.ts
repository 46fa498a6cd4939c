/**
 * Errors raised by the mapping core.
 *
 * Name resolution failures are not wrapped here: whatever the store
 * throws reaches the caller unchanged.
 */

/**
 * A mapping variant cannot contribute an identity-search constraint.
 * Mappers recover from it by leaving the field out of the search.
 */
export class QueryNotSupportedError extends Error {
  constructor(readonly mappingKind: string) {
    super(`${mappingKind} mappings cannot build query fragments`);
    this.name = "QueryNotSupportedError";
  }
}

/**
 * A mapping or mapper was set up in a way it cannot work with.
 */
export class MappingConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MappingConfigurationError";
  }
}

/**
 * A field or stored value does not have the shape its mapping expects.
 */
export class MappingValueError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MappingValueError";
  }
}
