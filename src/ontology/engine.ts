/**
 * Ontology Engine: an in-memory ontology store.
 *
 * The engine registers ontology schemas, resolves class and property
 * names inside their namespaces, and holds the individuals created
 * against them. It implements the OntologyStore contract, so mappers
 * can run against it directly in the CLI and in tests.
 */

import type {
  Entity,
  EntityId,
  OntologySchema,
  PropertyValue,
  ScalarValue,
} from "./types.js";
import type { OntologyStore, QueryFragment, TermHandle } from "./store.js";

export class UnknownNameError extends Error {
  constructor(
    readonly term: string,
    readonly namespace: string
  ) {
    super(`Unknown name "${term}" in namespace ${namespace}`);
    this.name = "UnknownNameError";
  }
}

export class UnknownEntityError extends Error {
  constructor(readonly entityId: EntityId) {
    super(`Unknown individual: ${entityId}`);
    this.name = "UnknownEntityError";
  }
}

export interface OntologyEngineOptions {
  /** Namespace for bare names; defaults to the first registered ontology */
  defaultNamespace?: string;
}

export class OntologyEngine implements OntologyStore {
  private ontologies: Map<string, OntologySchema> = new Map();
  private terms: Map<string, TermHandle> = new Map();
  private superClasses: Map<string, string[]> = new Map();
  private entities: Map<EntityId, Entity> = new Map();
  private counters: Map<string, number> = new Map();
  private configuredNamespace: string | undefined;

  constructor(options: OntologyEngineOptions = {}) {
    this.configuredNamespace = options.defaultNamespace;
  }

  get defaultNamespace(): string {
    const namespace =
      this.configuredNamespace ?? this.getOntologies()[0]?.iri;
    if (namespace === undefined) {
      throw new Error("No ontology registered and no default namespace set");
    }
    return namespace;
  }

  /**
   * Register an ontology schema with the engine.
   */
  registerOntology(schema: OntologySchema): void {
    this.ontologies.set(schema.iri, schema);

    for (const cls of schema.classes) {
      const iri = schema.iri + cls.name;
      this.terms.set(iri, {
        iri,
        name: cls.name,
        namespace: schema.iri,
        kind: "class",
        functional: false,
      });
      this.superClasses.set(
        iri,
        (cls.subClassOf ?? []).map((parent) => schema.iri + parent)
      );
    }

    for (const prop of schema.properties) {
      const iri = schema.iri + prop.name;
      this.terms.set(iri, {
        iri,
        name: prop.name,
        namespace: schema.iri,
        kind: prop.kind,
        functional: prop.functional,
      });
    }
  }

  /**
   * Get all registered ontology schemas.
   */
  getOntologies(): OntologySchema[] {
    return Array.from(this.ontologies.values());
  }

  /**
   * Get a specific ontology schema by namespace IRI.
   */
  getOntology(namespace: string): OntologySchema | undefined {
    return this.ontologies.get(namespace);
  }

  resolveName(name: string, namespace: string = this.defaultNamespace): TermHandle {
    const term = this.terms.get(namespace + name);
    if (!term) throw new UnknownNameError(name, namespace);
    return term;
  }

  createIndividual(cls: TermHandle): EntityId {
    if (cls.kind !== "class") {
      throw new Error(`Cannot instantiate ${cls.kind} property ${cls.iri}`);
    }

    // "Dog" #11 and "Dog1" #1 both spell dog11; skip ids already taken.
    const prefix = `${cls.namespace}${cls.name.toLowerCase()}`;
    let n = this.counters.get(cls.iri) ?? 0;
    let id: EntityId;
    do {
      n++;
      id = `${prefix}${n}`;
    } while (this.entities.has(id));
    this.counters.set(cls.iri, n);

    this.entities.set(id, {
      id,
      type: cls.iri,
      namespace: cls.namespace,
      properties: {},
      relationships: {},
    });
    return id;
  }

  getProperty(individual: EntityId, property: TermHandle): PropertyValue {
    const values = this.storedValues(this.requireEntity(individual), property);
    if (property.functional) return values[0] ?? null;
    return [...values];
  }

  setProperty(
    individual: EntityId,
    property: TermHandle,
    value: PropertyValue
  ): void {
    const entity = this.requireEntity(individual);
    const values = toValueList(value);

    if (property.functional && values.length > 1) {
      throw new Error(
        `Functional property ${property.iri} cannot hold ${values.length} values`
      );
    }

    switch (property.kind) {
      case "data":
        entity.properties[property.iri] = values;
        return;
      case "object": {
        const targets: EntityId[] = [];
        for (const target of values) {
          if (typeof target !== "string" || !this.entities.has(target)) {
            throw new Error(
              `Object property ${property.iri} must point at individuals, got ${String(target)}`
            );
          }
          targets.push(target);
        }
        entity.relationships[property.iri] = targets;
        return;
      }
      case "class":
        throw new Error(`${property.iri} is a class, not a property`);
    }
  }

  searchOne(
    cls: TermHandle,
    constraints: QueryFragment[]
  ): EntityId | undefined {
    for (const entity of this.entities.values()) {
      if (!this.isInstanceOf(entity, cls)) continue;
      const matches = constraints.every((c) =>
        matchesConstraint(this.storedValues(entity, c.property), c.value)
      );
      if (matches) return entity.id;
    }
    return undefined;
  }

  /**
   * Get all stored individuals, in creation order.
   */
  getAllEntities(): Entity[] {
    return Array.from(this.entities.values());
  }

  /**
   * Retrieve an individual by ID.
   */
  getEntity(id: EntityId): Entity | undefined {
    return this.entities.get(id);
  }

  /**
   * Whether an individual's class is the given class or one of its
   * (transitive) subclasses.
   */
  isInstanceOf(entity: Entity, cls: TermHandle): boolean {
    const queue = [entity.type];
    const seen = new Set<string>();

    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined || seen.has(current)) continue;
      if (current === cls.iri) return true;
      seen.add(current);
      queue.push(...(this.superClasses.get(current) ?? []));
    }

    return false;
  }

  /**
   * Generate a human-readable summary of an ontology.
   */
  describeOntology(namespace: string): string {
    const ontology = this.ontologies.get(namespace);
    if (!ontology) return `Unknown ontology: ${namespace}`;

    const lines: string[] = [
      `# ${ontology.label} (${ontology.name}) v${ontology.version}`,
      `Namespace: ${ontology.iri}`,
      ontology.description,
      "",
      "## Classes",
    ];

    for (const cls of ontology.classes) {
      const parents = cls.subClassOf?.length
        ? ` ⊑ ${cls.subClassOf.join(", ")}`
        : "";
      lines.push(`  - ${cls.label} (${cls.name})${parents}: ${cls.description}`);
    }

    lines.push("", "## Properties");
    for (const prop of ontology.properties) {
      const arity = prop.functional ? "functional" : "multi-valued";
      const range = prop.range ? ` → ${prop.range}` : "";
      lines.push(
        `  - ${prop.label} (${prop.name}, ${prop.kind}, ${arity})${range}: ${prop.description}`
      );
    }

    const count = this.getAllEntities().filter(
      (e) => e.namespace === namespace
    ).length;
    lines.push("", `Individuals: ${count}`);

    return lines.join("\n");
  }

  private requireEntity(id: EntityId): Entity {
    const entity = this.entities.get(id);
    if (!entity) throw new UnknownEntityError(id);
    return entity;
  }

  private storedValues(entity: Entity, property: TermHandle): ScalarValue[] {
    if (property.kind === "object") {
      return entity.relationships[property.iri] ?? [];
    }
    return entity.properties[property.iri] ?? [];
  }
}

function toValueList(value: PropertyValue): ScalarValue[] {
  if (value === null) return [];
  if (Array.isArray(value)) return [...value];
  return [value];
}

function sameValue(a: ScalarValue, b: ScalarValue): boolean {
  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime();
  }
  if (typeof a === "number" && typeof b === "number") {
    return a === b || (Number.isNaN(a) && Number.isNaN(b));
  }
  return a === b;
}

/**
 * null matches an empty property, an array matches the stored values
 * as a set, and a scalar matches when any stored value equals it.
 */
function matchesConstraint(stored: ScalarValue[], wanted: PropertyValue): boolean {
  if (wanted === null) return stored.length === 0;

  if (Array.isArray(wanted)) {
    return (
      wanted.every((w) => stored.some((s) => sameValue(s, w))) &&
      stored.every((s) => wanted.some((w) => sameValue(s, w)))
    );
  }

  return stored.some((s) => sameValue(s, wanted));
}
