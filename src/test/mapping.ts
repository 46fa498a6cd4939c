/**
 * Test: field mappings and mappers against the in-memory store.
 * Covers round trips, identity resolution, list ordering and the
 * error paths of the mapping core.
 *
 * Run: npx tsx src/test/mapping.ts
 */

import { isDeepStrictEqual } from "util";
import { z, ZodError } from "zod";

import { OntologyEngine, UnknownNameError } from "../ontology/engine.js";
import type { EntityId, PropertyValue } from "../ontology/types.js";
import type { TermHandle } from "../ontology/store.js";
import { Mapper } from "../mapping/mapper.js";
import { ScalarMapping } from "../mapping/scalar.js";
import { ReferenceMapping } from "../mapping/reference.js";
import { ListMapping } from "../mapping/list.js";
import {
  MappingConfigurationError,
  MappingValueError,
  QueryNotSupportedError,
} from "../mapping/errors.js";
import type { Diagnostics } from "../mapping/types.js";
import { PETS_IRI, petsOntology } from "../domains/pets/ontology.js";

let passed = 0;
let failed = 0;

function assert(label: string, condition: boolean, detail?: string) {
  if (condition) {
    console.log(`  ✅ ${label}`);
    passed++;
  } else {
    console.log(`  ❌ ${label}${detail ? ` — ${detail}` : ""}`);
    failed++;
  }
}

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

// ── Domain types ──────────────────────────────────────────────

const Person = z.object({ name: z.string(), age: z.number() });
type Person = z.infer<typeof Person>;

interface Dog {
  name: string;
  tricks: Set<string>;
  owner: Person | null;
  friends: Set<Dog>;
}
const Dog: z.ZodType<Dog> = z.lazy(() =>
  z.object({
    name: z.string(),
    tricks: z.set(z.string()),
    owner: Person.nullable(),
    friends: z.set(Dog),
  })
);

const Kennel = z.object({ name: z.string(), runs: z.array(Dog) });
type Kennel = z.infer<typeof Kennel>;

const NamedDog = z.object({ name: z.string() });

/**
 * Collects warnings instead of printing them.
 */
class RecordingDiagnostics implements Diagnostics {
  messages: string[] = [];

  warn(message: string): void {
    this.messages.push(message);
  }
}

/**
 * Returns multi-valued properties in reverse order, so nothing can
 * depend on the order the store happens to keep.
 */
class ReversingEngine extends OntologyEngine {
  override getProperty(individual: EntityId, property: TermHandle): PropertyValue {
    const value = super.getProperty(individual, property);
    return Array.isArray(value) ? [...value].reverse() : value;
  }
}

function createStore(store: OntologyEngine = new OntologyEngine()): OntologyEngine {
  store.registerOntology(petsOntology);
  return store;
}

function personMapper(store: OntologyEngine): Mapper<Person> {
  return new Mapper({
    source: Person,
    target: ["Person", PETS_IRI],
    mappings: {
      name: new ScalarMapping({ property: "entity_name", store }),
      age: new ScalarMapping({ property: "age", store }),
    },
    store,
  });
}

function dogMapper(store: OntologyEngine): Mapper<Dog> {
  return new Mapper({
    source: Dog,
    target: "Dog",
    mappings: {
      name: new ScalarMapping({ property: "entity_name", identityKey: true, store }),
      tricks: new ScalarMapping({ property: "knows_trick", functional: false, store }),
      owner: new ReferenceMapping({
        relation: "has_owner",
        mapper: () => personMapper(store),
        store,
      }),
      friends: new ReferenceMapping({
        relation: "has_friend",
        functional: false,
        mapper: () => dogMapper(store),
        store,
      }),
    },
    store,
  });
}

function kennelMapper(store: OntologyEngine, diagnostics: Diagnostics): Mapper<Kennel> {
  return new Mapper({
    source: Kennel,
    target: "Kennel",
    mappings: {
      name: new ScalarMapping({ property: "entity_name", store }),
      runs: new ListMapping({
        relation: "has_slot",
        pivotClass: "Slot",
        pivotItem: "slot_item",
        mapper: () => dogMapper(store),
        store,
      }),
    },
    store,
    diagnostics,
  });
}

function dog(name: string, owner: Person | null = null, tricks: string[] = []): Dog {
  return { name, tricks: new Set(tricks), owner, friends: new Set() };
}

function countOf(store: OntologyEngine, className: string): number {
  return store.getAllEntities().filter((e) => e.type === PETS_IRI + className).length;
}

// ── Identity by key ───────────────────────────────────────────

console.log("\n🔍 Identity by key");

{
  const store = createStore();
  const entityName = store.resolveName("entity_name");
  const keyed = new Mapper({
    source: NamedDog,
    target: "Dog",
    mappings: {
      name: new ScalarMapping({ property: "entity_name", identityKey: true, store }),
    },
    store,
  });

  const first = keyed.encode({ name: "pluto" });
  assert("Encode on an empty store creates dog1", first === `${PETS_IRI}dog1`, first);
  assert("New individual carries the name", store.getProperty(first, entityName) === "pluto");

  const second = keyed.encode({ name: "pluto" });
  assert("Second encode returns the same individual", second === first);
  assert("No duplicate created", countOf(store, "Dog") === 1);
}

{
  const store = createStore();
  const unkeyed = new Mapper({
    source: NamedDog,
    target: "Dog",
    mappings: { name: new ScalarMapping({ property: "entity_name", store }) },
    store,
  });
  const first = unkeyed.encode({ name: "pluto" });
  const second = unkeyed.encode({ name: "pluto" });
  assert("Single-field mapper without key also matches", first === second);
  assert("Single-field mapper creates one individual", countOf(store, "Dog") === 1);
}

{
  const store = createStore();
  const dogs = dogMapper(store);
  const rex = dogs.encode(dog("rex", { name: "ana", age: 34 }, ["sit"]));
  const again = dogs.encode(dog("rex", { name: "bob", age: 50 }, ["beg"]));

  assert("Matching key returns the first individual", again === rex);
  assert(
    "Existing individual is not overwritten",
    isDeepStrictEqual(dogs.decode(rex), dog("rex", { name: "ana", age: 34 }, ["sit"]))
  );
  assert("Key search does not touch other fields", countOf(store, "Person") === 1);
}

// ── Conjunctive search ────────────────────────────────────────

console.log("\n🔍 Conjunctive search");

{
  const store = createStore();
  const people = personMapper(store);
  const ana34 = people.encode({ name: "ana", age: 34 });
  const ana35 = people.encode({ name: "ana", age: 35 });
  const ana34again = people.encode({ name: "ana", age: 34 });

  assert("Partial match is not returned", ana35 !== ana34);
  assert("Full match is returned", ana34again === ana34);
  assert("Two people stored", countOf(store, "Person") === 2);
}

{
  const store = createStore();
  const people = personMapper(store);
  const unknownAge = people.encode({ name: "ana", age: NaN });
  assert("NaN field value matches itself", people.encode({ name: "ana", age: NaN }) === unknownAge);
  assert("NaN field value stored once", countOf(store, "Person") === 1);
}

{
  const store = createStore();
  const TrickDog = z.object({ name: z.string(), tricks: z.set(z.string()) });
  const trickDogs = new Mapper({
    source: TrickDog,
    target: "Dog",
    mappings: {
      name: new ScalarMapping({ property: "entity_name", store }),
      tricks: new ScalarMapping({ property: "knows_trick", functional: false, store }),
    },
    store,
  });
  const first = trickDogs.encode({ name: "rex", tricks: new Set(["sit", "roll"]) });
  const reordered = trickDogs.encode({ name: "rex", tricks: new Set(["roll", "sit"]) });
  const fewer = trickDogs.encode({ name: "rex", tricks: new Set(["sit"]) });

  assert("Multi-valued constraint matches regardless of order", reordered === first);
  assert("Multi-valued constraint needs the same values", fewer !== first);
}

// ── Round trips ───────────────────────────────────────────────

console.log("\n🔍 Round trips");

{
  const store = createStore();
  const dogs = dogMapper(store);
  const fido = dog("fido", null, ["fetch"]);
  const rex: Dog = {
    name: "rex",
    tricks: new Set(["sit", "roll"]),
    owner: { name: "ana", age: 34 },
    friends: new Set([fido, dog("lassie")]),
  };

  const id = dogs.encode(rex);
  const decoded = dogs.decode(id);

  assert("Dog round trip is faithful", isDeepStrictEqual(decoded, rex));
  assert("Tricks decode to a Set", decoded.tricks instanceof Set);
  assert("Friends decode to a Set", decoded.friends instanceof Set && decoded.friends.size === 2);
  assert("Missing owner decodes to null", dogs.decode(dogs.encode(fido)).owner === null);
  assert("Friends were stored as dogs", countOf(store, "Dog") === 3);
}

{
  const store = createStore();
  const dogs = dogMapper(store);
  const byHandle = new Mapper({
    source: NamedDog,
    target: store.resolveName("Dog"),
    mappings: {
      name: new ScalarMapping({ property: ["entity_name", PETS_IRI], identityKey: true, store }),
    },
    store,
  });
  const id = byHandle.encode({ name: "rex" });
  assert("Class handle target works", id === `${PETS_IRI}dog1`);
  assert("Handle and name mappers agree", dogs.encode(dog("rex")) === id);
}

{
  const store = createStore();
  let built = 0;
  const OwnedDog = z.object({ name: z.string(), owner: Person });
  const owned = new Mapper({
    source: OwnedDog,
    target: "Dog",
    mappings: {
      name: new ScalarMapping({ property: "entity_name", identityKey: true, store }),
      owner: new ReferenceMapping({
        relation: "has_owner",
        mapper: () => {
          built++;
          return personMapper(store);
        },
        store,
      }),
    },
    store,
  });

  const id = owned.encode({ name: "rex", owner: { name: "ana", age: 34 } });
  assert("Nested mapper built once for encode", built === 1, `got ${built}`);
  owned.decode(id);
  assert("Nested mapper built again for decode", built === 2, `got ${built}`);
}

// ── Reference query fragments ─────────────────────────────────

console.log("\n🔍 Reference query fragments");

{
  const store = createStore();
  const owner = new ReferenceMapping({
    relation: "has_owner",
    mapper: () => personMapper(store),
    store,
  });

  const fragment = owner.toQueryFragment({ owner: { name: "zoe", age: 20 } }, "owner");
  assert("Building a constraint creates the nested individual", countOf(store, "Person") === 1);
  assert("Constraint points at the nested individual", fragment.value === `${PETS_IRI}person1`);
  assert("Constraint targets the relation", fragment.property.iri === `${PETS_IRI}has_owner`);
  assert("Reference mapping is never an identity key", !owner.isIdentityKey());

  const again = owner.toQueryFragment({ owner: { name: "zoe", age: 20 } }, "owner");
  assert("Existing nested individual is reused", again.value === fragment.value && countOf(store, "Person") === 1);
}

// ── List ordering ─────────────────────────────────────────────

console.log("\n🔍 List ordering");

{
  const store = createStore(new ReversingEngine());
  const diagnostics = new RecordingDiagnostics();
  const kennels = kennelMapper(store, diagnostics);
  const kennel: Kennel = { name: "Riverside", runs: [dog("a"), dog("b"), dog("c")] };

  const id = kennels.encode(kennel);
  const hasSlot = store.resolveName("has_slot");
  const slotItem = store.resolveName("slot_item");
  const entityName = store.resolveName("entity_name");
  const sequenceNumber = store.resolveName("sequence_number");

  const slots = store.getProperty(id, hasSlot);
  const storedOrder = Array.isArray(slots)
    ? slots.map((slot) => {
        const item = store.getProperty(String(slot), slotItem);
        return store.getProperty(String(item), entityName);
      })
    : [];
  assert(
    "Store hands pivots back in a different order",
    isDeepStrictEqual(storedOrder, ["c", "b", "a"]),
    JSON.stringify(storedOrder)
  );

  const indices = Array.isArray(slots)
    ? slots.map((slot) => store.getProperty(String(slot), sequenceNumber))
    : [];
  assert("Pivot indices are dense", isDeepStrictEqual([...indices].sort(), [0, 1, 2]));

  const decoded = kennels.decode(id);
  assert(
    "Decode restores the encoded order",
    isDeepStrictEqual(decoded.runs.map((d) => d.name), ["a", "b", "c"])
  );
  assert("Kennel round trip is faithful", isDeepStrictEqual(decoded, kennel));
  assert("One pivot per element", countOf(store, "Slot") === 3);

  assert("List field produces a diagnostic", diagnostics.messages.length === 1);
  assert(
    "Diagnostic names the mapper and field",
    diagnostics.messages[0] ===
      'Mapper [Kennel]: field "runs" left out of identity search (list mappings cannot build query fragments)',
    diagnostics.messages[0]
  );

  const again = kennels.encode({ name: "Riverside", runs: [dog("z")] });
  assert("Kennel is found by its remaining fields", again === id);
  assert("Found kennel keeps its pivots", countOf(store, "Slot") === 3);
  assert("Each encode reports the skipped field", diagnostics.messages.length === 2);
}

{
  const store = createStore();
  const diagnostics = new RecordingDiagnostics();
  const kennels = kennelMapper(store, diagnostics);
  const empty = kennels.decode(kennels.encode({ name: "Hilltop", runs: [] }));
  assert("Empty list round trips", isDeepStrictEqual(empty, { name: "Hilltop", runs: [] }));

  const shared = kennels.decode(
    kennels.encode({ name: "Twice", runs: [dog("rex"), dog("rex")] })
  );
  assert(
    "Repeated elements keep one position each",
    isDeepStrictEqual(shared.runs.map((d) => d.name), ["rex", "rex"])
  );
  assert("Repeated elements share one individual", countOf(store, "Dog") === 1);
}

{
  const store = createStore();
  const runs = new ListMapping({
    relation: "has_slot",
    pivotClass: "Slot",
    pivotItem: "slot_item",
    mapper: () => dogMapper(store),
    store,
  });
  const error = thrown(() => runs.toQueryFragment({ runs: [] }, "runs"));
  assert("List query fragment is not supported", error instanceof QueryNotSupportedError);
}

{
  const store = createStore();
  const kennels = kennelMapper(store, new RecordingDiagnostics());
  const runs = new ListMapping({
    relation: "has_slot",
    pivotClass: "Slot",
    pivotItem: "slot_item",
    mapper: () => dogMapper(store),
    store,
  });
  const hasSlot = store.resolveName("has_slot");

  const id = kennels.encode({ name: "Riverside", runs: [dog("a"), dog("b")] });
  runs.encode(id, { runs: [dog("c")] }, "runs");

  assert(
    "Re-encoding a list points only at the fresh pivots",
    isDeepStrictEqual(store.getProperty(id, hasSlot), [`${PETS_IRI}slot3`]),
    JSON.stringify(store.getProperty(id, hasSlot))
  );
  assert(
    "Re-encoded list decodes to the second sequence",
    isDeepStrictEqual(kennels.decode(id).runs.map((d) => d.name), ["c"])
  );
  assert("Earlier pivots stay in the store", countOf(store, "Slot") === 3);
}

{
  const store = createStore();
  const runs = new ListMapping({
    relation: "has_slot",
    pivotClass: "Slot",
    pivotItem: "slot_item",
    mapper: () => dogMapper(store),
    store,
  });
  const hasSlot = store.resolveName("has_slot");
  const slotItem = store.resolveName("slot_item");
  const sequenceNumber = store.resolveName("sequence_number");
  const slotClass = store.resolveName("Slot");

  const kennel = store.createIndividual(store.resolveName("Kennel"));
  const rex = store.createIndividual(store.resolveName("Dog"));

  const unnumbered = store.createIndividual(slotClass);
  store.setProperty(unnumbered, slotItem, rex);
  store.setProperty(kennel, hasSlot, [unnumbered]);

  const noIndex = thrown(() => runs.decode(kennel));
  assert("Pivot without an index raises MappingValueError", noIndex instanceof MappingValueError);
  assert(
    "Missing index error names the pivot",
    noIndex instanceof Error &&
      noIndex.message === `Pivot ${PETS_IRI}slot1 has no numeric sequence_number`
  );

  const empty = store.createIndividual(slotClass);
  store.setProperty(empty, sequenceNumber, 0);
  store.setProperty(kennel, hasSlot, [empty]);

  const noItem = thrown(() => runs.decode(kennel));
  assert("Pivot without an element raises MappingValueError", noItem instanceof MappingValueError);
  assert(
    "Missing element error names the pivot",
    noItem instanceof Error && noItem.message === `Pivot ${PETS_IRI}slot2 has no slot_item`
  );
}

// ── Errors ────────────────────────────────────────────────────

console.log("\n🔍 Errors");

{
  const store = createStore();
  const error = thrown(
    () =>
      new ListMapping({
        relation: "has_slot",
        pivotClass: "Slot",
        pivotItem: "slot_item",
        mapper: () => dogMapper(store),
      })
  );
  assert("List mapping without a store fails fast", error instanceof MappingConfigurationError);
  assert(
    "Configuration error names the relation",
    error instanceof Error &&
      error.message === 'List mapping on "has_slot" needs a store connection to create pivot individuals'
  );
}

{
  const store = createStore();
  const error = thrown(
    () =>
      new Mapper({
        source: Person,
        target: "Person",
        mappings: {
          name: new ScalarMapping({ property: "entity_name", identityKey: true, store }),
          age: new ScalarMapping({ property: "age", identityKey: true, store }),
        },
        store,
      })
  );
  assert("Two identity keys are rejected", error instanceof MappingConfigurationError);
}

{
  const store = createStore();
  const cats = new Mapper({
    source: NamedDog,
    target: "Cat",
    mappings: { name: new ScalarMapping({ property: "entity_name", store }) },
    store,
  });
  assert(
    "Unknown target class propagates the store error",
    thrown(() => cats.encode({ name: "tom" })) instanceof UnknownNameError
  );

  const typo = new Mapper({
    source: NamedDog,
    target: "Dog",
    mappings: { name: new ScalarMapping({ property: "entity_nam", store }) },
    store,
  });
  assert(
    "Unknown property propagates the store error",
    thrown(() => typo.encode({ name: "tom" })) instanceof UnknownNameError
  );
}

{
  const store = createStore();
  const mismatched = new Mapper({
    source: Person,
    target: "Person",
    mappings: {
      name: new ScalarMapping({ property: "entity_name", store }),
      age: new ScalarMapping({ property: "entity_name", store }),
    },
    store,
  });
  const id = mismatched.encode({ name: "ana", age: 34 });
  assert(
    "Shape mismatch on decode propagates the constructor error",
    thrown(() => mismatched.decode(id)) instanceof ZodError
  );
}

{
  const store = createStore();
  const loose = new Mapper({
    source: z.object({ tricks: z.unknown() }),
    target: "Dog",
    mappings: {
      tricks: new ScalarMapping({ property: "knows_trick", functional: false, store }),
    },
    store,
  });
  const error = thrown(() => loose.encode({ tricks: "sit" }));
  assert("Wrongly shaped field raises MappingValueError", error instanceof MappingValueError);
  assert(
    "Value error names the field",
    error instanceof Error &&
      error.message === 'Field "tricks" must be an array or a Set, got string'
  );
}

// ── Summary ───────────────────────────────────────────────────

console.log(`\n${"─".repeat(50)}`);
console.log(`Results: ${passed} passed, ${failed} failed, ${passed + failed} total`);
console.log(`${failed === 0 ? "🎉 All tests passed!" : "💥 Some tests failed."}`);
process.exit(failed > 0 ? 1 : 0);
