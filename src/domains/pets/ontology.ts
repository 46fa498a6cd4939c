/**
 * Pets Ontology: the example domain for ontobridge.
 *
 * Dogs with owners, friends and tricks, and kennels that keep their
 * dogs in a fixed run order. The run order is held by Slot pivots,
 * since object properties carry no order of their own.
 */

import type { OntologySchema } from "../../ontology/types.js";

export const PETS_IRI = "http://example.org/pets#";

export const petsOntology: OntologySchema = {
  name: "pets",
  label: "Pets",
  version: "0.1.0",
  iri: PETS_IRI,
  description:
    "Dogs, the people who own them, and the kennels that house them.",
  classes: [
    {
      name: "Animal",
      label: "Animal",
      description: "Any animal kept as a pet",
    },
    {
      name: "Dog",
      label: "Dog",
      subClassOf: ["Animal"],
      description: "A dog",
    },
    {
      name: "Person",
      label: "Person",
      description: "Someone who owns pets",
    },
    {
      name: "Kennel",
      label: "Kennel",
      description: "A kennel with an ordered row of runs",
    },
    {
      name: "Slot",
      label: "Run Slot",
      description: "Position of one dog in a kennel's run order",
    },
  ],
  properties: [
    {
      name: "entity_name",
      label: "Name",
      kind: "data",
      functional: true,
      range: "string",
      description: "Display name of any named entity",
    },
    {
      name: "age",
      label: "Age",
      kind: "data",
      functional: true,
      range: "number",
      description: "Age in years",
    },
    {
      name: "knows_trick",
      label: "Knows Trick",
      kind: "data",
      functional: false,
      range: "string",
      description: "Tricks a dog can perform",
    },
    {
      name: "has_owner",
      label: "Has Owner",
      kind: "object",
      functional: true,
      range: "Person",
      description: "The person a dog belongs to",
    },
    {
      name: "has_friend",
      label: "Has Friend",
      kind: "object",
      functional: false,
      range: "Dog",
      description: "Dogs this dog gets along with",
    },
    {
      name: "has_slot",
      label: "Has Slot",
      kind: "object",
      functional: false,
      range: "Slot",
      description: "Run slots of a kennel",
    },
    {
      name: "slot_item",
      label: "Slot Item",
      kind: "object",
      functional: true,
      range: "Dog",
      description: "The dog occupying a run slot",
    },
    {
      name: "sequence_number",
      label: "Sequence Number",
      kind: "data",
      functional: true,
      range: "number",
      description: "Zero-based position of a slot",
    },
  ],
};
