/**
 * YAML Loader: loads ontologies and mapper definitions from
 * declarative YAML files.
 *
 * An ontology file declares classes and properties under one
 * namespace; a mappers file declares, per domain type, which class it
 * maps to and how each field maps onto properties.
 */

import { readFileSync } from "fs";
import { load as yamlLoad } from "js-yaml";
import { z } from "zod";

import type { OntologySchema } from "./ontology/types.js";
import {
  mappersFileSchema,
  type MapperDefinition,
} from "./mapping/definitions.js";

// ── Ontology Loader ───────────────────────────────────────────

const rawClassSchema = z.object({
  name: z.string().min(1),
  label: z.string(),
  subClassOf: z.array(z.string()).optional(),
  description: z.string().default(""),
});

const rawPropertySchema = z.object({
  name: z.string().min(1),
  label: z.string(),
  kind: z.enum(["data", "object"]),
  functional: z.boolean().default(false),
  range: z.string().optional(),
  description: z.string().default(""),
});

const rawOntologySchema = z.object({
  name: z.string().min(1),
  label: z.string(),
  version: z.string(),
  iri: z.string().min(1),
  description: z.string().default(""),
  classes: z.array(rawClassSchema),
  properties: z.array(rawPropertySchema).default([]),
});

export function loadOntologyFromYaml(filePath: string): OntologySchema {
  const raw = rawOntologySchema.parse(yamlLoad(readFileSync(filePath, "utf-8")));

  return {
    name: raw.name,
    label: raw.label,
    version: raw.version,
    iri: raw.iri,
    description: raw.description.trim(),
    classes: raw.classes.map((c) => ({
      ...c,
      description: c.description.trim(),
    })),
    properties: raw.properties.map((p) => ({
      ...p,
      description: p.description.trim(),
    })),
  };
}

// ── Mapper Loader ─────────────────────────────────────────────

export function loadMappersFromYaml(
  filePath: string
): Record<string, MapperDefinition> {
  const raw = mappersFileSchema.parse(yamlLoad(readFileSync(filePath, "utf-8")));
  return raw.mappers;
}
