#!/usr/bin/env node

/**
 * ontobridge CLI: inspect a domain's ontology and push JSON objects
 * through its declared mappers.
 *
 * Usage:
 *   ontobridge describe <domain>                       Print the ontology summary
 *   ontobridge encode <domain> <type> <objects.json>   Encode objects, print the store
 *   ontobridge roundtrip <domain> <type> <objects.json> Encode then decode objects
 */

import "dotenv/config";
import { existsSync, readFileSync } from "fs";
import { resolve } from "path";
import { dump as yamlDump } from "js-yaml";
import { z } from "zod";

import { loadConfig, type AppConfig } from "./config.js";
import { loadMappersFromYaml, loadOntologyFromYaml } from "./loader.js";
import { OntologyEngine } from "./ontology/engine.js";
import { validateOntologySchema } from "./ontology/schema.js";
import { MapperRegistry } from "./mapping/registry.js";

const command = process.argv[2] || "help";
const args = process.argv.slice(3);

const objectsSchema = z.array(z.record(z.string(), z.unknown()));

interface LoadedDomain {
  engine: OntologyEngine;
  namespace: string;
  registry: MapperRegistry | undefined;
}

function loadDomain(config: AppConfig, domain: string): LoadedDomain {
  const domainDir = resolve(config.domainsDir, domain);
  const ontologyYaml = resolve(domainDir, "ontology.yaml");
  const mappersYaml = resolve(domainDir, "mappers.yaml");

  if (!existsSync(ontologyYaml)) {
    throw new Error(`No ontology.yaml for domain "${domain}" in ${domainDir}`);
  }

  const schema = loadOntologyFromYaml(ontologyYaml);
  const errors = validateOntologySchema(schema);
  if (errors.length > 0) {
    console.warn(`  Validation warnings for ${domain}:`, errors);
  }

  const engine = new OntologyEngine();
  engine.registerOntology(schema);

  const registry = existsSync(mappersYaml)
    ? new MapperRegistry(loadMappersFromYaml(mappersYaml), engine, {
        diagnostics: config.diagnostics,
      })
    : undefined;

  return { engine, namespace: schema.iri, registry };
}

function readObjects(filePath: string): Array<Record<string, unknown>> {
  return objectsSchema.parse(JSON.parse(readFileSync(resolve(filePath), "utf-8")));
}

function setsAsArrays(_key: string, value: unknown): unknown {
  return value instanceof Set ? Array.from(value) : value;
}

function usage(): void {
  console.log("Commands:");
  console.log("  describe <domain>                        Print the ontology summary");
  console.log("  encode <domain> <type> <objects.json>    Encode objects, print the store as YAML");
  console.log("  roundtrip <domain> <type> <objects.json> Encode then decode objects, print JSON");
  console.log("\nConfiguration: set ONTOBRIDGE_* variables in .env");
}

function main(): void {
  if (command === "help") {
    usage();
    return;
  }

  const config = loadConfig();
  const [domain, type, objectsFile] = args;

  if (!domain) {
    console.error(`❌ Missing <domain> for '${command}'`);
    usage();
    process.exit(1);
  }

  const loaded = loadDomain(config, domain);

  // ── Describe ───────────────────────────────────────────────

  if (command === "describe") {
    console.log(loaded.engine.describeOntology(loaded.namespace));
    if (loaded.registry) {
      console.log(`\nMappers: ${loaded.registry.types().join(", ")}`);
    }
    return;
  }

  if (command !== "encode" && command !== "roundtrip") {
    console.error(`❌ Unknown command: ${command}`);
    usage();
    process.exit(1);
  }

  // ── Encode ─────────────────────────────────────────────────

  if (!type || !objectsFile) {
    console.error(`❌ Usage: ${command} <domain> <type> <objects.json>`);
    process.exit(1);
  }
  if (!loaded.registry) {
    console.error(`❌ Domain "${domain}" has no mappers.yaml`);
    process.exit(1);
  }

  const mapper = loaded.registry.get(type);
  const ids = readObjects(objectsFile).map((obj) => mapper.encode(obj));

  if (command === "encode") {
    console.log(yamlDump(loaded.engine.getAllEntities()));
    console.error(`Encoded ${ids.length} ${type} object(s)`);
    return;
  }

  // ── Roundtrip ──────────────────────────────────────────────

  const decoded = ids.map((id) => mapper.decode(id));
  console.log(JSON.stringify(decoded, setsAsArrays, 2));
}

try {
  main();
} catch (error) {
  console.error("Fatal error:", error);
  process.exit(1);
}
