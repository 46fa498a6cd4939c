/**
 * Name resolution for mapping configuration.
 *
 * Classes, properties and relations are named either by a bare local
 * name, resolved in the store's default namespace, or by an explicit
 * [name, namespace] pair.
 */

import type { OntologyStore, TermHandle } from "../ontology/store.js";

export type QualifiedName = string | readonly [name: string, namespace: string];

export function isQualifiedName(
  value: QualifiedName | TermHandle
): value is QualifiedName {
  return typeof value === "string" || Array.isArray(value);
}

export function resolveName(
  name: QualifiedName,
  store: OntologyStore
): TermHandle {
  if (typeof name === "string") return store.resolveName(name);
  const [local, namespace] = name;
  return store.resolveName(local, namespace);
}

/**
 * Resolve a mapper target: handles pass through, names go through the store.
 */
export function resolveClass(
  target: QualifiedName | TermHandle,
  store: OntologyStore
): TermHandle {
  return isQualifiedName(target) ? resolveName(target, store) : target;
}

export function formatName(name: QualifiedName): string {
  return typeof name === "string" ? name : `${name[1]}${name[0]}`;
}
