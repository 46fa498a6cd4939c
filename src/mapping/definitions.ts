/**
 * Declarative mapper definitions, as written in mappers.yaml.
 */

import { z } from "zod";

export const qualifiedNameSchema = z.union([
  z.string().min(1),
  z.tuple([z.string().min(1), z.string().min(1)]),
]);

const scalarFieldSchema = z.object({
  kind: z.literal("scalar"),
  property: qualifiedNameSchema,
  functional: z.boolean().optional(),
  identityKey: z.boolean().optional(),
});

const referenceFieldSchema = z.object({
  kind: z.literal("reference"),
  relation: qualifiedNameSchema,
  mapper: z.string().min(1),
  functional: z.boolean().optional(),
});

const listFieldSchema = z.object({
  kind: z.literal("list"),
  relation: qualifiedNameSchema,
  pivotClass: qualifiedNameSchema,
  pivotItem: qualifiedNameSchema,
  indexProperty: qualifiedNameSchema.optional(),
  mapper: z.string().min(1),
});

export const fieldDefinitionSchema = z.discriminatedUnion("kind", [
  scalarFieldSchema,
  referenceFieldSchema,
  listFieldSchema,
]);

export const mapperDefinitionSchema = z.object({
  target: qualifiedNameSchema,
  fields: z.record(z.string(), fieldDefinitionSchema),
});

export const mappersFileSchema = z.object({
  mappers: z.record(z.string(), mapperDefinitionSchema),
});

export type FieldDefinition = z.infer<typeof fieldDefinitionSchema>;
export type MapperDefinition = z.infer<typeof mapperDefinitionSchema>;
