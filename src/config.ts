/**
 * Environment configuration for the CLI.
 *
 * Values come from process.env (populated from .env by dotenv) and are
 * validated once at startup.
 */

import { resolve, dirname } from "path";
import { fileURLToPath } from "url";
import { z } from "zod";

import type { Diagnostics } from "./mapping/types.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const projectRoot = resolve(__dirname, "..");

const envSchema = z.object({
  ONTOBRIDGE_DOMAINS_DIR: z.string().min(1).optional(),
  ONTOBRIDGE_DIAGNOSTICS: z.enum(["warn", "silent"]).default("warn"),
});

export interface AppConfig {
  /** Directory holding one sub-directory per domain */
  domainsDir: string;
  /** Sink for mapper warnings */
  diagnostics: Diagnostics;
}

export const silentDiagnostics: Diagnostics = {
  warn: () => undefined,
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  return {
    domainsDir: parsed.ONTOBRIDGE_DOMAINS_DIR
      ? resolve(parsed.ONTOBRIDGE_DOMAINS_DIR)
      : resolve(projectRoot, "domains"),
    diagnostics:
      parsed.ONTOBRIDGE_DIAGNOSTICS === "silent" ? silentDiagnostics : console,
  };
}
