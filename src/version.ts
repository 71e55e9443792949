import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";

const PackageJson = z.object({ name: z.string(), version: z.string() }).partial();

function readPackageJson(relative: string): z.infer<typeof PackageJson> | undefined {
  try {
    const pkgPath = new URL(relative, import.meta.url);
    const parsed = PackageJson.safeParse(JSON.parse(readFileSync(fileURLToPath(pkgPath), "utf-8")));
    return parsed.success ? parsed.data : undefined;
  } catch {
    return undefined;
  }
}

// src/version.ts → ../package.json; dist/src/version.js → ../../package.json
const pkg = readPackageJson("../package.json") ?? readPackageJson("../../package.json");

/**
 * Service name and version (single source of truth).
 * Reads package.json, with SERVICE_VERSION as an override.
 */
export const SERVICE_NAME = pkg?.name ?? "blueprint-healing-service";
export const SERVICE_VERSION = process.env.SERVICE_VERSION ?? pkg?.version ?? "0.0.0";
