#!/usr/bin/env node
/**
 * Entry point for the diffsift CLI
 *
 * We explicitly load .env from the package directory (not cwd) so that
 * the tool works when run from any directory.
 */
import { existsSync, readFileSync } from "node:fs";
import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";

import { run } from "./cli/index.js";

// Load .env from the package root, one level above src/ or dist/
// This ensures ANTHROPIC_API_KEY is available when running from other directories
const scriptDir = dirname(fileURLToPath(import.meta.url));
const envPath = join(scriptDir, "..", ".env");

if (existsSync(envPath)) {
  const envContent = readFileSync(envPath, "utf-8");
  for (const line of envContent.split("\n")) {
    const trimmed = line.trim();
    // Skip comments and empty lines
    if (!trimmed || trimmed.startsWith("#")) continue;
    const eqIndex = trimmed.indexOf("=");
    if (eqIndex === -1) continue;
    const key = trimmed.slice(0, eqIndex).trim();
    const value = trimmed.slice(eqIndex + 1).trim();
    // Only set if not already set (existing env vars take precedence)
    if (!(key in process.env)) {
      process.env[key] = value;
    }
  }
}

await run();
