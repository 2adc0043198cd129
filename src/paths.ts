import { join } from "node:path";

/** Built-in data shipped beside src/ and dist/: profile tables and the service catalog. */
export const DATA_DIR = join(__dirname, "..", "data");
export const BUILTIN_PROFILES_DIR = join(DATA_DIR, "profiles");
export const BUILTIN_CATALOG_PATH = join(DATA_DIR, "catalog", "services.yaml");
