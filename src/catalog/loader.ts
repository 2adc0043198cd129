// Service catalog: which ports each service claims, what it depends on, and
// which services exclude each other. The built-in catalog is data/catalog/services.yaml;
// extra catalog files layer on top: same-named services are replaced, conflict groups append.
import { readFileSync, existsSync } from "node:fs";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import type { CatalogService, ConflictGroup, ServiceCatalog } from "../types/service.js";
import { ComposeError, ComposeErrorCode } from "../shared/errors.js";
import { formatIssues } from "../tree/schema.js";
import { BUILTIN_CATALOG_PATH } from "../paths.js";
import { logger } from "../logger.js";

const CatalogServiceSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  ports: z.array(z.number().int()).default([]),
  depends_on: z.array(z.string().min(1)).default([]),
});

const ConflictGroupSchema = z.object({
  services: z.array(z.string().min(1)).min(2),
  message: z.string().min(1),
});

const CatalogSchema = z.object({
  services: z.array(CatalogServiceSchema).default([]),
  conflict_groups: z.array(ConflictGroupSchema).default([]),
});

export function parseCatalog(text: string, source = "catalog"): ServiceCatalog {
  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (e) {
    throw new ComposeError(ComposeErrorCode.CATALOG_LOAD_FAILED, `${source}: invalid YAML: ${e instanceof Error ? e.message : String(e)}`);
  }
  const parsed = CatalogSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ComposeError(ComposeErrorCode.CATALOG_LOAD_FAILED, `${source}: invalid service catalog`, { issues: formatIssues(parsed.error) });
  }
  return {
    services: parsed.data.services.map((s): CatalogService => ({
      name: s.name,
      ...(s.description !== undefined ? { description: s.description } : {}),
      ports: s.ports,
      dependsOn: s.depends_on,
    })),
    conflictGroups: parsed.data.conflict_groups,
  };
}

/** Later catalogs replace same-named services in place and append the rest. */
export function mergeCatalogs(catalogs: readonly ServiceCatalog[]): ServiceCatalog {
  const services: CatalogService[] = [];
  const conflictGroups: ConflictGroup[] = [];
  for (const catalog of catalogs) {
    for (const svc of catalog.services) {
      const i = services.findIndex((s) => s.name === svc.name);
      if (i >= 0) services[i] = svc;
      else services.push(svc);
    }
    conflictGroups.push(...catalog.conflictGroups);
  }
  return { services, conflictGroups };
}

export function loadServiceCatalog(additionalPaths: readonly string[] = [], builtinPath: string = BUILTIN_CATALOG_PATH): ServiceCatalog {
  const catalogs = [parseCatalog(readFileSync(builtinPath, "utf-8"), builtinPath)];
  for (const path of additionalPaths) {
    if (!existsSync(path)) {
      logger.warn({ path }, "Service catalog not found, skipping");
      continue;
    }
    catalogs.push(parseCatalog(readFileSync(path, "utf-8"), path));
  }
  const merged = mergeCatalogs(catalogs);
  logger.info({ services: merged.services.length, conflictGroups: merged.conflictGroups.length }, "Service catalog loaded");
  return merged;
}
