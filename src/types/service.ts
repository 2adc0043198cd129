/** A named, enable-able unit of configuration, rebuilt from the tree on every validation pass. */
export interface ServiceEntry {
  readonly name: string;
  readonly enabled: boolean;
  readonly ports: readonly number[];
  readonly dependsOn: readonly string[];
  /** Tree path the ports were read from; absent when they are the catalog defaults. */
  readonly portsPath?: string;
}

/** Group of services of which at most one may be enabled. */
export interface ConflictGroup {
  readonly services: readonly string[];
  readonly message: string;
}

/** Catalog declaration of a service. services.<name>.ports (or .port) in the tree replaces the default ports. */
export interface CatalogService {
  readonly name: string;
  readonly description?: string;
  readonly ports: readonly number[];
  readonly dependsOn: readonly string[];
}

export interface ServiceCatalog {
  readonly services: readonly CatalogService[];
  readonly conflictGroups: readonly ConflictGroup[];
}

/** One port claimed by one enabled service. */
export interface PortClaim {
  readonly service: string;
  readonly port: number;
}
