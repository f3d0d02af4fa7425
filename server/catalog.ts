import fs from "fs-extra";
import { z } from "zod";
import { CatalogConfigError } from "./errors";
import { log } from "./log";
import { normalizeName } from "./nameFilter";
import { ENTITY_KINDS, type MonitoredEntity } from "./types/entities";

const entitySchema = z.object({
  id: z.string().min(1),
  canonicalName: z.string().min(1),
  displayName: z.string().min(1).optional(),
  kind: z.enum(ENTITY_KINDS),
  aliases: z.array(z.string().min(1)).default([]),
  active: z.boolean().default(true),
});

export interface CatalogName {
  entity: MonitoredEntity;
  name: string;
  isCanonical: boolean;
}

/**
 * Immutable snapshot of the tracked entities and their alias index.
 * Built once per batch; a new snapshot replaces it rather than mutating it.
 */
export class EntityCatalog {
  private readonly byId: ReadonlyMap<string, MonitoredEntity>;
  private readonly index: ReadonlyMap<string, CatalogName>;

  private constructor(
    entities: MonitoredEntity[],
    index: Map<string, CatalogName>
  ) {
    this.byId = new Map(entities.map((e) => [e.id, Object.freeze(e)]));
    this.index = index;
  }

  static empty(): EntityCatalog {
    return new EntityCatalog([], new Map());
  }

  /**
   * Validate raw catalog entries and build the lookup index.
   * Entries with a malformed alias list are skipped with a warning; two active
   * entities claiming the same name is a configuration error.
   */
  static fromEntities(raw: readonly unknown[]): EntityCatalog {
    const entities: MonitoredEntity[] = [];

    raw.forEach((entry, position) => {
      const parsed = entitySchema.safeParse(entry);
      if (!parsed.success) {
        const label =
          typeof entry === "object" && entry !== null && "canonicalName" in entry
            ? String(entry.canonicalName)
            : `#${position}`;
        log.warn(
          `Skipping catalog entity ${label}: ${parsed.error.issues
            .map((i) => `${i.path.join(".")} ${i.message}`)
            .join("; ")}`
        );
        return;
      }
      const e = parsed.data;
      entities.push({
        id: e.id,
        canonicalName: e.canonicalName.trim(),
        displayName: (e.displayName ?? e.canonicalName).trim(),
        kind: e.kind,
        aliases: [...new Set(e.aliases.map((a) => a.trim()).filter((a) => a.length > 0))],
        active: e.active,
      });
    });

    const index = new Map<string, CatalogName>();
    const owners = new Map<string, Set<string>>();

    for (const entity of entities) {
      if (!entity.active) continue;
      const names: Array<[string, boolean]> = [
        [entity.canonicalName, true],
        ...entity.aliases.map((alias): [string, boolean] => [alias, false]),
      ];
      for (const [name, isCanonical] of names) {
        const key = normalizeName(name);
        const ids = owners.get(key) ?? new Set<string>();
        ids.add(entity.id);
        owners.set(key, ids);
        if (!index.has(key) || isCanonical) {
          index.set(key, { entity, name, isCanonical });
        }
      }
    }

    const conflicts = [...owners.entries()]
      .filter(([, ids]) => ids.size > 1)
      .map(([name, ids]) => ({ name, entityIds: [...ids] }));

    if (conflicts.length > 0) {
      throw new CatalogConfigError(
        `Alias collision in entity catalog: ${conflicts
          .map((c) => `"${c.name}" -> ${c.entityIds.join(", ")}`)
          .join("; ")}`,
        conflicts
      );
    }

    return new EntityCatalog(entities, index);
  }

  get size(): number {
    return this.byId.size;
  }

  get(id: string): MonitoredEntity | undefined {
    return this.byId.get(id);
  }

  active(): MonitoredEntity[] {
    return [...this.byId.values()].filter((e) => e.active);
  }

  /** Resolve a canonical name or alias (case-insensitive) to its entity. */
  lookup(name: string): MonitoredEntity | undefined {
    return this.index.get(normalizeName(name))?.entity;
  }

  names(): CatalogName[] {
    return [...this.index.values()];
  }
}

export async function loadCatalogFile(path: string): Promise<EntityCatalog> {
  if (!(await fs.pathExists(path))) {
    log.warn(`Entity catalog not found at ${path}, starting with an empty catalog`);
    return EntityCatalog.empty();
  }

  const data: unknown = await fs.readJson(path);
  if (!Array.isArray(data)) {
    throw new CatalogConfigError(`Entity catalog ${path} must contain a JSON array`);
  }

  const catalog = EntityCatalog.fromEntities(data);
  log.info(`📚 Loaded ${catalog.active().length} active entities from ${path}`);
  return catalog;
}
