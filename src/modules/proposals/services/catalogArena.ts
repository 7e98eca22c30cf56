import type { Candidate, CatalogClient, CatalogSource } from "../types";

/**
 * Read-only catalog keyed by candidate id. Match results only carry ids;
 * anything that needs names or prices resolves them here.
 */
export class CatalogArena implements CatalogClient, CatalogSource {
  private readonly byId: ReadonlyMap<string, Candidate>;

  constructor(candidates: Iterable<Candidate>) {
    const map = new Map<string, Candidate>();
    for (const c of candidates) {
      map.set(c.id, Object.freeze({ ...c, attributes: Object.freeze({ ...c.attributes }) }));
    }
    this.byId = map;
  }

  get size() {
    return this.byId.size;
  }

  getCandidate(id: string): Candidate | undefined {
    return this.byId.get(id);
  }

  snapshot(): CatalogArena {
    return this;
  }
}

/**
 * Catalog whose contents can be swapped wholesale on reload. Readers take a
 * `snapshot()`; a reload never changes an arena already handed out.
 */
export class ReloadableCatalog implements CatalogSource {
  private current: CatalogArena;

  constructor(
    private readonly load: () => Promise<Candidate[]>,
    initial: Candidate[] = []
  ) {
    this.current = new CatalogArena(initial);
  }

  get size() {
    return this.current.size;
  }

  async reload() {
    const candidates = await this.load();
    this.current = new CatalogArena(candidates);
    console.log(`catalog: loaded ${this.current.size} candidates`);
    return this.current.size;
  }

  snapshot(): CatalogArena {
    return this.current;
  }
}
