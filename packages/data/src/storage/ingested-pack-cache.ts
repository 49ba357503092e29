import { getLogger } from '@tagstore/logger';
import { ok, type Result } from 'neverthrow';

export type PackKind = 'tagpack' | 'actorpack';

export type PackIdLoader = () => Promise<Result<string[], Error>>;

/**
 * Snapshot of the pack ids already stored, loaded on first use.
 *
 * Inserting or deleting a pack does not update the snapshot. Callers that need
 * the current state call `refresh()` (or `invalidate()` and let the next `has`
 * reload).
 */
export class IngestedPackCache {
  private readonly logger = getLogger('IngestedPackCache');
  private ids: Set<string> | undefined;

  constructor(
    readonly kind: PackKind,
    private readonly loadIds: PackIdLoader
  ) {}

  get isLoaded(): boolean {
    return this.ids !== undefined;
  }

  async has(id: string): Promise<Result<boolean, Error>> {
    if (this.ids) {
      return ok(this.ids.has(id));
    }
    const loaded = await this.refresh();
    return loaded.map((ids) => ids.has(id));
  }

  async refresh(): Promise<Result<ReadonlySet<string>, Error>> {
    const result = await this.loadIds();
    return result.map((ids) => {
      const snapshot = new Set(ids);
      this.ids = snapshot;
      this.logger.debug(`Loaded ${snapshot.size} ${this.kind} ids`);
      return snapshot;
    });
  }

  invalidate(): void {
    this.ids = undefined;
  }
}
