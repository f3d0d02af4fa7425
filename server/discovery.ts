import { log } from "./log";
import { isValidEntityName, normalizeName } from "./nameFilter";
import type { SignalStore } from "./storage/signalStore";
import type {
  DiscoveredEntity,
  DiscoveryDisposition,
  DiscoverySighting,
  EntityKind,
} from "./types/entities";

export const MAX_SNIPPET_LENGTH = 200;

/**
 * Collects names seen in comments that the catalog does not know. Sightings
 * are buffered in memory and merged into the store on flush, once per batch.
 */
export class DiscoveredEntityTracker {
  private buffer = new Map<string, DiscoverySighting>();

  constructor(
    private readonly store: SignalStore,
    private readonly sampleCap = 10,
    private readonly now: () => Date = () => new Date()
  ) {}

  /** Returns false when the name fails the validity filter. */
  track(name: string, kind: EntityKind, contextSnippet: string): boolean {
    const clean = name.trim();
    if (!isValidEntityName(clean)) return false;

    const normalizedName = normalizeName(clean);
    const snippet = contextSnippet.slice(0, MAX_SNIPPET_LENGTH);
    const seenAt = this.now();
    const pending = this.buffer.get(normalizedName);

    if (pending) {
      pending.count++;
      pending.seenAt = seenAt;
      if (snippet && pending.samples.length < this.sampleCap) pending.samples.push(snippet);
    } else {
      this.buffer.set(normalizedName, {
        name: clean,
        normalizedName,
        kind,
        seenAt,
        count: 1,
        samples: snippet ? [snippet] : [],
      });
    }
    return true;
  }

  get pendingCount(): number {
    return this.buffer.size;
  }

  async flush(): Promise<number> {
    if (this.buffer.size === 0) return 0;

    const sightings = [...this.buffer.values()];
    this.buffer = new Map();
    await this.store.recordSightings(sightings, this.sampleCap);
    log.debug(`Recorded ${sightings.length} discovered names`);
    return sightings.length;
  }

  /** Unreviewed names seen at least `minMentions` times, most frequent first. */
  topUnreviewed(minMentions = 3, limit = 50): Promise<DiscoveredEntity[]> {
    return this.store.listDiscovered({ reviewed: false, minMentions, limit });
  }

  markReviewed(name: string, disposition: DiscoveryDisposition): Promise<DiscoveredEntity | null> {
    return this.store.setDiscoveredDisposition(normalizeName(name), disposition, this.now());
  }
}
