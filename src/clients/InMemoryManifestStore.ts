import { ManifestEntry, ManifestFilter, ManifestStore } from '../interfaces/ManifestStore';
import { DuplicateArtifactError } from '../errors/LifecycleErrors';
import { compareEntries, matchesFilter } from './ManifestEntryCodec';

/**
 * Non-durable manifest store for embedding and tests
 */
export class InMemoryManifestStore implements ManifestStore {
  private readonly entries = new Map<string, ManifestEntry>();

  constructor(initial: ManifestEntry[] = []) {
    for (const entry of initial) {
      this.entries.set(entry.ref.artifactId, entry);
    }
  }

  async append(entry: ManifestEntry): Promise<void> {
    if (this.entries.has(entry.ref.artifactId)) {
      throw new DuplicateArtifactError(entry.ref.artifactId);
    }
    this.entries.set(entry.ref.artifactId, entry);
  }

  async list(filter?: ManifestFilter): Promise<ManifestEntry[]> {
    return [...this.entries.values()].filter(entry => matchesFilter(entry, filter)).sort(compareEntries);
  }

  async get(artifactId: string): Promise<ManifestEntry | undefined> {
    return this.entries.get(artifactId);
  }

  async remove(artifactId: string): Promise<void> {
    this.entries.delete(artifactId);
  }
}
