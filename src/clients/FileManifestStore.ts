import { promises as fs } from 'fs';
import { join } from 'path';
import { v4 as uuidv4 } from 'uuid';
import { ManifestEntry, ManifestFilter, ManifestStore } from '../interfaces/ManifestStore';
import {
  DuplicateArtifactError,
  ManifestReadError,
  ManifestWriteError,
  formatError,
  toError,
} from '../errors/LifecycleErrors';
import { WriteLock } from '../utils/WriteLock';
import {
  compareEntries,
  decodeManifestEntry,
  encodeManifestEntry,
  entryFileName,
  matchesFilter,
} from './ManifestEntryCodec';
import { isExistingFile, isMissingFile } from '../utils/fsErrors';

/**
 * Manifest stored as one JSON document per artifact in a directory.
 *
 * Every write goes to a hidden temp file in the same directory, is fsynced,
 * and is then hard-linked to the final name, so a reader never sees a partial
 * entry and an existing entry is never replaced, even by another process.
 * Writes are serialized through a single lock; reads are served from an
 * in-memory index loaded on first use.
 */
export class FileManifestStore implements ManifestStore {
  private readonly lock = new WriteLock();
  private index: Map<string, ManifestEntry> | null = null;
  private loading: Promise<Map<string, ManifestEntry>> | null = null;

  constructor(private readonly directory: string) {}

  async append(entry: ManifestEntry): Promise<void> {
    const artifactId = entry.ref.artifactId;

    try {
      const index = await this.load();

      await this.lock.runExclusive(async () => {
        if (index.has(artifactId)) {
          throw new DuplicateArtifactError(artifactId);
        }

        await this.publish(artifactId, encodeManifestEntry(entry));
        index.set(artifactId, entry);
      });
    } catch (error) {
      if (error instanceof DuplicateArtifactError) {
        throw error;
      }
      throw new ManifestWriteError(
        `Failed to record manifest entry for ${artifactId}: ${formatError(error)}`,
        entry,
        toError(error)
      );
    }
  }

  async list(filter?: ManifestFilter): Promise<ManifestEntry[]> {
    const index = await this.load();
    return [...index.values()].filter(entry => matchesFilter(entry, filter)).sort(compareEntries);
  }

  async get(artifactId: string): Promise<ManifestEntry | undefined> {
    const index = await this.load();
    return index.get(artifactId);
  }

  async remove(artifactId: string): Promise<void> {
    const index = await this.load();

    await this.lock.runExclusive(async () => {
      try {
        await fs.unlink(this.pathFor(artifactId));
      } catch (error) {
        if (!isMissingFile(error)) {
          throw error;
        }
      }
      index.delete(artifactId);
    });
  }

  private load(): Promise<Map<string, ManifestEntry>> {
    if (this.index) {
      return Promise.resolve(this.index);
    }
    if (!this.loading) {
      this.loading = this.readDirectory().then(
        index => {
          this.index = index;
          return index;
        },
        (error: unknown) => {
          this.loading = null;
          throw error;
        }
      );
    }
    return this.loading;
  }

  private async readDirectory(): Promise<Map<string, ManifestEntry>> {
    await fs.mkdir(this.directory, { recursive: true });
    const names = await fs.readdir(this.directory);
    const index = new Map<string, ManifestEntry>();

    for (const name of names) {
      // Skip temp files left behind by an interrupted write
      if (name.startsWith('.') || !name.endsWith('.json')) {
        continue;
      }

      const path = join(this.directory, name);
      let entry: ManifestEntry;
      try {
        entry = decodeManifestEntry(await fs.readFile(path, 'utf8'));
      } catch (error) {
        throw new ManifestReadError(
          `Unreadable manifest entry ${path}: ${formatError(error)}`,
          path,
          toError(error)
        );
      }
      index.set(entry.ref.artifactId, entry);
    }

    return index;
  }

  private async publish(artifactId: string, contents: string): Promise<void> {
    const tempPath = join(this.directory, `.${uuidv4()}.tmp`);

    try {
      const handle = await fs.open(tempPath, 'wx');
      try {
        await handle.writeFile(contents, 'utf8');
        await handle.sync();
      } finally {
        await handle.close();
      }

      // link fails with EEXIST where rename would overwrite
      try {
        await fs.link(tempPath, this.pathFor(artifactId));
      } catch (error) {
        if (isExistingFile(error)) {
          throw new DuplicateArtifactError(artifactId);
        }
        throw error;
      }
    } finally {
      await fs.rm(tempPath, { force: true });
    }
  }

  private pathFor(artifactId: string): string {
    return join(this.directory, entryFileName(artifactId));
  }
}
