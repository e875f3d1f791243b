import { createArtifactRef } from '../interfaces/ArtifactRef';
import { ManifestEntry, ManifestFilter, ManifestOutcome } from '../interfaces/ManifestStore';
import { ValidationError } from '../errors/LifecycleErrors';

/**
 * On-disk / on-bucket shape of a manifest entry
 */
export interface ManifestRecord {
  ref: {
    sourceId: string;
    artifactId: string;
    kind: string;
    backend: string;
  };
  outcome: string;
  createdAt: string;
  sizeBytes: number;
  location: string;
  extra: Record<string, string>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isManifestOutcome(value: unknown): value is ManifestOutcome {
  return Object.values(ManifestOutcome).some(outcome => outcome === value);
}

export function encodeManifestEntry(entry: ManifestEntry): string {
  const record: ManifestRecord = {
    ref: {
      sourceId: entry.ref.sourceId,
      artifactId: entry.ref.artifactId,
      kind: entry.ref.kind,
      backend: entry.ref.backend,
    },
    outcome: entry.outcome,
    createdAt: entry.createdAt.toISOString(),
    sizeBytes: entry.sizeBytes,
    location: entry.location,
    extra: { ...entry.extra },
  };
  return `${JSON.stringify(record, null, 2)}\n`;
}

/**
 * Parse and validate a persisted entry. Throws ValidationError on any
 * missing or mistyped field.
 */
export function decodeManifestEntry(raw: string): ManifestEntry {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ValidationError(
      `Manifest record is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  if (!isRecord(parsed)) {
    throw new ValidationError('Manifest record must be a JSON object');
  }

  const { ref, outcome, createdAt, sizeBytes, location, extra } = parsed;

  if (!isRecord(ref)) {
    throw new ValidationError('Manifest record is missing ref', 'ref');
  }
  const artifactRef = createArtifactRef({
    sourceId: String(ref.sourceId ?? ''),
    artifactId: String(ref.artifactId ?? ''),
    kind: String(ref.kind ?? ''),
    backend: String(ref.backend ?? ''),
  });

  if (!isManifestOutcome(outcome)) {
    throw new ValidationError(`Unknown manifest outcome: ${String(outcome)}`, 'outcome');
  }

  const created = typeof createdAt === 'string' ? new Date(createdAt) : null;
  if (!created || isNaN(created.getTime())) {
    throw new ValidationError(`Invalid createdAt: ${String(createdAt)}`, 'createdAt');
  }

  if (typeof sizeBytes !== 'number' || !Number.isInteger(sizeBytes) || sizeBytes < 0) {
    throw new ValidationError(`Invalid sizeBytes: ${String(sizeBytes)}`, 'sizeBytes');
  }

  if (typeof location !== 'string') {
    throw new ValidationError('Manifest record is missing location', 'location');
  }

  const extraFields: Record<string, string> = {};
  if (extra !== undefined) {
    if (!isRecord(extra)) {
      throw new ValidationError('Manifest extra must be an object', 'extra');
    }
    for (const [key, value] of Object.entries(extra)) {
      if (typeof value !== 'string') {
        throw new ValidationError(`Manifest extra.${key} must be a string`, 'extra');
      }
      extraFields[key] = value;
    }
  }

  return Object.freeze({
    ref: artifactRef,
    outcome,
    createdAt: created,
    sizeBytes,
    location,
    extra: Object.freeze(extraFields),
  });
}

export function matchesFilter(entry: ManifestEntry, filter: ManifestFilter = {}): boolean {
  if (filter.backend !== undefined && entry.ref.backend !== filter.backend) return false;
  if (filter.kind !== undefined && entry.ref.kind !== filter.kind) return false;
  if (filter.sourceId !== undefined && entry.ref.sourceId !== filter.sourceId) return false;
  if (filter.outcome !== undefined && entry.outcome !== filter.outcome) return false;
  if (filter.createdBefore && entry.createdAt.getTime() >= filter.createdBefore.getTime()) return false;
  if (filter.createdAfter && entry.createdAt.getTime() < filter.createdAfter.getTime()) return false;
  if (filter.predicate && !filter.predicate(entry)) return false;
  return true;
}

/**
 * Oldest first; artifact id breaks ties so the order is stable across stores
 */
export function compareEntries(a: ManifestEntry, b: ManifestEntry): number {
  const byTime = a.createdAt.getTime() - b.createdAt.getTime();
  if (byTime !== 0) {
    return byTime;
  }
  return a.ref.artifactId < b.ref.artifactId ? -1 : a.ref.artifactId > b.ref.artifactId ? 1 : 0;
}

/**
 * File / object name for an artifact id, safe for any id.
 * Never starts with a dot: dot files in a manifest directory are temp files.
 */
export function entryFileName(artifactId: string): string {
  return `${encodeURIComponent(artifactId).replace(/^\./, '%2E')}.json`;
}
