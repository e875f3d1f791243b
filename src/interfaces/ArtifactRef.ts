import { ValidationError } from '../errors/LifecycleErrors';

/**
 * What kind of resource a backup was taken from
 */
export enum ArtifactKind {
  INSTANCE = 'Instance',
  CLUSTER = 'Cluster',
  KEYSPACE = 'Keyspace',
  DATABASE = 'Database',
  TABLE = 'Table',
  FILE = 'File',
}

/**
 * Identifies one backup target + output pair.
 * `sourceId` and `artifactId` are opaque, backend-defined strings.
 */
export interface ArtifactRef {
  readonly sourceId: string;
  readonly artifactId: string;
  readonly kind: ArtifactKind;
  readonly backend: string;
}

export function isArtifactKind(value: unknown): value is ArtifactKind {
  return Object.values(ArtifactKind).some(kind => kind === value);
}

/**
 * Validate and freeze an ArtifactRef
 */
export function createArtifactRef(fields: {
  sourceId: string;
  artifactId: string;
  kind: ArtifactKind | string;
  backend: string;
}): ArtifactRef {
  for (const field of ['sourceId', 'artifactId', 'backend'] as const) {
    const value = fields[field];
    if (typeof value !== 'string' || value.trim() === '') {
      throw new ValidationError(`ArtifactRef.${field} must be a non-empty string`, field);
    }
  }

  const kind = fields.kind;
  if (!isArtifactKind(kind)) {
    throw new ValidationError(`Unknown artifact kind: ${String(kind)}`, 'kind');
  }

  return Object.freeze({
    sourceId: fields.sourceId,
    artifactId: fields.artifactId,
    kind,
    backend: fields.backend,
  });
}

export function describeRef(ref: ArtifactRef): string {
  return `${ref.backend}:${ref.sourceId}/${ref.artifactId}`;
}
