import { Logger } from '../../src/interfaces/Logger';
import { ArtifactKind, ArtifactRef, createArtifactRef } from '../../src/interfaces/ArtifactRef';
import { AdapterHandle, AdapterStatus, BackendAdapter } from '../../src/interfaces/BackendAdapter';
import { ManifestEntry, ManifestOutcome } from '../../src/interfaces/ManifestStore';

export function createMockLogger(): jest.Mocked<Logger> {
  return {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
    logOperationSubmitted: jest.fn(),
    logOperationTerminal: jest.fn(),
    logAdapterError: jest.fn(),
    logManifestAppend: jest.fn(),
    logRetentionSweep: jest.fn(),
    logConfigurationStart: jest.fn(),
    logScheduledExecution: jest.fn(),
  };
}

export function createMockAdapter(backend = 'rds'): jest.Mocked<BackendAdapter> {
  return {
    backend,
    submit: jest.fn<Promise<AdapterHandle>, [ArtifactRef, AbortSignal?]>(async ref => ({
      artifactId: ref.artifactId,
      location: `loc/${ref.artifactId}`,
    })),
    status: jest.fn<Promise<AdapterStatus>, [AdapterHandle, AbortSignal?]>(async () => ({
      state: 'running',
    })),
    delete: jest.fn<Promise<void>, [ArtifactRef, AbortSignal?]>(async () => undefined),
  };
}

export function makeRef(artifactId = 'snap-001', overrides: Partial<ArtifactRef> = {}): ArtifactRef {
  return createArtifactRef({
    sourceId: 'db1',
    artifactId,
    kind: ArtifactKind.INSTANCE,
    backend: 'rds',
    ...overrides,
  });
}

/**
 * Clock that only moves when told to
 */
export class ManualClock {
  private current: number;

  constructor(start = Date.UTC(2024, 0, 15, 12, 0, 0)) {
    this.current = start;
  }

  readonly now = (): Date => new Date(this.current);

  advance(ms: number): void {
    this.current += ms;
  }
}

export function makeEntry(
  artifactId: string,
  createdAt: Date,
  overrides: Partial<ManifestEntry> = {}
): ManifestEntry {
  return {
    ref: makeRef(artifactId),
    outcome: ManifestOutcome.SUCCESS,
    createdAt,
    sizeBytes: 1024,
    location: `loc/${artifactId}`,
    extra: {},
    ...overrides,
  };
}
