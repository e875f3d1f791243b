import { ArtifactKind, createArtifactRef, describeRef } from '../src/interfaces/ArtifactRef';
import { LifecycleError, SubmissionError, ValidationError, formatError } from '../src/errors/LifecycleErrors';

describe('createArtifactRef', () => {
  const fields = { sourceId: 'db1', artifactId: 'snap-001', kind: 'Instance', backend: 'rds' };

  it('should return a frozen ref with a typed kind', () => {
    const ref = createArtifactRef(fields);

    expect(ref).toEqual({ ...fields, kind: ArtifactKind.INSTANCE });
    expect(Object.isFrozen(ref)).toBe(true);
    expect(describeRef(ref)).toBe('rds:db1/snap-001');
  });

  it.each(['sourceId', 'artifactId', 'backend'])('should reject a blank %s', field => {
    expect(() => createArtifactRef({ ...fields, [field]: '  ' })).toThrow(
      `ArtifactRef.${field} must be a non-empty string`
    );
  });

  it('should reject an unknown kind', () => {
    const error = (() => {
      try {
        createArtifactRef({ ...fields, kind: 'Volume' });
      } catch (caught) {
        return caught;
      }
      return undefined;
    })();

    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({ message: 'Unknown artifact kind: Volume', field: 'kind' });
  });
});

describe('LifecycleErrors', () => {
  it('should keep the cause and append its stack', () => {
    const ref = createArtifactRef({ sourceId: 'db1', artifactId: 'snap-001', kind: 'Instance', backend: 'rds' });
    const cause = new Error('quota exceeded');

    const error = new SubmissionError('Backend rejected backup request', ref, cause);

    expect(error).toBeInstanceOf(LifecycleError);
    expect(error.name).toBe('SubmissionError');
    expect(error.operation).toBe('submit');
    expect(error.cause).toBe(cause);
    expect(error.stack).toContain('Caused by: Error: quota exceeded');
  });

  it('should format thrown values of any type', () => {
    expect(formatError(new TypeError('bad'))).toBe('TypeError: bad');
    expect(formatError('plain')).toBe('plain');
  });
});
