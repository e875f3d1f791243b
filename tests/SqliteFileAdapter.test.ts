import Database from 'better-sqlite3';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { SqliteFileAdapter } from '../src/adapters/SqliteFileAdapter';
import { ArtifactKind } from '../src/interfaces/ArtifactRef';
import { AdapterHandle, AdapterStatus } from '../src/interfaces/BackendAdapter';
import { SubmissionError } from '../src/errors/LifecycleErrors';
import { createMockLogger, makeRef } from './helpers/mocks';

describe('SqliteFileAdapter', () => {
  let workDir: string;
  let sourcePath: string;
  let outputDir: string;
  let adapter: SqliteFileAdapter;
  let openDatabases: Database.Database[];

  const fileRef = (artifactId: string, sourceId = sourcePath) =>
    makeRef(artifactId, { sourceId, backend: 'sqlite', kind: ArtifactKind.FILE });

  const open = (filePath: string): Database.Database => {
    const db = new Database(filePath);
    openDatabases.push(db);
    return db;
  };

  const waitForBackup = async (handle: AdapterHandle): Promise<AdapterStatus> => {
    for (let attempt = 0; attempt < 200; attempt++) {
      const status = await adapter.status(handle);
      if (status.state !== 'running') {
        return status;
      }
      await new Promise(resolve => setTimeout(resolve, 5));
    }
    throw new Error(`Backup ${handle.artifactId} did not finish`);
  };

  const countRows = (filePath: string): unknown =>
    open(filePath).prepare('SELECT COUNT(*) AS count FROM items').get();

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'sqlite-adapter-'));
    sourcePath = path.join(workDir, 'app.db');
    outputDir = path.join(workDir, 'backups');
    openDatabases = [];

    const db = open(sourcePath);
    db.exec('CREATE TABLE items (id INTEGER PRIMARY KEY, label TEXT)');
    db.prepare('INSERT INTO items (label) VALUES (?)').run('first');
    db.close();

    adapter = new SqliteFileAdapter({ outputDir }, createMockLogger());
  });

  afterEach(async () => {
    for (const db of openDatabases) {
      if (db.open) {
        db.close();
      }
    }
    await fs.rm(workDir, { recursive: true, force: true });
  });

  it('should back up the database and report the file size', async () => {
    const handle = await adapter.submit(fileRef('app-001'));

    expect(handle).toEqual({
      artifactId: 'app-001',
      location: path.join(outputDir, 'app-001.sqlite'),
      extra: { source: 'app.db' },
    });

    const status = await waitForBackup(handle);
    const { size } = await fs.stat(handle.location);
    expect(status).toEqual({ state: 'done', sizeBytes: size });
    expect(countRows(handle.location)).toEqual({ count: 1 });
  });

  it('should include transactions still in the write-ahead log of an open writer', async () => {
    const writer = open(sourcePath);
    writer.pragma('journal_mode = WAL');
    writer.pragma('wal_autocheckpoint = 0');
    const insert = writer.prepare('INSERT INTO items (label) VALUES (?)');
    writer.transaction(() => {
      for (let i = 0; i < 99; i++) {
        insert.run(`row-${i}`);
      }
    })();
    writer.exec('CREATE TABLE audit (id INTEGER PRIMARY KEY)');

    const handle = await adapter.submit(fileRef('app-001'));
    const status = await waitForBackup(handle);

    expect(status.state).toBe('done');
    expect(countRows(handle.location)).toEqual({ count: 100 });
    expect(
      open(handle.location).prepare("SELECT name FROM sqlite_master WHERE name = 'audit'").get()
    ).toEqual({ name: 'audit' });
  });

  it('should never overwrite an existing backup', async () => {
    const handle = await adapter.submit(fileRef('app-001'));
    await waitForBackup(handle);

    await expect(adapter.submit(fileRef('app-001'))).rejects.toThrow(SubmissionError);
    await expect(adapter.submit(fileRef('app-001'))).rejects.toThrow(
      `${handle.location} already exists`
    );
  });

  it('should reject a missing source file', async () => {
    const missing = path.join(workDir, 'missing.db');

    await expect(adapter.submit(fileRef('app-001', missing))).rejects.toThrow(
      `Failed to back up ${missing} to ${path.join(outputDir, 'app-001.sqlite')}`
    );
    await expect(fs.stat(missing)).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('should report a backup file that disappeared as errored', async () => {
    const handle = await adapter.submit(fileRef('app-001'));
    await waitForBackup(handle);
    await fs.unlink(handle.location);

    await expect(adapter.status(handle)).resolves.toEqual({
      state: 'errored',
      reason: `Backup file ${handle.location} is missing`,
    });
  });

  it('should drop the copy when cancelled', async () => {
    const handle = await adapter.submit(fileRef('app-001'));

    await adapter.cancel(handle);

    await expect(fs.stat(handle.location)).rejects.toMatchObject({ code: 'ENOENT' });
    await expect(adapter.status(handle)).resolves.toEqual({
      state: 'errored',
      reason: `Backup file ${handle.location} is missing`,
    });
  });

  it('should delete the backup file and ignore one that is already gone', async () => {
    const handle = await adapter.submit(fileRef('app-001'));
    await waitForBackup(handle);

    await adapter.delete(fileRef('app-001'));
    await adapter.delete(fileRef('app-001'));

    await expect(fs.stat(handle.location)).rejects.toMatchObject({ code: 'ENOENT' });
  });
});
