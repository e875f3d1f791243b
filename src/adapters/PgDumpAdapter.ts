import { Client } from 'pg';
import { ArtifactRef } from '../interfaces/ArtifactRef';
import { AdapterHandle } from '../interfaces/BackendAdapter';
import { Logger } from '../interfaces/Logger';
import { formatError, toError } from '../errors/LifecycleErrors';
import { outputTail } from '../utils/childProcess';
import { SubprocessBackupAdapter, ToolCommand } from './SubprocessBackupAdapter';

export interface PgDumpAdapterOptions {
  connectionString: string;
  outputDir: string;
  /** Executable to run, `pg_dump` on the PATH by default */
  pgDumpPath?: string;
}

/**
 * Extract the database name from a PostgreSQL connection string.
 * Handles both URL and key=value formats.
 */
export function extractDatabaseName(connectionString: string): string {
  if (connectionString.startsWith('postgresql://') || connectionString.startsWith('postgres://')) {
    try {
      const url = new URL(connectionString);
      return decodeURIComponent(url.pathname.substring(1)) || 'postgres';
    } catch {
      return 'postgres';
    }
  }

  for (const param of connectionString.split(/\s+/)) {
    const [key, value] = param.split('=');
    if (key === 'dbname' && value) {
      return value;
    }
  }
  return 'postgres';
}

/**
 * Point a connection string at another database on the same server
 */
export function withDatabase(connectionString: string, database: string): string {
  if (connectionString.startsWith('postgresql://') || connectionString.startsWith('postgres://')) {
    const url = new URL(connectionString);
    url.pathname = `/${encodeURIComponent(database)}`;
    return url.toString();
  }

  const params = connectionString
    .split(/\s+/)
    .filter(param => param.length > 0 && !param.startsWith('dbname='));
  params.push(`dbname=${database}`);
  return params.join(' ');
}

/**
 * Map pg_dump failures to readable messages
 */
export function analyzePgDumpError(exitCode: number, stderr: string, databaseName: string): string {
  const lowerStderr = stderr.toLowerCase();

  if (lowerStderr.includes('authentication failed')) {
    return `pg_dump authentication failed (exit code ${exitCode}). Please check database credentials.`;
  }

  if (lowerStderr.includes('database') && lowerStderr.includes('does not exist')) {
    return `pg_dump failed: database "${databaseName}" does not exist (exit code ${exitCode}).`;
  }

  if (lowerStderr.includes('permission denied')) {
    return `pg_dump failed: insufficient permissions to access database (exit code ${exitCode}).`;
  }

  if (lowerStderr.includes('no space left on device')) {
    return `pg_dump failed: insufficient disk space (exit code ${exitCode}).`;
  }

  const details = outputTail(stderr) || 'No additional error information available';
  return `pg_dump failed with exit code ${exitCode}. Error details: ${details}`;
}

/**
 * Logical backups with pg_dump in custom format.
 *
 * Each source id is a database name on the server the connection string
 * points at.
 */
export class PgDumpAdapter extends SubprocessBackupAdapter {
  readonly backend = 'postgres';
  protected readonly toolName = 'pg_dump';
  protected readonly fileExtension = '.dump';

  constructor(
    private readonly options: PgDumpAdapterOptions,
    logger: Logger
  ) {
    super(options.outputDir, logger);
  }

  /**
   * Test connection to the PostgreSQL server
   */
  async testConnection(): Promise<boolean> {
    const client = new Client({ connectionString: this.options.connectionString });

    try {
      await client.connect();
      await client.query('SELECT 1');
      return true;
    } catch (error) {
      this.logger.error('PostgreSQL connection test failed', toError(error), {
        database: extractDatabaseName(this.options.connectionString),
      });
      return false;
    } finally {
      await client.end().catch((cleanupError: unknown) => {
        this.logger.warn(`Failed to close database connection during cleanup: ${formatError(cleanupError)}`);
      });
    }
  }

  protected buildCommand(ref: ArtifactRef, filePath: string): ToolCommand {
    return {
      command: this.options.pgDumpPath ?? 'pg_dump',
      args: [
        '--no-password',
        '--no-acl',
        '--no-owner',
        '--format=custom',
        '--compress=9',
        '--file',
        filePath,
        withDatabase(this.options.connectionString, ref.sourceId),
      ],
    };
  }

  protected describeFailure(exitCode: number, stderr: string, handle: AdapterHandle): string {
    return analyzePgDumpError(exitCode, stderr, handle.extra?.database ?? handle.artifactId);
  }

  protected handleExtra(ref: ArtifactRef): Record<string, string> {
    return { database: ref.sourceId, format: 'custom' };
  }
}
