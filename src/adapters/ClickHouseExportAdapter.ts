import { ArtifactRef } from '../interfaces/ArtifactRef';
import { AdapterHandle } from '../interfaces/BackendAdapter';
import { Logger } from '../interfaces/Logger';
import { SubmissionError } from '../errors/LifecycleErrors';
import { outputTail } from '../utils/childProcess';
import { SubprocessBackupAdapter, ToolCommand } from './SubprocessBackupAdapter';

export interface ClickHouseExportAdapterOptions {
  host: string;
  port?: number;
  user?: string;
  password?: string;
  outputDir: string;
  /** Executable to run, `clickhouse-client` on the PATH by default */
  clientPath?: string;
}

const TABLE_PATTERN = /^([A-Za-z_][A-Za-z0-9_]*)\.([A-Za-z_][A-Za-z0-9_]*)$/;

/**
 * Split a `database.table` source id
 */
export function parseTableName(sourceId: string): { database: string; table: string } | null {
  const match = TABLE_PATTERN.exec(sourceId);
  return match ? { database: match[1], table: match[2] } : null;
}

function quoteString(value: string): string {
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

/**
 * ClickHouse table exports with clickhouse-client, one CSV file per artifact.
 * Each source id names a table as `database.table`. An empty table exports
 * to an empty file, which still counts as a backup.
 */
export class ClickHouseExportAdapter extends SubprocessBackupAdapter {
  readonly backend = 'clickhouse';
  protected readonly toolName = 'clickhouse-client';
  protected readonly fileExtension = '.csv';
  protected readonly allowEmptyFile = true;

  constructor(
    private readonly options: ClickHouseExportAdapterOptions,
    logger: Logger
  ) {
    super(options.outputDir, logger);
  }

  protected buildCommand(ref: ArtifactRef, filePath: string): ToolCommand {
    const table = parseTableName(ref.sourceId);
    if (!table) {
      throw new SubmissionError(
        `Invalid ClickHouse source ${ref.sourceId}. Expected format: database.table`,
        ref
      );
    }

    const args = [
      `--host=${this.options.host}`,
      `--port=${this.options.port ?? 9000}`,
      `--user=${this.options.user ?? 'default'}`,
    ];
    if (this.options.password) {
      args.push(`--password=${this.options.password}`);
    }
    args.push(
      `--query=SELECT * FROM \`${table.database}\`.\`${table.table}\` INTO OUTFILE ${quoteString(filePath)} FORMAT CSVWithNames`
    );

    return { command: this.options.clientPath ?? 'clickhouse-client', args };
  }

  protected describeFailure(exitCode: number, stderr: string, handle: AdapterHandle): string {
    const details = outputTail(stderr) || 'No additional error information available';
    return `Export of ${handle.extra?.table ?? handle.artifactId} failed with exit code ${exitCode}. Error details: ${details}`;
  }

  protected handleExtra(ref: ArtifactRef): Record<string, string> {
    return { table: ref.sourceId, format: 'CSVWithNames' };
  }
}
