/**
 * Health check of a knowledge base installation: the store answers a
 * statistics query, the data directory exists and has room left.
 */

import fs from 'fs';
import { describeError } from '../../shared/domain/errors.js';
import { KnowledgeStatistics } from '../../shared/domain/repositories/KnowledgeRepository.js';
import { Logger } from '../../shared/infrastructure/logging.js';

export type HealthStatus = 'healthy' | 'warning' | 'unhealthy';

export interface HealthReport {
  status: HealthStatus;

  /** Check name to outcome, in the order the checks ran */
  checks: Record<string, string | number>;

  warnings: string[];

  errors: string[];
}

/** Below this much free space the disk check warns */
export const MIN_FREE_DISK_BYTES = 1024 ** 3;

const BYTES_PER_GB = 1024 ** 3;

/**
 * Bytes available to an unprivileged user on the filesystem holding `directory`
 */
export async function freeDiskBytes(directory: string): Promise<number> {
  const stats = await fs.promises.statfs(directory);
  return stats.bavail * stats.bsize;
}

export interface HealthCheckOptions {
  dataDir: string;

  /** Opens the store and reads its statistics */
  readStatistics: () => Promise<KnowledgeStatistics>;

  freeDiskBytes?: (directory: string) => Promise<number>;

  logger?: Logger;
}

export async function checkSystemHealth(options: HealthCheckOptions): Promise<HealthReport> {
  const report: HealthReport = { status: 'healthy', checks: {}, warnings: [], errors: [] };

  try {
    const statistics = await options.readStatistics();
    report.checks.database = 'ok';
    report.checks.documents_count = statistics.totalDocuments;
  } catch (error) {
    report.checks.database = 'error';
    report.errors.push(`Database error: ${describeError(error)}`);
  }

  if (fs.existsSync(options.dataDir)) {
    report.checks.data_directory = 'ok';

    try {
      const free = await (options.freeDiskBytes ?? freeDiskBytes)(options.dataDir);
      const gigabytes = Math.round((free / BYTES_PER_GB) * 100) / 100;
      report.checks.disk_space_gb = gigabytes;
      if (free < MIN_FREE_DISK_BYTES) {
        report.warnings.push(`Low disk space: ${gigabytes} GB free`);
      }
    } catch (error) {
      report.warnings.push(`Disk space check failed: ${describeError(error)}`);
    }
  } else {
    report.checks.data_directory = 'missing';
    report.errors.push(`Data directory missing: ${options.dataDir}`);
  }

  if (report.errors.length > 0) {
    report.status = 'unhealthy';
  } else if (report.warnings.length > 0) {
    report.status = 'warning';
  }

  options.logger?.info(`Health check: ${report.status}`, 'SystemHealth', {
    warnings: report.warnings.length,
    errors: report.errors.length
  });

  return report;
}
