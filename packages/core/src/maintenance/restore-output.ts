/**
 * pg_restore output classification
 *
 * pg_restore exits non-zero for harmless issues, e.g. a dump from a newer
 * server setting transaction_timeout. Only lines classified as errors fail
 * a restore.
 */

export interface RestoreOutput {
  errors: string[];
  warnings: string[];
}

export function classifyRestoreOutput(stderr: string): RestoreOutput {
  const errors: string[] = [];
  const warnings: string[] = [];

  for (const raw of stderr.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line) continue;
    const lower = line.toLowerCase();

    if (lower.includes('transaction_timeout') && lower.includes('unrecognized configuration parameter')) {
      warnings.push(line);
    } else if (lower.startsWith('command was:') && lower.includes('transaction_timeout')) {
      warnings.push(line);
    } else if (lower.includes('warning:')) {
      warnings.push(line);
    } else if (lower.includes('error:')) {
      errors.push(line);
    }
  }

  return { errors, warnings };
}

export function isRestoreFailure(exitCode: number | null, output: RestoreOutput): boolean {
  return exitCode !== 0 && output.errors.length > 0;
}
