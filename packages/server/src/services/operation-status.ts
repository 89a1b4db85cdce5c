/**
 * Maintenance operation lock
 *
 * Backup, restore and archive share one in-memory slot: only one of them
 * runs at a time per process. The status doubles as a progress report.
 */

import { OperationInProgressError, getErrorMessage } from '@pgdesk/core';
import { OPERATION_OUTPUT_MAX_LINES } from '../config/defaults.js';

export type MaintenanceOperation = 'backup' | 'restore' | 'archive';

export interface OperationStatus {
  isRunning: boolean;
  operation?: MaintenanceOperation;
  lastRun?: string;
  lastResult?: 'success' | 'failure';
  lastError?: string;
  output: string[];
}

export class OperationLock {
  private status: OperationStatus = { isRunning: false, output: [] };

  constructor(private readonly maxOutputLines: number = OPERATION_OUTPUT_MAX_LINES) {}

  getStatus(): OperationStatus {
    return { ...this.status, output: [...this.status.output] };
  }

  /**
   * Append a progress line, keeping only the most recent ones.
   */
  appendOutput(line: string): void {
    this.status.output.push(line);
    const excess = this.status.output.length - this.maxOutputLines;
    if (excess > 0) this.status.output.splice(0, excess);
  }

  /**
   * Run `fn` while holding the lock. Throws OperationInProgressError when
   * another operation is running.
   */
  async runExclusive<T>(operation: MaintenanceOperation, fn: () => Promise<T>): Promise<T> {
    if (this.status.isRunning) {
      throw new OperationInProgressError(this.status.operation ?? operation);
    }

    this.status = {
      isRunning: true,
      operation,
      lastRun: new Date().toISOString(),
      output: [],
    };

    try {
      const result = await fn();
      this.status = { ...this.status, isRunning: false, lastResult: 'success' };
      return result;
    } catch (error) {
      this.status = {
        ...this.status,
        isRunning: false,
        lastResult: 'failure',
        lastError: getErrorMessage(error),
      };
      throw error;
    }
  }
}

/** Process-wide lock shared by the maintenance services */
export const operationLock = new OperationLock();
