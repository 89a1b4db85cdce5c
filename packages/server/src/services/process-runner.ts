/**
 * Process Runner
 *
 * Runs a PostgreSQL client utility to completion, collecting its output.
 * Output lines are streamed to the caller as they arrive.
 */

import { spawn } from 'child_process';
import { basename } from 'path';
import { StringDecoder } from 'string_decoder';
import { ToolNotFoundError, getErrorCode } from '@pgdesk/core';

export type StreamName = 'stdout' | 'stderr';

export interface ProcessResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface RunProcessOptions {
  env?: NodeJS.ProcessEnv;
  /** Called for every non-empty output line */
  onLine?: (line: string, stream: StreamName) => void;
}

/**
 * Decodes one output stream. Multi-byte characters and lines split across
 * chunks are held back until the rest arrives.
 */
class OutputCollector {
  private readonly decoder = new StringDecoder('utf8');
  private pending = '';
  text = '';

  constructor(
    private readonly stream: StreamName,
    private readonly onLine: RunProcessOptions['onLine']
  ) {}

  write(chunk: Buffer): void {
    this.push(this.decoder.write(chunk));
  }

  end(): void {
    this.push(this.decoder.end());
    this.emit(this.pending);
    this.pending = '';
  }

  private push(decoded: string): void {
    if (!decoded) return;
    this.text += decoded;
    const lines = (this.pending + decoded).split('\n');
    this.pending = lines.pop() ?? '';
    for (const line of lines) this.emit(line);
  }

  private emit(raw: string): void {
    const line = raw.trim();
    if (line && this.onLine) this.onLine(line, this.stream);
  }
}

/**
 * Spawn a command and resolve with its exit code and captured output.
 * A missing executable rejects with ToolNotFoundError.
 */
export function runProcess(
  command: string,
  args: readonly string[],
  options: RunProcessOptions = {}
): Promise<ProcessResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, [...args], { env: options.env ?? process.env });
    const stdout = new OutputCollector('stdout', options.onLine);
    const stderr = new OutputCollector('stderr', options.onLine);

    child.stdout?.on('data', (data: Buffer) => stdout.write(data));
    child.stderr?.on('data', (data: Buffer) => stderr.write(data));

    child.on('error', (err) => {
      if (getErrorCode(err) === 'ENOENT') {
        reject(new ToolNotFoundError(basename(command), { cause: err }));
        return;
      }
      reject(err);
    });

    child.on('close', (code) => {
      stdout.end();
      stderr.end();
      resolve({ exitCode: code ?? 1, stdout: stdout.text, stderr: stderr.text });
    });
  });
}
