/**
 * Subprocess runner for the external tools (yt-dlp, ffmpeg, ffprobe).
 *
 * Output is buffered up to a cap; stderr can also be streamed line by
 * line for logging. A run past its timeout is terminated and reported
 * with `timedOut` set rather than rejected.
 */

import { spawn } from 'node:child_process';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  duration: number;
  timedOut: boolean;
}

export interface CommandOptions {
  cwd?: string;
  /** milliseconds */
  timeout?: number;
  onStderrLine?: (line: string) => void;
}

const OUTPUT_CAP = 4 * 1024 * 1024;
const KILL_GRACE_MS = 5000;

export class CommandFailedError extends Error {
  readonly command: string;
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;

  constructor(command: string, result: CommandResult) {
    const output = (result.stderr || result.stdout).trim().slice(-500);
    super(`${command} exited with code ${result.exitCode}${output ? `: ${output}` : ''}`);
    this.name = 'CommandFailedError';
    this.command = command;
    this.exitCode = result.exitCode;
    this.stdout = result.stdout;
    this.stderr = result.stderr;
  }
}

class OutputBuffer {
  private text = '';
  private partial = '';

  constructor(private readonly onLine?: (line: string) => void) {}

  push(chunk: string): void {
    if (this.text.length < OUTPUT_CAP) {
      this.text += chunk;
    }
    if (!this.onLine) return;
    const lines = (this.partial + chunk).split(/\r?\n/);
    this.partial = lines.pop() ?? '';
    for (const line of lines) {
      if (line.trim()) this.onLine(line);
    }
  }

  toString(): string {
    return this.text;
  }
}

export function executeCommand(command: string, args: string[], options: CommandOptions = {}): Promise<CommandResult> {
  const started = Date.now();
  const timeout = options.timeout ?? 300000;

  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { cwd: options.cwd, stdio: ['ignore', 'pipe', 'pipe'] });
    const stdout = new OutputBuffer();
    const stderr = new OutputBuffer(options.onStderrLine);
    let timedOut = false;
    let killTimer: NodeJS.Timeout | undefined;

    const timer = setTimeout(() => {
      timedOut = true;
      child.kill('SIGTERM');
      killTimer = setTimeout(() => child.kill('SIGKILL'), KILL_GRACE_MS);
    }, timeout);

    const settle = (): void => {
      clearTimeout(timer);
      if (killTimer) clearTimeout(killTimer);
    };

    child.stdout.setEncoding('utf8').on('data', (chunk: string) => stdout.push(chunk));
    child.stderr.setEncoding('utf8').on('data', (chunk: string) => stderr.push(chunk));

    child.on('error', (error) => {
      settle();
      reject(error);
    });

    child.on('close', (code, signal) => {
      settle();
      resolve({
        exitCode: code ?? (signal ? 128 : 1),
        stdout: stdout.toString(),
        stderr: stderr.toString(),
        duration: Date.now() - started,
        timedOut,
      });
    });
  });
}

/**
 * Run ffmpeg quietly and throw `CommandFailedError` unless it exits 0
 */
export async function execFFmpeg(
  args: string[],
  options: CommandOptions & { ffmpegPath?: string } = {}
): Promise<CommandResult> {
  const { ffmpegPath = 'ffmpeg', ...rest } = options;
  const result = await executeCommand(ffmpegPath, ['-hide_banner', '-loglevel', 'error', ...args], {
    timeout: 120000,
    ...rest,
  });
  if (result.exitCode !== 0 || result.timedOut) {
    throw new CommandFailedError(ffmpegPath, result);
  }
  return result;
}
