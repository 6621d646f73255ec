/**
 * yt-dlp Client
 *
 * Runs one single-item download per call as a subprocess. The info dict is
 * written after postprocessors have moved the file, so the report reflects
 * the extension audio extraction actually produced.
 * Docs: https://github.com/yt-dlp/yt-dlp#usage-and-options
 */

import { join } from 'node:path';
import {
  createLogger,
  executeCommand,
  listFiles,
  safeReadFile,
  type CommandOptions,
  type CommandResult,
  type Logger,
} from '@tunegrab/utils';
import { DownloaderError } from '@tunegrab/core';
import { parseDownloaderReport } from './report.js';
import type { DownloaderReport, DownloaderRunOptions, MediaDownloader } from './types.js';

/** File the info dict is printed into, inside the work directory */
export const REPORT_FILE = 'downloader-report.jsonl';

export const DEFAULT_OUTPUT_TEMPLATE = '%(artist,uploader|Unknown).80B - %(title).150B [%(id)s].%(ext)s';

export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandOptions
) => Promise<CommandResult>;

export interface YtDlpConfig {
  binaryPath?: string;
  ffmpegPath?: string;
  /** Format selector handed to -f */
  format?: string;
  timeoutMs?: number;
  runner?: CommandRunner;
  logger?: Logger;
}

export function buildYtDlpArgs(
  url: string,
  outputTemplate: string,
  options: DownloaderRunOptions,
  config: Pick<YtDlpConfig, 'ffmpegPath' | 'format'> = {}
): string[] {
  const args = [
    url,
    '--no-playlist',
    '--no-progress',
    '--newline',
    // file mtimes must reflect this run for the resolver's time window
    '--no-mtime',
    '-f', config.format ?? 'bestaudio[ext=m4a]/bestaudio/best',
    '-x',
    '--audio-format', options.audioFormat,
    '-P', options.workDir,
    '-o', outputTemplate,
    '--print-to-file', 'after_move:%()j', join(options.workDir, REPORT_FILE),
  ];

  if (options.cookiesFile) {
    args.push('--cookies', options.cookiesFile);
  }
  if (config.ffmpegPath) {
    args.push('--ffmpeg-location', config.ffmpegPath);
  }

  return args;
}

export class YtDlpClient implements MediaDownloader {
  private readonly binaryPath: string;
  private readonly ffmpegPath?: string;
  private readonly format?: string;
  private readonly timeoutMs: number;
  private readonly runner: CommandRunner;
  private readonly logger: Logger;

  constructor(config: YtDlpConfig = {}) {
    this.binaryPath = config.binaryPath ?? 'yt-dlp';
    this.ffmpegPath = config.ffmpegPath;
    this.format = config.format;
    this.timeoutMs = config.timeoutMs ?? 600000;
    this.runner = config.runner ?? executeCommand;
    this.logger = config.logger ?? createLogger({ component: 'yt-dlp' });
  }

  async run(url: string, outputTemplate: string, options: DownloaderRunOptions): Promise<DownloaderReport> {
    const args = buildYtDlpArgs(url, outputTemplate, options, { ffmpegPath: this.ffmpegPath, format: this.format });
    this.logger.debug({ url, workDir: options.workDir }, 'Starting yt-dlp');

    const result = await this.runner(this.binaryPath, args, {
      cwd: options.workDir,
      timeout: this.timeoutMs,
      onStderrLine: (line) => this.logger.trace({ line }, 'yt-dlp'),
    });

    if (result.exitCode !== 0 || result.timedOut) {
      const partialFileWritten = await hasDownloadedBytes(options.workDir);
      this.logger.warn({ url, exitCode: result.exitCode, timedOut: result.timedOut, partialFileWritten }, 'yt-dlp failed');
      throw new DownloaderError(url, result.exitCode, result.stderr, partialFileWritten);
    }

    const info = await safeReadFile(join(options.workDir, REPORT_FILE));
    const report = parseDownloaderReport(info ?? '', `${result.stdout}\n${result.stderr}`);

    this.logger.debug({
      url,
      chosenFormat: report.chosenFormat,
      reportedFinalExtension: report.reportedFinalExtension,
      postprocessors: report.postprocessorLog.length,
    }, 'yt-dlp finished');

    return report;
  }
}

async function hasDownloadedBytes(workDir: string): Promise<boolean> {
  const files = await listFiles(workDir);
  return files.some((file) => !file.path.endsWith(REPORT_FILE) && file.stats.size > 0);
}
