/**
 * Service wiring
 *
 * Builds the long-lived collaborators once at startup. Command handlers
 * receive them through BotServices and never construct their own.
 */

import {
  ClearRegistry,
  HistoryStore,
  ProgressReporter,
  createPolicy,
  type CallPolicy,
  type ChatClient,
  type DownloadResult,
  type MediaItem,
  type Operation,
  type PolicyDefaults,
} from '@tunegrab/core';
import { CatalogSession } from '@tunegrab/catalog';
import {
  CoverArtPreparer,
  DownloadPipeline,
  YtDlpClient,
  type CollectionHooks,
  type CollectionSummary,
  type DownloadContext,
} from '@tunegrab/acquisition';
import { CoverCropper, TagInjector } from '@tunegrab/processing';
import { ensureDir, type Logger } from '@tunegrab/utils';
import type { BotConfig } from './config.js';
import { sessionCatalog, type MusicCatalog } from './catalog.js';
import { TelegramChatClient, type TelegramTransport } from './telegram/chatClient.js';
import { classifyTelegramError } from './telegram/errors.js';

export interface TrackDownloader {
  download(item: MediaItem, context?: DownloadContext): Promise<DownloadResult>;
  downloadAll(items: readonly MediaItem[], hooks: CollectionHooks, operation?: Operation): Promise<CollectionSummary>;
}

export interface BotServices {
  config: BotConfig;
  chat: ChatClient;
  registry: ClearRegistry;
  reporter: ProgressReporter;
  catalog: MusicCatalog;
  downloads: TrackDownloader;
  history: HistoryStore;
  /** Policy for every message the bot sends outside the reporter */
  sendPolicy: CallPolicy;
  logger: Logger;
}

export function retryDefaults(config: BotConfig, logger: Logger): PolicyDefaults {
  return { ...config.retry, logger };
}

export async function createServices(config: BotConfig, api: TelegramTransport, logger: Logger): Promise<BotServices> {
  await Promise.all([ensureDir(config.storage.temp), ensureDir(config.storage.library)]);

  const chatLogger = logger.child({ component: 'telegram' });
  const chat = new TelegramChatClient(api, chatLogger);
  const defaults = retryDefaults(config, chatLogger);
  const sendPolicy = createPolicy('telegram.send', classifyTelegramError, defaults);

  const registry = new ClearRegistry(chat, {
    maxTracked: config.limits.clearLog,
    deletePolicy: createPolicy('telegram.delete', classifyTelegramError, defaults),
    logger: logger.child({ component: 'auto-clear' }),
  });

  const reporter = new ProgressReporter(chat, registry, {
    minEditIntervalMs: config.timing.progressIntervalMs,
    sendPolicy,
    enabled: config.features.progressMessages,
    logger: logger.child({ component: 'progress' }),
  });

  const catalogLogger = logger.child({ component: 'catalog' });
  const session = await CatalogSession.open({
    ...(config.credentials.catalogHeadersFile ? { headersFile: config.credentials.catalogHeadersFile } : {}),
    retry: retryDefaults(config, catalogLogger),
    logger: catalogLogger,
  });

  const pipelineLogger = logger.child({ component: 'download-pipeline' });
  const downloads = new DownloadPipeline({
    downloader: new YtDlpClient({
      binaryPath: config.binaries.ytdlp,
      ffmpegPath: config.binaries.ffmpeg,
      timeoutMs: config.timing.operationTimeoutMs > 0 ? config.timing.operationTimeoutMs : undefined,
      logger: pipelineLogger,
    }),
    cover: new CoverArtPreparer({
      cropper: new CoverCropper({ ffmpegPath: config.binaries.ffmpeg }),
      logger: pipelineLogger,
    }),
    tags: new TagInjector({
      ffmpegPath: config.binaries.ffmpeg,
      ffprobePath: config.binaries.ffprobe,
      logger: pipelineLogger,
    }),
    tempRoot: config.storage.temp,
    libraryDir: config.storage.library,
    audioFormat: config.audio.format,
    preserveExtensions: config.audio.preserveExtensions,
    cookiesFile: config.credentials.cookiesFile,
    logger: pipelineLogger,
  });

  const history = new HistoryStore({
    filePath: config.storage.historyFile,
    limit: config.limits.history,
    enabled: config.features.recentDownloads,
    logger: logger.child({ component: 'history' }),
  });

  logger.info({ catalog: session.state, audioFormat: config.audio.format }, 'Services ready');

  return {
    config,
    chat,
    registry,
    reporter,
    catalog: sessionCatalog(session),
    downloads,
    history,
    sendPolicy,
    logger,
  };
}
