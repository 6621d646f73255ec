/**
 * Reply formatting
 *
 * Everything returned here is Telegram HTML. Interpolated values are escaped
 * and no tag spans a line break, so splitMessage can cut between lines.
 */

import type { DownloadResult, HistoryRecord, MediaItem, OperationFailure } from '@tunegrab/core';
import type { CatalogEntity, Lyrics, Recommendations, SearchKind, SearchResult } from '@tunegrab/catalog';
import { formatDuration } from '@tunegrab/utils';
import { escapeHtml } from './text.js';

const SEARCH_LABELS: Record<SearchKind, string> = {
  tracks: 'Tracks',
  albums: 'Albums',
  playlists: 'Playlists',
  artists: 'Artists',
};

const FAILURE_LABELS: Record<OperationFailure['kind'], string> = {
  'transient-network': 'Network error',
  'rate-limited': 'Rate limited',
  'authentication-lost': 'Session expired',
  'authentication-failed': 'Authentication failed',
  'retries-exhausted': 'Service unavailable',
  'ambiguous-output': 'Ambiguous download output',
  'download-incomplete': 'Download incomplete',
  'metadata-incomplete': 'Incomplete metadata',
  cancelled: 'Cancelled',
  fatal: 'Failed',
};

function link(url: string, text: string): string {
  return `<a href="${escapeHtml(url).replace(/"/g, '&quot;')}">${escapeHtml(text)}</a>`;
}

function code(text: string): string {
  return `<code>${escapeHtml(text)}</code>`;
}

export function formatFailure(failure: OperationFailure): string {
  return `❌ <b>${FAILURE_LABELS[failure.kind]}</b>\n${escapeHtml(failure.detail)}`;
}

export function formatSearchResults(query: string, kind: SearchKind, results: readonly SearchResult[]): string {
  if (results.length === 0) {
    return `No ${SEARCH_LABELS[kind].toLowerCase()} found for <i>${escapeHtml(query)}</i>.`;
  }

  const lines = [`🔎 <b>${SEARCH_LABELS[kind]}</b> for <i>${escapeHtml(query)}</i>`, ''];
  for (const [index, result] of results.entries()) {
    const details = [
      result.artists,
      result.album,
      result.year,
      result.durationSeconds !== null ? formatDuration(result.durationSeconds) : null,
    ].filter((value): value is string => Boolean(value));

    lines.push(`${index + 1}. ${link(result.url, result.title)}`);
    if (details.length > 0) {
      lines.push(`    ${escapeHtml(details.join(' · '))}`);
    }
    lines.push(`    ${code(result.id)}`);
  }
  return lines.join('\n');
}

function trackLine(index: number, item: MediaItem): string {
  return `${index + 1}. ${link(item.url, item.title)} · ${escapeHtml(item.artist)} · ${formatDuration(item.durationSeconds)}`;
}

export function formatEntity(entity: CatalogEntity): string {
  switch (entity.kind) {
    case 'track':
      return [
        `🎵 <b>${link(entity.url, entity.title)}</b>`,
        `Artist: ${escapeHtml(entity.artist)}`,
        entity.album ? `Album: ${escapeHtml(entity.album)}` : null,
        entity.year ? `Year: ${escapeHtml(entity.year)}` : null,
        `Duration: ${formatDuration(entity.durationSeconds)}`,
        `Id: ${code(entity.sourceId)}`,
        entity.lyricsBrowseId ? 'Lyrics available: /lyrics' : null,
      ].filter((line): line is string => line !== null).join('\n');

    case 'album':
      return [
        `💿 <b>${link(entity.url, entity.title)}</b>`,
        `Artist: ${escapeHtml(entity.artist)}`,
        entity.year ? `Year: ${escapeHtml(entity.year)}` : null,
        `Tracks: ${entity.tracks.length}`,
        `Id: ${code(entity.id)}`,
        '',
        ...entity.tracks.map((item, index) => trackLine(index, item)),
      ].filter((line): line is string => line !== null).join('\n');

    case 'playlist':
      return [
        `📃 <b>${link(entity.url, entity.title)}</b>`,
        `By: ${escapeHtml(entity.author)}`,
        `Tracks: ${entity.tracks.length}`,
        `Id: ${code(entity.id)}`,
        '',
        ...entity.tracks.map((item, index) => trackLine(index, item)),
      ].join('\n');

    case 'artist':
      return [
        `👤 <b>${link(entity.url, entity.name)}</b>`,
        entity.description ? escapeHtml(entity.description) : null,
        `Id: ${code(entity.id)}`,
        '',
        entity.topTracks.length > 0 ? '<b>Top tracks</b>' : null,
        ...entity.topTracks.map((item, index) => trackLine(index, item)),
      ].filter((line): line is string => line !== null).join('\n');
  }
}

export function formatLyrics(title: string, lyrics: Lyrics): string {
  const lines = [`📝 <b>${escapeHtml(title)}</b>`, '', escapeHtml(lyrics.text)];
  if (lyrics.source) {
    lines.push('', `<i>${escapeHtml(lyrics.source)}</i>`);
  }
  return lines.join('\n');
}

export function formatHistory(records: readonly HistoryRecord[]): string {
  if (records.length === 0) {
    return 'No downloads yet.';
  }

  const lines = ['🕘 <b>Recent downloads</b>', ''];
  for (const [index, record] of records.entries()) {
    const details = [record.artist, record.album, formatDuration(record.durationSeconds)]
      .filter((value): value is string => Boolean(value));
    lines.push(`${index + 1}. ${link(record.sourceUrl, record.title)}`);
    lines.push(`    ${escapeHtml(details.join(' · '))} · ${record.downloadedAt.toISOString().slice(0, 16).replace('T', ' ')}`);
  }
  return lines.join('\n');
}

export function formatDelivered(result: DownloadResult): string {
  const lines = [`✅ <b>${escapeHtml(result.title)}</b> · ${escapeHtml(result.artist)}`];
  for (const warning of result.warnings) {
    lines.push(`⚠️ Missing tags: ${escapeHtml(warning.missing.join(', '))}`);
  }
  return lines.join('\n');
}

export interface CollectionReport {
  title: string;
  total: number;
  delivered: number;
  failures: Array<{ index: number; title: string; failure: OperationFailure }>;
}

export function formatCollectionProgress(title: string, index: number, total: number, current: string, failed: number): string {
  const lines = [
    `⬇️ <b>${escapeHtml(title)}</b>`,
    `Track ${index + 1}/${total}: ${escapeHtml(current)}`,
  ];
  if (failed > 0) {
    lines.push(`Failed so far: ${failed}`);
  }
  return lines.join('\n');
}

export function formatCollectionSummary(report: CollectionReport): string {
  const icon = report.failures.length === 0 ? '✅' : report.delivered > 0 ? '⚠️' : '❌';
  const lines = [`${icon} <b>${escapeHtml(report.title)}</b>: ${report.delivered}/${report.total} tracks sent`];
  for (const entry of report.failures) {
    lines.push(`• ${entry.index + 1}. ${escapeHtml(entry.title)}: ${escapeHtml(entry.failure.detail)}`);
  }
  return lines.join('\n');
}

export function formatUsage(usage: string, description: string): string {
  return `${escapeHtml(description)}\nUsage: <code>${escapeHtml(usage)}</code>`;
}

/**
 * Numbered tracks with their ids, so any line can be handed to /dl
 */
export function formatTrackList(heading: string, items: readonly MediaItem[]): string {
  const lines = [heading, ''];
  for (const [index, item] of items.entries()) {
    const details = [item.artist, item.album, formatDuration(item.durationSeconds)]
      .filter((value): value is string => Boolean(value));
    lines.push(`${index + 1}. ${link(item.url, item.title)}`);
    lines.push(`    ${escapeHtml(details.join(' · '))}`);
    lines.push(`    ${code(item.sourceId)}`);
  }
  return lines.join('\n');
}

export function formatRecommendations(recommendations: Recommendations): string {
  if (recommendations.tracks.length === 0) {
    return 'No recommendations right now.';
  }
  const heading = recommendations.seed
    ? `🎧 <b>Recommended</b> after <i>${escapeHtml(recommendations.seed.title)}</i>`
    : '🎧 <b>Recommended</b> from your home feed';
  return formatTrackList(heading, recommendations.tracks);
}
