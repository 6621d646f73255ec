import { describe, expect, it } from 'vitest';
import { entityUrl, extractEntityId, formatArtists, inferEntityKind } from './ids.js';

describe('extractEntityId', () => {
  it.each([
    ['dQw4w9WgXcQ', 'dQw4w9WgXcQ'],
    ['https://music.youtube.com/watch?v=dQw4w9WgXcQ&si=x', 'dQw4w9WgXcQ'],
    ['https://youtu.be/dQw4w9WgXcQ', 'dQw4w9WgXcQ'],
    ['https://www.youtube.com/watch?v=dQw4w9WgXcQ', 'dQw4w9WgXcQ'],
    ['https://music.youtube.com/playlist?list=OLAK5uy_abc123', 'OLAK5uy_abc123'],
    ['https://music.youtube.com/browse/MPREb_album1', 'MPREb_album1'],
    ['https://www.youtube.com/channel/UCartist42', 'UCartist42'],
    ['PLsomeplaylist', 'PLsomeplaylist'],
    ['  MPREb_trimmed  ', 'MPREb_trimmed'],
  ])('extracts %s', (input, expected) => {
    expect(extractEntityId(input)).toBe(expected);
  });

  it('returns null for text that holds no id', () => {
    expect(extractEntityId('https://example.com/song')).toBeNull();
    expect(extractEntityId('   ')).toBeNull();
  });
});

describe('inferEntityKind', () => {
  it('maps id shapes to kinds', () => {
    expect(inferEntityKind('dQw4w9WgXcQ')).toBe('track');
    expect(inferEntityKind('PLabc')).toBe('playlist');
    expect(inferEntityKind('VLPLabc')).toBe('playlist');
    expect(inferEntityKind('OLAK5uy_abc')).toBe('album');
    expect(inferEntityKind('MPREb_x')).toBe('album');
    expect(inferEntityKind('UCxyz')).toBe('artist');
    expect(inferEntityKind('something-else')).toBeNull();
  });
});

describe('formatArtists', () => {
  it('joins names and strips Topic channels', () => {
    expect(formatArtists([{ name: 'First - Topic' }, { name: ' Second ' }])).toBe('First, Second');
  });

  it('accepts a single object or string', () => {
    expect(formatArtists({ name: 'Solo' })).toBe('Solo');
    expect(formatArtists('Band - Topic')).toBe('Band');
  });

  it('falls back to Unknown', () => {
    expect(formatArtists([])).toBe('Unknown');
    expect(formatArtists(undefined)).toBe('Unknown');
    expect(formatArtists([{ name: '' }, null])).toBe('Unknown');
  });
});

describe('entityUrl', () => {
  it('drops the VL prefix from playlist links', () => {
    expect(entityUrl('playlist', 'VLPL123')).toBe('https://music.youtube.com/playlist?list=PL123');
    expect(entityUrl('album', 'MPREb_1')).toBe('https://music.youtube.com/browse/MPREb_1');
  });
});
