import { describe, expect, it } from 'vitest';
import { parseDownloaderReport } from './report.js';

const info = {
  id: 'abc123def45',
  title: 'Song',
  ext: 'm4a',
  filepath: '/w/Song [abc123def45].m4a',
  format_id: '251',
  artist: 'Band',
  album: 'Record',
  release_year: 2021,
  duration: 201.4,
  thumbnails: [{ url: 'https://img.example/a.jpg', width: 120, height: 90 }],
  requested_downloads: [{ filepath: '/w/Song [abc123def45].m4a', ext: 'm4a', format_id: '140' }],
};

describe('parseDownloaderReport', () => {
  it('takes the final path and extension from the last requested download', () => {
    const log = [
      '[youtube] abc123def45: Downloading webpage',
      '[download] Destination: /w/Song [abc123def45].webm',
      '[ExtractAudio] Destination: /w/Song [abc123def45].m4a',
      '[FixupM4a] Correcting container of "/w/Song [abc123def45].m4a"',
    ].join('\n');

    const report = parseDownloaderReport(`${JSON.stringify(info)}\n`, log);

    expect(report.chosenFormat).toBe('140');
    expect(report.reportedFinalExtension).toBe('m4a');
    expect(report.filepath).toBe('/w/Song [abc123def45].m4a');
    expect(report.postprocessorLog).toEqual([
      '[ExtractAudio] Destination: /w/Song [abc123def45].m4a',
      '[FixupM4a] Correcting container of "/w/Song [abc123def45].m4a"',
    ]);
    expect(report.info).toEqual({
      id: 'abc123def45',
      title: 'Song',
      artist: 'Band',
      album: 'Record',
      year: '2021',
      durationSeconds: 201,
      webpageUrl: null,
      thumbnails: [{ url: 'https://img.example/a.jpg', width: 120, height: 90 }],
    });
  });

  it('skips lines that are not a valid info dict', () => {
    const output = ['not json', '{broken', JSON.stringify({ id: 'x1', ext: 'OPUS', filepath: '/w/x1.opus' })].join('\n');

    const report = parseDownloaderReport(output);

    expect(report.reportedFinalExtension).toBe('opus');
    expect(report.filepath).toBe('/w/x1.opus');
    expect(report.chosenFormat).toBeNull();
  });

  it('falls back to channel and upload date for artist and year', () => {
    const report = parseDownloaderReport(JSON.stringify({ id: 'x1', channel: 'Uploader', upload_date: '20190301' }));

    expect(report.info).toMatchObject({ artist: 'Uploader', year: '2019', title: null });
  });

  it('reads the extension from the extraction log when there is no info dict', () => {
    const report = parseDownloaderReport('', '[ExtractAudio] Destination: /w/Song [x1].opus\n');

    expect(report).toEqual({
      chosenFormat: null,
      postprocessorLog: ['[ExtractAudio] Destination: /w/Song [x1].opus'],
      reportedFinalExtension: 'opus',
      filepath: null,
      info: null,
    });
  });
});
