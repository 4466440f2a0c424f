import { describe, it, expect } from 'vitest';
import { calculateQualityScore, parseQuality, parseReleaseGroup, qualityName } from '../../src/services/qualityParser';

describe('qualityParser', () => {
  it('parses a typical web release', () => {
    expect(parseQuality('UFC.300.Main.Card.1080p.WEB-DL.H264-GRP')).toEqual({
      resolution: '1080p',
      source: 'WEB-DL',
      codec: 'x264',
      releaseGroup: 'GRP',
      name: 'WEBDL-1080p'
    });
  });

  it('treats a bare WEB tag as WEB-DL', () => {
    const quality = parseQuality('UFC 300 Early Prelims 1080p WEB');
    expect(quality.source).toBe('WEB-DL');
    expect(quality.name).toBe('WEBDL-1080p');
    expect(quality.releaseGroup).toBeNull();
    expect(calculateQualityScore(quality)).toBe(890);
  });

  it('parses bluray releases and strips the extension before reading the group', () => {
    const quality = parseQuality('Fight.Night.2160p.BluRay.x265-GRP.mkv');
    expect(quality).toEqual({
      resolution: '2160p',
      source: 'BluRay',
      codec: 'x265',
      releaseGroup: 'GRP',
      name: 'Bluray-2160p'
    });
    expect(calculateQualityScore(quality)).toBe(1100);
  });

  it('prefers WEBRip over WEB-DL when both could match', () => {
    const quality = parseQuality('Event.720p.WEBRip.x264');
    expect(quality.name).toBe('WEBRip-720p');
    expect(calculateQualityScore(quality)).toBe(685);
  });

  it('names HDTV, DVD and unknown qualities', () => {
    expect(parseQuality('Event 720p HDTV').name).toBe('HDTV-720p');
    expect(parseQuality('Event DVDRip XviD').name).toBe('DVD');
    expect(parseQuality('Event DVDRip XviD').codec).toBe('XviD');
    expect(parseQuality('Event').name).toBe('Unknown');
  });

  it('assumes HDTV when only a resolution is present', () => {
    const quality = parseQuality('Event 1080p');
    expect(quality.name).toBe('HDTV-1080p');
    expect(calculateQualityScore(quality)).toBe(800);
  });

  it('reads 4K as 2160p', () => {
    expect(parseQuality('Event 4K WEB').resolution).toBe('2160p');
  });

  it('does not treat source suffixes as release groups', () => {
    expect(parseReleaseGroup('Event.1080p.WEB-DL')).toBeNull();
    expect(parseReleaseGroup('Event.1080p.WEB-DL-Rip')).toBeNull();
  });

  it('builds names from resolution and source', () => {
    expect(qualityName('720p', 'BluRay')).toBe('Bluray-720p');
    expect(qualityName(null, 'HDTV')).toBe('SDTV');
    expect(qualityName(null, null)).toBe('Unknown');
  });

  it('scores missing parts as zero', () => {
    expect(calculateQualityScore({ resolution: null, source: 'HDTV' })).toBe(70);
    expect(calculateQualityScore({ resolution: null, source: null })).toBe(0);
  });
});
