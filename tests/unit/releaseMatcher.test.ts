import { describe, it, expect } from 'vitest';
import {
  MIN_MATCH_CONFIDENCE,
  extractKeywords,
  findMatch,
  passesKeywordFilter,
  validateRelease
} from '../../src/services/releaseMatcher';
import { monitoredEvent } from '../helpers';

describe('releaseMatcher', () => {
  it('extracts keywords without noise words or duplicates', () => {
    expect(extractKeywords('UFC 300: Pereira vs. Hill')).toEqual(['ufc', '300', 'pereira', 'hill']);
    expect(extractKeywords('The Ashes 1 at Lords and Lords')).toEqual(['ashes', 'lords']);
  });

  describe('validateRelease', () => {
    const event = monitoredEvent();

    it('matches a segment release naming only the headline', () => {
      const result = validateRelease({ title: 'UFC 300 Early Prelims 1080p WEB' }, event);

      expect(result).toEqual({ isMatch: true, confidence: 70, isHardRejection: false, reasons: [] });
      expect(result.confidence).toBeGreaterThanOrEqual(MIN_MATCH_CONFIDENCE);
    });

    it('gives full confidence when the whole title is present', () => {
      expect(validateRelease({ title: 'UFC.300.Pereira.vs.Hill.1080p' }, event).confidence).toBe(100);
    });

    it('hard-rejects a different card number', () => {
      const result = validateRelease({ title: 'UFC 299 Early Prelims 1080p WEB' }, event);

      expect(result.isMatch).toBe(false);
      expect(result.isHardRejection).toBe(true);
      expect(result.confidence).toBe(35);
      expect(result.reasons).toEqual(['Event number 300 not in release']);
    });

    it('hard-rejects a release from another year', () => {
      const result = validateRelease({ title: 'UFC 300 2023 1080p' }, event);

      expect(result.isHardRejection).toBe(true);
      expect(result.reasons).toEqual(['Year mismatch: release 2023, event 2024']);
    });

    it('does not match below the confidence threshold', () => {
      const result = validateRelease({ title: 'UFC Pereira 1080p' }, event);

      // headline 1/2, subtitle 1/2
      expect(result.confidence).toBe(50);
      expect(result.isMatch).toBe(false);
    });
  });

  describe('dated team events', () => {
    const event = monitoredEvent({
      id: 'evt-nfl',
      title: 'Chiefs vs Ravens',
      sport: 'football',
      home_team: 'Kansas City Chiefs',
      away_team: 'Baltimore Ravens',
      event_date: '2024-09-05T00:20:00Z'
    });

    it('matches a release dated the same day', () => {
      const result = validateRelease({ title: 'NFL.2024.09.05.Ravens.vs.Chiefs.720p' }, event);

      expect(result).toEqual({ isMatch: true, confidence: 100, isHardRejection: false, reasons: [] });
    });

    it('hard-rejects a release dated a week later', () => {
      const result = validateRelease({ title: 'NFL.2024.09.12.Ravens.vs.Chiefs.720p' }, event);

      expect(result.isHardRejection).toBe(true);
      expect(result.reasons).toEqual(['Date mismatch: release 2024-09-12']);
    });

    it('hard-rejects when neither team is named', () => {
      const weekly = monitoredEvent({
        title: 'NFL Week 1',
        sport: 'football',
        home_team: 'Kansas City Chiefs',
        away_team: 'Baltimore Ravens',
        event_date: null
      });
      const result = validateRelease({ title: 'NFL Week 1 Eagles vs Packers 720p' }, weekly);

      expect(result.confidence).toBe(100);
      expect(result.isHardRejection).toBe(true);
      expect(result.reasons).toEqual(['Neither team named in release']);
    });
  });

  it('filters releases sharing no keyword with the event', () => {
    const event = monitoredEvent();
    expect(passesKeywordFilter('Bellator 301 Main Card', event)).toBe(false);
    expect(passesKeywordFilter('ufc.fight.night', event)).toBe(true);
  });

  describe('findMatch', () => {
    const recent = monitoredEvent({ id: 'evt-recent', title: 'PFL World Championship', event_date: '2024-11-29T20:00:00Z' });
    const older = monitoredEvent({ id: 'evt-older', title: 'PFL World Championship', event_date: '2023-11-24T20:00:00Z' });

    it('prefers the event dated nearest to now', () => {
      const release = { title: 'PFL World Championship 1080p' };

      expect(findMatch(release, [older, recent], new Date('2024-11-30T00:00:00Z'))).toEqual({
        event: recent,
        confidence: 100,
        isHardRejection: false
      });
      expect(findMatch(release, [older, recent], new Date('2023-11-25T00:00:00Z'))?.event.id).toBe('evt-older');
    });

    it('returns null when every candidate rejects the release', () => {
      expect(findMatch({ title: 'UFC 299 Main Card 1080p' }, [monitoredEvent()])).toBeNull();
    });
  });
});
