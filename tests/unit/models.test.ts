import { describe, it, expect, beforeEach } from 'vitest';
import db from '../../src/config/database';
import { BlocklistModel } from '../../src/models/Blocklist';
import { CustomFormatModel } from '../../src/models/CustomFormat';
import { DownloadClientModel } from '../../src/models/DownloadClient';
import { EventModel, LeagueModel, parsePartList } from '../../src/models/Event';
import { GrabHistoryModel } from '../../src/models/GrabHistory';
import { IndexerModel } from '../../src/models/Indexer';
import { QualityProfileModel } from '../../src/models/QualityProfile';
import { ReleaseProfileModel } from '../../src/models/ReleaseProfile';
import { resetDatabase } from '../helpers';

describe('models', () => {
  beforeEach(() => {
    resetDatabase();
  });

  it('parses comma-separated part lists', () => {
    expect(parsePartList(' Main Card, ,Prelims ')).toEqual(['Main Card', 'Prelims']);
    expect(parsePartList(null)).toEqual([]);
  });

  describe('EventModel', () => {
    it('falls back to the league\'s monitored parts', () => {
      const league = LeagueModel.create({ name: 'UFC', sport: 'fighting', monitored_parts: ['Main Card', 'Prelims'] });
      const event = EventModel.create({ title: 'UFC 300: Pereira vs. Hill', sport: 'fighting', league_id: league.id });

      expect(event.league_name).toBe('UFC');
      expect(event.monitored_parts).toEqual(['Main Card', 'Prelims']);

      EventModel.setMonitoredParts(event.id, ['Main Card']);
      expect(EventModel.findById(event.id)?.monitored_parts).toEqual(['Main Card']);
      expect(LeagueModel.findById(league.id)?.monitored_parts).toEqual(['Main Card', 'Prelims']);
    });

    it('lists only monitored events', () => {
      EventModel.create({ title: 'UFC 300', sport: 'fighting' });
      EventModel.create({ title: 'UFC 301', sport: 'fighting', monitored: false });

      expect(EventModel.findMonitored().map(event => event.title)).toEqual(['UFC 300']);
    });
  });

  it('stores quality profiles with their format scores', () => {
    const proper = CustomFormatModel.create({
      name: 'Proper',
      specifications: [{ implementation: 'ReleaseTitleSpecification', pattern: '\\bproper\\b' }]
    });
    const profile = QualityProfileModel.create({
      name: 'HD',
      items: [{ quality: 'WEBDL-1080p', allowed: true }],
      min_custom_format_score: 10,
      format_scores: { [proper.id]: 50 }
    });

    expect(QualityProfileModel.findById(profile.id)).toEqual({
      id: profile.id,
      name: 'HD',
      items: [{ quality: 'WEBDL-1080p', allowed: true }],
      min_custom_format_score: 10,
      format_scores: { [proper.id]: 50 }
    });
    expect(proper.specifications).toEqual([
      { implementation: 'ReleaseTitleSpecification', name: '', negate: false, pattern: '\\bproper\\b' }
    ]);
  });

  it('skips custom formats whose stored specifications are invalid', () => {
    CustomFormatModel.create({ name: 'Valid', specifications: [{ implementation: 'SourceSpecification', value: 'WEB-DL' }] });
    db.prepare('INSERT INTO custom_formats (id, name, specifications) VALUES (?, ?, ?)').run('cf-bad', 'Broken', '{not json');

    expect(CustomFormatModel.findAll().map(format => format.name)).toEqual(['Valid']);
    expect(CustomFormatModel.findById('cf-bad')).toBeUndefined();
  });

  it('rejects malformed specifications on create', () => {
    expect(() => CustomFormatModel.create({
      name: 'Bad size',
      specifications: [{ implementation: 'SizeSpecification', max: -1 }]
    })).toThrow();
  });

  it('round-trips release profiles', () => {
    ReleaseProfileModel.create({ name: 'Off', enabled: false, required: ['WEB'] });
    ReleaseProfileModel.create({
      name: 'Web',
      required: ['WEB', '1080p'],
      ignored: ['CAM'],
      preferred: [{ term: 'PROPER', score: 10 }],
      indexer_ids: ['idx-1']
    });

    expect(ReleaseProfileModel.findEnabled()).toMatchObject([
      {
        name: 'Web',
        enabled: true,
        required: ['WEB', '1080p'],
        ignored: ['CAM'],
        preferred: [{ term: 'PROPER', score: 10 }],
        indexer_ids: ['idx-1']
      }
    ]);
    expect(ReleaseProfileModel.findAll()).toHaveLength(2);
  });

  it('filters indexers by RSS and automatic search flags', () => {
    IndexerModel.create({ name: 'Both', type: 'torznab', url: 'http://a.test', apiKey: 'test-secret', priority: 1 });
    IndexerModel.create({ name: 'Search only', type: 'newznab', url: 'http://b.test', apiKey: 'test-secret', enableRss: false });
    IndexerModel.create({ name: 'Disabled', type: 'torznab', url: 'http://c.test', apiKey: 'test-secret', enabled: false });

    expect(IndexerModel.findForRss().map(indexer => indexer.name)).toEqual(['Both']);
    expect(IndexerModel.findForAutomaticSearch().map(indexer => indexer.name)).toEqual(['Both', 'Search only']);
  });

  it('picks the lowest-priority enabled client for a protocol', () => {
    DownloadClientModel.create({ name: 'Backup', type: 'qbittorrent', host: 'localhost', port: 8081, priority: 5 });
    DownloadClientModel.create({ name: 'Primary', type: 'qbittorrent', host: 'localhost', port: 8080, priority: 1 });
    DownloadClientModel.create({ name: 'Off', type: 'sabnzbd', host: 'localhost', port: 8082, enabled: false });

    expect(DownloadClientModel.findForProtocol('torrent')?.name).toBe('Primary');
    expect(DownloadClientModel.findForProtocol('usenet')).toBeUndefined();
  });

  it('supersedes live history entries for one pair only', () => {
    const event = EventModel.create({ title: 'UFC 300', sport: 'fighting' });
    const entry = {
      event_id: event.id,
      title: 'UFC 300 Main Card 720p',
      indexer: 'Tracker',
      protocol: 'torrent' as const,
      quality: 'HDTV-720p',
      quality_score: 670,
      custom_format_score: 0,
      download_client_id: null,
      download_id: null
    };
    GrabHistoryModel.create({ ...entry, part_name: 'Main Card' });
    GrabHistoryModel.create({ ...entry, part_name: 'Prelims' });

    expect(GrabHistoryModel.supersede(event.id, 'Main Card')).toBe(1);
    expect(GrabHistoryModel.supersede(event.id, 'Main Card')).toBe(0);
    expect(GrabHistoryModel.findByEvent(event.id).map(row => [row.part_name, row.superseded])).toEqual([
      ['Main Card', true],
      ['Prelims', false]
    ]);
    expect(GrabHistoryModel.findRecent(1)).toHaveLength(1);
  });

  it('matches blocklisted hashes and titles case-insensitively', () => {
    const entry = BlocklistModel.add({ title: 'UFC 300 Main Card', indexer: 'Tracker', protocol: 'torrent', info_hash: 'ABC123', reason: 'failed' });

    expect(BlocklistModel.isBlockedByHash('abc123')).toBe(true);
    expect(BlocklistModel.isBlockedByTitle('ufc 300 main card', 'TRACKER')).toBe(true);
    expect(BlocklistModel.isBlockedByTitle('ufc 300 main card', 'Other')).toBe(false);
    expect(BlocklistModel.remove(entry.id)).toBe(true);
    expect(BlocklistModel.findAll()).toEqual([]);
  });
});
