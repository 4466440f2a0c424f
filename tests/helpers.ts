import { vi } from 'vitest';
import db from '../src/config/database';
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '../src/config/engineConfig';
import { DownloadClientModel, type DownloadClient } from '../src/models/DownloadClient';
import type { MonitoredEvent } from '../src/models/Event';
import type { AddDownloadResult, DownloadGateway } from '../src/services/downloadClient';
import { toEvaluatedRelease, type EvaluatedRelease, type RawRelease } from '../src/types/release';

const TABLES = [
  'grab_history',
  'download_queue',
  'blocklist',
  'event_files',
  'events',
  'leagues',
  'quality_profile_custom_formats',
  'quality_profiles',
  'custom_formats',
  'release_profiles',
  'indexers',
  'download_clients',
  'system_settings'
];

export function resetDatabase(): void {
  for (const table of TABLES) {
    db.prepare(`DELETE FROM ${table}`).run();
  }
}

export function engineConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  return { ...DEFAULT_ENGINE_CONFIG, grabDelayMs: 0, cascadeSearchDelayMs: 0, ...overrides };
}

export function rawRelease(overrides: Partial<RawRelease> = {}): RawRelease {
  return {
    guid: 'guid-1',
    title: 'UFC 300 Main Card 1080p WEB-DL x264-TEST',
    downloadUrl: 'http://indexer.test/download/1',
    indexer: 'TestIndexer',
    size: 4 * 1024 * 1024 * 1024,
    publishDate: new Date().toISOString(),
    protocol: 'torrent',
    infoHash: 'abc123',
    ...overrides
  };
}

export function evaluatedRelease(overrides: Partial<EvaluatedRelease> = {}): EvaluatedRelease {
  const base = toEvaluatedRelease(rawRelease());
  const merged = { ...base, ...overrides };
  if (overrides.totalScore === undefined) {
    merged.totalScore = merged.qualityScore + merged.customFormatScore + merged.preferredScore;
  }
  return merged;
}

export function torrentClient(overrides: Partial<Parameters<typeof DownloadClientModel.create>[0]> = {}): DownloadClient {
  return DownloadClientModel.create({
    name: 'qBit',
    type: 'qbittorrent',
    host: 'localhost',
    port: 8080,
    category: 'fights',
    ...overrides
  });
}

export function fakeGateway(result: AddDownloadResult = { success: true, message: 'ok', downloadId: 'dl-1' }) {
  const gateway = {
    addDownload: vi.fn<Parameters<DownloadGateway['addDownload']>, ReturnType<DownloadGateway['addDownload']>>()
      .mockResolvedValue(result),
    cancelDownload: vi.fn<Parameters<DownloadGateway['cancelDownload']>, ReturnType<DownloadGateway['cancelDownload']>>()
      .mockResolvedValue(true)
  };
  return gateway;
}

export function monitoredEvent(overrides: Partial<MonitoredEvent> = {}): MonitoredEvent {
  return {
    id: 'evt-1',
    title: 'UFC 300: Pereira vs. Hill',
    sport: 'fighting',
    league_id: null,
    league_name: null,
    home_team: null,
    away_team: null,
    event_date: '2024-04-13T22:00:00Z',
    monitored: true,
    monitored_parts: [],
    quality_profile_id: null,
    ...overrides
  };
}
