import db from '../config/database';
import type { EngineConfig } from '../config/engineConfig';
import logger from '../config/logger';
import { BlocklistModel } from '../models/Blocklist';
import { DownloadModel, type QueueItem } from '../models/Download';
import { DownloadClientModel, clientTypeForProtocol, type DownloadClient } from '../models/DownloadClient';
import { EventFileModel, storedTotalScore, type MonitoredEvent } from '../models/Event';
import { GrabHistoryModel } from '../models/GrabHistory';
import type { EvaluatedRelease } from '../types/release';
import { errorMessage } from '../utils/errors';
import type { CascadeCoordinator } from './cascadeSearch';
import type { DownloadGateway } from './downloadClient';
import { isSegmentedSport } from './partDetector';
import { parseQuality } from './qualityParser';
import { multiPartRejection } from './releaseEvaluator';

export interface Decision {
  grab: boolean;
  reason: string;
  part: string | null;
  isUpgrade: boolean;
  // Active item the grab will cancel and replace
  replaceQueueItem?: QueueItem;
  // Sibling parts to re-search once the grab succeeds
  cascadeParts: string[];
  retryAt?: string;
}

export interface GrabResult {
  success: boolean;
  message: string;
  queueItemId?: string;
  downloadId?: string;
  // Another grab for the same pair was recorded first with an equal or better score
  outranked?: boolean;
}

type RecordOutcome =
  | { kind: 'recorded'; item: QueueItem; replaced: QueueItem | undefined }
  | { kind: 'outranked'; current: QueueItem };

export interface ProcessOutcome {
  decision: Decision;
  grabbed: boolean;
  grab?: GrabResult;
}

function skip(reason: string, part: string | null, extra: Partial<Decision> = {}): Decision {
  return { grab: false, reason, part, isUpgrade: false, cascadeParts: [], ...extra };
}

function describePart(part: string | null): string {
  return part ?? 'full event';
}

export class DecisionEngine {
  constructor(
    private readonly gateway: DownloadGateway,
    private readonly cascade: CascadeCoordinator | null = null
  ) {}

  /**
   * Grab-or-skip for one scored release against its matched event. Reads
   * queue, blocklist and file state; writes nothing.
   */
  evaluate(event: MonitoredEvent, release: EvaluatedRelease, config: EngineConfig, now: Date = new Date()): Decision {
    const segmented = isSegmentedSport(event.sport);
    const part = segmented ? release.part : null;

    const policy = multiPartRejection(part, event.sport, config.enableMultiPartEpisodes);
    if (policy) {
      return skip(policy, part);
    }

    if (segmented && part !== null && event.monitored_parts.length > 0 && !event.monitored_parts.includes(part)) {
      return skip(`Segment not monitored: ${part}`, part);
    }

    let isUpgrade = false;
    const active = DownloadModel.findActive(event.id, part);
    if (active) {
      const queuedScore = storedTotalScore(active);
      if (release.totalScore <= queuedScore) {
        return skip(`Better or equal release already queued (score: ${queuedScore})`, part);
      }
      isUpgrade = true;
    }

    if (DownloadModel.findImporting(event.id, part)) {
      return skip(`Already importing (${describePart(part)})`, part);
    }

    if (this.isBlocklisted(release)) {
      return skip('Blocklisted', part);
    }

    const latest = DownloadModel.findLatestAttempt(event.id, part);
    if (latest && latest.status === 'failed') {
      const ladder = config.retryBackoffMinutes;
      const delayMinutes = ladder[Math.min(latest.retry_count, ladder.length - 1)] ?? 0;
      const retryAt = new Date(new Date(latest.last_update).getTime() + delayMinutes * 60 * 1000);
      if (now.getTime() < retryAt.getTime()) {
        return skip(`Backoff until ${retryAt.toISOString()} (attempt ${latest.retry_count + 1} failed)`, part, {
          retryAt: retryAt.toISOString()
        });
      }
    }

    let cascadeParts: string[] = [];
    const existingFile = EventFileModel.findForPart(event.id, part);
    if (existingFile) {
      const fileScore = storedTotalScore(existingFile);
      if (release.totalScore <= fileScore) {
        return skip(`Existing file has same or better score (${fileScore})`, part);
      }
      isUpgrade = true;

      if (part !== null && config.enableMultiPartEpisodes) {
        cascadeParts = this.siblingsBelow(event, part, release.totalScore);
      }
    }

    if (!release.approved || release.rejections.length > 0) {
      const detail = release.rejections.length > 0 ? release.rejections.join('; ') : 'rejected by profile';
      return skip(`Not approved: ${detail}`, part);
    }

    return {
      grab: true,
      reason: isUpgrade ? `Upgrade to score ${release.totalScore}` : `New release (score: ${release.totalScore})`,
      part,
      isUpgrade,
      replaceQueueItem: active,
      cascadeParts
    };
  }

  /**
   * Sends an approved release to a client and records it. A client refusal
   * is stored as a failed queue item so backoff applies to the next attempt.
   */
  async grab(event: MonitoredEvent, release: EvaluatedRelease, decision: Decision, config: EngineConfig): Promise<GrabResult> {
    const part = decision.part;
    const client = DownloadClientModel.findForProtocol(release.protocol);
    if (!client) {
      const message = `No enabled ${clientTypeForProtocol(release.protocol)} download client`;
      logger.warn(`[Decision] ${message} for "${release.title}"`);
      return { success: false, message };
    }

    const added = await this.gateway.addDownload(client, release.downloadUrl, client.category || '', release.title, release.infoHash);
    const persistedFormatScore = release.customFormatScore + release.preferredScore;

    if (!added.success) {
      const previous = DownloadModel.findLatestAttempt(event.id, part);
      const retryCount = previous && previous.status === 'failed' ? previous.retry_count + 1 : 0;
      const failed = DownloadModel.create({
        event_id: event.id,
        part_name: part,
        title: release.title,
        download_client_id: client.id,
        status: 'failed',
        retry_count: retryCount,
        quality: release.qualityName,
        quality_score: release.qualityScore,
        custom_format_score: persistedFormatScore,
        indexer: release.indexer,
        protocol: release.protocol,
        info_hash: release.infoHash ?? null,
        size: release.size,
        error_message: added.message
      });
      logger.error(`[Decision] ${client.name} refused "${release.title}": ${added.message}`);
      return { success: false, message: added.message, queueItemId: failed.id };
    }

    // The queue may have changed while the client call was in flight, so the
    // comparison is repeated inside the same transaction as the insert.
    const record = db.transaction((): RecordOutcome => {
      const current = DownloadModel.findActive(event.id, part);
      if (current && storedTotalScore(current) >= release.totalScore) {
        return { kind: 'outranked', current };
      }
      if (current) {
        DownloadModel.delete(current.id);
      }
      const item = DownloadModel.create({
        event_id: event.id,
        part_name: part,
        title: release.title,
        download_client_id: client.id,
        download_id: added.downloadId ?? null,
        status: 'queued',
        quality: release.qualityName,
        quality_score: release.qualityScore,
        custom_format_score: persistedFormatScore,
        indexer: release.indexer,
        protocol: release.protocol,
        info_hash: release.infoHash ?? null,
        size: release.size
      });
      GrabHistoryModel.supersede(event.id, part);
      GrabHistoryModel.create({
        event_id: event.id,
        part_name: part,
        title: release.title,
        indexer: release.indexer,
        protocol: release.protocol,
        quality: release.qualityName,
        quality_score: release.qualityScore,
        custom_format_score: persistedFormatScore,
        download_client_id: client.id,
        download_id: added.downloadId ?? null
      });
      return { kind: 'recorded', item, replaced: current };
    });
    const outcome = record();

    if (outcome.kind === 'outranked') {
      const message = `Better or equal release already queued (score: ${storedTotalScore(outcome.current)})`;
      logger.info(`[Decision] "${outcome.current.title}" was queued first, withdrawing "${release.title}"`);
      await this.cancelOnClient(client, added.downloadId, release.title);
      return { success: false, outranked: true, message };
    }

    const item = outcome.item;
    if (outcome.replaced) {
      await this.cancelReplaced(outcome.replaced);
    }

    logger.info(`[Decision] Grabbed "${release.title}" for "${event.title}" (${describePart(part)}, score ${release.totalScore})`);

    if (decision.cascadeParts.length > 0 && this.cascade) {
      const resolution = parseQuality(release.title).resolution;
      const task = this.cascade.schedule(event.id, decision.cascadeParts, resolution, config.cascadeSearchDelayMs);
      if (!task) {
        logger.debug(`[Cascading Upgrade] Nothing new to search for "${event.title}"`);
      }
    }

    return { success: true, message: added.message, queueItemId: item.id, downloadId: added.downloadId };
  }

  async process(event: MonitoredEvent, release: EvaluatedRelease, config: EngineConfig): Promise<ProcessOutcome> {
    const decision = this.evaluate(event, release, config);
    if (!decision.grab) {
      logger.debug(`[Decision] Skipping "${release.title}": ${decision.reason}`);
      return { decision, grabbed: false };
    }

    const grab = await this.grab(event, release, decision, config);
    if (grab.outranked) {
      return { decision: skip(grab.message, decision.part), grabbed: false, grab };
    }
    return { decision, grabbed: grab.success, grab };
  }

  private isBlocklisted(release: EvaluatedRelease): boolean {
    if (release.protocol === 'torrent' && release.infoHash) {
      return BlocklistModel.isBlockedByHash(release.infoHash);
    }
    return BlocklistModel.isBlockedByTitle(release.title, release.indexer);
  }

  private siblingsBelow(event: MonitoredEvent, part: string, score: number): string[] {
    const siblings = new Set<string>();
    for (const file of EventFileModel.findByEvent(event.id)) {
      if (file.part_name === null || file.part_name === part) continue;
      if (event.monitored_parts.length > 0 && !event.monitored_parts.includes(file.part_name)) continue;
      if (storedTotalScore(file) < score) {
        siblings.add(file.part_name);
      }
    }
    return [...siblings];
  }

  private async cancelReplaced(item: QueueItem): Promise<void> {
    const client = item.download_client_id ? DownloadClientModel.findById(item.download_client_id) : undefined;
    if (!client || !item.download_id) {
      logger.warn(`[Decision] Replacing "${item.title}" without cancelling it: no client download id`);
      return;
    }
    await this.cancelOnClient(client, item.download_id, item.title);
  }

  private async cancelOnClient(client: DownloadClient, downloadId: string | undefined, title: string): Promise<void> {
    if (!downloadId) {
      logger.warn(`[Decision] Cannot remove "${title}" from ${client.name}: no client download id`);
      return;
    }

    try {
      const cancelled = await this.gateway.cancelDownload(client, downloadId, true);
      if (!cancelled) {
        logger.warn(`[Decision] ${client.name} did not confirm removal of "${title}"`);
      }
    } catch (error) {
      logger.warn(`[Decision] Failed to cancel "${title}" on ${client.name}: ${errorMessage(error)}`);
    }
  }
}
