import { AutoSearchService } from './autoSearch';
import { CascadeCoordinator } from './cascadeSearch';
import { DecisionEngine } from './decisionEngine';
import { downloadClientService } from './downloadClient';
import { indexerService } from './indexer';
import { resultCache } from './resultCache';
import { RssSyncService } from './rssSync';

// Cascades re-enter the automatic search, which is built after the engine
export const cascadeCoordinator = new CascadeCoordinator(
  (eventId, part, resolution) => autoSearchService.searchEvent(eventId, part, resolution)
);

export const decisionEngine = new DecisionEngine(downloadClientService, cascadeCoordinator);

export const autoSearchService: AutoSearchService = new AutoSearchService(decisionEngine, indexerService, resultCache);

export const rssSyncService = new RssSyncService(indexerService, decisionEngine);
