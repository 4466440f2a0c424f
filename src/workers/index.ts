import { warmupMsFromEnv } from '../config/engineConfig';
import { cascadeCoordinator, rssSyncService } from '../services/engine';
import { RssSyncWorker } from './RssSyncWorker';

export const rssSyncWorker = new RssSyncWorker(rssSyncService, cascadeCoordinator, { warmupMs: warmupMsFromEnv() });
