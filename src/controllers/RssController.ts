import { Request, Response } from 'express';
import logger from '../config/logger';
import { rssSyncWorker } from '../workers';

export class RssController {
  static getStatus(req: Request, res: Response) {
    return res.json(rssSyncWorker.getStatus());
  }

  static async triggerSync(req: Request, res: Response) {
    try {
      const result = await rssSyncWorker.triggerNow();
      if (!result) {
        return res.status(409).json({ error: 'RSS sync already in progress' });
      }
      return res.json({ success: true, result });
    } catch (error) {
      logger.error('Manual RSS sync error:', error);
      return res.status(500).json({ error: 'RSS sync failed' });
    }
  }
}
