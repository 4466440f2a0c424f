import { Request, Response } from 'express';
import { z } from 'zod';
import logger from '../config/logger';
import { BlocklistModel } from '../models/Blocklist';
import { DownloadModel } from '../models/Download';
import { GrabHistoryModel } from '../models/GrabHistory';

const queueQuerySchema = z.object({
  status: z.enum(['queued', 'downloading', 'completed', 'importing', 'imported', 'failed', 'cancelled']).optional()
});

const historyQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(100)
});

export class ActivityController {
  static getQueue(req: Request, res: Response) {
    const query = queueQuerySchema.safeParse(req.query);
    if (!query.success) {
      return res.status(400).json({ error: 'Invalid status filter' });
    }
    try {
      return res.json(DownloadModel.findAll(query.data.status));
    } catch (error) {
      logger.error('Get queue error:', error);
      return res.status(500).json({ error: 'Failed to get queue' });
    }
  }

  static getHistory(req: Request, res: Response) {
    const query = historyQuerySchema.safeParse(req.query);
    if (!query.success) {
      return res.status(400).json({ error: 'Invalid limit' });
    }
    try {
      return res.json(GrabHistoryModel.findRecent(query.data.limit));
    } catch (error) {
      logger.error('Get history error:', error);
      return res.status(500).json({ error: 'Failed to get history' });
    }
  }

  static getBlocklist(req: Request, res: Response) {
    try {
      return res.json(BlocklistModel.findAll());
    } catch (error) {
      logger.error('Get blocklist error:', error);
      return res.status(500).json({ error: 'Failed to get blocklist' });
    }
  }

  static removeFromBlocklist(req: Request, res: Response) {
    if (!BlocklistModel.remove(req.params.id)) {
      return res.status(404).json({ error: 'Blocklist entry not found' });
    }
    return res.json({ success: true });
  }
}
