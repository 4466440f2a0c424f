import { Request, Response } from 'express';
import { resultCache } from '../services/resultCache';

export class CacheController {
  static getStats(req: Request, res: Response) {
    return res.json(resultCache.getStats());
  }

  static clear(req: Request, res: Response) {
    resultCache.clear();
    return res.json({ success: true });
  }

  static invalidate(req: Request, res: Response) {
    const removed = resultCache.invalidate(req.params.query);
    if (!removed) {
      return res.status(404).json({ error: 'No cached results for that query' });
    }
    return res.json({ success: true });
  }
}
