import { Request, Response } from 'express';
import { z } from 'zod';
import logger from '../config/logger';
import { EventModel } from '../models/Event';
import { autoSearchService } from '../services/engine';
import { canonicalSegmentName, getAvailableSegments, getSegmentDefinitions } from '../services/partDetector';

const searchQuerySchema = z.object({
  part: z.string().trim().min(1).optional()
});

export class SearchController {
  static async searchEvent(req: Request, res: Response) {
    try {
      const query = searchQuerySchema.safeParse(req.query);
      if (!query.success) {
        return res.status(400).json({ error: 'Invalid query parameters' });
      }

      const requested = query.data.part;
      const part = requested === undefined ? null : canonicalSegmentName(requested);
      if (requested !== undefined && part === null) {
        return res.status(400).json({ error: `Unknown part: ${requested}` });
      }

      if (!EventModel.findById(req.params.id)) {
        return res.status(404).json({ error: 'Event not found' });
      }

      const result = await autoSearchService.searchEvent(req.params.id, part);
      return res.json(result);
    } catch (error) {
      logger.error('Event search error:', error);
      return res.status(500).json({ error: 'Search failed' });
    }
  }

  static getSegments(req: Request, res: Response) {
    const sport = typeof req.query.sport === 'string' ? req.query.sport : undefined;
    if (sport) {
      return res.json({ sport, segments: getAvailableSegments(sport) });
    }
    return res.json({ segments: getSegmentDefinitions() });
  }
}
