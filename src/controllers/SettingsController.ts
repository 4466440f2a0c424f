import { Request, Response } from 'express';
import { z } from 'zod';
import { isSettingKey, loadEngineConfig, validateSetting } from '../config/engineConfig';
import logger from '../config/logger';
import { SystemSettingsModel } from '../models/SystemSettings';

const updateSchema = z.record(z.union([z.string(), z.number(), z.boolean()]));

export class SettingsController {
  static getEngineSettings(req: Request, res: Response) {
    return res.json(loadEngineConfig());
  }

  /**
   * Body maps setting keys (rss_sync_interval, ...) to values. Nothing is
   * written unless every entry is valid.
   */
  static updateEngineSettings(req: Request, res: Response) {
    const body = updateSchema.safeParse(req.body);
    if (!body.success) {
      return res.status(400).json({ error: 'Expected an object of setting values' });
    }

    const errors: Record<string, string> = {};
    for (const [key, value] of Object.entries(body.data)) {
      if (!isSettingKey(key)) {
        errors[key] = 'Unknown setting';
        continue;
      }
      const problem = validateSetting(key, String(value));
      if (problem) {
        errors[key] = problem;
      }
    }
    if (Object.keys(errors).length > 0) {
      return res.status(400).json({ error: 'Invalid settings', details: errors });
    }

    try {
      for (const [key, value] of Object.entries(body.data)) {
        SystemSettingsModel.set(key, value);
      }
      logger.info(`[Config] Updated settings: ${Object.keys(body.data).join(', ')}`);
      return res.json(loadEngineConfig());
    } catch (error) {
      logger.error('Update settings error:', error);
      return res.status(500).json({ error: 'Failed to update settings' });
    }
  }
}
