import { Router } from 'express';
import { SettingsController } from '../controllers/SettingsController';

const router = Router();

router.get('/engine', SettingsController.getEngineSettings);
router.put('/engine', SettingsController.updateEngineSettings);

export default router;
