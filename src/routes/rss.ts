import { Router } from 'express';
import { RssController } from '../controllers/RssController';

const router = Router();

router.get('/status', RssController.getStatus);
router.post('/sync', RssController.triggerSync);

export default router;
