import { Router } from 'express';
import { ActivityController } from '../controllers/ActivityController';

const router = Router();

router.get('/queue', ActivityController.getQueue);
router.get('/history', ActivityController.getHistory);
router.get('/blocklist', ActivityController.getBlocklist);
router.delete('/blocklist/:id', ActivityController.removeFromBlocklist);

export default router;
