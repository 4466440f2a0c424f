import { Router } from 'express';
import { CacheController } from '../controllers/CacheController';

const router = Router();

router.get('/', CacheController.getStats);
router.delete('/', CacheController.clear);
router.delete('/:query', CacheController.invalidate);

export default router;
