import { Router } from 'express';
import { SearchController } from '../controllers/SearchController';

const router = Router();

router.post('/events/:id', SearchController.searchEvent);
router.get('/segments', SearchController.getSegments);

export default router;
