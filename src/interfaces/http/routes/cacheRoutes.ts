import { CacheController } from '@interfaces/http/controllers/CacheController';
import { Router } from 'express';

const router = Router();
const controller = new CacheController();

router.delete('/cache', controller.clear);

export { router as cacheRoutes };
