/**
 * Record Routes
 * Layer: Interfaces (HTTP)
 *
 * Mounted under `/api/v1` in app.ts:
 *
 *   GET /api/v1/records?url=...&attributes=a,b&paginate=false  →  controller.records
 *   GET /api/v1/table?url=...&attributes=a,b                   →  controller.table
 */
import { RecordController } from '@interfaces/http/controllers/RecordController';
import { Router } from 'express';

const router = Router();
const controller = new RecordController();

router.get('/records', controller.records);
router.get('/table', controller.table);

export { router as recordRoutes };
