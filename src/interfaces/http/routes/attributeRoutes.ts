/**
 * Attribute Routes
 * Layer: Interfaces (HTTP)
 *
 * Mounted under `/api/v1/attributes` in app.ts:
 *
 *   GET /api/v1/attributes/standard?url=...&boneMeasures=true  →  controller.standard
 *   GET /api/v1/attributes/common?url=...&minPortion=0.3       →  controller.common
 */
import { AttributeController } from '@interfaces/http/controllers/AttributeController';
import { Router } from 'express';

const router = Router();
const controller = new AttributeController();

router.get('/standard', controller.standard);
router.get('/common', controller.common);

export { router as attributeRoutes };
