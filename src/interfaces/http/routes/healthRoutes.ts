/**
 * Health Route
 * Layer: Interfaces (HTTP)
 *
 *   GET /  →  { status, message, data: { postgres, oracle } }
 */
import { HealthController } from '@interfaces/http/controllers/HealthController';
import { Router } from 'express';

const router = Router();
const controller = new HealthController();

router.get('/', controller.index);

export { router as healthRoutes };
