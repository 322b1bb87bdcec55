/**
 * User Routes
 * Layer: Interfaces (HTTP)
 *
 *   GET /user?page=2&size=5  →  controller.list
 */
import { USERS_ENDPOINT } from '@application/services/UserService';
import { UserController } from '@interfaces/http/controllers/UserController';
import { Router } from 'express';

const router = Router();
const controller = new UserController();

router.get(USERS_ENDPOINT, controller.list);

export { router as userRoutes };
