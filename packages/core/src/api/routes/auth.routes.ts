import { Router } from 'express';
import { AuthController } from '../controllers/auth.controller.js';
import type { AuthService } from '../../services/auth.service.js';

export function createAuthRouter(authService: AuthService): Router {
    const router = Router();
    const controller = new AuthController(authService);

    router.post('/start', controller.startAuth);
    router.post('/challenge', controller.submitChallenge);
    router.delete('/sessions/:token', controller.cancelSession);
    router.delete('/cookies/:identity', controller.logout);

    return router;
}
