import { Request, Response, NextFunction } from 'express';
import {
    IdentityParamSchema,
    SessionTokenParamSchema,
    StartAuthSchema,
    SubmitChallengeSchema,
    contextStorage,
    logger,
    parseRequest,
    successResponse
} from '@authbridge/shared';
import type { AuthResult, AuthService } from '../../services/auth.service.js';

function toResponseBody(result: AuthResult) {
    if (result.status === 'success') {
        return { status: 'success' as const, identity: result.identity };
    }
    return {
        status: 'challenge' as const,
        sessionToken: result.sessionToken,
        challenge: {
            kind: result.challenge.kind,
            message: result.challenge.message,
            hint: result.challenge.hint ?? null
        }
    };
}

export class AuthController {
    constructor(private readonly authService: AuthService) { }

    /**
     * Start a login
     * POST /auth/start
     */
    startAuth = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        try {
            const { identity, secret } = parseRequest(StartAuthSchema, req.body);
            contextStorage.getStore()?.set('identity', identity);
            const result = await this.authService.startAuth(identity, secret);

            logger.info({ identity, status: result.status }, 'Login start handled');
            res.status(200).json(successResponse(toResponseBody(result), req.id));
        } catch (error) {
            next(error);
        }
    };

    /**
     * Answer a verification challenge
     * POST /auth/challenge
     */
    submitChallenge = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        try {
            const { sessionToken, answer } = parseRequest(SubmitChallengeSchema, req.body);
            const result = await this.authService.submitChallenge(sessionToken, answer);

            res.status(200).json(successResponse(toResponseBody(result), req.id));
        } catch (error) {
            next(error);
        }
    };

    /**
     * Abandon a suspended login
     * DELETE /auth/sessions/:token
     */
    cancelSession = (req: Request, res: Response, next: NextFunction): void => {
        try {
            const { token } = parseRequest(SessionTokenParamSchema, req.params);
            this.authService.cancel(token);

            res.status(200).json(successResponse({ cancelled: true }, req.id));
        } catch (error) {
            next(error);
        }
    };

    /**
     * Drop cached cookies for an identity
     * DELETE /auth/cookies/:identity
     */
    logout = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        try {
            const { identity } = parseRequest(IdentityParamSchema, req.params);
            await this.authService.logout(identity);

            res.status(200).json(successResponse({ loggedOut: true }, req.id));
        } catch (error) {
            next(error);
        }
    };
}
