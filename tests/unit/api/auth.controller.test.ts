import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
    ChallengeLoginDriver,
    CookieCache,
    InvalidSessionError,
    SessionRegistry,
    ValidationError
} from '@authbridge/shared';
import { AuthController } from '@core/api/controllers/auth.controller';
import { AuthService } from '@core/services/auth.service';
import { createMockRequest, createMockResponse, ScriptedLoginClient } from '../../utils/test-helpers';

const VALID_TOKEN = '3f2b8a52-6a1e-4c1a-9a57-2f0d7d0c9b11';

describe('AuthController', () => {
    let service: AuthService;
    let controller: AuthController;

    beforeEach(() => {
        const registry = new SessionRegistry();
        service = new AuthService({
            driver: new ChallengeLoginDriver({ registry }),
            registry,
            cookieCache: new CookieCache({ cookiesDir: 'unused', ttlSeconds: 60 }),
            createLoginClient: () => new ScriptedLoginClient(async () => { })
        });
        controller = new AuthController(service);
    });

    describe('startAuth', () => {
        it('should return success', async () => {
            const startAuth = vi.spyOn(service, 'startAuth').mockResolvedValue({ status: 'success', identity: 'alice' });
            const req = createMockRequest({ identity: 'alice', secret: 'test-secret' });
            const res = createMockResponse();
            const next = vi.fn();

            await controller.startAuth(req, res, next);

            expect(startAuth).toHaveBeenCalledWith('alice', 'test-secret');
            expect(res.status).toHaveBeenCalledWith(200);
            expect(res.json).toHaveBeenCalledWith(expect.objectContaining({
                success: true,
                data: { status: 'success', identity: 'alice' },
                meta: expect.objectContaining({ requestId: 'test-request-id' })
            }));
            expect(next).not.toHaveBeenCalled();
        });

        it('should return the challenge with a null hint when none was found', async () => {
            vi.spyOn(service, 'startAuth').mockResolvedValue({
                status: 'challenge',
                sessionToken: VALID_TOKEN,
                challenge: { kind: 'email_verification', message: 'Please verify your identity' }
            });
            const res = createMockResponse();

            await controller.startAuth(createMockRequest({ identity: 'alice', secret: 'test-secret' }), res, vi.fn());

            expect(res.json).toHaveBeenCalledWith(expect.objectContaining({
                data: {
                    status: 'challenge',
                    sessionToken: VALID_TOKEN,
                    challenge: { kind: 'email_verification', message: 'Please verify your identity', hint: null }
                }
            }));
        });

        it('should pass validation failures to the error handler', async () => {
            const startAuth = vi.spyOn(service, 'startAuth');
            const next = vi.fn();

            await controller.startAuth(createMockRequest({ identity: '' }), createMockResponse(), next);

            expect(next).toHaveBeenCalledWith(expect.any(ValidationError));
            expect(startAuth).not.toHaveBeenCalled();
        });
    });

    describe('submitChallenge', () => {
        it('should forward the answer', async () => {
            const submit = vi.spyOn(service, 'submitChallenge').mockResolvedValue({ status: 'success', identity: 'alice' });
            const res = createMockResponse();

            await controller.submitChallenge(createMockRequest({ sessionToken: VALID_TOKEN, answer: ' 123456 ' }), res, vi.fn());

            expect(submit).toHaveBeenCalledWith(VALID_TOKEN, '123456');
            expect(res.status).toHaveBeenCalledWith(200);
        });

        it('should reject malformed session tokens', async () => {
            const next = vi.fn();

            await controller.submitChallenge(createMockRequest({ sessionToken: 'nope', answer: '123456' }), createMockResponse(), next);

            expect(next).toHaveBeenCalledWith(expect.any(ValidationError));
        });

        it('should pass service errors through', async () => {
            const error = new InvalidSessionError(VALID_TOKEN);
            vi.spyOn(service, 'submitChallenge').mockRejectedValue(error);
            const next = vi.fn();

            await controller.submitChallenge(createMockRequest({ sessionToken: VALID_TOKEN, answer: '123456' }), createMockResponse(), next);

            expect(next).toHaveBeenCalledWith(error);
        });
    });

    describe('cancelSession', () => {
        it('should cancel the session', () => {
            const cancel = vi.spyOn(service, 'cancel').mockImplementation(() => undefined);
            const res = createMockResponse();

            controller.cancelSession(createMockRequest({}, { token: VALID_TOKEN }), res, vi.fn());

            expect(cancel).toHaveBeenCalledWith(VALID_TOKEN);
            expect(res.json).toHaveBeenCalledWith(expect.objectContaining({ data: { cancelled: true } }));
        });
    });

    describe('logout', () => {
        it('should discard cached cookies', async () => {
            const logout = vi.spyOn(service, 'logout').mockResolvedValue(undefined);
            const res = createMockResponse();

            await controller.logout(createMockRequest({}, { identity: 'alice' }), res, vi.fn());

            expect(logout).toHaveBeenCalledWith('alice');
            expect(res.json).toHaveBeenCalledWith(expect.objectContaining({ data: { loggedOut: true } }));
        });
    });
});
