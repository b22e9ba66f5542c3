/**
 * src/modules/two-factor/two-factor.controller.ts
 *
 * WHY:
 * - Maps HTTP → TwoFactorService for the /2fa/* endpoints.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - /2fa/verify is public (identified by user_id or email); everything else
 *   runs behind the access-token guard.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import type { z } from 'zod';

import { AppError } from '../../shared/http/errors';
import { requireSession } from '../../shared/http/auth-context';
import { okResponse } from '../../shared/http/response';

import type { TwoFactorService } from './two-factor.service';
import { TwoFactorErrors } from './two-factor.errors';
import { confirmSetupSchema, tokenOnlySchema, verifySchema } from './two-factor.schemas';

function toIso(date: Date | null): string | null {
  return date ? date.toISOString() : null;
}

function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.output<S> {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    throw AppError.validationError('Invalid request body', {
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}

export class TwoFactorController {
  constructor(private readonly twoFactorService: TwoFactorService) {}

  async setup(req: FastifyRequest, reply: FastifyReply) {
    const { user } = requireSession(req);

    const result = await this.twoFactorService.beginSetup(user);
    if (!result.ok) throw TwoFactorErrors.alreadyEnabled();

    const enrollment = result.value;
    return reply.status(200).send(
      okResponse({
        secret: enrollment.secret,
        qr_code: enrollment.qrCode,
        provisioning_uri: enrollment.provisioningUri,
        backup_codes: enrollment.backupCodes,
      }),
    );
  }

  async confirmSetup(req: FastifyRequest, reply: FastifyReply) {
    const { user } = requireSession(req);
    const body = parseBody(confirmSetupSchema, req.body);

    const missing = [!body.secret && 'secret', !body.token && 'token'].filter(
      (f): f is string => typeof f === 'string',
    );
    if (!body.secret || !body.token) throw TwoFactorErrors.missingFields(missing);

    const result = await this.twoFactorService.confirmSetup(user, {
      secret: body.secret,
      token: body.token,
      backupCodes: body.backup_codes,
    });
    if (!result.ok) {
      throw result.error === '2fa_already_enabled'
        ? TwoFactorErrors.alreadyEnabled()
        : TwoFactorErrors.invalidToken();
    }

    return reply.status(200).send(
      okResponse({
        message: 'Two-factor authentication enabled',
        created: result.value.created,
      }),
    );
  }

  async verify(req: FastifyRequest, reply: FastifyReply) {
    const body = parseBody(verifySchema, req.body);

    if (!body.token || (!body.user_id && !body.email)) {
      const missing = [!body.token && 'token', !body.user_id && !body.email && 'user_id'].filter(
        (f): f is string => typeof f === 'string',
      );
      throw TwoFactorErrors.missingFields(missing);
    }

    const result = await this.twoFactorService.verifyForIdentity(
      { userId: body.user_id, email: body.email },
      { code: body.token, useBackup: body.use_backup },
      { ip: req.requestContext.ip },
    );
    if (!result.ok) throw TwoFactorErrors.forVerifyEndpoint(result.error);

    return reply.status(200).send(okResponse({ verified: true }));
  }

  async disable(req: FastifyRequest, reply: FastifyReply) {
    const { user } = requireSession(req);
    const body = parseBody(tokenOnlySchema, req.body);
    if (!body.token) throw TwoFactorErrors.missingFields(['token']);

    const result = await this.twoFactorService.disable(user, body.token);
    if (!result.ok) {
      throw result.error === 'not_enabled'
        ? TwoFactorErrors.notEnabled()
        : TwoFactorErrors.invalidToken();
    }

    return reply.status(200).send(okResponse({ message: 'Two-factor authentication disabled' }));
  }

  async status(req: FastifyRequest, reply: FastifyReply) {
    const { userId } = requireSession(req);

    const status = await this.twoFactorService.getStatus(userId);

    return reply.status(200).send(
      okResponse({
        is_enabled: status.isEnabled,
        backup_codes_remaining: status.backupCodesRemaining,
        last_used: toIso(status.lastUsedAt),
        confirmed_at: toIso(status.confirmedAt),
        created_at: toIso(status.createdAt),
      }),
    );
  }

  async regenerateBackupCodes(req: FastifyRequest, reply: FastifyReply) {
    const { user } = requireSession(req);
    const body = parseBody(tokenOnlySchema, req.body);
    if (!body.token) throw TwoFactorErrors.missingFields(['token']);

    const result = await this.twoFactorService.regenerateBackupCodes(user, body.token);
    if (!result.ok) {
      throw result.error === 'not_enabled'
        ? TwoFactorErrors.notEnabled()
        : TwoFactorErrors.invalidToken();
    }

    return reply.status(200).send(
      okResponse({
        message: 'Backup codes regenerated',
        backup_codes: result.value,
        backup_codes_remaining: result.value.length,
      }),
    );
  }
}
