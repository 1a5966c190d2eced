/**
 * FPO registry and lifecycle endpoints.
 */

import express, { type Request, type Response } from 'express';
import { z } from 'zod';
import type { OrganizationRecord } from '../../db/schema.js';
import { NotFoundError, ValidationError } from '../../lifecycle/errors.js';
import type { TransitionResult } from '../../lifecycle/lifecycleController.js';
import { FPO_STATUSES, isRequestableAction } from '../../lifecycle/states.js';
import { allowedActions } from '../../lifecycle/transitionValidator.js';
import type { Services } from '../../services.js';
import { MAX_PAGE_SIZE } from '../../store/organizationStore.js';
import { validate } from '../middleware/validate.js';

// ─── Validation Schemas ─────────────────────────────────────────────

const ceoProfileSchema = z.object({
  firstName: z.string().min(1).max(100),
  lastName: z.string().min(1).max(100),
  phoneNumber: z.string().min(5).max(20),
  email: z.string().email().optional(),
});

const registerSchema = z.object({
  name: z.string().min(1).max(200),
  registrationNumber: z.string().min(1).max(100).optional(),
  description: z.string().max(2000).optional(),
  metadata: z.record(z.unknown()).optional(),
  ceoProfile: ceoProfileSchema,
  parentFpoId: z.string().uuid().optional(),
});

const transitionSchema = z.object({
  reason: z.string().min(1).max(1000),
  overrideRetryLimit: z.boolean().optional(),
});

const eraseSchema = z.object({
  reason: z.string().min(1).max(1000),
});

const pageSchema = z.object({
  limit: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).optional(),
  offset: z.coerce.number().int().min(0).optional(),
});

const listSchema = pageSchema.extend({
  status: z.enum(FPO_STATUSES),
});

const idSchema = z.string().uuid();

type RegisterBody = z.infer<typeof registerSchema>;
type TransitionBody = z.infer<typeof transitionSchema>;
type EraseBody = z.infer<typeof eraseSchema>;

// ─── Helpers ────────────────────────────────────────────────────────

function present(record: OrganizationRecord) {
  return { ...record, allowedActions: record.deletedAt ? [] : allowedActions(record.status) };
}

/** Ids that are not UUIDs cannot name a record. */
function orgIdParam(req: Request): string {
  const id = req.params.id;
  if (!idSchema.safeParse(id).success) throw new NotFoundError('Organization', id);
  return id;
}

function context(req: Request): { actorId: string; requestId: string } {
  // Both are set by authenticate/requestContext, which run before this router
  return { actorId: req.actorId ?? 'unknown', requestId: req.requestId ?? 'unknown' };
}

/** Aborts when the client goes away before the response is written. */
function clientSignal(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) controller.abort();
  });
  return controller.signal;
}

function sendTransitionResult(res: Response, result: TransitionResult): void {
  if (result.ok) {
    res.json({
      success: true,
      data: { status: result.status, record: present(result.record), provisioning: result.provisioning },
    });
    return;
  }
  res.status(result.error.statusCode).json({
    success: false,
    error: result.error.toJSON(),
    data: { status: result.status },
  });
}

// ─── Routes ─────────────────────────────────────────────────────────

export function createFpoRouter(services: Services): express.Router {
  const router = express.Router();
  const { registry, lifecycle } = services;

  /**
   * POST /api/fpos
   * Register a new FPO in DRAFT.
   */
  router.post('/', validate(registerSchema), async (req, res) => {
    const body: RegisterBody = req.body;
    const { actorId, requestId } = context(req);

    const record = await registry.register(body, actorId, requestId);

    res.status(201).json({ success: true, data: present(record) });
  });

  /**
   * POST /api/fpos/sync/:externalOrgRef
   * Link an organization that already exists in the access-control service.
   */
  router.post('/sync/:externalOrgRef', async (req, res) => {
    const { actorId, requestId } = context(req);

    const { record, created } = await registry.syncFromAccessControl(req.params.externalOrgRef, actorId, requestId, {
      signal: clientSignal(res),
    });

    res.status(created ? 201 : 200).json({ success: true, data: present(record) });
  });

  /**
   * GET /api/fpos?status=ACTIVE&limit=50&offset=0
   */
  router.get('/', async (req, res) => {
    const { status, limit, offset } = listSchema.parse(req.query);

    const page = await registry.listByStatus(status, { limit, offset });

    res.json({ success: true, data: { ...page, items: page.items.map(present) } });
  });

  /**
   * GET /api/fpos/:id
   */
  router.get('/:id', async (req, res) => {
    const record = await registry.get(orgIdParam(req));
    res.json({ success: true, data: present(record) });
  });

  /**
   * GET /api/fpos/:id/history?limit=50&offset=0
   * Audit entries, oldest first.
   */
  router.get('/:id/history', async (req, res) => {
    const orgId = orgIdParam(req);
    const { limit, offset } = pageSchema.parse(req.query);

    const page = await lifecycle.getHistory(orgId, { limit, offset });

    res.json({ success: true, data: page });
  });

  /**
   * POST /api/fpos/:id/:action
   * Request a lifecycle action (submit, approve, begin-setup, ...).
   */
  router.post('/:id/:action', validate(transitionSchema), async (req, res) => {
    const orgId = orgIdParam(req);
    const action = req.params.action;
    if (!isRequestableAction(action)) {
      throw new ValidationError(`Unknown lifecycle action "${action}"`, { action });
    }
    const body: TransitionBody = req.body;
    if (body.overrideRetryLimit && action !== 'retry-setup') {
      throw new ValidationError('overrideRetryLimit only applies to retry-setup', { action });
    }
    const { actorId, requestId } = context(req);

    const result = await lifecycle.transition({
      orgId,
      action,
      actorId,
      reason: body.reason,
      requestId,
      overrideRetryLimit: body.overrideRetryLimit,
      signal: clientSignal(res),
    });

    sendTransitionResult(res, result);
  });

  /**
   * DELETE /api/fpos/:id
   * Compliance erasure. The record disappears from every read except history.
   */
  router.delete('/:id', validate(eraseSchema), async (req, res) => {
    const orgId = orgIdParam(req);
    const body: EraseBody = req.body;
    const { actorId, requestId } = context(req);

    const record = await registry.erase(orgId, actorId, body.reason, requestId);

    res.json({ success: true, data: { id: record.id, deletedAt: record.deletedAt } });
  });

  return router;
}
