import { Router, type Response } from 'express';
import type { ZodType, ZodTypeDef } from 'zod';
import {
  CallerRequestSchema,
  CastVoteRequestSchema,
  PendingRoleRequestSchema,
  ProposeRequestSchema,
  UpdateParametersRequestSchema,
  isAddressString,
} from '@veto-governor/shared';
import type { GovernanceEngine } from '../governance/engine.js';
import { isGovernanceError, type GovernanceErrorCode } from '../governance/errors.js';
import { appendLog, createLogEvent } from '../storage/logStore.js';

const NOT_FOUND: ReadonlySet<GovernanceErrorCode> = new Set(['UnknownProposal']);
const FORBIDDEN: ReadonlySet<GovernanceErrorCode> = new Set([
  'AdminOnly',
  'PendingAdminOnly',
  'VetoerOnly',
  'PendingVetoerOnly',
]);

/** HTTP status for a failure thrown by the engine. */
export function statusForError(err: unknown): number {
  if (!isGovernanceError(err)) return 500;
  if (NOT_FOUND.has(err.code)) return 404;
  if (FORBIDDEN.has(err.code)) return 403;
  return 409;
}

function parseProposalId(raw: string): number | null {
  if (!/^\d+$/.test(raw)) return null;
  const id = Number(raw);
  return Number.isSafeInteger(id) && id > 0 ? id : null;
}

function validation(res: Response, message: string): void {
  res.status(400).json({ error: message, code: 'VALIDATION' });
}

function parseBody<T>(schema: ZodType<T, ZodTypeDef, unknown>, body: unknown, res: Response): T | null {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    validation(res, parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '));
    return null;
  }
  return parsed.data;
}

async function respond(res: Response, label: string, op: () => Promise<unknown>, status = 200): Promise<void> {
  try {
    const body = await op();
    res.status(status).json(body);
  } catch (err) {
    const code = statusForError(err);
    if (isGovernanceError(err)) {
      res.status(code).json({ error: err.message, code: err.code });
      return;
    }
    console.error(`[governance/${label}] error:`, err);
    appendLog(createLogEvent('ERROR', { route: label, message: err instanceof Error ? err.message : String(err) }, 'ERROR'));
    res.status(code).json({ error: `${label} failed` });
  }
}

/** REST surface over one engine instance, mounted at /api/governance. */
export function createGovernanceRouter(engine: GovernanceEngine): Router {
  const router = Router();

  // ─── Proposals ───────────────────────────────────────

  router.post('/proposals', async (req, res) => {
    const body = parseBody(ProposeRequestSchema, req.body, res);
    if (!body) return;
    const { caller, description, ...calls } = body;
    await respond(res, 'propose', async () => ({ id: await engine.propose(caller, calls, description) }), 201);
  });

  router.get('/proposals/:id', async (req, res) => {
    const id = parseProposalId(req.params.id);
    if (id === null) return validation(res, 'id must be a positive integer');
    await respond(res, 'proposal', () => engine.proposal(id));
  });

  router.get('/proposals/:id/receipts/:voter', async (req, res) => {
    const id = parseProposalId(req.params.id);
    const voter = req.params.voter;
    if (id === null || !isAddressString(voter)) {
      return validation(res, 'id must be a positive integer and voter an address');
    }
    await respond(res, 'receipt', async () => engine.getReceipt(id, voter));
  });

  router.post('/proposals/:id/votes', async (req, res) => {
    const id = parseProposalId(req.params.id);
    if (id === null) return validation(res, 'id must be a positive integer');
    const body = parseBody(CastVoteRequestSchema, req.body, res);
    if (!body) return;
    await respond(res, 'castVote', async () => ({
      votes: await engine.castVote(body.caller, id, body.support, body.reason),
    }));
  });

  router.post('/proposals/:id/cancel', async (req, res) => {
    const id = parseProposalId(req.params.id);
    if (id === null) return validation(res, 'id must be a positive integer');
    const body = parseBody(CallerRequestSchema, req.body, res);
    if (!body) return;
    await respond(res, 'cancel', async () => {
      await engine.cancel(body.caller, id);
      return { id, state: await engine.state(id) };
    });
  });

  router.post('/proposals/:id/veto', async (req, res) => {
    const id = parseProposalId(req.params.id);
    if (id === null) return validation(res, 'id must be a positive integer');
    const body = parseBody(CallerRequestSchema, req.body, res);
    if (!body) return;
    await respond(res, 'veto', async () => {
      await engine.veto(body.caller, id);
      return { id, state: await engine.state(id) };
    });
  });

  router.post('/proposals/:id/queue', async (req, res) => {
    const id = parseProposalId(req.params.id);
    if (id === null) return validation(res, 'id must be a positive integer');
    await respond(res, 'queue', async () => ({ id, eta: await engine.queue(id) }));
  });

  router.post('/proposals/:id/execute', async (req, res) => {
    const id = parseProposalId(req.params.id);
    if (id === null) return validation(res, 'id must be a positive integer');
    await respond(res, 'execute', async () => {
      await engine.execute(id);
      return { id, state: await engine.state(id) };
    });
  });

  // ─── Authority ───────────────────────────────────────

  router.get('/authority', (_req, res) => {
    res.json(engine.authorityState());
  });

  router.post('/authority/pending-admin', async (req, res) => {
    const body = parseBody(PendingRoleRequestSchema, req.body, res);
    if (!body) return;
    await respond(res, 'setPendingAdmin', async () => {
      await engine.setPendingAdmin(body.caller, body.newPending);
      return engine.authorityState();
    });
  });

  router.post('/authority/accept-admin', async (req, res) => {
    const body = parseBody(CallerRequestSchema, req.body, res);
    if (!body) return;
    await respond(res, 'acceptAdmin', async () => {
      await engine.acceptAdmin(body.caller);
      return engine.authorityState();
    });
  });

  router.post('/authority/pending-vetoer', async (req, res) => {
    const body = parseBody(PendingRoleRequestSchema, req.body, res);
    if (!body) return;
    await respond(res, 'setPendingVetoer', async () => {
      await engine.setPendingVetoer(body.caller, body.newPending);
      return engine.authorityState();
    });
  });

  router.post('/authority/accept-vetoer', async (req, res) => {
    const body = parseBody(CallerRequestSchema, req.body, res);
    if (!body) return;
    await respond(res, 'acceptVetoer', async () => {
      await engine.acceptVetoer(body.caller);
      return engine.authorityState();
    });
  });

  router.post('/authority/burn-veto', async (req, res) => {
    const body = parseBody(CallerRequestSchema, req.body, res);
    if (!body) return;
    await respond(res, 'burnVetoPower', async () => {
      await engine.burnVetoPower(body.caller);
      return engine.authorityState();
    });
  });

  router.post('/authority/withdraw', async (req, res) => {
    const body = parseBody(CallerRequestSchema, req.body, res);
    if (!body) return;
    await respond(res, 'withdraw', () => engine.withdraw(body.caller));
  });

  // ─── Parameters ──────────────────────────────────────

  router.get('/parameters', async (_req, res) => {
    await respond(res, 'parameters', async () => ({
      ...engine.parameters(),
      proposalThreshold: await engine.proposalThreshold(),
      proposalCount: engine.proposalCount(),
    }));
  });

  /** Admin-only; the supplied fields apply together or not at all. */
  router.post('/parameters', async (req, res) => {
    const body = parseBody(UpdateParametersRequestSchema, req.body, res);
    if (!body) return;
    const { caller, ...changes } = body;
    await respond(res, 'setParameters', () => engine.updateParameters(caller, changes));
  });

  return router;
}
