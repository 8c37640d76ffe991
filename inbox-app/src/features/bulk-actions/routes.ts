import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { BulkSelectionService, StoredSelection } from 'bulk-select';
import { BulkJobNotFoundError } from '../../domain/errors.js';
import type { ActionRegistry } from './registry.js';
import type { BulkJobRunner } from './job-runner.js';
import type { BulkJobStore } from './job-store.js';

const bulkActionBody = z.object({
  token: z.string().min(1),
  actionKind: z.string().min(1),
  actionParams: z.unknown().optional(),
  /** Run inline regardless of selection size. */
  wait: z.boolean().optional(),
});

const resultParams = z.object({ resultId: z.string().min(1) });

function runsInline(stored: StoredSelection, wait: boolean, syncThreshold: number): boolean {
  if (wait) return true;
  return stored.selection.mode === 'manual' && stored.selection.included.size <= syncThreshold;
}

export async function registerBulkActionRoutes(
  app: FastifyInstance,
  deps: {
    service: BulkSelectionService;
    registry: ActionRegistry;
    runner: BulkJobRunner;
    jobs: BulkJobStore;
    syncThreshold: number;
  },
): Promise<void> {
  const { service, registry, runner, jobs } = deps;

  app.post('/bulk-actions', async (request, reply) => {
    const body = bulkActionBody.parse(request.body ?? {});
    // Validate the action before claiming the token so a typo costs nothing
    const action = registry.create(body.actionKind, body.actionParams);
    const stored = await service.claimSelection(body.token);

    if (runsInline(stored, body.wait ?? false, deps.syncThreshold)) {
      const result = await runner.runInline(stored, action);
      request.log.info(
        { token: body.token, actionKind: body.actionKind, status: result.status, attempted: result.attempted },
        'bulk action ran inline',
      );
      return reply.status(200).send(result);
    }

    const resultId = await runner.start(stored, body.actionKind, action);
    request.log.info({ token: body.token, actionKind: body.actionKind, resultId }, 'bulk action started');
    return reply.status(202).send({ resultId });
  });

  app.get('/bulk-actions/:resultId', async (request, reply) => {
    const { resultId } = resultParams.parse(request.params);
    const job = await jobs.get(resultId);
    if (job === null) throw new BulkJobNotFoundError(resultId);
    return reply.status(200).send(job);
  });

  app.post('/bulk-actions/:resultId/cancel', async (request, reply) => {
    const { resultId } = resultParams.parse(request.params);
    await runner.cancel(resultId);
    request.log.info({ resultId }, 'bulk action cancellation requested');
    return reply.status(202).send({ resultId, cancelling: true });
  });
}
