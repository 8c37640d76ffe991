import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { parseFilterDescriptor, parseSelection } from 'bulk-select';
import type { BulkSelectionService } from 'bulk-select';

export interface SelectionRouteSettings {
  tokenTtlMs: number;
  tokenSingleUse: boolean;
}

const createSelectionBody = z.object({
  filter: z.unknown(),
  selection: z.unknown(),
  pinSnapshot: z.boolean().optional(),
  singleUse: z.boolean().optional(),
  ttlSeconds: z.number().int().min(1).max(86_400).optional(),
});

const tokenParams = z.object({ token: z.string().min(1) });

export async function registerSelectionRoutes(
  app: FastifyInstance,
  service: BulkSelectionService,
  settings: SelectionRouteSettings,
): Promise<void> {
  app.post('/selections', async (request, reply) => {
    const body = createSelectionBody.parse(request.body ?? {});
    const filter = parseFilterDescriptor(body.filter);
    const selection = parseSelection(body.selection);

    const { token, expiresAt } = await service.createSelection({
      filter,
      selection,
      pinSnapshot: body.pinSnapshot ?? false,
      singleUse: body.singleUse ?? settings.tokenSingleUse,
      ttlMs: body.ttlSeconds !== undefined ? body.ttlSeconds * 1000 : settings.tokenTtlMs,
    });
    request.log.info({ token, mode: selection.mode, pinned: body.pinSnapshot ?? false }, 'selection token created');
    return reply.status(201).send({ token, expiresAt: expiresAt.toISOString() });
  });

  app.post('/selections/:token/estimate', async (request, reply) => {
    const { token } = tokenParams.parse(request.params);
    const estimate = await service.estimate(token);
    return reply.status(200).send(estimate);
  });

  app.delete('/selections/:token', async (request, reply) => {
    const { token } = tokenParams.parse(request.params);
    await service.invalidate(token);
    return reply.status(204).send();
  });
}
