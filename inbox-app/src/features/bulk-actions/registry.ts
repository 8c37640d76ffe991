import type { z } from 'zod';
import type { BulkAction } from 'bulk-select';
import { InvalidActionParamsError, UnknownActionKindError } from '../../domain/errors.js';

/**
 * A named bulk action. `params` validates the request's `actionParams`;
 * `build` turns validated params into the per-record action.
 */
export interface ActionDefinition<P> {
  kind: string;
  params: z.ZodType<P, z.ZodTypeDef, unknown>;
  build(params: P): BulkAction;
}

type ActionFactory = (params: unknown) => BulkAction;

export class ActionRegistry {
  private readonly factories = new Map<string, ActionFactory>();

  register<P>(definition: ActionDefinition<P>): this {
    if (this.factories.has(definition.kind)) {
      throw new Error(`Bulk action kind '${definition.kind}' is already registered`);
    }
    this.factories.set(definition.kind, (raw) => {
      const parsed = definition.params.safeParse(raw);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
        throw new InvalidActionParamsError(
          `Invalid params for '${definition.kind}'${where}: ${issue?.message ?? 'invalid'}`,
        );
      }
      return definition.build(parsed.data);
    });
    return this;
  }

  kinds(): string[] {
    return [...this.factories.keys()].sort();
  }

  /** Throws UnknownActionKindError or InvalidActionParamsError. */
  create(kind: string, params: unknown): BulkAction {
    const factory = this.factories.get(kind);
    if (factory === undefined) throw new UnknownActionKindError(kind, this.kinds());
    return factory(params);
  }
}
