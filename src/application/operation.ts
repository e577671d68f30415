import type { z } from 'zod';

/** A named, remotely invocable read action known to the dispatcher. */
export interface OperationDefinition {
  readonly name: string;
  readonly description: string;
  /** `false` for introspective operations that must not appear in the audit log. */
  readonly audited: boolean;
  run(args: unknown): Promise<unknown>;
}

export interface OperationDescriptor {
  name: string;
  description: string;
  audited: boolean;
}

export class UnknownOperationError extends Error {
  constructor(readonly operationName: string) {
    super(`Unknown operation: ${operationName}`);
    this.name = 'UnknownOperationError';
  }
}

export class OperationInputError extends Error {
  constructor(
    readonly operationName: string,
    readonly issues: z.ZodIssue[],
  ) {
    super(
      `Invalid arguments for ${operationName}: ${issues
        .map((i) => `${i.path.join('.') || 'arguments'}: ${i.message}`)
        .join('; ')}`,
    );
    this.name = 'OperationInputError';
  }
}

/**
 * Builds an operation whose arguments are validated by `params` before
 * `handler` runs. The handler sees the parsed, typed arguments.
 */
export function defineOperation<S extends z.ZodTypeAny>(definition: {
  name: string;
  description: string;
  params: S;
  audited?: boolean;
  handler: (args: z.output<S>) => Promise<unknown>;
}): OperationDefinition {
  return {
    name: definition.name,
    description: definition.description,
    audited: definition.audited ?? true,
    async run(args: unknown): Promise<unknown> {
      const parsed = definition.params.safeParse(args ?? {});
      if (!parsed.success) {
        throw new OperationInputError(definition.name, parsed.error.issues);
      }
      return definition.handler(parsed.data);
    },
  };
}
