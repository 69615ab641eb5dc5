import type { z } from 'zod';

export interface JobContext {
  queueJobId: string;
  workerId: string;
  /** Aborted when the job exceeds its wall-clock budget */
  signal: AbortSignal;
}

export interface JobDefinition<TInput = unknown, TOutput = unknown> {
  name: string;
  input: z.ZodType<TInput, z.ZodTypeDef, unknown>;
  run(payload: TInput, context: JobContext): Promise<TOutput>;
}

/**
 * Declares a named background job with a validated payload
 */
export function defineJob<TInput, TOutput>(
  definition: JobDefinition<TInput, TOutput>
): JobDefinition<TInput, TOutput> {
  return definition;
}

/**
 * Type-erased runner the worker pool calls; validation happens before run()
 */
export interface RegisteredJob {
  name: string;
  execute(payload: unknown, context: JobContext): Promise<unknown>;
}

export function registerJob<TInput, TOutput>(
  definition: JobDefinition<TInput, TOutput>
): RegisteredJob {
  return {
    name: definition.name,
    async execute(payload, context) {
      const parsed = definition.input.safeParse(payload);
      if (!parsed.success) {
        const issues = parsed.error.issues
          .map((issue) => `${issue.path.join('.') || 'payload'}: ${issue.message}`)
          .join('; ');
        throw new Error(`Invalid payload for job ${definition.name}: ${issues}`);
      }
      return definition.run(parsed.data, context);
    },
  };
}
