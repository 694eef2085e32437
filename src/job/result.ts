import { z } from 'zod';

export const serializedErrorSchema = z.object({
  name: z.string(),
  message: z.string(),
  stack: z.string().optional(),
});

export const rawResultSchema = z.object({
  success: z.boolean(),
  data: z.unknown().optional(),
  error: serializedErrorSchema.optional(),
});

export const rawResultsSchema = z.array(rawResultSchema);

export type SerializedError = z.infer<typeof serializedErrorSchema>;
export type RawResult = z.infer<typeof rawResultSchema>;

export function serializeError(error: unknown): SerializedError {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { name: 'Error', message: String(error) };
}

export function failedResult(error: unknown): RawResult {
  return { success: false, error: serializeError(error) };
}

/**
 * Outcome of a single job, as handed to the job's callback.
 */
export class Result {
  public static fromRaw(raw: RawResult, jobId: string): Result {
    return new Result(jobId, raw.success, raw.data === undefined ? null : raw.data, raw.error || null);
  }

  constructor(
    public readonly jobId: string,
    public readonly success: boolean,
    public readonly data: unknown,
    public readonly error: SerializedError | null,
  ) {}
}
