/**
 * Machine-readable output contract for the csim JSON mode (--json).
 */

export interface AxExecutionMeta {
  timestamp: string;
  durationMs: number;
}

export interface AxHints {
  hints?: string[];
}

export interface AxCommandOutput<TData extends Record<string, unknown> = Record<string, unknown>> extends AxExecutionMeta, AxHints {
  command: string;
  success: boolean;
  data: TData;
  errors?: string[];
}

/** Build an AxCommandOutput stamped with the time elapsed since `start`. */
export function makeAxOutput<TData extends Record<string, unknown>>(
  command: string,
  start: number,
  data: TData,
  opts?: { success?: boolean; errors?: string[]; hints?: string[] },
): AxCommandOutput<TData> {
  const output: AxCommandOutput<TData> = {
    command,
    success: opts?.success ?? true,
    timestamp: new Date().toISOString(),
    durationMs: Date.now() - start,
    data,
  };
  if (opts?.errors?.length) output.errors = opts.errors;
  if (opts?.hints?.length) output.hints = opts.hints;
  return output;
}
