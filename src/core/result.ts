/** Discriminated result carried across every step boundary. */
export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

export type Stage<N extends string, E> = {
  name: N;
  run: () => Promise<Result<unknown, E>>;
};

export type PipelineHooks<N extends string, E> = {
  settle?: (name: N, result: Result<unknown, E>, durationMs: number) => void;
};

export type PipelineResult<N extends string, E> =
  | { ok: true }
  | { ok: false; failedAt: N; error: E };

/**
 * Run stages in order; the first failed result short-circuits the rest.
 * A stage that throws is not caught here — stages own their error mapping.
 */
export async function pipeline<N extends string, E>(
  stages: ReadonlyArray<Stage<N, E>>,
  hooks: PipelineHooks<N, E> = {},
  now: () => number = Date.now,
): Promise<PipelineResult<N, E>> {
  for (const stage of stages) {
    const started = now();
    const result = await stage.run();
    hooks.settle?.(stage.name, result, now() - started);
    if (!result.ok) return { ok: false, failedAt: stage.name, error: result.error };
  }
  return { ok: true };
}
