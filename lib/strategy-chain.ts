import { DownloadFailure, errorMessage } from "@/lib/errors";

export interface ChainStrategy {
  name: string;
}

export interface ChainSuccess<S, R> {
  result: R;
  strategy: S;
  attempts: string[];
}

/**
 * Tries each strategy once, in order, and stops at the first that yields a result.
 * An attempt that throws or resolves to `null` counts as failed.
 */
export async function runStrategyChain<S extends ChainStrategy, R>(params: {
  strategies: readonly S[];
  attempt: (strategy: S, index: number) => Promise<R | null>;
  log?: (message: string) => void;
}): Promise<ChainSuccess<S, R>> {
  const { strategies, attempt, log } = params;
  const attempts: string[] = [];
  let lastError: unknown = null;

  for (const [index, strategy] of strategies.entries()) {
    attempts.push(strategy.name);
    log?.(`Strategy ${index + 1}/${strategies.length}: ${strategy.name}`);

    try {
      const result = await attempt(strategy, index);

      if (result !== null) {
        log?.(`Strategy ${strategy.name} succeeded`);
        return { result, strategy, attempts };
      }

      lastError = new Error(`Strategy ${strategy.name} finished without producing audio`);
    } catch (error) {
      lastError = error;
    }

    log?.(`Strategy ${strategy.name} failed: ${errorMessage(lastError)}`);
  }

  if (strategies.length === 0) {
    throw new DownloadFailure("No download strategies are configured", attempts);
  }

  throw new DownloadFailure(
    `All ${strategies.length} download strategies failed. Last error: ${errorMessage(lastError)}`,
    attempts,
    { cause: lastError }
  );
}
