import type { Result } from "@archlens/core";
import type { AnalysisResult } from "../model.js";

export type ResultBuilder<E> = (
  version: number,
  current: AnalysisResult | undefined
) => Promise<Result<AnalysisResult, E>>;

/**
 * Versioned single-writer holder of the current and previous results.
 * Publications run one after another; readers always see a complete result.
 */
export class AnalysisHandle {
  private currentResult: AnalysisResult | undefined;
  private previousResult: AnalysisResult | undefined;
  private queue: Promise<void> = Promise.resolve();

  current(): AnalysisResult | undefined {
    return this.currentResult;
  }

  previous(): AnalysisResult | undefined {
    return this.previousResult;
  }

  get version(): number {
    return this.currentResult?.version ?? 0;
  }

  /**
   * Queue a build for version `current + 1`. The result is swapped in only
   * when the build returns Ok; an Err or a rejection leaves both slots alone.
   */
  publish<E>(build: ResultBuilder<E>): Promise<Result<AnalysisResult, E>> {
    const run = this.queue.then(async () => {
      const outcome = await build(this.version + 1, this.currentResult);
      if (outcome.ok) {
        this.previousResult = this.currentResult;
        this.currentResult = outcome.value;
      }
      return outcome;
    });
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
