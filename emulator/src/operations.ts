import type { LongRunningOperation, OperationState } from '@widecol/client';

/**
 * Operation that reports "running" for `pendingPolls` polls, then settles
 * with whatever `complete` returns. `complete` runs once.
 */
export class EmulatedOperation<T> implements LongRunningOperation<T> {
  readonly name: string;
  private remainingPolls: number;
  private settled: OperationState<T> | undefined;

  constructor(
    name: string,
    pendingPolls: number,
    private readonly complete: () => OperationState<T>
  ) {
    this.name = name;
    this.remainingPolls = pendingPolls;
  }

  async poll(): Promise<OperationState<T>> {
    if (this.settled !== undefined) {
      return this.settled;
    }
    if (this.remainingPolls > 0) {
      this.remainingPolls--;
      return { done: false };
    }
    this.settled = this.complete();
    return this.settled;
  }
}

let operationCounter = 0;

/**
 * Unique operation name under `resource`.
 */
export function operationName(resource: string): string {
  operationCounter++;
  return `operations/${resource}/locations/-/operations/${operationCounter}`;
}
