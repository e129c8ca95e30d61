import { InternalError, getErrorMessage, toError } from "@toolmesh/errors";
import type { McpLogger } from "../logger.js";

export type Teardown = () => void | Promise<void>;

interface DeferredTeardown {
  readonly label: string;
  readonly teardown: Teardown;
}

/**
 * Owns every resource opened during one conversion and releases them in
 * reverse order of acquisition.
 */
export class LifetimeOwner {
  private readonly pending: DeferredTeardown[] = [];
  private closing: Promise<void> | undefined;
  private settled: Promise<void> | undefined;

  constructor(private readonly logger: McpLogger) {}

  /** Number of teardowns not yet run */
  get size(): number {
    return this.pending.length;
  }

  get closed(): boolean {
    return this.closing !== undefined;
  }

  /**
   * Register a teardown. Throws once close() has been called.
   */
  defer(label: string, teardown: Teardown): void {
    if (this.closing) {
      throw new InternalError(`Cannot register "${label}": lifetime owner already closed`);
    }
    this.pending.push({ label, teardown });
  }

  /**
   * Run all teardowns, last registered first. Every teardown runs even when
   * an earlier one fails; failures are logged and rethrown together as an
   * AggregateError from the first call. Later calls resolve once the first
   * has finished.
   */
  close(): Promise<void> {
    if (this.closing && this.settled) {
      return this.settled;
    }
    const closing = this.unwind();
    this.closing = closing;
    // failures surface through the first caller's promise
    this.settled = closing.then(
      () => undefined,
      () => undefined,
    );
    return closing;
  }

  private async unwind(): Promise<void> {
    const failures: Error[] = [];
    for (let entry = this.pending.pop(); entry; entry = this.pending.pop()) {
      try {
        await entry.teardown();
      } catch (error) {
        this.logger.error(`Failed to release ${entry.label}: ${getErrorMessage(error)}`);
        failures.push(toError(error));
      }
    }
    if (failures.length > 0) {
      throw new AggregateError(failures, `${failures.length} resource(s) failed to release`);
    }
  }
}
