/**
 * @lightbench/execution-bridge
 *
 * Owns one long-lived transport session and runs work against it on behalf of
 * callers that must never hold the session themselves. Callers submit closures
 * to a single-consumer queue and await a per-submission completion handle.
 */

const DEFAULT_STARTUP_TIMEOUT = 10000;

/**
 * Thrown when a bridge's session cannot be created within the startup grace period.
 */
export class BridgeStartupError extends Error {
  readonly bridgeName: string;

  constructor(bridgeName: string, message: string, options?: { cause?: unknown }) {
    super(`Bridge "${bridgeName}" failed to start: ${message}`, options);
    this.name = "BridgeStartupError";
    this.bridgeName = bridgeName;
  }
}

/**
 * Thrown to a caller whose submission did not complete within its timeout.
 */
export class BridgeTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(bridgeName: string, timeoutMs: number) {
    super(`Bridge "${bridgeName}" submission timed out after ${timeoutMs}ms`);
    this.name = "BridgeTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export interface BridgeOptions<S> {
  /** Used in errors and log lines */
  name: string;
  /** Create the session the bridge will own */
  createSession: () => Promise<S>;
  /** Release the session at shutdown */
  disposeSession?: (session: S) => Promise<void> | void;
  /** Grace period for `createSession` (default: 10000ms) */
  startupTimeoutMs?: number;
}

export type BridgeWork<S, T> = (session: S) => Promise<T>;

interface QueuedSubmission<S> {
  submissionId: number;
  run: (session: S) => void;
}

interface CompletionHandle {
  timeoutId: ReturnType<typeof setTimeout>;
  fail: (err: Error) => void;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class ExecutionBridge<S> {
  readonly name: string;

  private readonly session: S;
  private readonly disposeSession?: (session: S) => Promise<void> | void;
  private readonly queue: QueuedSubmission<S>[] = [];
  private readonly completions = new Map<number, CompletionHandle>();
  private nextSubmissionId = 1;
  private drainScheduled = false;
  private closed = false;

  private constructor(
    name: string,
    session: S,
    disposeSession?: (session: S) => Promise<void> | void
  ) {
    this.name = name;
    this.session = session;
    this.disposeSession = disposeSession;
  }

  /**
   * Create the session and return a bridge owning it.
   *
   * @throws BridgeStartupError if the session factory fails or exceeds the grace period
   */
  static start<S>(options: BridgeOptions<S>): Promise<ExecutionBridge<S>> {
    const startupTimeoutMs = options.startupTimeoutMs ?? DEFAULT_STARTUP_TIMEOUT;

    return new Promise((resolve, reject) => {
      let expired = false;

      const timeoutId = setTimeout(() => {
        expired = true;
        reject(
          new BridgeStartupError(options.name, `no session after ${startupTimeoutMs}ms`)
        );
      }, startupTimeoutMs);

      void Promise.resolve()
        .then(() => options.createSession())
        .then(
          (session) => {
            clearTimeout(timeoutId);
            if (expired) {
              // Arrived after the grace period; nobody will ever use it
              void Promise.resolve()
                .then(() => options.disposeSession?.(session))
                .catch((err: unknown) => {
                  console.error(`Failed to dispose late "${options.name}" session:`, err);
                });
              return;
            }
            resolve(new ExecutionBridge(options.name, session, options.disposeSession));
          },
          (err: unknown) => {
            clearTimeout(timeoutId);
            reject(new BridgeStartupError(options.name, errorMessage(err), { cause: err }));
          }
        );
    });
  }

  /** Submissions that have not completed yet */
  get pendingCount(): number {
    return this.completions.size;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Run `work` against the owned session and wait for its result.
   *
   * Submissions may complete in any order; each caller receives exactly its own
   * result, error, or a BridgeTimeoutError.
   */
  submit<T>(work: BridgeWork<S, T>, timeoutMs: number): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      if (this.closed) {
        reject(new Error(`Bridge "${this.name}" is shut down`));
        return;
      }

      const submissionId = this.nextSubmissionId++;

      const timeoutId = setTimeout(() => {
        if (this.complete(submissionId)) {
          reject(new BridgeTimeoutError(this.name, timeoutMs));
        }
      }, timeoutMs);

      this.completions.set(submissionId, { timeoutId, fail: reject });

      this.queue.push({
        submissionId,
        run: (session) => {
          void Promise.resolve()
            .then(() => work(session))
            .then(
              (value) => {
                if (this.complete(submissionId)) {
                  resolve(value);
                }
              },
              (err: unknown) => {
                if (this.complete(submissionId)) {
                  reject(err);
                }
              }
            );
        },
      });

      this.scheduleDrain();
    });
  }

  /**
   * Dispose the session. Pending submissions are rejected.
   */
  async shutdown(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.queue.length = 0;

    const handles = [...this.completions.values()];
    this.completions.clear();
    for (const handle of handles) {
      clearTimeout(handle.timeoutId);
      handle.fail(new Error(`Bridge "${this.name}" shut down before completion`));
    }

    await this.disposeSession?.(this.session);
  }

  /**
   * Release a submission's completion handle. Returns false when the handle was
   * already released, so late results are dropped.
   */
  private complete(submissionId: number): boolean {
    const handle = this.completions.get(submissionId);
    if (!handle) {
      return false;
    }
    clearTimeout(handle.timeoutId);
    this.completions.delete(submissionId);
    return true;
  }

  private scheduleDrain(): void {
    if (this.drainScheduled) {
      return;
    }
    this.drainScheduled = true;
    setImmediate(() => this.drain());
  }

  private drain(): void {
    this.drainScheduled = false;
    for (const submission of this.queue.splice(0)) {
      if (!this.completions.has(submission.submissionId)) {
        continue; // timed out while queued
      }
      submission.run(this.session);
    }
  }
}

// ============================================================================
// Lazy process-wide acquisition
// ============================================================================

const startedBridges = new Set<{ shutdown(): Promise<void> }>();

/**
 * Process-wide holder for one bridge, started on first use.
 *
 * Concurrent first callers share one startup, so the session is created once.
 * A failed startup is final: every later `acquire` rejects with the same error.
 */
export class LazyBridge<S> {
  private readonly options: BridgeOptions<S>;
  private startup: Promise<ExecutionBridge<S>> | null = null;

  constructor(options: BridgeOptions<S>) {
    this.options = options;
  }

  get name(): string {
    return this.options.name;
  }

  get started(): boolean {
    return this.startup !== null;
  }

  acquire(): Promise<ExecutionBridge<S>> {
    if (!this.startup) {
      this.startup = ExecutionBridge.start(this.options);
      startedBridges.add(this);
    }
    return this.startup;
  }

  /**
   * Shut the bridge down if it ever started successfully.
   */
  async shutdown(): Promise<void> {
    const startup = this.startup;
    startedBridges.delete(this);
    if (!startup) {
      return;
    }
    // A failed startup has no session to release
    const bridge = await startup.catch(() => null);
    await bridge?.shutdown();
  }
}

/**
 * Shut down every bridge started in this process. Call once at exit.
 */
export async function shutdownBridges(): Promise<void> {
  const bridges = [...startedBridges];
  await Promise.all(bridges.map((bridge) => bridge.shutdown()));
}
