import { cloneSnapshot, configSnapshotSchema, formatZodIssues } from "../domain/config-snapshot.js";
import {
  ConfigRestoreError,
  ConfigWriteError,
  ValidationError,
} from "../middleware/error-handler.js";
import type { ConfigSnapshot } from "../types/pipeline.js";
import { errorMessage, logger } from "../utils/logger.js";
import type { ConfigResource } from "./config-resource.js";
import { ExecutionLock } from "./execution-lock.js";

export interface IsolatedContext {
  /** The override, passed by value; the body never needs to read the shared resource. */
  config: ConfigSnapshot;
  signal?: AbortSignal;
}

export interface RunIsolatedOptions {
  signal?: AbortSignal;
  /** Free-form tag for logs, such as a task id. */
  label?: string;
}

export class ExecutionIsolationManager {
  private readonly resource: ConfigResource;
  private readonly lock: ExecutionLock;
  private backup: ConfigSnapshot | null = null;

  constructor(resource: ConfigResource, lock = new ExecutionLock()) {
    this.resource = resource;
    this.lock = lock;
  }

  lockState(): { held: boolean; pending: number } {
    return { held: this.lock.held, pending: this.lock.pending };
  }

  /**
   * The baseline as seen from outside the critical section. While an
   * execution is in flight the resource holds an override, so the retained
   * backup is returned instead.
   */
  async currentBaseline(): Promise<ConfigSnapshot> {
    if (this.backup) return cloneSnapshot(this.backup);
    return this.resource.read();
  }

  async replaceBaseline(input: unknown, options: RunIsolatedOptions = {}): Promise<ConfigSnapshot> {
    const snapshot = this.validate(input);
    const release = await this.lock.acquire(options.signal);
    try {
      await this.resource.write(snapshot);
    } catch (error) {
      throw new ConfigWriteError("override", error);
    } finally {
      release();
    }
    logger.info("config_baseline_replaced", {
      groups: snapshot.groups.length,
      platforms: snapshot.platforms.length,
      mode: snapshot.mode,
    });
    return cloneSnapshot(snapshot);
  }

  async runIsolated<T>(
    override: unknown,
    body: (context: IsolatedContext) => Promise<T>,
    options: RunIsolatedOptions = {},
  ): Promise<T> {
    const snapshot = this.validate(override);
    const release = await this.lock.acquire(options.signal);
    const startedAt = Date.now();

    try {
      let backup: ConfigSnapshot;
      try {
        backup = await this.resource.read();
      } catch (error) {
        throw new ConfigWriteError("backup", error);
      }

      this.backup = backup;
      try {
        try {
          await this.resource.write(snapshot);
        } catch (error) {
          // The write may have left a partial file behind.
          await this.restore(backup, error, options.label);
          throw new ConfigWriteError("override", error);
        }

        let outcome: { ok: true; value: T } | { ok: false; error: unknown };
        try {
          outcome = { ok: true, value: await body({ config: cloneSnapshot(snapshot), signal: options.signal }) };
        } catch (error) {
          outcome = { ok: false, error };
        }

        await this.restore(backup, outcome.ok ? undefined : outcome.error, options.label);

        logger.debug("isolated_execution_finished", {
          label: options.label,
          ok: outcome.ok,
          durationMs: Date.now() - startedAt,
        });

        if (!outcome.ok) throw outcome.error;
        return outcome.value;
      } finally {
        this.backup = null;
      }
    } finally {
      release();
    }
  }

  private async restore(backup: ConfigSnapshot, bodyError: unknown, label?: string): Promise<void> {
    try {
      await this.resource.write(backup);
    } catch (error) {
      logger.error("config_restore_failed", {
        label,
        error: errorMessage(error),
      });
      throw new ConfigRestoreError(error, bodyError);
    }
  }

  private validate(input: unknown): ConfigSnapshot {
    const parsed = configSnapshotSchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError("Invalid configuration override", formatZodIssues(parsed.error));
    }
    return parsed.data;
  }
}
