/**
 * PID file management.
 *
 * A process holds at most one PID file: a text file with the decimal pid and
 * a newline, exclusively locked for the life of the process and removed at
 * exit. The lock is taken before the file is truncated, so a second
 * instance pointed at the same file fails with `ELOCKED` and leaves the
 * running instance's file alone.
 */

import { closeSync, fsyncSync, openSync, rmSync, writeSync } from "node:fs";
import lockfile from "proper-lockfile";
import { PidFileError } from "@sourcecast/core/errors";
import type { Logger } from "@sourcecast/core/logger";

export interface PidFileManagerOptions {
  logger: Logger;
  /** Id of the calling process. Default: `() => process.pid` */
  processId?: () => number;
  /** Arranges for `cleanup` to run at exit. Default: `process.once("exit")` */
  registerExitHook?: (cleanup: () => void) => void;
}

export class PidFileManager {
  private path: string | null = null;
  private fd: number | null = null;
  private releaseLock: (() => void) | null = null;
  private ownerPid: number | null = null;
  private exitHookRegistered = false;

  private readonly logger: Logger;
  private readonly processId: () => number;
  private readonly registerExitHook: (cleanup: () => void) => void;

  constructor(options: PidFileManagerOptions) {
    this.logger = options.logger;
    this.processId = options.processId ?? (() => process.pid);
    this.registerExitHook =
      options.registerExitHook ??
      ((cleanup) => {
        process.once("exit", cleanup);
      });
  }

  /** Path of the PID file currently held, if any. */
  get currentPath(): string | null {
    return this.path;
  }

  /** Whether a file handle or lock is still held. */
  get isHeld(): boolean {
    return this.fd !== null || this.releaseLock !== null;
  }

  /**
   * Write and lock the PID file at `path`, replacing any file tracked
   * before. `null` means the process runs without a PID file.
   *
   * @throws PidFileError carrying the code of the failing system call.
   */
  write(path: string | null): void {
    if (path === null) {
      return;
    }

    this.close();
    this.path = path;

    try {
      this.releaseLock = lockfile.lockSync(path, {
        realpath: false,
        onCompromised: (err) => {
          this.logger.error({ err, path }, "PID file lock compromised");
        },
      });
    } catch (err) {
      this.path = null;
      throw new PidFileError(path, err);
    }

    // An entry we could not open was never ours: leave it in place.
    let fd: number;
    try {
      fd = openSync(path, "w");
    } catch (err) {
      this.close();
      this.path = null;
      throw new PidFileError(path, err);
    }
    this.fd = fd;

    const pid = this.processId();
    try {
      writeSync(fd, `${pid}\n`);
      fsyncSync(fd);

      if (!this.exitHookRegistered) {
        this.ownerPid = pid;
        this.registerExitHook(() => this.cleanup());
        this.exitHookRegistered = true;
      }
    } catch (err) {
      this.discard(path);
      throw new PidFileError(path, err);
    }

    this.logger.debug({ path, pid }, "PID file written");
  }

  /**
   * Remove the PID file, but only from the process that wrote it: a forked
   * child inheriting this state must not delete its parent's file.
   */
  cleanup(): void {
    const path = this.path;
    if (path === null || this.processId() !== this.ownerPid) {
      return;
    }
    this.remove(path);
    this.close();
    this.path = null;
  }

  private discard(path: string): void {
    this.remove(path);
    this.close();
    this.path = null;
    this.ownerPid = null;
  }

  private remove(path: string): void {
    try {
      rmSync(path, { force: true });
    } catch (err) {
      this.logger.warn({ err, path }, "could not remove PID file");
    }
  }

  private close(): void {
    const release = this.releaseLock;
    this.releaseLock = null;
    if (release) {
      try {
        release();
      } catch (err) {
        // Already released by proper-lockfile's own exit handler
        this.logger.debug({ err, path: this.path }, "PID file lock release failed");
      }
    }

    const fd = this.fd;
    this.fd = null;
    if (fd !== null) {
      try {
        closeSync(fd);
      } catch (err) {
        this.logger.warn({ err, path: this.path }, "could not close PID file");
      }
    }
  }
}

let defaultManager: PidFileManager | null = null;

/**
 * Write the process-wide PID file. The first call creates the shared
 * manager with `logger`; later calls reuse it.
 */
export function writePidFile(path: string | null, logger: Logger): void {
  defaultManager ??= new PidFileManager({ logger });
  defaultManager.write(path);
}

/** Remove the process-wide PID file now instead of at exit. */
export function cleanupPidFile(): void {
  defaultManager?.cleanup();
}
