/**
 * Pause/Resume Controller
 *
 * Binds host lifecycle notifications to a session: backgrounding the host
 * pauses the session (close, no reconnect), foregrounding resumes it (open
 * against the last URL and re-subscribe everything).
 *
 * For a Node process the host lifecycle is job control: SIGTSTP (Ctrl-Z)
 * pauses the session and then stops the process, SIGCONT resumes it.
 */

import { toError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('lifecycle');

export interface PausableSession {
  readonly paused: boolean;
  pause(): Promise<void>;
  resume(): Promise<void>;
}

export interface HostLifecycle {
  /** @returns function that removes the listener */
  onPause(listener: () => void): () => void;
  /** @returns function that removes the listener */
  onResume(listener: () => void): () => void;
  /** Called once the session has been paused, e.g. to actually suspend the host */
  afterPause?(): void;
}

export interface ProcessLike {
  readonly pid: number;
  on(event: NodeJS.Signals, listener: () => void): unknown;
  off(event: NodeJS.Signals, listener: () => void): unknown;
  kill(pid: number, signal?: NodeJS.Signals): unknown;
}

export interface ProcessLifecycleOptions {
  pauseSignal?: NodeJS.Signals;
  resumeSignal?: NodeJS.Signals;
  /** Stop the process with SIGSTOP once paused (default: true) */
  stopAfterPause?: boolean;
}

/**
 * Host lifecycle backed by process signals.
 */
export function processLifecycle(proc: ProcessLike = process, options: ProcessLifecycleOptions = {}): HostLifecycle {
  const pauseSignal = options.pauseSignal ?? 'SIGTSTP';
  const resumeSignal = options.resumeSignal ?? 'SIGCONT';
  const stopAfterPause = options.stopAfterPause ?? true;

  return {
    onPause(listener) {
      proc.on(pauseSignal, listener);
      return () => {
        proc.off(pauseSignal, listener);
      };
    },
    onResume(listener) {
      proc.on(resumeSignal, listener);
      return () => {
        proc.off(resumeSignal, listener);
      };
    },
    afterPause: stopAfterPause
      ? () => {
          proc.kill(proc.pid, 'SIGSTOP');
        }
      : undefined,
  };
}

export class PauseResumeController {
  private readonly session: PausableSession;
  private readonly onError: (error: Error) => void;
  private unbind?: () => void;

  constructor(session: PausableSession, options: { onError?: (error: Error) => void } = {}) {
    this.session = session;
    this.onError = options.onError ?? ((error) => log.error('Lifecycle transition failed', { error: error.message }));
  }

  get bound(): boolean {
    return this.unbind !== undefined;
  }

  /** Start following a host's lifecycle. Rebinding replaces the previous host. */
  bind(host: HostLifecycle): void {
    this.release();

    const offPause = host.onPause(() => {
      this.handlePause(host).catch((err: unknown) => this.onError(toError(err)));
    });
    const offResume = host.onResume(() => {
      this.handleResume().catch((err: unknown) => this.onError(toError(err)));
    });

    this.unbind = () => {
      offPause();
      offResume();
    };
  }

  release(): void {
    this.unbind?.();
    this.unbind = undefined;
  }

  async handlePause(host?: HostLifecycle): Promise<void> {
    if (this.session.paused) return;
    await this.session.pause();
    host?.afterPause?.();
  }

  async handleResume(): Promise<void> {
    if (!this.session.paused) return;
    await this.session.resume();
  }
}
