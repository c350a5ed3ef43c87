import pino from 'pino'
import type {IdentityChange} from '../identity/reconcile.js'
import type {OwnershipOperation} from '../identity/ownership.js'
import type {BindMount} from '../engine/types.js'

/**
 * Discriminated union of build and run events.
 *
 * Build lifecycle:
 * 1. BUILD_START - Inputs resolved, build context written
 * 2. BUILD_FINISHED - Image tagged
 *    OR BUILD_FAILED - A build step failed, no tag published
 *    OR BUILD_RENDERED - Dry run, context written but nothing built
 *
 * Run lifecycle:
 * 1. IDENTITY_RESOLVED - Host identity checked against the image's account
 * 2. RUN_STARTING - Container about to start
 * 3. RUN_FINISHED - Container exited (any exit code)
 *
 * WARNING may be emitted at any point.
 */
export type BuildStartEvent = {
  event: 'BUILD_START';
  image: string;
  python: string;
  fingerprint: string;
  stages: string[];
}

export type BuildRenderedEvent = {
  event: 'BUILD_RENDERED';
  image: string;
  dockerfile: string;
  entrypoint: string;
}

export type BuildFinishedEvent = {
  event: 'BUILD_FINISHED';
  image: string;
  fingerprint: string;
  dependencies: number;
  durationMs: number;
}

export type BuildFailedEvent = {
  event: 'BUILD_FAILED';
  image: string;
  /** Absent when the build never produced an exit status. */
  exitCode?: number;
  error?: string;
}

export type IdentityResolvedEvent = {
  event: 'IDENTITY_RESOLVED';
  image: string;
  account: string;
  uid: number;
  gid: number;
  status: 'unchanged' | 'adjusted';
  changes: IdentityChange[];
  ownership: OwnershipOperation[];
}

export type RunStartingEvent = {
  event: 'RUN_STARTING';
  image: string;
  container: string;
  mounts: BindMount[];
  cmd?: string[];
}

export type RunFinishedEvent = {
  event: 'RUN_FINISHED';
  image: string;
  container: string;
  exitCode: number;
  durationMs: number;
}

export type WarningEvent = {
  event: 'WARNING';
  message: string;
}

export type DevcellEvent =
  | BuildStartEvent
  | BuildRenderedEvent
  | BuildFinishedEvent
  | BuildFailedEvent
  | IdentityResolvedEvent
  | RunStartingEvent
  | RunFinishedEvent
  | WarningEvent

/**
 * Interface for reporting build and run events.
 */
export type Reporter = {
  /** Reports state transitions */
  emit(event: DevcellEvent): void;
  /** Reports build output (stdout/stderr of the image build) */
  log(image: string, stream: 'stdout' | 'stderr', line: string): void;
}

/**
 * Reporter that outputs structured JSON logs via pino.
 * Writes to stderr: stdout belongs to the container when one is attached.
 */
export class ConsoleReporter implements Reporter {
  private readonly logger = pino({level: 'info'}, pino.destination(2))

  emit(event: DevcellEvent): void {
    if (event.event === 'WARNING') {
      this.logger.warn(event)
      return
    }

    if (event.event === 'BUILD_FAILED') {
      this.logger.error(event)
      return
    }

    this.logger.info(event)
  }

  log(image: string, stream: 'stdout' | 'stderr', line: string): void {
    this.logger.info({image, stream, line})
  }
}
