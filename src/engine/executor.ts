import type {BuildImageRequest, BuildImageResult, RunContainerRequest, RunContainerResult} from './types.js'

/** One line of `docker build` output. */
export type LogLine = {
  stream: 'stdout' | 'stderr';
  line: string;
}

/** Receives build output while the build runs. */
export type OnLogLine = (log: LogLine) => void

/**
 * Abstract interface over the container engine.
 *
 * Implementations:
 * - `DockerCliExecutor`: Uses Docker CLI
 *
 * The executor is responsible for:
 * - Building tagged images from a rendered build context
 * - Reading files out of an image (account database)
 * - Running one foreground container attached to the terminal
 */
export abstract class ContainerExecutor {
  /**
   * @throws {DockerNotAvailableError} when the engine cannot be reached
   */
  abstract check(): Promise<void>

  /**
   * Builds and tags an image. The tag is only published when every
   * build step succeeds.
   * @param onLogLine - Callback for build output
   */
  abstract buildImage(request: BuildImageRequest, onLogLine: OnLogLine): Promise<BuildImageResult>

  /**
   * Returns the labels of an image, or undefined when the image does not exist.
   */
  abstract imageLabels(tag: string): Promise<Record<string, string> | undefined>

  /**
   * Reads text files from an image without running its entrypoint.
   * @returns File contents, in the order of `paths`
   */
  abstract readImageFiles(tag: string, paths: string[]): Promise<string[]>

  /**
   * Runs a container in the foreground, attached to the current terminal,
   * and removes it on exit.
   */
  abstract run(request: RunContainerRequest): Promise<RunContainerResult>

  /**
   * Removes the container started by `run`, if still there.
   * Used by the SIGTERM/SIGHUP handlers of the run command.
   */
  abstract killRunningContainers(): Promise<void>
}
