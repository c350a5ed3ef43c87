/**
 * Bind mount of a host path into the container.
 */
export type BindMount = {
  /** Absolute path on the host */
  hostPath: string;
  /** Absolute path in the container */
  containerPath: string;
  /** Mount read-only (defaults to read-write) */
  readOnly?: boolean;
}

/**
 * Request to build an image from a rendered build context.
 */
export type BuildImageRequest = {
  /** Image tag to publish on success */
  tag: string;
  /** Build context root */
  contextDir: string;
  /** Absolute path to the Dockerfile */
  dockerfile: string;
  /** Base image reference, for reporting resolution failures */
  baseImage: string;
  /** Values for the Dockerfile's ARG instructions */
  buildArgs: Record<string, string>;
  /** Labels attached to the image */
  labels: Record<string, string>;
}

/**
 * Result of an image build.
 */
export type BuildImageResult = {
  /** Exit code (0 = success, non-zero = failure) */
  exitCode: number;
  startedAt: Date;
  finishedAt: Date;
  /** Error message if the build failed */
  error?: string;
}

/**
 * Request to start one foreground container.
 */
export type RunContainerRequest = {
  /** Container name (used for cleanup on signals) */
  name: string;
  /** Image tag to run */
  image: string;
  /** Command override (undefined = image default) */
  cmd?: string[];
  /** Environment variables passed with their values */
  env: Record<string, string>;
  /**
   * Environment variables passed by name only. Values travel through the
   * Docker CLI's own environment so they never appear in its argv.
   */
  secretEnv?: Record<string, string>;
  /** Host bind mounts */
  mounts: BindMount[];
  /** Keep stdin open */
  interactive: boolean;
  /** Allocate a pseudo-terminal */
  tty: boolean;
}

/**
 * Result of a container execution.
 */
export type RunContainerResult = {
  /** Exit code of the container's process 1 */
  exitCode: number;
  startedAt: Date;
  finishedAt: Date;
}
