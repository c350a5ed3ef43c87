// ---------------------------------------------------------------------------
// Shared project domain types.
//
// Used by the image builder, the run orchestrator and the CLI. Paths are
// relative to the project directory unless stated otherwise.
// ---------------------------------------------------------------------------

// -- Building blocks --------------------------------------------------------

/** What the entrypoint does when the identity variables are unset. */
export type MissingIdentityPolicy = 'refuse' | 'placeholder'

/** Unprivileged in-container account, created at build time. */
export type AccountConfig = {
  name: string;
  /** Placeholder uid baked into the image, replaced at container start. */
  uid: number;
  /** Placeholder gid baked into the image, replaced at container start. */
  gid: number;
}

export type PythonConfig = {
  /** File holding the interpreter version pin. */
  versionFile: string;
  /** Base image tag suffix (`python:<version>-<variant>`). */
  variant: string;
}

/** Dependency manifests consulted when syncing dependencies into the image. */
export type ManifestsConfig = {
  descriptor: string;
  lock: string;
  devLock: string;
  /** Files mounted for the sync step but never parsed (e.g. README.md). */
  extra: string[];
}

export type IdentityConfig = {
  onMissing: MissingIdentityPolicy;
  uidVar: string;
  gidVar: string;
}

export type EnvFileConfig = {
  path: string;
  /** False for the implicit `.env` default: a missing file is then ignored. */
  required: boolean;
}

// -- Resolved configuration -------------------------------------------------

export type DevcellConfig = {
  /** Image tag. */
  image: string;
  account: AccountConfig;
  python: PythonConfig;
  manifests: ManifestsConfig;
  /** Absolute working directory inside the image. */
  workdir: string;
  /** Host source directory, mounted at `<workdir>/src`. */
  source: string;
  /** Application entry point, relative to the working directory. */
  entry: string;
  envFile: EnvFileConfig;
  mount: {
    /** Also bind each manifest file individually over the baked copy. */
    manifests: boolean;
  };
  identity: IdentityConfig;
}

// -- Raw configuration (.devcell.yml) ---------------------------------------

/** Legacy mount strategy names, kept as aliases. */
export type LegacyMountStrategy = 'whole-tree' | 'per-file'

export type DevcellConfigFile = {
  image?: string;
  account?: Partial<AccountConfig>;
  python?: Partial<PythonConfig>;
  manifests?: Partial<ManifestsConfig>;
  workdir?: string;
  source?: string;
  entry?: string;
  envFile?: string;
  mount?: {
    manifests?: boolean;
    /** @deprecated Use `manifests: true` instead of `per-file`. */
    strategy?: LegacyMountStrategy;
  };
  identity?: Partial<IdentityConfig>;
}
