import {posix} from 'node:path'
import {StageError} from '../errors.js'
import type {ManifestSet} from '../core/manifests.js'
import type {DevcellConfig} from '../types.js'
import {entrypointPath} from './entrypoint-script.js'

// -- Instructions -----------------------------------------------------------

/** Build-time bind mount of a context file, not persisted into the layer. */
export type BuildMount = {
  /** Path relative to the build context. */
  source: string;
  /** Path in the image, relative to the working directory. */
  target: string;
}

export type Instruction =
  | {kind: 'arg'; name: string; defaultValue?: string}
  | {kind: 'from'; image: string}
  | {kind: 'env'; name: string; value: string}
  | {kind: 'shell'; argv: string[]}
  | {kind: 'run'; commands: string[]; mounts?: BuildMount[]}
  | {kind: 'workdir'; path: string}
  | {kind: 'copy'; source: string; target: string; chmod?: string}
  | {kind: 'entrypoint'; argv: string[]}
  | {kind: 'cmd'; argv: string[]}

// -- Stages -----------------------------------------------------------------

export type StageName =
  | 'base-runtime'
  | 'system-tools'
  | 'account'
  | 'package-manager'
  | 'workdir'
  | 'dependencies'
  | 'entrypoint'

/** Something a stage consumes: a build argument, a context file, or another stage's artifact. */
export type StageInput =
  | {kind: 'build-arg'; name: string}
  | {kind: 'file'; path: string}
  | {kind: 'artifact'; name: string}

/**
 * A named build step with explicit inputs and outputs.
 * Stages are rendered in order; each may only consume artifacts of earlier stages.
 */
export type BuildStage = {
  name: StageName;
  description: string;
  inputs: StageInput[];
  /** Artifacts available to later stages. */
  outputs: string[];
  instructions: Instruction[];
}

/** Build argument carrying the interpreter version pin. */
export const versionBuildArg = 'PYTHON_VERSION'

/** Tools installed in the image, and nothing else. */
export const systemTools = ['curl', 'gosu'] as const

export const packageManagerInstaller = 'https://rye.astral.sh/get'

export type StageContext = {
  config: DevcellConfig;
  manifests: ManifestSet;
  /** Rendered entrypoint script, relative to the build context. */
  entrypointSource: string;
}

export function defineStages({config, manifests, entrypointSource}: StageContext): BuildStage[] {
  const {account} = config
  const home = posix.join('/home', account.name)
  const ryeHome = posix.join(home, '.rye')
  const owner = `${account.uid}:${account.gid}`
  const manifestMounts = manifests.files.map(file => ({source: file.path, target: file.path}))

  return [
    {
      name: 'base-runtime',
      description: 'Slim interpreter runtime selected by the version pin',
      inputs: [{kind: 'build-arg', name: versionBuildArg}],
      outputs: ['runtime'],
      instructions: [
        {kind: 'arg', name: versionBuildArg},
        {kind: 'from', image: `python:\${${versionBuildArg}}-${config.python.variant}`},
        // ARG values declared before FROM are out of scope afterwards
        {kind: 'arg', name: versionBuildArg},
        {kind: 'env', name: 'PYTHONDONTWRITEBYTECODE', value: '1'},
        {kind: 'env', name: 'PYTHONUNBUFFERED', value: '1'}
      ]
    },
    {
      name: 'system-tools',
      description: 'Secure download and privilege transition tools',
      inputs: [{kind: 'artifact', name: 'runtime'}],
      outputs: [...systemTools],
      instructions: [
        {
          kind: 'run',
          commands: [
            'apt-get update',
            `apt-get install -y --no-install-recommends ${systemTools.join(' ')}`,
            'apt-get -y clean',
            'rm -rf /var/lib/apt/lists/*'
          ]
        }
      ]
    },
    {
      name: 'account',
      description: `Unprivileged account "${account.name}" with placeholder ids`,
      inputs: [{kind: 'artifact', name: 'runtime'}],
      outputs: ['account'],
      instructions: [
        {
          kind: 'run',
          commands: [
            `groupadd --gid ${account.gid} ${account.name}`,
            `useradd --uid ${account.uid} --gid ${account.gid} --create-home --shell /bin/bash ${account.name}`
          ]
        }
      ]
    },
    {
      name: 'package-manager',
      description: 'Dependency manager in global mode, pinned to the interpreter version',
      inputs: [
        {kind: 'artifact', name: 'curl'},
        {kind: 'artifact', name: 'account'},
        {kind: 'build-arg', name: versionBuildArg}
      ],
      outputs: ['rye'],
      instructions: [
        {kind: 'env', name: 'RYE_HOME', value: ryeHome},
        {kind: 'env', name: 'PATH', value: `${ryeHome}/shims:` + '${PATH}'},
        {kind: 'shell', argv: ['/bin/bash', '-o', 'pipefail', '-c']},
        {
          kind: 'run',
          commands: [
            `curl -sSf ${packageManagerInstaller} | RYE_NO_AUTO_INSTALL=1 RYE_INSTALL_OPTION="--yes" bash`,
            'rye config --set-bool behavior.global-python=true',
            'rye config --set-bool behavior.use-uv=true',
            `rye pin \${${versionBuildArg}}`,
            `chown -R ${owner} ${ryeHome}`
          ]
        }
      ]
    },
    {
      name: 'workdir',
      description: `Working directory ${config.workdir}`,
      inputs: [{kind: 'artifact', name: 'account'}],
      outputs: ['workdir'],
      instructions: [
        {kind: 'run', commands: [`mkdir -p ${config.workdir}`, `chown ${owner} ${config.workdir}`]},
        {kind: 'workdir', path: config.workdir}
      ]
    },
    {
      name: 'dependencies',
      description: 'Production dependencies synced from the lock files, without re-locking',
      inputs: [
        {kind: 'artifact', name: 'rye'},
        {kind: 'artifact', name: 'workdir'},
        ...manifests.files.map((file): StageInput => ({kind: 'file', path: file.path}))
      ],
      outputs: ['site-packages'],
      instructions: [
        {kind: 'run', mounts: manifestMounts, commands: ['rye sync --no-dev --no-lock']}
      ]
    },
    {
      name: 'entrypoint',
      description: 'Identity-reconciling entrypoint as process 1',
      inputs: [
        {kind: 'artifact', name: 'gosu'},
        {kind: 'artifact', name: 'account'},
        {kind: 'artifact', name: 'workdir'},
        {kind: 'file', path: entrypointSource}
      ],
      outputs: ['entrypoint'],
      instructions: [
        {kind: 'copy', source: entrypointSource, target: entrypointPath, chmod: '0755'},
        {kind: 'entrypoint', argv: [entrypointPath]},
        {kind: 'cmd', argv: ['python', config.entry]}
      ]
    }
  ]
}

/**
 * Checks stage names are unique and every consumed artifact is produced
 * by an earlier stage.
 */
export function validateStages(stages: BuildStage[]): void {
  const names = new Set<string>()
  const produced = new Map<string, string>()

  for (const stage of stages) {
    if (names.has(stage.name)) {
      throw new StageError(`Duplicate stage: '${stage.name}'`)
    }

    names.add(stage.name)

    for (const input of stage.inputs) {
      if (input.kind === 'artifact' && !produced.has(input.name)) {
        throw new StageError(`Stage '${stage.name}' consumes '${input.name}', which no earlier stage produces`)
      }
    }

    for (const output of stage.outputs) {
      const producer = produced.get(output)
      if (producer) {
        throw new StageError(`Artifact '${output}' is produced by both '${producer}' and '${stage.name}'`)
      }

      produced.set(output, stage.name)
    }
  }

  const [first] = stages
  if (!first) {
    throw new StageError('A build needs at least one stage')
  }

  if (first.instructions.every(i => i.kind !== 'from')) {
    throw new StageError(`First stage '${first.name}' must select a base image`)
  }
}

/** Context files the build reads, in first-use order. */
export function contextFiles(stages: BuildStage[]): string[] {
  const files = new Set<string>()
  for (const stage of stages) {
    for (const input of stage.inputs) {
      if (input.kind === 'file') {
        files.add(input.path)
      }
    }
  }

  return [...files]
}
