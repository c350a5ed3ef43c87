import {chmod, mkdir, writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import type {ManifestSet} from '../core/manifests.js'
import type {DevcellConfig} from '../types.js'
import {renderDockerfile, renderDockerignore} from './dockerfile.js'
import {entrypointOptions, renderEntrypointScript} from './entrypoint-script.js'
import {contextFiles, defineStages, validateStages, type BuildStage} from './stages.js'

/** Directory, relative to the project, holding the generated build files. */
export const contextDirName = '.devcell'

export type RenderedBuildContext = {
  stages: BuildStage[];
  dockerfile: string;
  dockerignore: string;
  entrypoint: string;
}

export type BuildContextPaths = {
  /** Build context root (the project directory). */
  contextDir: string;
  dockerfile: string;
  dockerignore: string;
  entrypoint: string;
}

export function renderBuildContext(config: DevcellConfig, manifests: ManifestSet): RenderedBuildContext {
  const stages = defineStages({config, manifests, entrypointSource: `${contextDirName}/entrypoint.sh`})
  validateStages(stages)

  return {
    stages,
    dockerfile: renderDockerfile(stages),
    dockerignore: renderDockerignore(contextFiles(stages)),
    entrypoint: renderEntrypointScript(entrypointOptions(config))
  }
}

/**
 * Writes the generated files under `<project>/.devcell/`.
 * `Dockerfile.dockerignore` sits next to the Dockerfile, where BuildKit
 * looks for a Dockerfile-specific ignore file.
 */
export async function writeBuildContext(projectDir: string, rendered: RenderedBuildContext): Promise<BuildContextPaths> {
  const dir = join(projectDir, contextDirName)
  await mkdir(dir, {recursive: true})

  const paths: BuildContextPaths = {
    contextDir: projectDir,
    dockerfile: join(dir, 'Dockerfile'),
    dockerignore: join(dir, 'Dockerfile.dockerignore'),
    entrypoint: join(dir, 'entrypoint.sh')
  }

  await writeFile(paths.dockerfile, rendered.dockerfile, 'utf8')
  await writeFile(paths.dockerignore, rendered.dockerignore, 'utf8')
  await writeFile(paths.entrypoint, rendered.entrypoint, 'utf8')
  await chmod(paths.entrypoint, 0o755)

  return paths
}
