import type {BuildStage, Instruction} from './stages.js'

const continuation = ' \\\n    '

function renderInstruction(instruction: Instruction): string {
  switch (instruction.kind) {
    case 'arg': {
      return instruction.defaultValue === undefined
        ? `ARG ${instruction.name}`
        : `ARG ${instruction.name}=${instruction.defaultValue}`
    }

    case 'from': {
      return `FROM ${instruction.image}`
    }

    case 'env': {
      return `ENV ${instruction.name}=${instruction.value}`
    }

    case 'shell': {
      return `SHELL ${JSON.stringify(instruction.argv)}`
    }

    case 'run': {
      const mounts = (instruction.mounts ?? []).map(m => `--mount=type=bind,source=${m.source},target=${m.target}`)
      return `RUN ${[...mounts, instruction.commands.join(' && \\\n    ')].join(continuation)}`
    }

    case 'workdir': {
      return `WORKDIR ${instruction.path}`
    }

    case 'copy': {
      const chmod = instruction.chmod ? `--chmod=${instruction.chmod} ` : ''
      return `COPY ${chmod}${instruction.source} ${instruction.target}`
    }

    case 'entrypoint': {
      return `ENTRYPOINT ${JSON.stringify(instruction.argv)}`
    }

    case 'cmd': {
      return `CMD ${JSON.stringify(instruction.argv)}`
    }
  }
}

/**
 * Renders stages into a Dockerfile. Each stage becomes a commented block;
 * the text depends only on the configuration, never on the pin value,
 * which is passed as a build argument.
 */
export function renderDockerfile(stages: BuildStage[]): string {
  const blocks = stages.map(stage => [
    `# -- ${stage.name}: ${stage.description}`,
    ...stage.instructions.map(instruction => renderInstruction(instruction))
  ].join('\n'))

  return ['# syntax=docker/dockerfile:1', ...blocks].join('\n\n') + '\n'
}

/**
 * Allow-list for `Dockerfile.dockerignore`: the build context exposes the
 * declared inputs and nothing else.
 */
export function renderDockerignore(files: string[]): string {
  return ['*', ...files.map(file => `!${file}`)].join('\n') + '\n'
}
