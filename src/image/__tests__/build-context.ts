import {readFile, stat} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import {resolveManifestSet} from '../../core/manifests.js'
import {renderBuildContext, writeBuildContext} from '../build-context.js'
import {createProject, testConfig} from '../../__tests__/helpers.js'

test('renderBuildContext exposes only the declared inputs', async t => {
  const dir = await createProject()
  const config = testConfig()
  const rendered = renderBuildContext(config, await resolveManifestSet(dir, config))
  t.is(rendered.dockerignore, [
    '*',
    '!pyproject.toml',
    '!requirements.lock',
    '!requirements-dev.lock',
    '!.python-version',
    '!README.md',
    '!.devcell/entrypoint.sh',
    ''
  ].join('\n'))
  t.is(rendered.stages.length, 7)
})

test('writeBuildContext writes the generated files', async t => {
  const dir = await createProject()
  const config = testConfig()
  const rendered = renderBuildContext(config, await resolveManifestSet(dir, config))
  const paths = await writeBuildContext(dir, rendered)

  t.deepEqual(paths, {
    contextDir: dir,
    dockerfile: join(dir, '.devcell', 'Dockerfile'),
    dockerignore: join(dir, '.devcell', 'Dockerfile.dockerignore'),
    entrypoint: join(dir, '.devcell', 'entrypoint.sh')
  })
  t.is(await readFile(paths.dockerfile, 'utf8'), rendered.dockerfile)
  t.is(await readFile(paths.dockerignore, 'utf8'), rendered.dockerignore)
  t.is((await stat(paths.entrypoint)).mode & 0o777, 0o755)
})

test('writeBuildContext overwrites a previous render', async t => {
  const dir = await createProject()
  const config = testConfig()
  const manifests = await resolveManifestSet(dir, config)
  await writeBuildContext(dir, renderBuildContext(testConfig({entry: 'src/other.py'}), manifests))
  const paths = await writeBuildContext(dir, renderBuildContext(config, manifests))
  const dockerfile = await readFile(paths.dockerfile, 'utf8')
  t.true(dockerfile.includes('CMD ["python","src/main.py"]'))
  t.false(dockerfile.includes('src/other.py'))
})
