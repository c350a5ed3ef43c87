import {writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import {LockInconsistentError, ManifestError} from '../../errors.js'
import {
  checkLockFidelity,
  fingerprintInputs,
  parseDescriptorDependencies,
  parseLockFile,
  readLockedDependencies,
  resolveManifestSet
} from '../manifests.js'
import {createProject, testConfig} from '../../__tests__/helpers.js'

const pin = {file: '.python-version', raw: '3.12.3', version: '3.12.3'}

// -- resolveManifestSet ------------------------------------------------------

test('resolveManifestSet lists files in build order', async t => {
  const dir = await createProject()
  const {files} = await resolveManifestSet(dir, testConfig())
  t.deepEqual(files.map(f => [f.role, f.path]), [
    ['descriptor', 'pyproject.toml'],
    ['lock', 'requirements.lock'],
    ['dev-lock', 'requirements-dev.lock'],
    ['version', '.python-version'],
    ['extra', 'README.md']
  ])
  t.is(files[0].hostPath, join(dir, 'pyproject.toml'))
})

test('resolveManifestSet drops duplicate paths', async t => {
  const dir = await createProject()
  const config = testConfig({manifests: {extra: ['README.md', 'pyproject.toml']}})
  const {files} = await resolveManifestSet(dir, config)
  t.deepEqual(files.map(f => f.path), ['pyproject.toml', 'requirements.lock', 'requirements-dev.lock', '.python-version', 'README.md'])
})

test('resolveManifestSet rejects a missing lock file', async t => {
  const dir = await createProject({'requirements.lock': null})
  const error = await t.throwsAsync(resolveManifestSet(dir, testConfig()), {instanceOf: ManifestError})
  t.is(error?.file, 'requirements.lock')
  t.is(error?.message, 'Build input "requirements.lock" is missing or unreadable')
})

test('resolveManifestSet rejects a missing extra file', async t => {
  const dir = await createProject({'README.md': null})
  const error = await t.throwsAsync(resolveManifestSet(dir, testConfig()), {instanceOf: ManifestError})
  t.is(error?.file, 'README.md')
})

// -- parseLockFile -----------------------------------------------------------

test('parseLockFile skips comments, options and editable installs', t => {
  const content = [
    '# generated by rye',
    '--index-url https://pypi.org/simple/',
    '-e file:.',
    'requests==2.32.3',
    '',
    'certifi==2024.8.30  # via requests'
  ].join('\n')

  t.deepEqual(parseLockFile(content), [
    {name: 'certifi', version: '2024.8.30'},
    {name: 'requests', version: '2.32.3'}
  ])
})

test('parseLockFile normalizes names and ignores extras and markers', t => {
  const content = 'Typing_Extensions==4.12.2\nuvicorn[standard]==0.30.6\ncolorama==0.4.6 ; sys_platform == "win32"\n'
  t.deepEqual(parseLockFile(content), [
    {name: 'colorama', version: '0.4.6'},
    {name: 'typing-extensions', version: '4.12.2'},
    {name: 'uvicorn', version: '0.30.6'}
  ])
})

test('parseLockFile keeps the last entry for a repeated name', t => {
  t.deepEqual(parseLockFile('zope.interface==6.0\nzope-interface==7.0\n'), [
    {name: 'zope-interface', version: '7.0'}
  ])
})

test('parseLockFile ignores unpinned requirements', t => {
  t.deepEqual(parseLockFile('requests>=2\nflask\n'), [])
})

test('readLockedDependencies reads the production lock by default', async t => {
  const dir = await createProject()
  const manifests = await resolveManifestSet(dir, testConfig())
  t.deepEqual((await readLockedDependencies(manifests)).map(d => d.name), ['certifi', 'requests', 'urllib3'])
  t.deepEqual((await readLockedDependencies(manifests, 'dev-lock')).map(d => d.name), ['certifi', 'pytest', 'requests', 'urllib3'])
})

// -- lock fidelity -----------------------------------------------------------

test('parseDescriptorDependencies normalizes and sorts names', t => {
  const content = [
    '[project]',
    'name = "sample"',
    'dependencies = [',
    '  "Requests[socks]>=2",',
    '  "zope.interface",',
    '  "typing_extensions ; python_version < \'3.11\'",',
    '  "requests<3",',
    ']'
  ].join('\n')

  t.deepEqual(parseDescriptorDependencies(content, 'pyproject.toml'), ['requests', 'typing-extensions', 'zope-interface'])
})

test('parseDescriptorDependencies accepts a descriptor without dependencies', t => {
  t.deepEqual(parseDescriptorDependencies('[project]\nname = "sample"\n', 'pyproject.toml'), [])
  t.deepEqual(parseDescriptorDependencies('[tool.rye]\nmanaged = true\n', 'pyproject.toml'), [])
})

test('parseDescriptorDependencies rejects invalid TOML and shapes', t => {
  const syntax = t.throws(() => parseDescriptorDependencies('[project\n', 'pyproject.toml'), {instanceOf: ManifestError})
  t.is(syntax?.code, 'MANIFEST_INVALID')
  t.is(syntax?.message, 'Cannot parse "pyproject.toml"')

  const list = t.throws(() => parseDescriptorDependencies('[project]\ndependencies = "requests"\n', 'pyproject.toml'), {instanceOf: ManifestError})
  t.is(list?.message, '"project.dependencies" in "pyproject.toml" must be a list')

  const item = t.throws(() => parseDescriptorDependencies('[project]\ndependencies = [3]\n', 'pyproject.toml'), {instanceOf: ManifestError})
  t.is(item?.message, 'Invalid requirement 3 in "pyproject.toml"')
})

test('checkLockFidelity passes when every declared dependency is pinned', async t => {
  const dir = await createProject()
  const manifests = await resolveManifestSet(dir, testConfig())
  await t.notThrowsAsync(checkLockFidelity(manifests, await readLockedDependencies(manifests)))
})

test('checkLockFidelity lists declared dependencies missing from the lock', async t => {
  const dir = await createProject({
    'pyproject.toml': '[project]\nname = "sample"\ndependencies = ["requests>=2", "Flask>=3", "pytest"]\n'
  })
  const manifests = await resolveManifestSet(dir, testConfig())
  const error = await t.throwsAsync(checkLockFidelity(manifests, await readLockedDependencies(manifests)), {instanceOf: LockInconsistentError})
  t.is(error?.code, 'LOCK_INCONSISTENT')
  t.is(error?.file, 'requirements.lock')
  t.is(error?.descriptor, 'pyproject.toml')
  t.deepEqual(error?.missing, ['flask', 'pytest'])
  t.is(error?.message, 'Lock file "requirements.lock" does not pin flask, pytest, declared in "pyproject.toml"')
})

// -- fingerprintInputs -------------------------------------------------------

test('fingerprint is stable for identical inputs', async t => {
  const first = await createProject()
  const second = await createProject()
  const a = await fingerprintInputs(pin, await resolveManifestSet(first, testConfig()))
  const b = await fingerprintInputs(pin, await resolveManifestSet(second, testConfig()))
  t.regex(a, /^[\da-f]{64}$/)
  t.is(a, b)
})

test('fingerprint changes with the lock file', async t => {
  const dir = await createProject()
  const config = testConfig()
  const before = await fingerprintInputs(pin, await resolveManifestSet(dir, config))
  await writeFile(join(dir, 'requirements.lock'), 'requests==2.31.0\n')
  const after = await fingerprintInputs(pin, await resolveManifestSet(dir, config))
  t.not(before, after)
})

test('fingerprint changes with the version pin', async t => {
  const dir = await createProject()
  const manifests = await resolveManifestSet(dir, testConfig())
  const a = await fingerprintInputs(pin, manifests)
  const b = await fingerprintInputs({...pin, raw: '3.12.4', version: '3.12.4'}, manifests)
  t.not(a, b)
})

test('fingerprint ignores extra files', async t => {
  const dir = await createProject()
  const config = testConfig()
  const before = await fingerprintInputs(pin, await resolveManifestSet(dir, config))
  await writeFile(join(dir, 'README.md'), '# rewritten\n')
  const after = await fingerprintInputs(pin, await resolveManifestSet(dir, config))
  t.is(before, after)
})
