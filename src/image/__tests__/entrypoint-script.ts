import {readFile, writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import {execa} from 'execa'
import {entrypointOptions, renderEntrypointScript} from '../entrypoint-script.js'
import type {MissingIdentityPolicy} from '../../types.js'
import {createTmpDir, testConfig} from '../../__tests__/helpers.js'

/**
 * Runs the rendered script with a PATH holding no tools, so every
 * failure before the privilege transition can be checked on any host.
 */
async function runScript(env: Record<string, string>, onMissing: MissingIdentityPolicy = 'refuse') {
  const dir = await createTmpDir()
  const script = join(dir, 'entrypoint.sh')
  await writeFile(script, renderEntrypointScript(entrypointOptions(testConfig({identity: {onMissing}}))))
  const result = await execa('/bin/sh', [script, 'python', 'src/main.py'], {
    env: {PATH: dir, ...env},
    extendEnv: false,
    reject: false
  })
  return {exitCode: result.exitCode, lastLine: result.stderr.split('\n').at(-1)}
}

/**
 * Account tools as they behave in the image: "user" holds 999:999 and
 * uid 1001 belongs to "app". Every modifying tool only records its call.
 */
const stubTools: Record<string, string> = {
  id: [
    'case "$1" in',
    '  -u) echo 999 ;;',
    '  -g) echo 999 ;;',
    '  -gn) echo user ;;',
    'esac'
  ].join('\n'),
  getent: [
    'if [ "$1 $2" = "passwd 1001" ]; then',
    '  echo "app:x:1001:1001::/home/app:/bin/sh"',
    '  exit 0',
    'fi',
    'exit 2'
  ].join('\n'),
  groupmod: 'echo "groupmod $*" >> "$STUB_LOG"',
  usermod: 'echo "usermod $*" >> "$STUB_LOG"',
  find: 'echo "find $*" >> "$STUB_LOG"',
  gosu: 'echo "gosu $*" >> "$STUB_LOG"'
}

/**
 * Runs the rendered script against the stub tools and returns the calls
 * they recorded, in order.
 */
async function runWithTools(env: Record<string, string>) {
  const dir = await createTmpDir()
  const script = join(dir, 'entrypoint.sh')
  const log = join(dir, 'calls.log')
  await writeFile(script, renderEntrypointScript(entrypointOptions(testConfig())))
  await writeFile(log, '')
  for (const [name, body] of Object.entries(stubTools)) {
    await writeFile(join(dir, name), `#!/bin/sh\n${body}\n`, {mode: 0o755})
  }

  const result = await execa('/bin/sh', [script, 'python', 'src/main.py'], {
    env: {PATH: `${dir}:/usr/bin:/bin`, STUB_LOG: log, ...env},
    extendEnv: false,
    reject: false
  })
  const calls = (await readFile(log, 'utf8')).split('\n').filter(Boolean)
  return {exitCode: result.exitCode, lastLine: result.stderr.split('\n').at(-1), calls}
}

// -- rendering ---------------------------------------------------------------

test('script is valid POSIX shell', async t => {
  const dir = await createTmpDir()
  const script = join(dir, 'entrypoint.sh')
  await writeFile(script, renderEntrypointScript(entrypointOptions(testConfig())))
  const {exitCode} = await execa('/bin/sh', ['-n', script], {reject: false})
  t.is(exitCode, 0)
})

test('script starts the workload through gosu', t => {
  const lines = renderEntrypointScript(entrypointOptions(testConfig())).split('\n')
  t.is(lines[0], '#!/bin/sh')
  t.is(lines.at(-2), 'exec gosu "$account" "$@"')
  t.true(lines.includes('account=user'))
})

test('collision checks come before any modification', t => {
  const script = renderEntrypointScript(entrypointOptions(testConfig()))
  const lastCheck = script.indexOf('is already assigned to user')
  t.true(lastCheck > 0)
  t.true(lastCheck < script.indexOf('groupmod'))
  t.true(script.indexOf('groupmod') < script.indexOf('usermod'))
  t.true(script.indexOf('usermod') < script.indexOf('chown -h'))
})

test('home and working directory are re-owned', t => {
  const lines = renderEntrypointScript(entrypointOptions(testConfig())).split('\n')
  t.true(lines.includes('  find /home/user -xdev -user "$current_uid" -exec chown -h "$LOCAL_UID" {} +'))
  t.true(lines.includes('  find /workspace -xdev -group "$current_gid" -exec chgrp -h "$LOCAL_GID" {} +'))
})

test('custom identity variable names are used throughout', t => {
  const config = testConfig({identity: {uidVar: 'HOST_UID', gidVar: 'HOST_GID'}})
  const script = renderEntrypointScript(entrypointOptions(config))
  t.false(script.includes('LOCAL_UID'))
  t.true(script.includes('usermod -u "$HOST_UID" "$account"'))
})

// -- failure paths -----------------------------------------------------------

test('refuses when both identity variables are missing', async t => {
  const {exitCode, lastLine} = await runScript({})
  t.is(exitCode, 1)
  t.is(lastLine, 'devcell-entrypoint: LOCAL_UID and LOCAL_GID must be set to the host user\'s ids')
})

test('refuses when only one variable is set', async t => {
  const {exitCode, lastLine} = await runScript({LOCAL_UID: '1000'})
  t.is(exitCode, 1)
  t.is(lastLine, 'devcell-entrypoint: LOCAL_GID is not set')
})

test('placeholder policy looks up the account ids', async t => {
  const {exitCode, lastLine} = await runScript({}, 'placeholder')
  t.is(exitCode, 1)
  t.is(lastLine, 'devcell-entrypoint: account user does not exist')
})

test('rejects a non-decimal id', async t => {
  const {exitCode, lastLine} = await runScript({LOCAL_UID: '12a', LOCAL_GID: '1000'})
  t.is(exitCode, 1)
  t.is(lastLine, 'devcell-entrypoint: LOCAL_UID must be a decimal id, got "12a"')
})

test('rejects an out of range id', async t => {
  const {exitCode, lastLine} = await runScript({LOCAL_UID: '1000', LOCAL_GID: '99999999999'})
  t.is(exitCode, 1)
  t.is(lastLine, 'devcell-entrypoint: LOCAL_GID must be a decimal id, got "99999999999"')
})

test('refuses root', async t => {
  const {exitCode, lastLine} = await runScript({LOCAL_UID: '0', LOCAL_GID: '0'})
  t.is(exitCode, 1)
  t.is(lastLine, 'devcell-entrypoint: refusing to run the workload as root (uid 0)')
})

test('fails without gosu', async t => {
  const {exitCode, lastLine} = await runScript({LOCAL_UID: '1000', LOCAL_GID: '1000'})
  t.is(exitCode, 1)
  t.is(lastLine, 'devcell-entrypoint: gosu is not installed')
})

// -- account adjustment ------------------------------------------------------

test('adjusts the account, re-owns its files and drops privileges', async t => {
  const {exitCode, calls} = await runWithTools({LOCAL_UID: '1000', LOCAL_GID: '1000'})
  t.is(exitCode, 0)
  t.deepEqual(calls, [
    'groupmod -g 1000 user',
    'usermod -u 1000 user',
    'find /home/user -xdev -user 999 -exec chown -h 1000 {} +',
    'find /home/user -xdev -group 999 -exec chgrp -h 1000 {} +',
    'find /workspace -xdev -user 999 -exec chown -h 1000 {} +',
    'find /workspace -xdev -group 999 -exec chgrp -h 1000 {} +',
    'gosu user python src/main.py'
  ])
})

test('matching ids leave the account untouched', async t => {
  const {exitCode, calls} = await runWithTools({LOCAL_UID: '999', LOCAL_GID: '999'})
  t.is(exitCode, 0)
  t.deepEqual(calls, ['gosu user python src/main.py'])
})

test('a uid owned by another account fails before any change', async t => {
  const {exitCode, lastLine, calls} = await runWithTools({LOCAL_UID: '1001', LOCAL_GID: '999'})
  t.is(exitCode, 1)
  t.is(lastLine, 'devcell-entrypoint: uid 1001 is already assigned to user "app"')
  t.deepEqual(calls, [])
})
