import {writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import {testConfig, createTmpDir} from '../../__tests__/helpers.js'
import {requestedIdentity} from '../../identity/host-identity.js'
import {defaultProjectDir} from '../utils.js'

// -- defaultProjectDir -------------------------------------------------------

test('defaultProjectDir prefers the environment', async t => {
  const cwd = await createTmpDir()
  await writeFile(join(cwd, '.env'), 'DEVCELL_PROJECT=from-file\n')
  t.is(await defaultProjectDir({DEVCELL_PROJECT: 'from-env'}, cwd), 'from-env')
})

test('defaultProjectDir falls back to the current directory', async t => {
  const cwd = await createTmpDir()
  t.is(await defaultProjectDir({}, cwd), '.')
})

test('a .env file never changes the run identity', async t => {
  const cwd = await createTmpDir()
  await writeFile(join(cwd, '.env'), 'LOCAL_UID=4242\nLOCAL_GID=4242\nDEVCELL_PROJECT=app\n')
  const env: Record<string, string | undefined> = {HOME: '/home/dev'}

  t.is(await defaultProjectDir(env, cwd), 'app')
  t.deepEqual(env, {HOME: '/home/dev'})
  t.deepEqual(
    requestedIdentity(env, testConfig().identity, {uid: 1000, gid: 1000}),
    {uid: 1000, gid: 1000, source: 'host'}
  )
})
