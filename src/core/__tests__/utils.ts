import {writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import {formatDuration, isDirectory} from '../utils.js'
import {createTmpDir} from '../../__tests__/helpers.js'

test('formatDuration: milliseconds', t => {
  t.is(formatDuration(250), '250ms')
})

test('formatDuration: seconds', t => {
  t.is(formatDuration(1500), '1.5s')
})

test('formatDuration: minutes', t => {
  t.is(formatDuration(125_000), '2m 5s')
})

test('isDirectory: true for a directory', async t => {
  t.true(await isDirectory(await createTmpDir()))
})

test('isDirectory: false for a file or a missing path', async t => {
  const dir = await createTmpDir()
  await writeFile(join(dir, 'file.txt'), 'x')
  t.false(await isDirectory(join(dir, 'file.txt')))
  t.false(await isDirectory(join(dir, 'missing')))
})
