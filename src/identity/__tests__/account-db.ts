import test from 'ava'
import {AccountNotFoundError} from '../../errors.js'
import {findAccount, parseAccountDatabase, parseGroup, parsePasswd} from '../account-db.js'
import {imageGroup, imagePasswd} from '../../__tests__/helpers.js'

test('parsePasswd reads every entry', t => {
  const users = parsePasswd(imagePasswd)
  t.deepEqual(users.map(u => u.name), ['root', 'daemon', 'user', 'app', 'nobody'])
  t.deepEqual(users[2], {name: 'user', uid: 999, gid: 999, home: '/home/user', shell: '/bin/bash'})
})

test('parsePasswd skips comments and malformed ids', t => {
  const users = parsePasswd('# local users\n+::::::\nbroken:x:abc:1::/:/bin/sh\n\nok:x:5:5::/home/ok:/bin/sh\n')
  t.deepEqual(users, [{name: 'ok', uid: 5, gid: 5, home: '/home/ok', shell: '/bin/sh'}])
})

test('parseGroup reads members', t => {
  const groups = parseGroup(imageGroup)
  t.deepEqual(groups.find(g => g.name === 'staff'), {name: 'staff', gid: 50, members: ['app', 'daemon']})
  t.deepEqual(groups.find(g => g.name === 'user'), {name: 'user', gid: 999, members: []})
})

test('findAccount builds a record at revision 0', t => {
  const db = parseAccountDatabase(imagePasswd, imageGroup)
  t.deepEqual(findAccount(db, 'user'), {name: 'user', uid: 999, gid: 999, home: '/home/user', revision: 0})
})

test('findAccount rejects an unknown account', t => {
  const db = parseAccountDatabase(imagePasswd, imageGroup)
  const error = t.throws(() => findAccount(db, 'ghost'), {instanceOf: AccountNotFoundError})
  t.is(error?.message, 'Account "ghost" not found in the image')
})
