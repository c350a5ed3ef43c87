import {AccountNotFoundError} from '../errors.js'

export type PasswdEntry = {
  name: string;
  uid: number;
  gid: number;
  home: string;
  shell: string;
}

export type GroupEntry = {
  name: string;
  gid: number;
  members: string[];
}

/** Snapshot of an image's `/etc/passwd` and `/etc/group`. */
export type AccountDatabase = {
  users: PasswdEntry[];
  groups: GroupEntry[];
}

/**
 * Identity record of the unprivileged account.
 * `revision` increases by one each time reconciliation changes the ids.
 */
export type AccountRecord = {
  name: string;
  uid: number;
  gid: number;
  home: string;
  revision: number;
}

function splitLines(content: string): string[][] {
  return content
    .split('\n')
    .map(line => line.trim())
    .filter(line => line !== '' && !line.startsWith('#'))
    .map(line => line.split(':'))
}

function toId(value: string | undefined): number | undefined {
  return value !== undefined && /^\d+$/.test(value) ? Number(value) : undefined
}

/**
 * Parses `/etc/passwd` content. Lines with non-numeric ids are skipped
 * (NIS `+` entries and the like).
 */
export function parsePasswd(content: string): PasswdEntry[] {
  const entries: PasswdEntry[] = []
  for (const [name, , uidField, gidField, , home = '', shell = ''] of splitLines(content)) {
    const uid = toId(uidField)
    const gid = toId(gidField)
    if (!name || uid === undefined || gid === undefined) {
      continue
    }

    entries.push({name, uid, gid, home, shell})
  }

  return entries
}

export function parseGroup(content: string): GroupEntry[] {
  const entries: GroupEntry[] = []
  for (const [name, , gidField, membersField = ''] of splitLines(content)) {
    const gid = toId(gidField)
    if (!name || gid === undefined) {
      continue
    }

    entries.push({name, gid, members: membersField.split(',').filter(Boolean)})
  }

  return entries
}

export function parseAccountDatabase(passwd: string, group: string): AccountDatabase {
  return {users: parsePasswd(passwd), groups: parseGroup(group)}
}

/**
 * Builds the account record for `name`. The group id is the user's
 * primary group as listed in `/etc/passwd`.
 */
export function findAccount(db: AccountDatabase, name: string): AccountRecord {
  const user = db.users.find(u => u.name === name)
  if (!user) {
    throw new AccountNotFoundError(name)
  }

  return {name: user.name, uid: user.uid, gid: user.gid, home: user.home, revision: 0}
}
