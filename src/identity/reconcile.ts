import {IdentityCollisionError, RootIdentityError} from '../errors.js'
import type {AccountDatabase, AccountRecord} from './account-db.js'
import type {NumericIdentity} from './host-identity.js'

export type GroupIdChange = {
  kind: 'group-id';
  group: string;
  from: number;
  to: number;
}

export type UserIdChange = {
  kind: 'user-id';
  user: string;
  from: number;
  to: number;
}

export type IdentityChange = GroupIdChange | UserIdChange

export type UnchangedOutcome = {
  status: 'unchanged';
  record: AccountRecord;
}

export type AdjustedOutcome = {
  status: 'adjusted';
  previous: AccountRecord;
  record: AccountRecord;
  /** Group change first, then user change, in the order they must be applied. */
  changes: IdentityChange[];
}

export type ReconcileOutcome = UnchangedOutcome | AdjustedOutcome

/**
 * Decides how the account must change to carry `target`'s ids.
 *
 * Pure: `db` and `record` are not modified. Applying the outcome and calling
 * `reconcile` again with the same target yields `unchanged`.
 *
 * @throws {RootIdentityError} when the target uid is 0
 * @throws {IdentityCollisionError} when a target id already belongs to another user or group
 */
export function reconcile(target: NumericIdentity, record: AccountRecord, db: AccountDatabase): ReconcileOutcome {
  if (target.uid === 0) {
    throw new RootIdentityError()
  }

  const changes: IdentityChange[] = []

  if (record.gid !== target.gid) {
    const primaryGroup = db.groups.find(g => g.gid === record.gid)
    const owner = db.groups.find(g => g.gid === target.gid)
    if (owner) {
      throw new IdentityCollisionError('gid', target.gid, owner.name)
    }

    changes.push({kind: 'group-id', group: primaryGroup?.name ?? record.name, from: record.gid, to: target.gid})
  }

  if (record.uid !== target.uid) {
    const owner = db.users.find(u => u.uid === target.uid && u.name !== record.name)
    if (owner) {
      throw new IdentityCollisionError('uid', target.uid, owner.name)
    }

    changes.push({kind: 'user-id', user: record.name, from: record.uid, to: target.uid})
  }

  if (changes.length === 0) {
    return {status: 'unchanged', record}
  }

  return {
    status: 'adjusted',
    previous: record,
    record: {...record, uid: target.uid, gid: target.gid, revision: record.revision + 1},
    changes
  }
}

/**
 * Returns the account database as it looks once `outcome` has been applied.
 */
export function applyOutcome(db: AccountDatabase, outcome: ReconcileOutcome): AccountDatabase {
  if (outcome.status === 'unchanged') {
    return db
  }

  const {previous, record} = outcome
  return {
    users: db.users.map(u => {
      if (u.name === record.name) {
        return {...u, uid: record.uid, gid: record.gid}
      }

      return u.gid === previous.gid ? {...u, gid: record.gid} : u
    }),
    groups: db.groups.map(g => (g.gid === previous.gid ? {...g, gid: record.gid} : g))
  }
}
