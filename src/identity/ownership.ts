import {shellQuote} from '../core/shell.js'
import type {ReconcileOutcome} from './reconcile.js'

/**
 * Re-owns what is still owned by the previous ids under `path`.
 * User and group are handled separately so a file owned by another user
 * but the account's old group only has its group changed.
 */
export type OwnershipOperation = {
  path: string;
  user?: {from: number; to: number};
  group?: {from: number; to: number};
}

/** Shell expressions standing for ids only known when the entrypoint runs. */
export type OwnershipVariables = {
  fromUid: string;
  toUid: string;
  fromGid: string;
  toGid: string;
}

/**
 * Filesystem follow-up to a reconcile outcome. Empty when nothing changed.
 */
export function planOwnership(outcome: ReconcileOutcome, paths: string[]): OwnershipOperation[] {
  if (outcome.status === 'unchanged') {
    return []
  }

  const {previous, record} = outcome
  const user = previous.uid === record.uid ? undefined : {from: previous.uid, to: record.uid}
  const group = previous.gid === record.gid ? undefined : {from: previous.gid, to: record.gid}

  return [...new Set(paths)].map(path => ({path, user, group}))
}

function chownCommand(path: string, from: string, to: string): string {
  return `find ${shellQuote(path)} -xdev -user ${from} -exec chown -h ${to} {} +`
}

function chgrpCommand(path: string, from: string, to: string): string {
  return `find ${shellQuote(path)} -xdev -group ${from} -exec chgrp -h ${to} {} +`
}

/**
 * `find` invocations for one path. `-xdev` keeps them off bind mounts,
 * `-h` re-owns symlinks rather than their targets.
 */
export function ownershipCommands(path: string, ids: OwnershipVariables): string[] {
  return [
    chownCommand(path, ids.fromUid, ids.toUid),
    chgrpCommand(path, ids.fromGid, ids.toGid)
  ]
}

export function renderOwnershipOperation({path, user, group}: OwnershipOperation): string[] {
  const commands: string[] = []
  if (user) {
    commands.push(chownCommand(path, String(user.from), String(user.to)))
  }

  if (group) {
    commands.push(chgrpCommand(path, String(group.from), String(group.to)))
  }

  return commands
}
