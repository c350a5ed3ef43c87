import {posix} from 'node:path'
import {shellQuote} from '../core/shell.js'
import {ownershipCommands} from '../identity/ownership.js'
import type {DevcellConfig, IdentityConfig} from '../types.js'

/** Path the entrypoint is installed at inside the image. */
export const entrypointPath = '/usr/local/bin/entrypoint.sh'

export type EntrypointOptions = {
  account: string;
  /** Directories the account must keep owning after its ids change. */
  ownedPaths: string[];
  identity: IdentityConfig;
}

export function entrypointOptions(config: DevcellConfig): EntrypointOptions {
  return {
    account: config.account.name,
    ownedPaths: [posix.join('/home', config.account.name), config.workdir],
    identity: config.identity
  }
}

function missingIdentityBlock({uidVar, gidVar, onMissing}: IdentityConfig): string[] {
  const body = onMissing === 'placeholder'
    ? [
      `  ${uidVar}=$(id -u "$account") || fail "account $account does not exist"`,
      `  ${gidVar}=$(id -g "$account")`
    ]
    : [`  fail "${uidVar} and ${gidVar} must be set to the host user's ids"`]

  return [
    `if [ -z "\${${uidVar}:-}" ] && [ -z "\${${gidVar}:-}" ]; then`,
    ...body,
    'fi'
  ]
}

/**
 * Renders the POSIX shell entrypoint run as PID 1.
 *
 * Order matters: every check runs before the account is touched, and the
 * workload only starts through `exec gosu`, never as root.
 */
export function renderEntrypointScript(options: EntrypointOptions): string {
  const {uidVar, gidVar} = options.identity
  const reown = options.ownedPaths.flatMap(path => ownershipCommands(path, {
    fromUid: '"$current_uid"',
    toUid: `"$${uidVar}"`,
    fromGid: '"$current_gid"',
    toGid: `"$${gidVar}"`
  }))

  const lines = [
    '#!/bin/sh',
    `# Rendered by devcell. Aligns "${options.account}" with the host identity, then runs the command as that account.`,
    'set -eu',
    '',
    `account=${shellQuote(options.account)}`,
    '',
    'fail() {',
    '  printf \'devcell-entrypoint: %s\\n\' "$*" >&2',
    '  exit 1',
    '}',
    '',
    'is_id() {',
    '  case "$1" in',
    '    \'\' | *[!0-9]*) return 1 ;;',
    '  esac',
    '  [ "${#1}" -le 10 ] && [ "$1" -le 4294967294 ]',
    '}',
    '',
    ...missingIdentityBlock(options.identity),
    '',
    `[ -n "\${${uidVar}:-}" ] || fail "${uidVar} is not set"`,
    `[ -n "\${${gidVar}:-}" ] || fail "${gidVar} is not set"`,
    `is_id "$${uidVar}" || fail "${uidVar} must be a decimal id, got \\"$${uidVar}\\""`,
    `is_id "$${gidVar}" || fail "${gidVar} must be a decimal id, got \\"$${gidVar}\\""`,
    `[ "$${uidVar}" -ne 0 ] || fail "refusing to run the workload as root (uid 0)"`,
    '',
    'command -v gosu >/dev/null 2>&1 || fail "gosu is not installed"',
    '',
    'current_uid=$(id -u "$account") || fail "account $account does not exist"',
    'current_gid=$(id -g "$account")',
    'group=$(id -gn "$account")',
    '',
    `if [ "$current_gid" -ne "$${gidVar}" ]; then`,
    `  owner=$(getent group "$${gidVar}" | cut -d: -f1)`,
    `  [ -z "$owner" ] || fail "gid $${gidVar} is already assigned to group \\"$owner\\""`,
    'fi',
    '',
    `if [ "$current_uid" -ne "$${uidVar}" ]; then`,
    `  owner=$(getent passwd "$${uidVar}" | cut -d: -f1)`,
    `  [ -z "$owner" ] || fail "uid $${uidVar} is already assigned to user \\"$owner\\""`,
    'fi',
    '',
    `if [ "$current_gid" -ne "$${gidVar}" ]; then`,
    `  groupmod -g "$${gidVar}" "$group"`,
    'fi',
    '',
    `if [ "$current_uid" -ne "$${uidVar}" ]; then`,
    `  usermod -u "$${uidVar}" "$account"`,
    'fi',
    '',
    `if [ "$current_uid" -ne "$${uidVar}" ] || [ "$current_gid" -ne "$${gidVar}" ]; then`,
    ...reown.map(line => `  ${line}`),
    'fi',
    '',
    '[ "$#" -gt 0 ] || fail "no command given"',
    'exec gosu "$account" "$@"',
    ''
  ]

  return lines.join('\n')
}
