import process from 'node:process'
import {maxNumericId} from '../core/config.js'
import {IdentityError, MalformedIdentityError, MissingIdentityError} from '../errors.js'
import type {IdentityConfig} from '../types.js'

/** Numeric user and group identifiers. */
export type NumericIdentity = {
  uid: number;
  gid: number;
}

/** Identity the entrypoint is asked to adopt, with where it came from. */
export type RequestedIdentity = NumericIdentity & {
  source: 'environment' | 'placeholder' | 'host';
}

type IdentitySource = {
  getuid?: () => number;
  getgid?: () => number;
}

/**
 * Captures the invoking user's numeric identity.
 * Called once, synchronously, when the run command starts.
 */
export function captureHostIdentity(source: IdentitySource = process): NumericIdentity {
  if (!source.getuid || !source.getgid) {
    throw new IdentityError('HOST_IDENTITY_UNAVAILABLE', 'The host platform exposes no numeric user identity')
  }

  return {uid: source.getuid(), gid: source.getgid()}
}

export function parseNumericId(variable: string, value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new MalformedIdentityError(variable, value)
  }

  const id = Number(value)
  if (id > maxNumericId) {
    throw new MalformedIdentityError(variable, value)
  }

  return id
}

/**
 * Reads the requested identity from the two identity variables.
 *
 * - both set: parsed as decimal ids
 * - both unset: `refuse` throws, `placeholder` keeps the build-time ids
 * - only one set: always an error, a half-applied identity is never used
 */
export function readIdentityEnv(
  env: Record<string, string | undefined>,
  options: {identity: IdentityConfig; placeholder: NumericIdentity}
): RequestedIdentity {
  const {uidVar, gidVar, onMissing} = options.identity
  const rawUid = env[uidVar]
  const rawGid = env[gidVar]
  const missing = [
    ...(rawUid === undefined || rawUid === '' ? [uidVar] : []),
    ...(rawGid === undefined || rawGid === '' ? [gidVar] : [])
  ]

  if (missing.length === 2 && onMissing === 'placeholder') {
    return {...options.placeholder, source: 'placeholder'}
  }

  if (missing.length > 0 || rawUid === undefined || rawGid === undefined) {
    throw new MissingIdentityError(missing)
  }

  return {
    uid: parseNumericId(uidVar, rawUid),
    gid: parseNumericId(gidVar, rawGid),
    source: 'environment'
  }
}

/**
 * Identity for a run: the identity variables when the caller sets either
 * of them (both are then required), otherwise the captured host identity.
 */
export function requestedIdentity(
  env: Record<string, string | undefined>,
  identity: IdentityConfig,
  host: NumericIdentity
): RequestedIdentity {
  if (!env[identity.uidVar] && !env[identity.gidVar]) {
    return {...host, source: 'host'}
  }

  return readIdentityEnv(env, {identity, placeholder: host})
}

/** Environment entries handing an identity to the entrypoint. */
export function identityEnv(identity: NumericIdentity, config: IdentityConfig): Record<string, string> {
  return {
    [config.uidVar]: String(identity.uid),
    [config.gidVar]: String(identity.gid)
  }
}
