/**
 * Credentials used to sign URLs, and the boundary with whatever
 * supplies them (an SDK client, the environment, a vault...).
 *
 * The signer captures credentials once and never refreshes them:
 * if they're temporary and expire, URLs signed afterwards are invalid
 * and a new signer has to be created.
 */
/** */

import { KeyPair } from './core'

/** Long-lived access key pair */
export interface PlainCredentials extends Readonly<KeyPair> {
    readonly kind: 'plain'
}

/** Temporary (STS) credentials, whose session token is added to signed URLs */
export interface TemporaryCredentials extends Readonly<KeyPair> {
    readonly kind: 'temporary'
    readonly sessionToken: string
}

export type Credentials = PlainCredentials | TemporaryCredentials

/**
 * Credentials as the AWS SDK represents them
 * (structurally compatible with `AwsCredentialIdentity`).
 */
export interface CredentialIdentity {
    accessKeyId: string
    secretAccessKey: string
    sessionToken?: string
}

/** A blocking or a suspending source of credentials */
export type CredentialProvider = () => CredentialIdentity | Promise<CredentialIdentity>

export function plainCredentials(accessKey: string, secretKey: string): PlainCredentials {
    return Object.freeze({ kind: 'plain', accessKey, secretKey })
}

export function temporaryCredentials(accessKey: string, secretKey: string, sessionToken: string): TemporaryCredentials {
    return Object.freeze({ kind: 'temporary', accessKey, secretKey, sessionToken })
}

/** Convert an SDK credential identity. An empty session token counts as absent. */
export function fromIdentity(identity: CredentialIdentity): Credentials {
    const { accessKeyId, secretAccessKey, sessionToken } = identity
    return sessionToken ?
        temporaryCredentials(accessKeyId, secretAccessKey, sessionToken) :
        plainCredentials(accessKeyId, secretAccessKey)
}

/**
 * Ask a provider for its current credentials. Note that SDK providers
 * may refresh their credentials as a result of this call.
 */
export async function resolveCredentials(provider: CredentialProvider): Promise<Credentials> {
    return fromIdentity(await provider())
}
