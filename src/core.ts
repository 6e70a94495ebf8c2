/**
 * Common AWS Signature version 4 primitives.
 *
 * This module contains only the parts of the signing process that don't
 * depend on the message being signed: [[formatTimestamp]] to generate
 * timestamps, [[getSigningData]] to derive the signing key, and
 * [[signDigest]] to sign a canonical request hash with it.
 */
/** */

import { createHmac } from 'crypto'

export interface SigningData {
    key: Buffer
    scope: string
}

/** Anything holding a key pair; see `Credentials` in the credentials module */
export interface KeyPair {
    accessKey: string
    secretKey: string
}

/** Format the date stamp for [[getSigningData]] (low-level). */
export function formatDate(date?: Date) {
    return formatTimestamp(date).substring(0, 8)
}

/** Format the timestamp for a request (low-level) */
export function formatTimestamp(date?: Date) {
    const str = (date || new Date()).toISOString()
    if (str.length !== 24) {
        throw new Error('Unexpected ISO string when formatting date')
    }
    return str.substring(0, 19).replace(/[:-]/g, '') + 'Z'
}

/**
 * Derive the signature key and credential scope (low-level)
 *
 * `dateStamp` can be created with [[formatDate]]. Because it's cropped
 * to 8 characters, a full timestamp (see [[formatTimestamp]]) also works.
 *
 * @category Key derivation
 */
export function getSigningData(dateStamp: string, secretKey: string, regionName: string, serviceName: string): SigningData {
    dateStamp = dateStamp.substring(0, 8)
    const parts = [dateStamp, regionName, serviceName, 'aws4_request']
    let key: Buffer = Buffer.from('AWS4' + secretKey)
    for (const part of parts) {
        key = createHmac('sha256', key).update(part).digest()
    }
    return { key, scope: parts.join('/') }
}

/**
 * Convenience version of [[getSigningData]] that also returns
 * the credential string (`<access key>/<scope>`).
 *
 * @param timestamp The timestamp / date stamp
 * @category Key derivation
 */
export function getSigning(timestamp: string, credentials: KeyPair, regionName: string, serviceName: string) {
    const { accessKey, secretKey } = credentials
    const signing = getSigningData(timestamp, secretKey, regionName, serviceName)
    return { signing, credential: `${accessKey}/${signing.scope}` }
}

/**
 * Sign an arbitrary string using the derived key (low-level)
 *
 * @param key The signing key obtained from [[getSigningData]]
 * @returns The binary signature
 * @category Signing
 */
export const signString = (key: Buffer, sts: string | Buffer) =>
    createHmac('sha256', key).update(sts).digest()

/** Main algorithm ID, used by [[signDigest]] */
export const ALGORITHM = 'AWS4-HMAC-SHA256'

/**
 * Construct the string to sign for a payload digest, and sign it with [[signString]]
 *
 * @param payloadDigest The canonical request digest (hex-encoded SHA-256)
 * @param timestamp Timestamp used in the request
 * @param signing The signing data (its date should match `timestamp`)
 * @returns The binary signature
 * @category Signing
 */
export const signDigest = (payloadDigest: string, timestamp: string,
        signing: SigningData, algorithm: string = ALGORITHM) =>
    signString(signing.key,
        [algorithm, timestamp, signing.scope, payloadDigest].join('\n'))
