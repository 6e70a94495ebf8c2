/**
 * This module generates presigned GET URLs for objects of a bucket,
 * see [[S3UrlSigner]].
 *
 * Unlike signing each URL separately, everything that only depends on
 * the time and the credentials (timestamp, signing key, credential
 * scope and the query string) is computed once per batch, so each
 * object key costs one hash and one HMAC.
 */
/** */

import { createHash } from 'crypto'

import { ALGORITHM, formatTimestamp, getSigning, signDigest } from './core'
import { Credentials } from './credentials'
import { InvalidArgumentError } from './errors'
import { uriEncode } from './util/encoding'
import { DEFAULT_REGION, parseBucketEndpoint } from './util/endpoint'

/** Maximum value for the X-Amz-Expires query parameter */
export const EXPIRES_MAX = 604800

/** Default validity of presigned URLs, in seconds */
export const EXPIRES_DEFAULT = 3600

/** Special value for payload digest, which indicates the payload is not signed */
export const PAYLOAD_UNSIGNED = 'UNSIGNED-PAYLOAD'

const SERVICE_NAME = 's3'
const SIGNED_HEADERS = 'host'

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/

export interface S3UrlSignerOptions {
    /**
     * URL of the bucket, either virtual-hosted style
     * (`https://my-bucket.s3.amazonaws.com/`) or path style
     * (`https://s3.amazonaws.com/my-bucket/`)
     */
    bucketEndpointUrl: string
    credentials: Credentials
    /** Region to sign for (default: [[DEFAULT_REGION]]) */
    regionName?: string
}

export interface PresignOptions {
    /** Validity of the URLs in seconds, from 1 to [[EXPIRES_MAX]] (default: 3600) */
    expiresIn?: number
    /** Time to sign at (default: now) */
    signingDate?: Date
}

function validateOptions(options?: PresignOptions) {
    const expiresIn = (options && options.expiresIn !== undefined) ?
        options.expiresIn : EXPIRES_DEFAULT
    if (!Number.isInteger(expiresIn) || expiresIn < 1 || expiresIn > EXPIRES_MAX) {
        throw new InvalidArgumentError(
            `'expiresIn' must be an integer between 1 and ${EXPIRES_MAX}, got ${expiresIn}`)
    }
    const signingDate = options && options.signingDate
    if (signingDate !== undefined) {
        if (isNaN(signingDate.getTime())) {
            throw new InvalidArgumentError(`'signingDate' is an invalid date`)
        }
        // timestamps only have room for 4-digit years
        const year = signingDate.getUTCFullYear()
        if (year < 0 || year > 9999) {
            throw new InvalidArgumentError(`'signingDate' must be within years 0000-9999, got ${year}`)
        }
    }
    return { expiresIn, signingDate }
}

/**
 * Batch generator of SigV4 presigned GET URLs for a single bucket.
 *
 * Instances are immutable and hold no per-call state, so they can be
 * shared freely. The credentials are captured at construction time
 * and never refreshed.
 */
export class S3UrlSigner {
    readonly canonicalUriPrefix: string
    readonly endpointUrl: string
    readonly bucketHost: string
    readonly regionName: string
    readonly credentials: Credentials

    /**
     * @throws MalformedEndpointError if `bucketEndpointUrl` can't be parsed
     */
    constructor(options: S3UrlSignerOptions) {
        const { endpointUrl, bucketHost, canonicalUriPrefix } =
            parseBucketEndpoint(options.bucketEndpointUrl)
        this.canonicalUriPrefix = canonicalUriPrefix
        this.endpointUrl = endpointUrl
        this.bucketHost = bucketHost
        this.regionName = options.regionName || DEFAULT_REGION
        this.credentials = options.credentials
    }

    /**
     * Generate presigned GET URLs for the passed object keys, in the
     * same order. All of them share the same timestamp and expiry.
     *
     * @param objectKeys Keys of the objects (must be non-empty)
     * @returns One presigned URL per key
     * @throws InvalidArgumentError if a key is empty, missing or not well-formed UTF-16, or the
     *     options are out of range (nothing is signed in that case)
     */
    presignGetObjectUrls(
        objectKeys: ReadonlyArray<string | null | undefined>,
        options?: PresignOptions
    ): string[] {
        const { expiresIn, signingDate } = validateOptions(options)
        const keys: string[] = []
        // indexed loop so that holes in sparse arrays are seen as missing keys
        for (let index = 0; index < objectKeys.length; index++) {
            const key = objectKeys[index]
            if (typeof key !== 'string' || !key) {
                throw new InvalidArgumentError(
                    `All object keys must be non-empty strings (index ${index})`, index)
            }
            if (LONE_SURROGATE.test(key)) {
                throw new InvalidArgumentError(
                    `Object key at index ${index} is not well-formed UTF-16`, index)
            }
            keys.push(key)
        }
        if (!keys.length) {
            return []
        }

        // Get timestamp, derive key, prepare query string
        const timestamp = formatTimestamp(signingDate)
        const { signing, credential } = getSigning(
            timestamp, this.credentials, this.regionName, SERVICE_NAME)
        const params = [
            `X-Amz-Algorithm=${ALGORITHM}`,
            `X-Amz-Credential=${uriEncode(credential)}`,
            `X-Amz-Date=${timestamp}`,
            `X-Amz-Expires=${expiresIn}`,
            `X-Amz-SignedHeaders=${SIGNED_HEADERS}`,
        ]
        if (this.credentials.kind === 'temporary') {
            params.push(`X-Amz-Security-Token=${uriEncode(this.credentials.sessionToken)}`)
        }
        // all ASCII at this point, so code unit order is byte order
        const query = params.sort().join('&')
        const canonicalHeaders = `host:${this.bucketHost}\n`

        return keys.map(key => {
            const canonicalUri = `${this.canonicalUriPrefix}/${uriEncode(key, '/')}`
            const creq = [
                'GET',
                canonicalUri,
                query,
                canonicalHeaders,
                SIGNED_HEADERS,
                PAYLOAD_UNSIGNED,
            ].join('\n')
            const digest = createHash('sha256').update(creq).digest('hex')
            const signature = signDigest(digest, timestamp, signing).toString('hex')
            return `${this.endpointUrl}${canonicalUri}?${query}&X-Amz-Signature=${signature}`
        })
    }

    /** Single-key version of [[presignGetObjectUrls]] */
    presignGetObjectUrl(objectKey: string, options?: PresignOptions): string {
        return this.presignGetObjectUrls([objectKey], options)[0]
    }
}
