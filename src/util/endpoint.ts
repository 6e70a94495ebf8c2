/**
 * Utilities for parsing bucket endpoints and formatting S3 hosts.
 * @module
 */

import { URL } from 'url'

import { MalformedEndpointError } from '../errors'

/** Default region for AWS requests */
export const DEFAULT_REGION = 'us-east-1'

export interface BucketEndpoint {
    /** Scheme and authority only, e.g. `https://s3.amazonaws.com` */
    endpointUrl: string
    /** Host (and port, if not the default one) used in the `host` header */
    bucketHost: string
    /**
     * Path that precedes the object key, without trailing slashes:
     * `/bucket` for path-style endpoints, empty for virtual-hosted ones
     */
    canonicalUriPrefix: string
}

/**
 * Split a bucket endpoint URL into the parts the signer needs.
 * Query and fragment, if any, are dropped.
 *
 * @throws MalformedEndpointError if the URL can't be parsed or isn't HTTP(S)
 */
export function parseBucketEndpoint(bucketEndpointUrl: string): BucketEndpoint {
    let url: URL
    try {
        url = new URL(bucketEndpointUrl)
    } catch (e) {
        throw new MalformedEndpointError(bucketEndpointUrl,
            `Bucket endpoint '${bucketEndpointUrl}' is not a valid absolute URL`, e)
    }
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
        throw new MalformedEndpointError(bucketEndpointUrl,
            `Bucket endpoint must be an HTTP(S) URL, got '${url.protocol}'`)
    }
    if (!url.host) {
        throw new MalformedEndpointError(bucketEndpointUrl,
            `Bucket endpoint '${bucketEndpointUrl}' has no host`)
    }
    return {
        endpointUrl: `${url.protocol}//${url.host}`,
        bucketHost: url.host,
        canonicalUriPrefix: url.pathname.replace(/\/+$/, ''),
    }
}

/**
 * Obtain the (most common) endpoint for a service on a region.
 * This uses the `<service>.<region>` format.
 */
export function formatHost(serviceName: string, regionName?: string, port?: number | string) {
    regionName = regionName ? '.' + regionName : ''
    return `${serviceName}${regionName}.amazonaws.com` + (port ? `:${port}` : '')
}

/**
 * Build the endpoint URL of an AWS-hosted bucket, in domain form
 * (`https://<bucket>.s3.<region>.amazonaws.com/`, the default) or
 * in path form (`https://s3.<region>.amazonaws.com/<bucket>/`).
 */
export function formatBucketEndpoint(bucket: string, regionName?: string, options?: { pathStyle?: boolean }) {
    const host = formatHost('s3', regionName)
    return (options && options.pathStyle) ?
        `https://${host}/${bucket}/` : `https://${bucket}.${host}/`
}
