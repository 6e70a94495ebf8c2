/**
 * Adapter creating an [[S3UrlSigner]] from an AWS SDK `S3Client`, so
 * that endpoint, addressing style, region and credentials follow the
 * client's own configuration.
 */
/** */

import { randomBytes } from 'crypto'
import { GetObjectCommand, S3Client } from '@aws-sdk/client-s3'
import { getSignedUrl } from '@aws-sdk/s3-request-presigner'

import { resolveCredentials } from './credentials'
import { MalformedEndpointError } from './errors'
import { S3UrlSigner } from './s3'

/**
 * Create a signer for `bucket` using the client's configuration and
 * its current credentials.
 *
 * Rather than reimplementing the SDK's endpoint logic, the client is
 * asked to presign a URL for a random key, and the URL is cut right
 * before it. Nothing is sent over the network.
 *
 * Resolving the credentials may cause the client to refresh them, but
 * the returned signer won't refresh its copy: if they're temporary,
 * keep it short-lived.
 */
export async function fromS3Client(client: S3Client, bucket: string): Promise<S3UrlSigner> {
    const dummyKey = randomBytes(8).toString('hex')
    const dummyUrl = await getSignedUrl(client,
        new GetObjectCommand({ Bucket: bucket, Key: dummyKey }))
    const idx = dummyUrl.indexOf(dummyKey)
    if (idx === -1) {
        throw new MalformedEndpointError(dummyUrl,
            `Couldn't find the object key in the client's presigned URL`)
    }

    const credentials = await resolveCredentials(client.config.credentials)
    const regionName = await client.config.region()
    return new S3UrlSigner({
        bucketEndpointUrl: dummyUrl.substring(0, idx),
        credentials,
        regionName,
    })
}
