/**
 * Demo CLI tool that generates presigned GET URLs for several objects
 * of a bucket at once, in path or domain form.
 */

import { S3UrlSigner } from '../src/s3'
import { plainCredentials, temporaryCredentials } from '../src/credentials'
import { formatBucketEndpoint } from '../src/util/endpoint'

const accessKey = process.env.AWS_ACCESS_KEY_ID
const secretKey = process.env.AWS_SECRET_ACCESS_KEY
const sessionToken = process.env.AWS_SESSION_TOKEN
const args = process.argv.slice(2)
const pathStyle = args[0] === '--path-style'
if (pathStyle) {
    args.shift()
}
if (!accessKey || !secretKey || args.length < 3) {
    console.error(`Usage: demo_s3_urlgen.js [--path-style] <bucket name> <region> <object>...`)
    console.error('Please make sure AWS_ACCESS_KEY_ID and AWS_SECRET_ACCESS_KEY are set')
    process.exit(1)
}

const [ bucket, regionName, ...keys ] = args
const signer = new S3UrlSigner({
    bucketEndpointUrl: formatBucketEndpoint(bucket, regionName, { pathStyle }),
    credentials: sessionToken ?
        temporaryCredentials(accessKey, secretKey, sessionToken) :
        plainCredentials(accessKey, secretKey),
    regionName,
})
for (const url of signer.presignGetObjectUrls(keys)) {
    console.log(url)
}
