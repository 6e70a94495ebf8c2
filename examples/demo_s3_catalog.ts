/**
 * Demo CLI tool that lists a bucket (using the SDK's default
 * credential chain) and prints a presigned URL for every object.
 */

import { S3Client, paginateListObjectsV2 } from '@aws-sdk/client-s3'
import { fromS3Client } from '../src/client'

async function main(bucket: string, expiresIn: number) {
    const client = new S3Client({})
    try {
        const keys: string[] = []
        for await (const page of paginateListObjectsV2({ client }, { Bucket: bucket })) {
            for (const object of page.Contents || []) {
                if (object.Key) {
                    keys.push(object.Key)
                }
            }
        }
        const signer = await fromS3Client(client, bucket)
        const urls = signer.presignGetObjectUrls(keys, { expiresIn })
        keys.forEach((key, i) => console.log(`${key}\t${urls[i]}`))
    } finally {
        client.destroy()
    }
}

const args = process.argv.slice(2)
if (args.length < 1 || args.length > 2) {
    console.error(`Usage: demo_s3_catalog.js <bucket name> [expires in seconds]`)
    process.exit(1)
}
main(args[0], args[1] ? Number(args[1]) : 3600).catch(e => {
    console.error(e)
    process.exit(1)
})
