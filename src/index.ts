import * as core from './core'
import * as util from './util'

export { S3UrlSigner, S3UrlSignerOptions, PresignOptions, EXPIRES_MAX, EXPIRES_DEFAULT, PAYLOAD_UNSIGNED } from './s3'
export { fromS3Client } from './client'
export {
    Credentials, PlainCredentials, TemporaryCredentials, CredentialIdentity, CredentialProvider,
    plainCredentials, temporaryCredentials, fromIdentity, resolveCredentials,
} from './credentials'
export { SignerError, SignerErrorCode, InvalidArgumentError, MalformedEndpointError } from './errors'
export { core, util }
