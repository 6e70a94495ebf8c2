/**
 * Errors thrown by the signer. All of them are raised synchronously at
 * the point of misuse; problems with the credentials themselves (expired
 * tokens, revoked keys, wrong region) can't be detected here and only
 * surface when the signed URL is used.
 */

export type SignerErrorCode = 'InvalidArgument' | 'MalformedEndpoint'

/** Base class for every error thrown by this library */
export class SignerError extends Error {
    readonly code: SignerErrorCode

    constructor(code: SignerErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options)
        this.name = new.target.name
        this.code = code
    }
}

/** An argument (object key, expiry, signing date) was rejected before signing */
export class InvalidArgumentError extends SignerError {
    /** Position of the offending object key, for key list errors */
    readonly index?: number

    constructor(message: string, index?: number) {
        super('InvalidArgument', message)
        this.index = index
    }
}

/** The bucket endpoint URL couldn't be parsed, or isn't an HTTP(S) URL */
export class MalformedEndpointError extends SignerError {
    readonly endpoint: string

    constructor(endpoint: string, message: string, cause?: unknown) {
        super('MalformedEndpoint', message, cause === undefined ? undefined : { cause })
        this.endpoint = endpoint
    }
}
