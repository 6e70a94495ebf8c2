import { uriEncode } from '../src/util/encoding'
import { formatHost, formatBucketEndpoint, parseBucketEndpoint, DEFAULT_REGION } from '../src/util/endpoint'
import { MalformedEndpointError } from '../src/errors'

describe('encoding utilities', () => {
    it('keeps unreserved characters', () => {
        expect(uriEncode('AZaz09-._~')).toBe('AZaz09-._~')
    })
    it('encodes everything else with uppercase hex', () => {
        expect(uriEncode('hello world.txt')).toBe('hello%20world.txt')
        expect(uriEncode('    ')).toBe('%20%20%20%20')
        expect(uriEncode(`it's (1)*!.txt`)).toBe('it%27s%20%281%29%2A%21.txt')
        expect(uriEncode('a+b=c&d')).toBe('a%2Bb%3Dc%26d')
        expect(uriEncode('ACCESS/20190901/us-east-1/s3/aws4_request'))
            .toBe('ACCESS%2F20190901%2Fus-east-1%2Fs3%2Faws4_request')
    })
    it('encodes UTF-8 bytes', () => {
        expect(uriEncode('Scheiße.dat')).toBe('Schei%C3%9Fe.dat')
        expect(uriEncode('ünï/cödé~', '/')).toBe('%C3%BCn%C3%AF/c%C3%B6d%C3%A9~')
    })
    it('keeps extra safe characters', () => {
        expect(uriEncode('my/image.png', '/')).toBe('my/image.png')
        expect(uriEncode('my/image.png')).toBe('my%2Fimage.png')
        expect(uriEncode('a=b/c', '=/')).toBe('a=b/c')
    })
    it('returns an empty string for empty input', () => {
        expect(uriEncode('')).toBe('')
    })
})

describe('endpoint utilities', () => {
    it('parses path-style endpoints', () => {
        expect(parseBucketEndpoint('https://s3.amazonaws.com/my-bucket/')).toStrictEqual({
            endpointUrl: 'https://s3.amazonaws.com',
            bucketHost: 's3.amazonaws.com',
            canonicalUriPrefix: '/my-bucket',
        })
        expect(parseBucketEndpoint('http://localhost:9000/bucket')).toStrictEqual({
            endpointUrl: 'http://localhost:9000',
            bucketHost: 'localhost:9000',
            canonicalUriPrefix: '/bucket',
        })
    })
    it('parses virtual-hosted endpoints', () => {
        expect(parseBucketEndpoint('https://my-bucket.s3.amazonaws.com/')).toStrictEqual({
            endpointUrl: 'https://my-bucket.s3.amazonaws.com',
            bucketHost: 'my-bucket.s3.amazonaws.com',
            canonicalUriPrefix: '',
        })
        expect(parseBucketEndpoint('https://my-bucket.s3.amazonaws.com').canonicalUriPrefix).toBe('')
    })
    it('strips every trailing slash', () => {
        expect(parseBucketEndpoint('http://localhost:9000/bucket///').canonicalUriPrefix).toBe('/bucket')
    })
    it('drops query and fragment', () => {
        expect(parseBucketEndpoint('http://localhost:9000/bucket/?x=1#frag')).toStrictEqual({
            endpointUrl: 'http://localhost:9000',
            bucketHost: 'localhost:9000',
            canonicalUriPrefix: '/bucket',
        })
    })
    it('throws MalformedEndpointError for invalid URLs', () => {
        expect(() => parseBucketEndpoint('not a url')).toThrow(MalformedEndpointError)
        expect(() => parseBucketEndpoint('/bucket/')).toThrow(MalformedEndpointError)
        expect(() => parseBucketEndpoint('ftp://example.com/bucket/')).toThrow(MalformedEndpointError)
    })
    it('keeps the offending endpoint and parse error', () => {
        let error: unknown
        try {
            parseBucketEndpoint('not a url')
        } catch (e) {
            error = e
        }
        expect(error).toBeInstanceOf(MalformedEndpointError)
        if (error instanceof MalformedEndpointError) {
            expect(error.code).toBe('MalformedEndpoint')
            expect(error.name).toBe('MalformedEndpointError')
            expect(error.endpoint).toBe('not a url')
            expect(error.cause).toBeInstanceOf(TypeError)
        }
    })
    it('formats an endpoint without region', () => {
        expect(formatHost('s3')).toBe('s3.amazonaws.com')
        expect(formatHost('s3', undefined, 1000)).toBe('s3.amazonaws.com:1000')
    })
    it('formats an endpoint with region', () => {
        expect(formatHost('s3', 'eu-west-1')).toBe('s3.eu-west-1.amazonaws.com')
        expect(formatHost('s3', 'eu-west-1', '8443')).toBe('s3.eu-west-1.amazonaws.com:8443')
    })
    it('formats bucket endpoints in both forms', () => {
        expect(formatBucketEndpoint('my-bucket', 'eu-west-1'))
            .toBe('https://my-bucket.s3.eu-west-1.amazonaws.com/')
        expect(formatBucketEndpoint('my-bucket', 'eu-west-1', { pathStyle: true }))
            .toBe('https://s3.eu-west-1.amazonaws.com/my-bucket/')
        expect(formatBucketEndpoint('my-bucket')).toBe('https://my-bucket.s3.amazonaws.com/')
    })
    it('defaults to us-east-1', () => {
        expect(DEFAULT_REGION).toBe('us-east-1')
    })
})
