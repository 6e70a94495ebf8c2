import * as encoding from './encoding'
import * as endpoint from './endpoint'

export { encoding, endpoint }
