// public api for @vigil/sdk
// usage:
//   import { registerChecker, ServiceLimitError } from '@vigil/sdk';
//   registerChecker('compute', 'health_check', { capability: 'health_check', configSchema, execute });

export * from './errors';
export * from './secret';
export * from './types';
export { CheckerRegistry, defineChecker, globalRegistry, registerChecker } from './registry';
export {
    encodePayload,
    decodePayload,
    SerializationError,
    MAX_RESULT_SIZE,
} from './utils/serialization';
export type { EncodedPayload } from './utils/serialization';
