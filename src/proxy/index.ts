export {
  ProxyVerifier,
  describeFailure,
  DEFAULT_GEO_API_URL,
  DEFAULT_TEST_TIMEOUT_SEC,
  type ProxyVerifierConfig,
} from './proxy-verifier.js';

export { geoResponseSchema } from './types.js';

export type {
  GeoResponse,
  ProxyResult,
  VerificationOutcome,
  Verifier,
} from './types.js';
