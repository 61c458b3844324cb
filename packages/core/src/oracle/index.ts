export {
  platformCodec,
  type PlatformCodec,
  type ParseFailure,
} from './codec.js';
export {
  checkRoundTrip,
  expectedRejectionMessage,
  type OracleVerdict,
} from './round-trip.js';
