/**
 * Discovery module public API: candidate endpoints, CIDR enumeration,
 * and the two address sources (subnet scan and candidate file).
 */

export type {
  Candidate,
  CandidateSource,
  CidrRange,
  IpFamily,
  ProbeFn,
  SendCandidate,
  SourceKind,
} from './types.js';

export { parseEndpoint, formatEndpoint, proxyUrl } from './endpoint.js';
export { parseCidr, hosts, hostCount, formatCidr } from './cidr.js';
export {
  SubnetScanner,
  tcpProbe,
  DEFAULT_SCAN_TIMEOUT_MS,
  type SubnetScannerConfig,
} from './subnet-scanner.js';
export { FileSource, readCandidateFile, ADDRESS_COLUMN } from './record-reader.js';
export { createSource, type SourceConfig } from './source-factory.js';
