// CONSTANTS

const DEFAULT_PROVIDER = "kubernetes";
const DEFAULT_CHART_REPO = "stable";

// helm charts used for each role
const CA_CHART = "hlf-ca";
const ORDERER_CHART = "hlf-ord";
const PEER_CHART = "hlf-peer";

const ORDERER_PORT = 7050;

// configtxgen defaults
const DEFAULT_GENESIS_PROFILE = "OrdererGenesis";
const GENESIS_BLOCK_FILENAME = "genesis.block";
const DEFAULT_SECRET_GENESIS = "hlf--genesis";
const DEFAULT_SECRET_CHANNEL = "hlf--channel";

// settings defaults
const DEFAULT_GLOBAL_TIMEOUT = 1200; // 20 mins
const DEFAULT_MAX_ATTEMPTS = 10;
const DEFAULT_BACKOFF_BASE = 2000; // ms
const DEFAULT_BACKOFF_CEILING = 60 * 1000; // ms
const DEFAULT_WAIT_TIMEOUT = 120; // secs
const DEFAULT_POLL_INTERVAL = 3000; // ms
const DEFAULT_CONCURRENCY = 4;

// annotation holding the hash of the desired state a resource was applied from
const SPEC_HASH_ANNOTATION = "fabkube.io/spec-hash";
const MANAGED_BY_LABEL = "fabkube";
const CHANNEL_MARKER_PREFIX = "fabkube-channel-";
const STATUS_REPORT_FILENAME = "fabkube-status.json";

// fabric-ca-client answers this when the identity is not registered
const IDENTITY_NOT_FOUND = "no rows in result set";

// stderr fragments of failures worth retrying
const TRANSIENT_ERROR_PATTERNS: RegExp[] = [
  /connection refused/i,
  /connection reset/i,
  /i\/o timeout/i,
  /unable to connect to the server/i,
  /TLS handshake timeout/i,
  /the server is currently unable to handle the request/i,
  /context deadline exceeded/i,
  /etcdserver/i,
  /\bEOF\b/,
  /timed out/i,
  /another operation \(install\/upgrade\/rollback\) is in progress/i,
];

// stderr fragments meaning the cluster rejected the request itself
const PERMANENT_ERROR_PATTERNS: RegExp[] = [
  /\bis invalid\b/i,
  /admission webhook .* denied/i,
  /\bforbidden\b/i,
  /chart .*not found/i,
  /failed to download/i,
  /unknown field/i,
  /YAML parse error/i,
  /no matches for kind/i,
  /Authorization failure/i,
];

export {
  CA_CHART,
  CHANNEL_MARKER_PREFIX,
  DEFAULT_BACKOFF_BASE,
  DEFAULT_BACKOFF_CEILING,
  DEFAULT_CHART_REPO,
  DEFAULT_CONCURRENCY,
  DEFAULT_GENESIS_PROFILE,
  DEFAULT_GLOBAL_TIMEOUT,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_POLL_INTERVAL,
  DEFAULT_PROVIDER,
  DEFAULT_SECRET_CHANNEL,
  DEFAULT_SECRET_GENESIS,
  DEFAULT_WAIT_TIMEOUT,
  GENESIS_BLOCK_FILENAME,
  IDENTITY_NOT_FOUND,
  MANAGED_BY_LABEL,
  ORDERER_CHART,
  ORDERER_PORT,
  PEER_CHART,
  PERMANENT_ERROR_PATTERNS,
  SPEC_HASH_ANNOTATION,
  STATUS_REPORT_FILENAME,
  TRANSIENT_ERROR_PATTERNS,
};
