// Shape of the configuration document as operators write it (snake_case).

export interface CoreConfig {
  cluster?: string;
  chart_repo?: string;
  dir_config?: string;
  dir_crypto: string;
  dir_values: string;
}

export interface CaConfig {
  namespace: string;
  tls_cert: string;
  parent_ca?: string;
}

export interface MspConfig {
  ca: string;
  namespace: string;
  org_admin: string;
  org_adminpw?: string;
}

export interface OrdererGroupConfig {
  domain: string;
  msp: string;
  names: string[];
  secret_genesis?: string;
  genesis_profile?: string;
}

export interface PeerGroupConfig {
  domain: string;
  msp: string;
  names: string[];
  channel_name?: string;
  channel_profile?: string;
  secret_channel?: string;
  orderer?: string;
}

export interface ComposerConfig {
  name: string;
  secret_bna: string;
  secret_connection: string;
}

export interface SettingsConfig {
  timeout?: number;
  max_attempts?: number;
  backoff_base?: number;
  backoff_ceiling?: number;
  wait_timeout?: number;
  poll_interval?: number;
  concurrency?: number;
}

export interface TopologyConfig {
  core: CoreConfig;
  cas?: { [name: string]: CaConfig };
  msps?: { [name: string]: MspConfig };
  orderers?: OrdererGroupConfig | OrdererGroupConfig[];
  peers?: PeerGroupConfig | PeerGroupConfig[];
  composer?: ComposerConfig;
  settings?: SettingsConfig;
}

type Fields<T> = ReadonlyArray<keyof T>;

// known fields per section, anything else is reported as a warning
export const KNOWN_FIELDS = {
  core: [
    "cluster",
    "chart_repo",
    "dir_config",
    "dir_crypto",
    "dir_values",
  ] satisfies Fields<CoreConfig>,
  cas: ["namespace", "tls_cert", "parent_ca"] satisfies Fields<CaConfig>,
  msps: [
    "ca",
    "namespace",
    "org_admin",
    "org_adminpw",
  ] satisfies Fields<MspConfig>,
  orderers: [
    "domain",
    "msp",
    "names",
    "secret_genesis",
    "genesis_profile",
  ] satisfies Fields<OrdererGroupConfig>,
  peers: [
    "domain",
    "msp",
    "names",
    "channel_name",
    "channel_profile",
    "secret_channel",
    "orderer",
  ] satisfies Fields<PeerGroupConfig>,
  composer: [
    "name",
    "secret_bna",
    "secret_connection",
  ] satisfies Fields<ComposerConfig>,
  settings: [
    "timeout",
    "max_attempts",
    "backoff_base",
    "backoff_ceiling",
    "wait_timeout",
    "poll_interval",
    "concurrency",
  ] satisfies Fields<SettingsConfig>,
};

export type KnownSection = keyof typeof KNOWN_FIELDS;
