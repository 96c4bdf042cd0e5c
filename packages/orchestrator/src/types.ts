import type {
  DependencyBlockedError,
  PermanentResourceError,
  TransientClusterError,
} from "./errors";

export interface Core {
  readonly cluster?: string;
  readonly chartRepo: string;
  readonly dirConfig?: string;
  readonly dirCrypto: string;
  readonly dirValues: string;
}

export interface CertificateAuthority {
  readonly name: string;
  readonly namespace: string;
  readonly tlsCert: string;
  readonly parentCa?: string;
}

export interface Msp {
  readonly name: string;
  readonly ca: string;
  readonly namespace: string;
  readonly orgAdmin: string;
  readonly orgAdminPw?: string;
}

export interface OrdererGroup {
  readonly domain: string;
  readonly msp: string;
  readonly names: readonly string[];
  readonly secretGenesis: string;
  readonly genesisProfile: string;
}

export interface PeerGroup {
  readonly domain: string;
  readonly msp: string;
  readonly names: readonly string[];
  readonly channelName?: string;
  readonly channelProfile?: string;
  readonly secretChannel: string;
  // orderer node the channel is created through
  readonly orderer?: string;
}

export interface Composer {
  readonly name: string;
  readonly secretBna: string;
  readonly secretConnection: string;
}

export interface Settings {
  readonly timeout: number; // secs
  readonly maxAttempts: number;
  readonly backoffBase: number; // ms
  readonly backoffCeiling: number; // ms
  readonly waitTimeout: number; // secs
  readonly pollInterval: number; // ms
  readonly concurrency: number;
}

export interface Topology {
  readonly core: Core;
  readonly cas: readonly CertificateAuthority[];
  readonly msps: readonly Msp[];
  readonly ordererGroups: readonly OrdererGroup[];
  readonly peerGroups: readonly PeerGroup[];
  readonly composer?: Composer;
  readonly settings: Settings;
  readonly warnings: readonly string[];
}

// Entities: the units the orchestrator reconciles, one variant per kind.

export interface CaEntity {
  readonly kind: "ca";
  readonly name: string;
  readonly ca: CertificateAuthority;
  readonly parent?: CertificateAuthority;
}

export interface MspEntity {
  readonly kind: "msp";
  readonly name: string;
  readonly msp: Msp;
  readonly ca: CertificateAuthority;
}

export interface OrdererEntity {
  readonly kind: "orderer";
  readonly name: string;
  readonly group: OrdererGroup;
  readonly msp: Msp;
  readonly ca: CertificateAuthority;
  // org MSPs the genesis block is generated from
  readonly genesisMsps: readonly Msp[];
}

export interface PeerEntity {
  readonly kind: "peer";
  readonly name: string;
  readonly group: PeerGroup;
  readonly msp: Msp;
  readonly ca: CertificateAuthority;
}

export interface ChannelEntity {
  readonly kind: "channel";
  readonly name: string;
  readonly group: PeerGroup;
  readonly msp: Msp;
  readonly orderer: string;
  readonly ordererGroup: OrdererGroup;
  readonly ordererMsp: Msp;
}

export type Entity =
  | CaEntity
  | MspEntity
  | OrdererEntity
  | PeerEntity
  | ChannelEntity;

export type EntityKind = Entity["kind"];

export interface DependencyGraph {
  // declaration order
  readonly entities: readonly Entity[];
  readonly byName: ReadonlyMap<string, Entity>;
  readonly dependencies: ReadonlyMap<string, readonly string[]>;
  readonly dependents: ReadonlyMap<string, readonly string[]>;
}

export type ReconcileError = TransientClusterError | PermanentResourceError;

export type ReconcileResult =
  | { status: "Ready" }
  | { status: "Pending"; reason: string }
  | { status: "Failed"; error: ReconcileError };

export type EntityState =
  | "NotStarted"
  | "Pending"
  | "Ready"
  | "Failed"
  | "Blocked";

export interface EntityStatus {
  name: string;
  kind: EntityKind;
  state: EntityState;
  attempts: number;
  // only meaningful while `Failed`
  retryable: boolean;
  detail?: string;
  error?: ReconcileError | DependencyBlockedError;
}

export type ConvergenceOutcome = "converged" | "failed" | "cancelled";

export interface ConvergenceReport {
  outcome: ConvergenceOutcome;
  iterations: number;
  startedAt: number;
  finishedAt: number;
  entities: EntityStatus[];
  reason?: string;
}
