export interface NamespaceSpec {
  name: string;
}

export interface SecretSpec {
  name: string;
  namespace: string;
  // base64 encoded values, as stored by the cluster
  data: { [key: string]: string };
}

export type IdentityType = "client" | "orderer" | "peer";

// Registration of an identity with a Fabric CA.
export interface IdentitySpec {
  name: string;
  ca: string;
  namespace: string;
  password: string;
  type: IdentityType;
  admin?: boolean;
  intermediate?: boolean;
}

// A channel created on the ordering service, through one of the peers.
export interface ChannelSpec {
  name: string;
  namespace: string;
  peer: string;
  orderer: string;
  txSecret: string;
  txKey: string;
}

// A peer joined to a channel.
export interface ChannelMembershipSpec {
  channel: string;
  peer: string;
  namespace: string;
  orderer: string;
}

export interface ResourceSpecs {
  Namespace: NamespaceSpec;
  Secret: SecretSpec;
  Identity: IdentitySpec;
  Channel: ChannelSpec;
  ChannelMembership: ChannelMembershipSpec;
}

export type ApplicableKind = keyof ResourceSpecs;
export type ResourceKind = ApplicableKind | "Ingress" | "Release";

export interface ResourceHandle {
  kind: ResourceKind;
  name: string;
  namespace?: string;
}

export interface Resource extends ResourceHandle {
  // hash of the desired state the resource was last applied from, when the provider keeps it
  specHash?: string;
  data?: { [key: string]: string };
}

export interface ChartRef {
  repo: string;
  chart: string;
  release: string;
  namespace: string;
  version?: string;
}

export type ReleaseValues = { [key: string]: unknown };

export type WaitResult = "Ready" | "Timeout";

// `[kind, spec]` pairs, so both narrow together on `kind`
export type ResourceArgs = {
  [K in ApplicableKind]: [kind: K, spec: ResourceSpecs[K]];
}[ApplicableKind];

export function resourceName(...[kind, spec]: ResourceArgs): string {
  switch (kind) {
    case "Identity":
      return identityName(spec.ca, spec.name);
    case "ChannelMembership":
      return membershipName(spec.channel, spec.peer);
    default:
      return spec.name;
  }
}

export function resourceNamespace(...[kind, spec]: ResourceArgs): string | undefined {
  return kind === "Namespace" ? undefined : spec.namespace;
}

export const identityName = (ca: string, username: string) =>
  `${ca}/${username}`;

export const membershipName = (channel: string, peer: string) =>
  `${channel}@${peer}`;

/**
 * Capability boundary towards the cluster control plane and the release
 * manager. Applying an unchanged spec is a no-op, a changed one updates.
 */
export abstract class Client {
  configPath: string;
  providerName: string;
  context?: string;
  // delay between readiness polls (ms)
  pollInterval = 3000;

  constructor(configPath: string, providerName: string, context?: string) {
    this.configPath = configPath;
    this.providerName = providerName;
    this.context = context;
  }

  abstract validateAccess(): Promise<boolean>;
  abstract applyResource(...args: ResourceArgs): Promise<ResourceHandle>;
  abstract getResource(
    kind: ResourceKind,
    name: string,
    namespace?: string,
  ): Promise<Resource | undefined>;
  abstract waitReady(
    handle: ResourceHandle,
    timeout: number,
    signal?: AbortSignal,
  ): Promise<WaitResult>;
  abstract installOrUpgradeRelease(
    chart: ChartRef,
    values: ReleaseValues,
  ): Promise<ResourceHandle>;
}
