import path from "path";
import { IdentityType } from "../providers/client";
import { OrdererEntity, PeerEntity, ReconcileResult } from "../types";
import {
  caHost,
  credSecretName,
  cryptoSecretName,
  ensureCredentials,
  ensureResource,
  pending,
} from "./apply";
import { cryptoSecrets, ID_ITEMS } from "./cryptoMaterial";
import { ReconcileContext } from "./types";

export interface NodeIdentity {
  namespace: string;
  credSecret: string;
  type: IdentityType;
  mspDir: string;
}

export function nodeIdentity(
  entity: OrdererEntity | PeerEntity,
  ctx: ReconcileContext,
): NodeIdentity {
  return {
    namespace: entity.msp.namespace,
    credSecret: credSecretName(entity.name),
    type: entity.kind,
    mspDir: path.join(ctx.topology.core.dirCrypto, `${entity.name}_MSP`),
  };
}

// Secret names the hlf-ord / hlf-peer charts mount.
export function nodeSecretValues(entity: OrdererEntity | PeerEntity) {
  const admin = entity.msp.orgAdmin;
  return {
    cred: credSecretName(entity.name),
    cert: cryptoSecretName(entity.name, "idcert"),
    key: cryptoSecretName(entity.name, "idkey"),
    caCert: cryptoSecretName(admin, "cacert"),
    adminCert: cryptoSecretName(admin, "idcert"),
  };
}

/**
 * Credentials, CA registration, enrollment into `<dir_crypto>/<node>_MSP`
 * and the idcert/idkey secrets of an orderer or peer node.
 */
export async function ensureNodeIdentity(
  entity: OrdererEntity | PeerEntity,
  identity: NodeIdentity,
  ctx: ReconcileContext,
): Promise<ReconcileResult | undefined> {
  const host = await caHost(ctx, entity.ca);
  if (!host) return pending(`waiting for ingress of ca ${entity.ca.name}`);

  const password = await ensureCredentials(
    ctx,
    identity.credSecret,
    identity.namespace,
    entity.name,
  );
  await ensureResource(ctx, "Identity", {
    name: entity.name,
    ca: entity.ca.name,
    namespace: entity.ca.namespace,
    password,
    type: identity.type,
  });

  await ctx.tools.enroll({
    username: entity.name,
    password,
    caHost: host,
    tlsCert: entity.ca.tlsCert,
    mspDir: identity.mspDir,
  });

  const secrets = await cryptoSecrets(
    identity.mspDir,
    entity.name,
    identity.namespace,
    ID_ITEMS,
  );
  for (const secret of secrets) await ensureResource(ctx, "Secret", secret);
  return undefined;
}

export async function probeRelease(
  release: string,
  namespace: string,
  ctx: ReconcileContext,
): Promise<ReconcileResult> {
  const ready = await ctx.client.waitReady(
    { kind: "Release", name: release, namespace },
    ctx.topology.settings.waitTimeout,
    ctx.signal,
  );
  return ready === "Ready"
    ? { status: "Ready" }
    : pending(`release ${release} not ready yet`);
}
