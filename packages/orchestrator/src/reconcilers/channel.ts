import Debug from "debug";
import path from "path";
import { ORDERER_PORT } from "../constants";
import { PermanentResourceError } from "../errors";
import { ChannelMembershipSpec, ChannelSpec, membershipName } from "../providers/client";
import { ChannelEntity, Msp, PeerGroup } from "../types";
import { ensureFileSecret, ensureResource, pending } from "./apply";
import { EntityReconciler, ReconcileContext } from "./types";

const debug = Debug("fabkube::reconciler::channel");

export const channelTxKey = (channel: string) => `${channel}.tx`;

export const ordererAddress = (orderer: string, domain: string) =>
  `${orderer}-hlf-ord.${domain}:${ORDERER_PORT}`;

/**
 * Channel creation transaction (`<dir_crypto>/<channel>.tx`) and the secret
 * holding it in the peers' namespace.
 */
export async function ensureChannelArtifacts(
  group: PeerGroup,
  msp: Msp,
  ctx: ReconcileContext,
): Promise<void> {
  const { core } = ctx.topology;
  if (!group.channelName) return;
  if (!group.channelProfile || !core.dirConfig)
    throw new PermanentResourceError(
      `channel ${group.channelName} needs channel_profile and core.dir_config`,
    );

  const key = channelTxKey(group.channelName);
  const txFile = path.join(core.dirCrypto, key);
  await ctx.tools.generateChannelTx(
    group.channelProfile,
    group.channelName,
    txFile,
    core.dirConfig,
  );
  await ensureFileSecret(ctx, group.secretChannel, msp.namespace, key, txFile);
}

export interface ChannelDesired {
  channel: ChannelSpec;
  memberships: ChannelMembershipSpec[];
}

export const channelReconciler: EntityReconciler<ChannelEntity, ChannelDesired> = {
  desiredState(entity) {
    const orderer = ordererAddress(entity.orderer, entity.ordererGroup.domain);
    const namespace = entity.msp.namespace;

    return {
      channel: {
        name: entity.name,
        namespace,
        // created through the first peer of the group
        peer: entity.group.names[0],
        orderer,
        txSecret: entity.group.secretChannel,
        txKey: channelTxKey(entity.name),
      },
      memberships: entity.group.names.map((peer) => ({
        channel: entity.name,
        peer,
        namespace,
        orderer,
      })),
    };
  },

  async apply(entity, desired, ctx) {
    await ensureChannelArtifacts(entity.group, entity.msp, ctx);

    if (await ensureResource(ctx, "Channel", desired.channel))
      debug(`channel ${entity.name} created through ${desired.channel.peer}`);

    for (const membership of desired.memberships)
      await ensureResource(ctx, "ChannelMembership", membership);
    return undefined;
  },

  async probe(entity, desired, { client }) {
    const missing: string[] = [];
    for (const membership of desired.memberships) {
      const joined = await client.getResource(
        "ChannelMembership",
        membershipName(membership.channel, membership.peer),
        membership.namespace,
      );
      if (!joined) missing.push(membership.peer);
    }

    return missing.length
      ? pending(`${missing.join(", ")} not joined to ${entity.name} yet`)
      : { status: "Ready" };
  },
};
