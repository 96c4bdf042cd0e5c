import { PEER_CHART } from "../constants";
import { ChartRef, ReleaseValues } from "../providers/client";
import { PeerEntity } from "../types";
import { cryptoSecretName, ensureRelease, mergeValues, readValuesFile } from "./apply";
import { ensureChannelArtifacts } from "./channel";
import {
  ensureNodeIdentity,
  NodeIdentity,
  nodeIdentity,
  nodeSecretValues,
  probeRelease,
} from "./node";
import { EntityReconciler } from "./types";

export interface PeerDesired {
  identity: NodeIdentity;
  chart: ChartRef;
  values: ReleaseValues;
}

export const peerReconciler: EntityReconciler<PeerEntity, PeerDesired> = {
  desiredState(entity, ctx) {
    const { core } = ctx.topology;
    const identity = nodeIdentity(entity, ctx);
    const { adminCert, ...peer } = nodeSecretValues(entity);

    return {
      identity,
      chart: {
        repo: core.chartRepo,
        chart: PEER_CHART,
        release: entity.name,
        namespace: identity.namespace,
      },
      values: mergeValues(readValuesFile(core.dirValues, PEER_CHART, entity.name), {
        peer: { mspID: entity.msp.name },
        secrets: {
          peer,
          channel: entity.group.secretChannel,
          adminCert,
          adminKey: cryptoSecretName(entity.msp.orgAdmin, "idkey"),
        },
      }),
    };
  },

  async apply(entity, desired, ctx) {
    const early = await ensureNodeIdentity(entity, desired.identity, ctx);
    if (early) return early;

    // the chart mounts the channel transaction secret
    if (entity.group.channelName)
      await ensureChannelArtifacts(entity.group, entity.msp, ctx);

    await ensureRelease(ctx, desired.chart, desired.values);
    return undefined;
  },

  async probe(_entity, desired, ctx) {
    return probeRelease(desired.chart.release, desired.chart.namespace, ctx);
  },
};
