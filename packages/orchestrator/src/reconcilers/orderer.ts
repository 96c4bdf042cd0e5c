import path from "path";
import { GENESIS_BLOCK_FILENAME, ORDERER_CHART } from "../constants";
import { PermanentResourceError } from "../errors";
import { ChartRef, ReleaseValues } from "../providers/client";
import { OrdererEntity } from "../types";
import { ensureFileSecret, ensureRelease, mergeValues, readValuesFile } from "./apply";
import {
  ensureNodeIdentity,
  NodeIdentity,
  nodeIdentity,
  nodeSecretValues,
  probeRelease,
} from "./node";
import { EntityReconciler } from "./types";

export interface OrdererDesired {
  identity: NodeIdentity;
  // one block per profile, shared by every orderer using it
  genesisFile: string;
  chart: ChartRef;
  values: ReleaseValues;
}

export const ordererReconciler: EntityReconciler<OrdererEntity, OrdererDesired> = {
  desiredState(entity, ctx) {
    const { core } = ctx.topology;
    const identity = nodeIdentity(entity, ctx);
    const { adminCert, ...ord } = nodeSecretValues(entity);

    return {
      identity,
      genesisFile: path.join(
        core.dirCrypto,
        `${entity.group.genesisProfile}.${GENESIS_BLOCK_FILENAME}`,
      ),
      chart: {
        repo: core.chartRepo,
        chart: ORDERER_CHART,
        release: entity.name,
        namespace: identity.namespace,
      },
      values: mergeValues(readValuesFile(core.dirValues, ORDERER_CHART, entity.name), {
        ord: { mspID: entity.msp.name },
        secrets: { ord: ord, genesis: entity.group.secretGenesis, adminCert },
      }),
    };
  },

  async apply(entity, desired, ctx) {
    const early = await ensureNodeIdentity(entity, desired.identity, ctx);
    if (early) return early;

    const { dirConfig } = ctx.topology.core;
    if (!dirConfig)
      throw new PermanentResourceError(
        "core.dir_config is required to generate the genesis block",
      );
    await ctx.tools.generateGenesisBlock(
      entity.group.genesisProfile,
      desired.genesisFile,
      dirConfig,
    );
    await ensureFileSecret(
      ctx,
      entity.group.secretGenesis,
      desired.identity.namespace,
      GENESIS_BLOCK_FILENAME,
      desired.genesisFile,
    );

    await ensureRelease(ctx, desired.chart, desired.values);
    return undefined;
  },

  async probe(_entity, desired, ctx) {
    return probeRelease(desired.chart.release, desired.chart.namespace, ctx);
  },
};
