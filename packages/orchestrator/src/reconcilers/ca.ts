import Debug from "debug";
import { CA_CHART } from "../constants";
import { ChartRef, ReleaseValues } from "../providers/client";
import { CaEntity } from "../types";
import {
  caHost,
  credSecretName,
  ensureCredentials,
  ensureRelease,
  ensureResource,
  mergeValues,
  pending,
  readValuesFile,
} from "./apply";
import { EntityReconciler } from "./types";

const debug = Debug("fabkube::reconciler::ca");

export interface CaDesired {
  namespace: string;
  chart: ChartRef;
  values: ReleaseValues;
}

export const caReconciler: EntityReconciler<CaEntity, CaDesired> = {
  desiredState({ ca }, { topology }) {
    return {
      namespace: ca.namespace,
      chart: {
        repo: topology.core.chartRepo,
        chart: CA_CHART,
        release: ca.name,
        namespace: ca.namespace,
      },
      values: readValuesFile(topology.core.dirValues, CA_CHART, ca.name),
    };
  },

  async apply({ ca, parent }, desired, ctx) {
    await ensureResource(ctx, "Namespace", { name: desired.namespace });

    let values = desired.values;
    if (parent) {
      // intermediate CA: registered with, and enrolled against, its parent
      const parentHost = await caHost(ctx, parent);
      if (!parentHost) return pending(`waiting for ingress of parent ca ${parent.name}`);

      const password = await ensureCredentials(
        ctx,
        credSecretName(ca.name),
        ca.namespace,
        ca.name,
      );
      await ensureResource(ctx, "Identity", {
        name: ca.name,
        ca: parent.name,
        namespace: parent.namespace,
        password,
        type: "client",
        intermediate: true,
      });

      values = mergeValues(values, {
        config: {
          intermediate: { parent: { chart: parent.name, url: parentHost } },
        },
      });
    }

    debug(`ensuring release ${desired.chart.release}`);
    await ensureRelease(ctx, desired.chart, values);
    return undefined;
  },

  async probe(_entity, desired, { client, topology, signal }) {
    const ready = await client.waitReady(
      {
        kind: "Release",
        name: desired.chart.release,
        namespace: desired.chart.namespace,
      },
      topology.settings.waitTimeout,
      signal,
    );
    return ready === "Ready"
      ? { status: "Ready" }
      : pending(`release ${desired.chart.release} not ready yet`);
  },
};
