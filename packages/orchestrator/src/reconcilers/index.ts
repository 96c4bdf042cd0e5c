import Debug from "debug";
import { classifyClusterError } from "../errors";
import { Entity, ReconcileResult } from "../types";
import { caReconciler } from "./ca";
import { channelReconciler } from "./channel";
import { mspReconciler } from "./msp";
import { ordererReconciler } from "./orderer";
import { peerReconciler } from "./peer";
import { EntityReconciler, ReconcileContext } from "./types";

const debug = Debug("fabkube::reconciler");

/**
 * One step towards the desired state: compute it, apply what differs, probe
 * readiness. Errors come back as `Failed`, classified; an abort is rethrown.
 */
export async function reconcile<E extends Entity, D>(
  reconciler: EntityReconciler<E, D>,
  entity: E,
  ctx: ReconcileContext,
): Promise<ReconcileResult> {
  try {
    const desired = reconciler.desiredState(entity, ctx);
    const early = await reconciler.apply(entity, desired, ctx);
    if (early) return early;
    return await reconciler.probe(entity, desired, ctx);
  } catch (err) {
    if (ctx.signal?.aborted) throw err;

    const error = classifyClusterError(err, `${entity.kind} ${entity.name}`);
    debug(`${entity.name}: ${error.name}: ${error.message}`);
    return { status: "Failed", error };
  }
}

// reconciler registry, one per entity kind
export async function reconcileEntity(
  entity: Entity,
  ctx: ReconcileContext,
): Promise<ReconcileResult> {
  switch (entity.kind) {
    case "ca":
      return reconcile(caReconciler, entity, ctx);
    case "msp":
      return reconcile(mspReconciler, entity, ctx);
    case "orderer":
      return reconcile(ordererReconciler, entity, ctx);
    case "peer":
      return reconcile(peerReconciler, entity, ctx);
    case "channel":
      return reconcile(channelReconciler, entity, ctx);
  }
}

export {
  caReconciler,
  channelReconciler,
  mspReconciler,
  ordererReconciler,
  peerReconciler,
};
export * from "./apply";
export type { EntityReconciler, ReconcileContext } from "./types";
