import { Client } from "../providers/client";
import { FabricTools } from "../providers/fabricTools";
import { Entity, ReconcileResult, Topology } from "../types";

export interface ReconcileContext {
  readonly topology: Topology;
  readonly client: Client;
  readonly tools: FabricTools;
  readonly signal?: AbortSignal;
}

/**
 * Drives one entity kind towards its desired state.
 *
 * `desiredState` reads local files only, never the cluster. `apply` applies
 * what differs from it and may stop early with a result (e.g. Pending while a
 * dependency's endpoint is not published yet); `probe` then reports readiness.
 */
export interface EntityReconciler<E extends Entity, D> {
  desiredState(entity: E, ctx: ReconcileContext): D;
  apply(
    entity: E,
    desired: D,
    ctx: ReconcileContext,
  ): Promise<ReconcileResult | undefined>;
  probe(entity: E, desired: D, ctx: ReconcileContext): Promise<ReconcileResult>;
}
