import {
  abortReason,
  CreateLogTable,
  decorators,
  series,
} from "@fabkube/utils";
import Debug from "debug";
import { buildDependencyGraph, dependencyLevels } from "./graph";
import { Client } from "./providers/client";
import { FabricTools } from "./providers/fabricTools";
import { reconcileEntity } from "./reconcilers";
import { ReconcileContext } from "./reconcilers/types";
import { StatusMap } from "./status";
import { DependencyGraph, Entity, ReconcileResult, Topology } from "./types";

const debug = Debug("fabkube::orchestrator");

export interface OrchestrateOptions {
  tools: FabricTools;
  signal?: AbortSignal;
  // defaults to the whole topology
  graph?: DependencyGraph;
  concurrency?: number;
  maxAttempts?: number;
}

function logResult(entity: Entity, result: ReconcileResult) {
  switch (result.status) {
    case "Ready":
      new CreateLogTable({ colWidths: [12, 30, 80] }).pushToPrint([
        [entity.kind, decorators.green(entity.name), decorators.green("✅ Ready")],
      ]);
      break;
    case "Pending":
      debug(`${entity.name} pending: ${result.reason}`);
      break;
    case "Failed":
      new CreateLogTable({ colWidths: [12, 30, 80] }).pushToPrint([
        [
          entity.kind,
          decorators.red(entity.name),
          decorators.red(`${result.error.name}: ${result.error.message}`),
        ],
      ]);
      break;
  }
}

/**
 * One pass over the topology, level by level. Entities of a level run
 * concurrently, and only once every dependency is Ready; dependents of an
 * entity that can no longer become Ready are blocked instead.
 */
export async function orchestrate(
  topology: Topology,
  client: Client,
  statuses: StatusMap,
  opts: OrchestrateOptions,
): Promise<StatusMap> {
  const graph = opts.graph || buildDependencyGraph(topology);
  const levels = dependencyLevels(graph);
  const order = levels.flat();
  const concurrency = opts.concurrency || topology.settings.concurrency;
  const maxAttempts = opts.maxAttempts || topology.settings.maxAttempts;
  const { signal } = opts;

  const ctx: ReconcileContext = {
    topology,
    client,
    tools: opts.tools,
    signal,
  };

  const dependenciesReady = (entity: Entity) =>
    (graph.dependencies.get(entity.name) || []).every(
      (dep) => statuses.state(dep) === "Ready",
    );

  for (const [index, level] of levels.entries()) {
    if (signal?.aborted) throw abortReason(signal);
    statuses.propagateBlocks(graph, order);

    const runnable = level.filter(
      (entity) => !statuses.isSettled(entity.name) && dependenciesReady(entity),
    );
    debug(`level ${index}: ${runnable.map((e) => e.name).join(", ") || "-"}`);

    await series(
      runnable.map((entity) => async () => {
        statuses.startAttempt(entity.name);
        const result = await reconcileEntity(entity, ctx);
        statuses.record(entity.name, result);
        logResult(entity, result);

        const status = statuses.get(entity.name);
        if (!statuses.isSettled(entity.name) && status.attempts >= maxAttempts) {
          statuses.exhaust(entity.name);
          debug(`${entity.name}: ${status.detail}`);
        }
      }),
      concurrency,
    );
  }

  statuses.propagateBlocks(graph, order);
  return statuses;
}
