import {
  abortReason,
  backoffDelay,
  sleep,
  TimeoutAbortController,
} from "@fabkube/utils";
import Debug from "debug";
import { buildDependencyGraph, restrictTo } from "./graph";
import { orchestrate } from "./orchestrator";
import { Client } from "./providers/client";
import { FabricCliTools, FabricTools } from "./providers/fabricTools";
import { StatusMap } from "./status";
import { ConvergenceOutcome, ConvergenceReport, Topology } from "./types";

const debug = Debug("fabkube::supervisor");

export interface ConvergeOptions {
  tools?: FabricTools;
  // cancels the run; in-flight waits stop within one poll interval
  signal?: AbortSignal;
  // converge only these entities and what they depend on
  targets?: readonly string[];
  onPass?: (iteration: number, statuses: StatusMap) => void;
}

// aborts as soon as any of the given signals does
function linkSignals(...signals: Array<AbortSignal | undefined>): AbortSignal {
  const controller = new AbortController();
  for (const signal of signals) {
    if (!signal) continue;
    if (signal.aborted) {
      controller.abort(signal.reason);
      break;
    }
    signal.addEventListener("abort", () => controller.abort(signal.reason), {
      once: true,
    });
  }
  return controller.signal;
}

const readyCount = (statuses: StatusMap) =>
  statuses.all().filter((status) => status.state === "Ready").length;

/**
 * Run orchestrate passes until every entity is Ready, nothing can progress
 * any more, the global timeout fires or the caller aborts. Nothing created
 * is rolled back.
 */
export async function converge(
  topology: Topology,
  client: Client,
  opts: ConvergeOptions = {},
): Promise<ConvergenceReport> {
  const { settings } = topology;
  const fullGraph = buildDependencyGraph(topology);
  const graph = opts.targets?.length
    ? restrictTo(fullGraph, opts.targets)
    : fullGraph;

  const tools = opts.tools || new FabricCliTools();
  const statuses = new StatusMap(graph.entities);
  const timeout = TimeoutAbortController(settings.timeout);
  const signal = linkSignals(opts.signal, timeout.signal);
  client.pollInterval = settings.pollInterval;

  const startedAt = Date.now();
  let iterations = 0;
  // passes in a row where no entity became Ready
  let idle = 0;
  let outcome: ConvergenceOutcome = "failed";
  let reason: string | undefined;

  try {
    for (;;) {
      iterations++;
      const readyBefore = readyCount(statuses);
      await orchestrate(topology, client, statuses, { tools, signal, graph });
      opts.onPass?.(iterations, statuses);

      if (statuses.allReady()) {
        outcome = "converged";
        break;
      }
      if (!statuses.canProgress()) {
        outcome = "failed";
        reason = "no entity can make further progress";
        break;
      }

      if (readyCount(statuses) > readyBefore) {
        idle = 0;
        continue;
      }

      idle++;
      const delay = backoffDelay(idle, settings.backoffBase, settings.backoffCeiling);
      debug(`pass ${iterations} made no progress, next one in ${delay}ms`);
      await sleep(delay, signal);
    }
  } catch (err) {
    if (!signal.aborted) throw err;
    outcome = "cancelled";
    reason = abortReason(signal).message;
  } finally {
    // release the timer of the global timeout
    if (!timeout.signal.aborted) timeout.abort(new Error("run finished"));
  }

  debug(`${outcome} after ${iterations} passes`);
  return {
    outcome,
    iterations,
    startedAt,
    finishedAt: Date.now(),
    entities: statuses.all(),
    reason,
  };
}
