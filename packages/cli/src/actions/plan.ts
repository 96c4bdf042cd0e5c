import {
  buildDependencyGraph,
  dependencyLevels,
  loadTopology,
  restrictTo,
  topologicalOrder,
} from "@fabkube/orchestrator";
import { CreateLogTable, decorators } from "@fabkube/utils";
import path from "path";
import { CliOptions } from "../types";
import { settingsOverrides } from "./options";
import { printWarnings } from "./validate";

/**
 * Plan - prints the order (and concurrency levels) entities would be
 * reconciled in, without touching the cluster.
 * @param configFile: config file, yaml or json
 * @param opts: `target` restricts the plan to these entities and their dependencies
 *
 * @returns exit code
 */
export async function plan(
  configFile: string,
  opts: CliOptions,
): Promise<number> {
  const configPath = path.resolve(configFile);
  // relative paths in the config are relative to the config file
  const topology = loadTopology(configPath, {
    basePath: path.dirname(configPath),
    overrides: settingsOverrides(opts),
  });
  printWarnings(topology.warnings);

  const fullGraph = buildDependencyGraph(topology);
  const graph = opts.target?.length
    ? restrictTo(fullGraph, opts.target)
    : fullGraph;

  const levelsTable = new CreateLogTable({
    head: [decorators.green("Level"), decorators.green("Entities")],
    colWidths: [10, 110],
  });
  levelsTable.pushToPrint(
    dependencyLevels(graph).map((level, index) => [
      index,
      level.map((entity) => `${entity.name} (${entity.kind})`).join(", "),
    ]),
  );

  const order = topologicalOrder(graph);
  const orderTable = new CreateLogTable({
    head: [
      decorators.green("#"),
      decorators.green("Entity"),
      decorators.green("Kind"),
      decorators.green("Depends on"),
    ],
    colWidths: [6, 30, 12, 72],
  });
  orderTable.pushToPrint(
    order.map((entity, index) => [
      index + 1,
      decorators.blue(entity.name),
      entity.kind,
      (graph.dependencies.get(entity.name) || []).join(", "),
    ]),
  );
  return 0;
}
