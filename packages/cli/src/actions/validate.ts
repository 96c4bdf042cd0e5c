import { loadTopology, topologyEntities } from "@fabkube/orchestrator";
import { CreateLogTable, decorators } from "@fabkube/utils";
import path from "path";
import { CliOptions } from "../types";
import { settingsOverrides } from "./options";

export function printWarnings(warnings: readonly string[]) {
  for (const warning of warnings)
    console.log(`${decorators.yellow("Warning: ")} ${warning}`);
}

/**
 * Validate - checks the configuration without any cluster call.
 * Every issue found is reported at once (as a ValidationError).
 * @param configFile: config file, yaml or json
 *
 * @returns exit code
 */
export async function validate(
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

  const entities = topologyEntities(topology);
  new CreateLogTable({ colWidths: [20, 100], doubleBorder: true }).pushToPrint([
    [decorators.green("Config"), configPath],
    [decorators.green("Status"), decorators.green("valid")],
    [decorators.green("Entities"), entities.length],
    [decorators.green("Warnings"), topology.warnings.length],
  ]);
  return 0;
}
