import {
  converge,
  DEFAULT_PROVIDER,
  exitCodeFor,
  getProvider,
  loadTopology,
  printReport,
  TransientClusterError,
  ValidationError,
  writeReport,
} from "@fabkube/orchestrator";
import {
  CreateLogTable,
  decorators,
  getCredsFilePath,
  makeDir,
} from "@fabkube/utils";
import Debug from "debug";
import path from "path";
import { CliOptions } from "../types";
import { settingsOverrides } from "./options";
import { printWarnings } from "./validate";

const debug = Debug("fabkube::cli");

/**
 * Deploy - provisions the Fabric network declared in the config and keeps
 * reconciling until it converges, fails or is cancelled.
 * @param configFile: config file, yaml or json
 * @param credsFile: kubeconfig file name or path; looked up in the current
 *  directory, its parent and $HOME/.kube/ (default: `config`)
 * @param opts: cli options
 * @param signal: aborts the run (ctrl+c)
 *
 * @returns exit code (0 all Ready, 2 otherwise)
 */
export async function deploy(
  configFile: string,
  credsFile: string | undefined,
  opts: CliOptions,
  signal?: AbortSignal,
): Promise<number> {
  const configPath = path.resolve(configFile);
  const topology = loadTopology(configPath, {
    basePath: path.dirname(configPath),
    overrides: settingsOverrides(opts),
  });
  printWarnings(topology.warnings);

  const creds = getCredsFilePath(credsFile || "config");
  if (!creds)
    throw new ValidationError([
      `I can't find the Creds file: ${credsFile || "config"}`,
    ]);

  const client = getProvider(DEFAULT_PROVIDER).initClient(
    creds,
    topology.core.cluster,
  );
  if (!(await client.validateAccess()))
    throw new TransientClusterError(
      `can not access the cluster with ${creds}${
        topology.core.cluster ? ` (context ${topology.core.cluster})` : ""
      }`,
    );

  new CreateLogTable({
    head: [decorators.green("fabkube"), decorators.green("Deploy")],
    colWidths: [20, 100],
    doubleBorder: true,
  }).pushToPrint([
    [decorators.green("Config"), configPath],
    [decorators.green("Provider"), decorators.blue(client.providerName)],
    [decorators.green("Cluster"), topology.core.cluster || "(current context)"],
    [decorators.green("Targets"), opts.target?.join(", ") || "all"],
    [decorators.green("Timeout"), `${topology.settings.timeout}s`],
  ]);

  const report = await converge(topology, client, {
    signal,
    targets: opts.target,
    onPass: (iteration) => debug(`pass ${iteration} done`),
  });

  printReport(report);
  if (opts.dir) {
    await makeDir(opts.dir, true);
    const reportPath = writeReport(opts.dir, report);
    console.log(`\t Status report written to ${decorators.green(reportPath)}`);
  }

  return exitCodeFor(report);
}
