#!/usr/bin/env node
import {
  EXIT_CONVERGENCE,
  EXIT_VALIDATION,
  ValidationError,
} from "@fabkube/orchestrator";
import { decorators, setLogType } from "@fabkube/utils";
import { Command, Option } from "commander";
import Debug from "debug";
import { deploy } from "./actions/deploy";
import { parseCliOptions, parsePositiveInt } from "./actions/options";
import { plan } from "./actions/plan";
import { validate } from "./actions/validate";
import { readPackageInfo } from "./packageInfo";
import { CliOptions } from "./types";
import { checkNodeVersion } from "./versionCheck";

const debug = Debug("fabkube::cli");

const program = new Command("fabkube");

const optionalString = (value: unknown) =>
  typeof value === "string" ? value : undefined;

// aborted on ctrl+c / SIGTERM; resources already created stay in place
const runController = new AbortController();
let alreadyTryToStop = false;

checkNodeVersion();

function handleTermination(signal: NodeJS.Signals) {
  if (alreadyTryToStop) {
    console.log(decorators.red(`${signal} received again, exiting now`));
    process.exit(130);
  }
  alreadyTryToStop = true;
  console.log(decorators.yellow(`${signal} detected, stopping after the current step...`));
  runController.abort(new Error(`interrupted by ${signal}`));
}

// Ensure to log the uncaught exceptions
// to debug the problem, also exit because we don't know
// what happens there.
process.on("uncaughtException", (err) => {
  console.log(`uncaughtException`);
  console.log(err);
  debug(err);
  process.exit(100);
});

// Ensure that we know about any exception thrown in a promise that we
// accidentally don't have a 'catch' for.
process.on("unhandledRejection", (err) => {
  debug(err);
  console.log(
    `\n${decorators.red("UnhandledRejection: ")} \t ${decorators.bright(
      String(err),
    )}\n`,
  );
  process.exit(101);
});

process.on("SIGINT", handleTermination);
process.on("SIGTERM", handleTermination);

program
  .addOption(
    new Option(
      "-t, --timeout <secs>",
      "Global timeout for the whole run, overrides settings.timeout",
    ).argParser(parsePositiveInt),
  )
  .addOption(
    new Option(
      "-m, --max-attempts <attempts>",
      "Attempts per entity before giving up, overrides settings.max_attempts",
    ).argParser(parsePositiveInt),
  )
  .addOption(
    new Option(
      "-b, --backoff-ceiling <ms>",
      "Longest pause between passes, overrides settings.backoff_ceiling",
    ).argParser(parsePositiveInt),
  )
  .addOption(
    new Option(
      "-c, --concurrency <concurrency>",
      "Entities reconciled at the same time, overrides settings.concurrency",
    ).argParser(parsePositiveInt),
  )
  .addOption(
    new Option(
      "-l, --logType <logType>",
      "Type of logging - defaults to 'table'",
    ).choices(["table", "text", "silent"]),
  )
  .addOption(
    new Option(
      "-d, --dir <path>",
      "Directory where the status report (fabkube-status.json) is written",
    ),
  );

program
  .command("deploy")
  .description("Deploy the Fabric network defined in the config and wait for it to converge")
  .argument("<config>", "Topology config file path (yaml or json)")
  .argument("[creds]", "kubectl credentials file")
  .addOption(
    new Option(
      "--target <names...>",
      "Only converge these entities (and what they depend on)",
    ),
  )
  .action(
    asyncAction(([config, creds], opts) =>
      deploy(String(config), optionalString(creds), opts, runController.signal),
    ),
  );

program
  .command("validate")
  .description("Validate the config without touching the cluster")
  .argument("<config>", "Topology config file path (yaml or json)")
  .action(asyncAction(([config], opts) => validate(String(config), opts)));

program
  .command("plan")
  .description("Print the order entities would be reconciled in")
  .argument("<config>", "Topology config file path (yaml or json)")
  .addOption(
    new Option("--target <names...>", "Only plan these entities (and what they depend on)"),
  )
  .action(asyncAction(([config], opts) => plan(String(config), opts)));

program
  .command("version")
  .description("Prints fabkube version")
  .action(() => {
    console.log(readPackageInfo().version);
    process.exit(0);
  });

program.addHelpText(
  "after",
  `

Exit codes:
  0  every entity is Ready
  1  invalid configuration
  2  convergence failed, timed out or was cancelled

Debug:
  The debug/verbose output is managed by the DEBUG environment variable, you can enable/disable specific debugging namespaces setting an space or comma-delimited names.
  $ e.g $ DEBUG=fabkube::config,fabkube::kube::client fabkube deploy examples/network.yaml

  The available namespaces are:
  fabkube::cli
  fabkube::config
  fabkube::graph
  fabkube::kube::client
  fabkube::orchestrator
  fabkube::reconciler
  fabkube::reconciler::ca
  fabkube::reconciler::channel
  fabkube::supervisor
  fabkube::tools

  NOTE: wildcard (e.g.'fabkube*') are supported, for advance use check https://www.npmjs.com/package/debug#wildcards
`,
);

program.parse(process.argv);

// Wraps an action: options (own and global) are parsed, the returned exit
// code is set, errors are printed and mapped to an exit code.
function asyncAction(
  cmd: (positional: unknown[], opts: CliOptions) => Promise<number>,
) {
  // commander passes the arguments, then the command options and the command
  return function (...args: unknown[]) {
    const command = args[args.length - 1];
    if (!(command instanceof Command)) throw new Error("commander did not pass the command");

    const opts = parseCliOptions(command.optsWithGlobals());
    setLogType(opts.logType || "table");
    const positional = args.slice(0, -2);

    (async () => {
      try {
        process.exitCode = await cmd(positional, opts);
      } catch (err) {
        if (err instanceof ValidationError) {
          for (const warning of err.warnings)
            console.log(`${decorators.yellow("Warning: ")} ${warning}`);
          console.log(`\n ${decorators.red("Error: ")} \t ${decorators.bright(err.message)}\n`);
          process.exitCode = EXIT_VALIDATION;
          return;
        }

        debug(err);
        const message = err instanceof Error ? err.message : String(err);
        console.log(`\n ${decorators.red("Error: ")} \t ${decorators.bright(message)}\n`);
        process.exitCode = EXIT_CONVERGENCE;
      }
    })();
  };
}
