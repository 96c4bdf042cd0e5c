import {
  CreateLogTable,
  decorators,
  LocalJsonFileContentIF,
  writeLocalJsonFile,
} from "@fabkube/utils";
import { STATUS_REPORT_FILENAME } from "./constants";
import { serialize } from "./errors";
import { ConvergenceReport, EntityState } from "./types";

export const EXIT_OK = 0;
export const EXIT_VALIDATION = 1;
export const EXIT_CONVERGENCE = 2;

export function exitCodeFor(report: ConvergenceReport): number {
  return report.outcome === "converged" ? EXIT_OK : EXIT_CONVERGENCE;
}

const paintState = (state: EntityState): string => {
  switch (state) {
    case "Ready":
      return decorators.green(state);
    case "Pending":
    case "NotStarted":
      return decorators.yellow(state);
    case "Failed":
    case "Blocked":
      return decorators.red(state);
  }
};

export function printReport(report: ConvergenceReport) {
  const table = new CreateLogTable({
    head: [
      decorators.green("Entity"),
      decorators.green("Kind"),
      decorators.green("State"),
      decorators.green("Attempts"),
      decorators.green("Detail"),
    ],
    colWidths: [24, 10, 14, 10, 80],
    wordWrap: true,
  });

  table.pushTo(
    report.entities.map((status) => [
      status.name,
      status.kind,
      paintState(status.state),
      status.attempts,
      status.state === "Ready" ? "" : status.detail || "",
    ]),
  );
  table.print();

  const outcome =
    report.outcome === "converged"
      ? decorators.green(report.outcome)
      : decorators.red(report.outcome);
  new CreateLogTable({ colWidths: [20, 100], doubleBorder: true }).pushToPrint([
    [decorators.green("Outcome"), outcome],
    [decorators.green("Passes"), report.iterations],
    [
      decorators.green("Duration"),
      `${((report.finishedAt - report.startedAt) / 1000).toFixed(1)}s`,
    ],
    ...(report.reason ? [[decorators.green("Reason"), report.reason]] : []),
  ]);
}

// Plain JSON form of the report; errors keep their class and cause.
export function reportContent(report: ConvergenceReport): LocalJsonFileContentIF {
  return {
    outcome: report.outcome,
    iterations: report.iterations,
    startedAt: new Date(report.startedAt).toISOString(),
    finishedAt: new Date(report.finishedAt).toISOString(),
    reason: report.reason,
    entities: report.entities.map((status) => ({
      name: status.name,
      kind: status.kind,
      state: status.state,
      attempts: status.attempts,
      detail: status.detail,
      error: status.error ? serialize(status.error) : undefined,
    })),
  };
}

export function writeReport(dir: string, report: ConvergenceReport): string {
  writeLocalJsonFile(dir, STATUS_REPORT_FILENAME, reportContent(report));
  return `${dir}/${STATUS_REPORT_FILENAME}`;
}
