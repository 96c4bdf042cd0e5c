import { isRecord, readDataFile } from "@fabkube/utils";
import fs from "fs";
import path from "path";
import { PackageInfo } from "./types";

// next to the sources, or at the root once built into dist/cli/src
const CANDIDATES = ["../package.json", "../../../package.json"];

export function readPackageInfo(): PackageInfo {
  const file = CANDIDATES.map((candidate) =>
    path.resolve(__dirname, candidate),
  ).find((candidate) => fs.existsSync(candidate));
  if (!file) throw new Error("package.json of fabkube not found");

  const content: unknown = JSON.parse(readDataFile(file));
  if (!isRecord(content)) throw new Error(`${file} is not a mapping`);

  const { version, engines } = content;
  const node = isRecord(engines) ? engines.node : undefined;
  return {
    version: typeof version === "string" ? version : "0.0.0",
    nodeVersion: typeof node === "string" ? node.replace(/>=\s*/, "") : "20",
  };
}
