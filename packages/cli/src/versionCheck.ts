import { decorators } from "@fabkube/utils";
import { readPackageInfo } from "./packageInfo";

export const checkNodeVersion = () => {
  const nodeVersion = process.versions.node;
  const requiredNodeVersion = readPackageInfo().nodeVersion;
  if (
    parseInt(nodeVersion.split(".")[0]) <
    parseInt(requiredNodeVersion.split(".")[0])
  ) {
    console.error(
      `\n${decorators.red("Error: ")} \t ${decorators.bright(
        `Node version ${nodeVersion} is not supported. Please update to Node ${requiredNodeVersion} or above.`,
      )}\n`,
    );
    process.exit(1);
  }
};
