import fs from "fs";
import { ILoader, LoaderSource } from "nunjucks";
import path from "path";

// Resolves `{% include %}` names as files relative to the config directories,
// first match wins.
export class RelativeLoader implements ILoader {
  constructor(private paths: string[]) {}

  getSource(name: string): LoaderSource {
    const fullPath = path.isAbsolute(name)
      ? name
      : this.paths
          .map((base) => path.resolve(base, name))
          .find((candidate) => fs.existsSync(candidate));

    if (!fullPath || !fs.existsSync(fullPath))
      throw new Error(
        `template ${name} not found in: ${this.paths.join(", ")}`,
      );

    return {
      src: fs.readFileSync(fullPath, "utf-8"),
      path: fullPath,
      noCache: true,
    };
  }
}
