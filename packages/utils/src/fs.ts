import fs from "fs";
import { Environment } from "nunjucks";
import path from "path";
import yaml from "yaml";
import { decorators } from "./colors";
import { RelativeLoader } from "./nunjucksRelativeLoader";
import { ConfigDocument, isRecord } from "./types";

export interface LocalJsonFileContentIF {
  [key: string]: unknown;
}

export function writeLocalJsonFile(
  dir: string,
  fileName: string,
  content: LocalJsonFileContentIF,
) {
  fs.writeFileSync(`${dir}/${fileName}`, JSON.stringify(content, null, 4));
}

export async function makeDir(dir: string, recursive = false) {
  if (!fs.existsSync(dir)) {
    await fs.promises.mkdir(dir, { recursive });
  }
}

export function isReadableDir(dir: string): boolean {
  try {
    fs.accessSync(dir, fs.constants.R_OK);
    return fs.statSync(dir).isDirectory();
  } catch {
    return false;
  }
}

export function isReadableFile(filePath: string): boolean {
  try {
    fs.accessSync(filePath, fs.constants.R_OK);
    return fs.statSync(filePath).isFile();
  } catch {
    return false;
  }
}

export function getCredsFilePath(credsFile: string): string | undefined {
  if (fs.existsSync(credsFile)) return credsFile;

  const possiblePaths = [".", "..", `${process.env.HOME}/.kube`];
  const credsFileExistInPath: string | undefined = possiblePaths.find(
    (p) => {
      const t = `${p}/${credsFile}`;
      return fs.existsSync(t);
    },
  );
  if (credsFileExistInPath) return `${credsFileExistInPath}/${credsFile}`;
}

// Plain `{{ NAME }}` references in the template, resolved from the environment.
export function getReplacementInText(content: string): string[] {
  const replacements: string[] = [];
  const replacementRegex = /{{\s*([A-Za-z_][A-Za-z0-9_]*)\s*}}/gm;
  for (const match of content.matchAll(replacementRegex)) {
    if (!replacements.includes(match[1])) replacements.push(match[1]);
  }

  return replacements;
}

export function parseConfigContent(
  content: string,
  filepath: string,
): ConfigDocument {
  const jsonChar = /[{]/;
  const yamlChar = /[A-Za-z\-#"']/;

  const fileType = path.extname(filepath).slice(1).toLowerCase();
  if (!fileType) {
    throw new Error(
      `${decorators.bright("Error - config file has no extension.")}`,
    );
  }

  let firstChar: string | undefined;
  for (const line of content.split(/\r?\n/)) {
    // skip comments and empty lines
    if (!line.trim() || ["#", "/"].includes(line.trim()[0])) continue;
    firstChar = line.trim()[0];
    break;
  }

  if (!firstChar) {
    throw new Error(
      `${decorators.bright("Config file has no valid characters.")}`,
    );
  }

  let parsed: unknown;
  if (fileType === "json" && jsonChar.test(firstChar)) {
    parsed = JSON.parse(content);
  } else if (["yaml", "yml"].includes(fileType) && yamlChar.test(firstChar)) {
    parsed = yaml.parse(content);
  } else {
    throw new Error(
      `${decorators.bright(
        "config file is not one of the known types: 'json' or 'yaml'.",
      )}`,
    );
  }

  if (!isRecord(parsed))
    throw new Error(
      `${decorators.bright(`config file ${filepath} is not a mapping`)}`,
    );
  return parsed;
}

/**
 * Read a config file, render it as a nunjucks template against
 * `process.env` (includes are resolved next to the file) and parse it.
 */
export function readConfigFile(
  filepath: string,
  env: NodeJS.ProcessEnv = process.env,
): ConfigDocument {
  const configBasePath = path.dirname(filepath);
  const templateContent = fs.readFileSync(filepath).toString();

  const missing = getReplacementInText(templateContent).filter(
    (name) => env[name] === undefined,
  );
  if (missing.length > 0) {
    throw new Error(`Environment not set for : ${missing.join(",")}`);
  }

  const nunjucksEnv = new Environment(new RelativeLoader([configBasePath]));
  const content = nunjucksEnv.renderString(templateContent, env);

  return parseConfigContent(content, filepath);
}

export function readDataFile(filepath: string): string {
  try {
    const fileData = fs.readFileSync(filepath, "utf8");
    return fileData.trim();
  } catch (err) {
    throw Error(decorators.red(`Cannot read ${filepath}: ${err}`));
  }
}
