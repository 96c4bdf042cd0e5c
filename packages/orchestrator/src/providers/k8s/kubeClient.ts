import { hashSpec, pollUntil } from "@fabkube/utils";
import Debug from "debug";
import execa from "execa";
import fs from "fs";
import tmp from "tmp-promise";
import yaml from "yaml";
import { IDENTITY_NOT_FOUND, SPEC_HASH_ANNOTATION } from "../../constants";
import { TransientClusterError, classifyClusterError } from "../../errors";
import {
  ChannelMembershipSpec,
  ChannelSpec,
  ChartRef,
  Client,
  IdentitySpec,
  ReleaseValues,
  Resource,
  ResourceArgs,
  ResourceHandle,
  ResourceKind,
  WaitResult,
  resourceName,
  resourceNamespace,
} from "../client";
import {
  genChannelMarkerDef,
  genHelmUpgradeArgs,
  genNamespaceDef,
  genRegisterArgs,
  genSecretDef,
} from "./dynResourceDefinition";
import { parseJson, podsReady, readPath, readString, readStringMap } from "./parse";
import { channelMarkerName, ResourceDef } from "./resources";

const debug = Debug("fabkube::kube::client");

export interface RunCommandResponse {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface RunCommandOptions {
  resourceDef?: string;
  allowFail?: boolean;
  mainCmd?: string;
}

const NOT_FOUND = /NotFound|not found/i;
const CHANNEL_ALREADY_EXISTS =
  /already exists|at version 0, but got version 1/i;
const CHANNEL_BLOCK_DIR = "/var/hyperledger";

export function initClient(configPath: string, context?: string): KubeClient {
  return new KubeClient(configPath, context);
}

export class KubeClient extends Client {
  command = "kubectl";

  constructor(configPath: string, context?: string) {
    super(configPath, "kubernetes", context);
  }

  async validateAccess(): Promise<boolean> {
    try {
      const result = await this.runCommand(["cluster-info"]);
      return result.exitCode === 0;
    } catch (e) {
      debug(e);
      return false;
    }
  }

  async applyResource(...args: ResourceArgs): Promise<ResourceHandle> {
    const [kind, spec] = args;
    const handle: ResourceHandle = {
      kind,
      name: resourceName(...args),
      namespace: resourceNamespace(...args),
    };

    switch (kind) {
      case "Namespace":
        await this.createResource(genNamespaceDef(spec), kind);
        break;
      case "Secret":
        await this.createResource(genSecretDef(spec), kind);
        break;
      case "Identity":
        await this.registerIdentity(spec);
        break;
      case "Channel":
        await this.createChannel(spec);
        break;
      case "ChannelMembership":
        await this.joinChannel(spec);
        break;
    }

    return handle;
  }

  async getResource(
    kind: ResourceKind,
    name: string,
    namespace?: string,
  ): Promise<Resource | undefined> {
    switch (kind) {
      case "Namespace":
        return this.getObject(kind, ["namespace", name], name);
      case "Secret":
        return this.getObject(kind, ["secret", name, "-n", this.ns(namespace)], name);
      case "Ingress":
        return this.getIngress(name, this.ns(namespace));
      case "Release":
        return this.getRelease(name, this.ns(namespace));
      case "Identity":
        return this.getIdentity(name, this.ns(namespace));
      case "Channel": {
        const marker = await this.getObject(
          "Channel",
          ["configmap", channelMarkerName(name), "-n", this.ns(namespace)],
          name,
        );
        return marker && { ...marker, data: undefined };
      }
      case "ChannelMembership":
        return this.getMembership(name, this.ns(namespace));
    }
  }

  async waitReady(
    handle: ResourceHandle,
    timeout: number,
    signal?: AbortSignal,
  ): Promise<WaitResult> {
    const ready = await pollUntil(
      this.pollInterval,
      timeout * 1000,
      () => this.isReady(handle),
      signal,
    );
    debug(`waitReady(): ${handle.kind}/${handle.name} ready: ${ready}`);
    return ready ? "Ready" : "Timeout";
  }

  async installOrUpgradeRelease(
    chart: ChartRef,
    values: ReleaseValues,
  ): Promise<ResourceHandle> {
    const valuesFile = await tmp.file({ postfix: ".yaml" });
    try {
      await fs.promises.writeFile(valuesFile.path, yaml.stringify(values));
      await this.runHelm(
        genHelmUpgradeArgs(chart, valuesFile.path),
        `helm upgrade ${chart.release}`,
      );
    } finally {
      await valuesFile.cleanup();
    }

    return { kind: "Release", name: chart.release, namespace: chart.namespace };
  }

  private ns(namespace?: string): string {
    return namespace || "default";
  }

  private async isReady(handle: ResourceHandle): Promise<boolean> {
    switch (handle.kind) {
      case "Release": {
        const result = await this.runCommand(
          [
            "get",
            "pods",
            "-n",
            this.ns(handle.namespace),
            "-l",
            `release=${handle.name}`,
            "-o",
            "json",
          ],
          { allowFail: true },
        );
        if (result.exitCode !== 0) throw classifyClusterError(result, `pods of ${handle.name}`);
        return podsReady(parseJson(result.stdout));
      }
      case "Namespace": {
        const result = await this.runCommand(
          ["get", "namespace", handle.name, "-o", "jsonpath={.status.phase}"],
          { allowFail: true },
        );
        return result.stdout.trim() === "Active";
      }
      default:
        return (
          (await this.getResource(handle.kind, handle.name, handle.namespace)) !==
          undefined
        );
    }
  }

  // accept a json def
  private async createResource(resourceDef: ResourceDef, kind: string): Promise<void> {
    debug(resourceDef.metadata.name);
    const result = await this.runCommand(["apply", "-f", "-"], {
      resourceDef: JSON.stringify(resourceDef),
      allowFail: true,
    });
    if (result.exitCode !== 0)
      throw classifyClusterError(result, `apply ${kind}/${resourceDef.metadata.name}`);
  }

  private async getObject(
    kind: ResourceKind,
    args: string[],
    name: string,
  ): Promise<Resource | undefined> {
    const result = await this.runCommand(["get", ...args, "-o", "json"], {
      allowFail: true,
    });
    if (result.exitCode !== 0) {
      if (NOT_FOUND.test(result.stderr)) return undefined;
      throw classifyClusterError(result, `get ${kind}/${name}`);
    }

    const json = parseJson(result.stdout);
    return {
      kind,
      name,
      namespace: readString(json, "metadata", "namespace"),
      specHash: readString(json, "metadata", "annotations", SPEC_HASH_ANNOTATION),
      data: readStringMap(json, "data"),
    };
  }

  // the host the chart publishes, as `data.host`
  private async getIngress(name: string, namespace: string): Promise<Resource | undefined> {
    const result = await this.runCommand(
      ["get", "ingress", name, "-n", namespace, "-o", "json"],
      { allowFail: true },
    );
    if (result.exitCode !== 0) {
      if (NOT_FOUND.test(result.stderr)) return undefined;
      throw classifyClusterError(result, `get Ingress/${name}`);
    }

    const host = readString(parseJson(result.stdout), "spec", "rules", 0, "host");
    return { kind: "Ingress", name, namespace, data: host ? { host } : {} };
  }

  private async getRelease(name: string, namespace: string): Promise<Resource | undefined> {
    const listed = await this.runHelm(
      ["list", "--namespace", namespace, "--filter", `^${name}$`, "-o", "json"],
      `helm list ${name}`,
    );
    const release = readPath(parseJson(listed), 0);
    if (!release) return undefined;

    const values = await this.runHelm(
      ["get", "values", name, "--namespace", namespace, "-o", "json"],
      `helm get values ${name}`,
    );
    const parsedValues = parseJson(values);

    return {
      kind: "Release",
      name,
      namespace,
      specHash: hashSpec(parsedValues ?? {}),
      data: {
        chart: readString(release, "chart") || "",
        status: readString(release, "status") || "",
      },
    };
  }

  private async getPodName(namespace: string, app: string, release: string): Promise<string> {
    const result = await this.runCommand([
      "get",
      "pods",
      "-n",
      namespace,
      "-l",
      `app=${app},release=${release}`,
      "-o",
      "jsonpath={.items[0].metadata.name}",
    ]);
    const podName = result.stdout.trim();
    if (!podName)
      throw new TransientClusterError(`no ${app} pod found for release ${release}`);
    return podName;
  }

  private async exec(
    namespace: string,
    pod: string,
    cmd: string[],
  ): Promise<RunCommandResponse> {
    return this.runCommand(["exec", "-n", namespace, pod, "--", ...cmd], {
      allowFail: true,
    });
  }

  private async getIdentity(name: string, namespace: string): Promise<Resource | undefined> {
    const [ca, username] = name.split("/");
    const pod = await this.getPodName(namespace, "hlf-ca", ca);
    const result = await this.exec(namespace, pod, [
      "fabric-ca-client",
      "identity",
      "list",
      "--id",
      username,
    ]);
    if (result.exitCode !== 0) {
      if (result.stderr.includes(IDENTITY_NOT_FOUND)) return undefined;
      throw classifyClusterError(result, `identity ${username}`);
    }
    return { kind: "Identity", name, namespace };
  }

  private async registerIdentity(spec: IdentitySpec): Promise<void> {
    const pod = await this.getPodName(spec.namespace, "hlf-ca", spec.ca);
    const attrs: string[] = [];
    if (spec.admin) attrs.push("admin=true:ecert");
    if (spec.intermediate) attrs.push("hf.IntermediateCA=true");

    const result = await this.exec(
      spec.namespace,
      pod,
      genRegisterArgs(spec.name, spec.password, spec.type, attrs),
    );
    if (result.exitCode !== 0)
      throw classifyClusterError(result, `register ${spec.name}`);
  }

  private async createChannel(spec: ChannelSpec): Promise<void> {
    const pod = await this.getPodName(spec.namespace, "hlf-peer", spec.peer);
    const result = await this.exec(spec.namespace, pod, [
      "peer",
      "channel",
      "create",
      "-o",
      spec.orderer,
      "-c",
      spec.name,
      "-f",
      `/hl_config/channel/${spec.txKey}`,
      "--outputBlock",
      `${CHANNEL_BLOCK_DIR}/${spec.name}.block`,
    ]);
    if (result.exitCode !== 0 && !CHANNEL_ALREADY_EXISTS.test(result.stderr))
      throw classifyClusterError(result, `create channel ${spec.name}`);

    await this.createResource(genChannelMarkerDef(spec), "Channel");
  }

  private async joinChannel(spec: ChannelMembershipSpec): Promise<void> {
    const pod = await this.getPodName(spec.namespace, "hlf-peer", spec.peer);
    const block = `${CHANNEL_BLOCK_DIR}/${spec.channel}.block`;

    const fetched = await this.exec(spec.namespace, pod, [
      "peer",
      "channel",
      "fetch",
      "oldest",
      block,
      "-c",
      spec.channel,
      "-o",
      spec.orderer,
    ]);
    if (fetched.exitCode !== 0)
      throw classifyClusterError(fetched, `fetch channel ${spec.channel}`);

    const joined = await this.exec(spec.namespace, pod, [
      "peer",
      "channel",
      "join",
      "-b",
      block,
    ]);
    if (joined.exitCode !== 0)
      throw classifyClusterError(joined, `join ${spec.peer} to ${spec.channel}`);
  }

  private async getMembership(name: string, namespace: string): Promise<Resource | undefined> {
    const separator = name.lastIndexOf("@");
    const channel = name.slice(0, separator);
    const peer = name.slice(separator + 1);

    const pod = await this.getPodName(namespace, "hlf-peer", peer);
    const result = await this.exec(namespace, pod, ["peer", "channel", "list"]);
    if (result.exitCode !== 0)
      throw classifyClusterError(result, `list channels of ${peer}`);

    const joined = result.stdout
      .split(/\r?\n/)
      .map((line) => line.trim())
      .includes(channel);
    return joined ? { kind: "ChannelMembership", name, namespace } : undefined;
  }

  private async runHelm(args: string[], context: string): Promise<string> {
    const result = await this.runCommand(args, { mainCmd: "helm", allowFail: true });
    if (result.exitCode !== 0) throw classifyClusterError(result, context);
    return result.stdout;
  }

  async runCommand(
    args: string[],
    opts?: RunCommandOptions,
  ): Promise<RunCommandResponse> {
    const cmd = opts?.mainCmd || this.command;
    const augmentedCmd: string[] = ["--kubeconfig", this.configPath];
    if (this.context)
      augmentedCmd.push(cmd === "helm" ? "--kube-context" : "--context", this.context);
    const finalArgs = [...augmentedCmd, ...args];

    try {
      const result = await execa(cmd, finalArgs, {
        input: opts?.resourceDef,
      });

      return {
        exitCode: result.exitCode,
        stdout: result.stdout,
        stderr: result.stderr,
      };
    } catch (error) {
      debug(error);
      if (!opts?.allowFail) throw classifyClusterError(error, `${cmd} ${args[0]}`);

      const exitCode = readPath(error, "exitCode");
      return {
        exitCode: typeof exitCode === "number" ? exitCode : 1,
        stdout: readString(error, "stdout") || "",
        stderr: readString(error, "stderr") || readString(error, "message") || "",
      };
    }
  }
}
