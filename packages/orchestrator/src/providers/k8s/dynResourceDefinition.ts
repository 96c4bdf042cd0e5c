import { hashSpec } from "@fabkube/utils";
import { ChannelSpec, ChartRef, NamespaceSpec, SecretSpec } from "../client";
import {
  ChannelMarkerResource,
  NamespaceResource,
  SecretResource,
} from "./resources";
import { ConfigMapDef, NamespaceDef, SecretDef } from "./resources/types";

export function genNamespaceDef(spec: NamespaceSpec): NamespaceDef {
  return new NamespaceResource(spec, hashSpec(spec)).generateSpec();
}

export function genSecretDef(spec: SecretSpec): SecretDef {
  return new SecretResource(spec, hashSpec(spec)).generateSpec();
}

export function genChannelMarkerDef(spec: ChannelSpec): ConfigMapDef {
  return new ChannelMarkerResource(spec, hashSpec(spec)).generateSpec();
}

export function genHelmUpgradeArgs(
  chart: ChartRef,
  valuesFile: string,
): string[] {
  const args = [
    "upgrade",
    "--install",
    chart.release,
    `${chart.repo}/${chart.chart}`,
    "--namespace",
    chart.namespace,
    "--create-namespace",
    "-f",
    valuesFile,
  ];
  if (chart.version) args.push("--version", chart.version);
  return args;
}

export function genRegisterArgs(
  name: string,
  password: string,
  type: string,
  attrs: string[],
): string[] {
  const args = [
    "fabric-ca-client",
    "register",
    "--id.name",
    name,
    "--id.secret",
    password,
    "--id.type",
    type,
  ];
  if (attrs.length) args.push("--id.attrs", attrs.join(","));
  return args;
}
