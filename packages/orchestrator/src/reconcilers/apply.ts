import { generatePassword, hashSpec, isRecord } from "@fabkube/utils";
import Debug from "debug";
import fs from "fs";
import path from "path";
import yaml from "yaml";
import { PermanentResourceError } from "../errors";
import {
  ChartRef,
  ReleaseValues,
  ResourceArgs,
  ResourceHandle,
  resourceName,
  resourceNamespace,
} from "../providers/client";
import { CertificateAuthority, ReconcileResult } from "../types";
import { ReconcileContext } from "./types";

const debug = Debug("fabkube::reconciler");

export const credSecretName = (username: string) => `hlf--${username}-cred`;
export const adminCredSecretName = (admin: string) =>
  `hlf--${admin}-admincred`;
export const cryptoSecretName = (username: string, type: string) =>
  `hlf--${username}-${type}`;

export const encode = (value: string | Buffer) =>
  Buffer.from(value).toString("base64");
export const decode = (value: string) =>
  Buffer.from(value, "base64").toString("utf8");

export const pending = (reason: string): ReconcileResult => ({
  status: "Pending",
  reason,
});

/**
 * Apply a resource unless it exists with the same spec. Resources the
 * provider keeps no spec hash for are left alone once they exist.
 * Returns whether anything was applied.
 */
export async function ensureResource(
  ctx: ReconcileContext,
  ...args: ResourceArgs
): Promise<boolean> {
  const [kind, spec] = args;
  const name = resourceName(...args);
  const actual = await ctx.client.getResource(
    kind,
    name,
    resourceNamespace(...args),
  );

  if (actual && (!actual.specHash || actual.specHash === hashSpec(spec))) {
    debug(`${kind}/${name} up to date`);
    return false;
  }

  debug(`${actual ? "updating" : "creating"} ${kind}/${name}`);
  await ctx.client.applyResource(...args);
  return true;
}

export async function ensureRelease(
  ctx: ReconcileContext,
  chart: ChartRef,
  values: ReleaseValues,
): Promise<ResourceHandle> {
  const actual = await ctx.client.getResource(
    "Release",
    chart.release,
    chart.namespace,
  );
  if (actual && actual.specHash === hashSpec(values)) {
    debug(`release ${chart.release} up to date`);
    return { kind: "Release", name: chart.release, namespace: chart.namespace };
  }

  debug(`${actual ? "upgrading" : "installing"} release ${chart.release}`);
  return ctx.client.installOrUpgradeRelease(chart, values);
}

export async function readSecret(
  ctx: ReconcileContext,
  name: string,
  namespace: string,
): Promise<{ [key: string]: string } | undefined> {
  const secret = await ctx.client.getResource("Secret", name, namespace);
  if (!secret) return undefined;

  const data: { [key: string]: string } = {};
  for (const [key, value] of Object.entries(secret.data || {}))
    data[key] = decode(value);
  return data;
}

/**
 * Credentials secret (`CA_USERNAME`/`CA_PASSWORD`) for an identity. A
 * password already stored in the cluster always wins; otherwise the given
 * one, otherwise a random one. Returns the password in use.
 */
export async function ensureCredentials(
  ctx: ReconcileContext,
  secretName: string,
  namespace: string,
  username: string,
  password?: string,
): Promise<string> {
  const existing = await readSecret(ctx, secretName, namespace);
  if (existing?.CA_PASSWORD) return existing.CA_PASSWORD;

  const inUse = password || generatePassword();
  await ctx.client.applyResource("Secret", {
    name: secretName,
    namespace,
    data: { CA_USERNAME: encode(username), CA_PASSWORD: encode(inUse) },
  });
  return inUse;
}

// pending writes per secret, so concurrent writers merge their keys in turn
const secretWrites = new Map<string, Promise<unknown>>();

function serialized<T>(key: string, fn: () => Promise<T>): Promise<T> {
  const previous = secretWrites.get(key) || Promise.resolve();
  const next = previous.then(fn, fn);
  secretWrites.set(
    key,
    next.catch(() => undefined),
  );
  return next;
}

/**
 * Store `file` under `key` of a secret. Keys other writers put into the same
 * secret are kept: peer groups sharing a namespace share the channel secret.
 */
export async function ensureFileSecret(
  ctx: ReconcileContext,
  name: string,
  namespace: string,
  key: string,
  file: string,
): Promise<boolean> {
  const value = encode(await fs.promises.readFile(file));

  return serialized(`${namespace}/${name}`, async () => {
    const actual = await ctx.client.getResource("Secret", name, namespace);
    if (actual?.data?.[key] === value) {
      debug(`Secret/${name} already holds ${key}`);
      return false;
    }

    debug(`${actual ? "adding" : "creating"} ${key} in Secret/${name}`);
    await ctx.client.applyResource("Secret", {
      name,
      namespace,
      data: { ...actual?.data, [key]: value },
    });
    return true;
  });
}

// Host the CA publishes through its ingress, once there is one.
export async function caHost(
  ctx: ReconcileContext,
  ca: CertificateAuthority,
): Promise<string | undefined> {
  const ingress = await ctx.client.getResource(
    "Ingress",
    `${ca.name}-hlf-ca`,
    ca.namespace,
  );
  return ingress?.data?.host || undefined;
}

// `<dir_values>/<chart>/<release>.yaml`, empty when there is none
export function readValuesFile(
  dirValues: string,
  chart: string,
  release: string,
): ReleaseValues {
  const file = path.join(dirValues, chart, `${release}.yaml`);
  if (!fs.existsSync(file)) {
    debug(`no values file ${file}`);
    return {};
  }

  const values: unknown = yaml.parse(fs.readFileSync(file, "utf8"));
  if (values === null || values === undefined) return {};
  if (!isRecord(values))
    throw new PermanentResourceError(`values file ${file} is not a mapping`);
  return values;
}

// `override` wins; nested mappings are merged key by key
export function mergeValues(
  base: ReleaseValues,
  override: ReleaseValues,
): ReleaseValues {
  const merged: ReleaseValues = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const current = merged[key];
    merged[key] =
      isRecord(current) && isRecord(value) ? mergeValues(current, value) : value;
  }
  return merged;
}
