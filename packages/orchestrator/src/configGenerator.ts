import {
  ConfigDocument,
  deepFreeze,
  isReadableDir,
  isReadableFile,
  isRecord,
  readConfigFile,
} from "@fabkube/utils";
import Debug from "debug";
import path from "path";
import { KNOWN_FIELDS, KnownSection, TopologyConfig } from "./configTypes";
import {
  DEFAULT_BACKOFF_BASE,
  DEFAULT_BACKOFF_CEILING,
  DEFAULT_CHART_REPO,
  DEFAULT_CONCURRENCY,
  DEFAULT_GENESIS_PROFILE,
  DEFAULT_GLOBAL_TIMEOUT,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_POLL_INTERVAL,
  DEFAULT_SECRET_CHANNEL,
  DEFAULT_SECRET_GENESIS,
  DEFAULT_WAIT_TIMEOUT,
} from "./constants";
import { ValidationError } from "./errors";
import { buildDependencyGraph, findCycle } from "./graph";
import {
  CertificateAuthority,
  Composer,
  Core,
  Msp,
  OrdererGroup,
  PeerGroup,
  Settings,
  Topology,
} from "./types";

const debug = Debug("fabkube::config");

export interface LoadOptions {
  // directory relative paths resolve against (default: cwd)
  basePath?: string;
  // values taking precedence over the `settings` section (cli flags)
  overrides?: Partial<Settings>;
}

export interface ValidationResult {
  topology?: Topology;
  issues: string[];
  warnings: string[];
}

type Fields = Record<string, unknown>;

// Collects every issue found while reading a document, instead of stopping at
// the first one.
class Checker {
  issues: string[] = [];
  warnings: string[] = [];
  basePath: string;

  constructor(basePath: string) {
    this.basePath = basePath;
  }

  issue(where: string, message: string) {
    this.issues.push(`${where}: ${message}`);
  }

  unknownFields(section: KnownSection, where: string, fields: Fields) {
    const known: readonly string[] = KNOWN_FIELDS[section];
    for (const key of Object.keys(fields)) {
      if (!known.includes(key))
        this.warnings.push(`${where}: unknown field "${key}"`);
    }
  }

  mapping(value: unknown, where: string): Fields | undefined {
    if (isRecord(value)) return value;
    this.issue(where, "expected a mapping");
    return undefined;
  }

  string(fields: Fields, key: string, where: string): string | undefined {
    const value = fields[key];
    if (value === undefined || value === null) {
      this.issue(where, `missing required field "${key}"`);
      return undefined;
    }
    return this.nonEmpty(value, `${where}.${key}`);
  }

  optionalString(fields: Fields, key: string, where: string): string | undefined {
    const value = fields[key];
    if (value === undefined || value === null) return undefined;
    return this.nonEmpty(value, `${where}.${key}`);
  }

  names(fields: Fields, where: string): string[] {
    const value = fields.names;
    if (value === undefined || value === null) {
      this.issue(where, `missing required field "names"`);
      return [];
    }
    if (!Array.isArray(value) || value.length === 0) {
      this.issue(`${where}.names`, "expected a non-empty list");
      return [];
    }

    const names: string[] = [];
    value.forEach((item, i) => {
      const name = this.nonEmpty(item, `${where}.names[${i}]`);
      if (name === undefined) return;
      if (names.includes(name))
        this.issue(`${where}.names`, `duplicate name "${name}"`);
      else names.push(name);
    });
    return names;
  }

  positive(fields: Fields, key: string, fallback: number): number {
    const value = fields[key];
    if (value === undefined || value === null) return fallback;
    if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) {
      this.issue(`settings.${key}`, "expected a positive number");
      return fallback;
    }
    return value;
  }

  directory(value: string | undefined, where: string): string | undefined {
    if (value === undefined) return undefined;
    const dir = path.resolve(this.basePath, value);
    if (!isReadableDir(dir))
      this.issue(where, `directory ${dir} does not exist or is not readable`);
    return dir;
  }

  file(value: string | undefined, where: string): string | undefined {
    if (value === undefined) return undefined;
    const file = path.resolve(this.basePath, value);
    if (!isReadableFile(file))
      this.issue(where, `file ${file} does not exist or is not readable`);
    return file;
  }

  private nonEmpty(value: unknown, where: string): string | undefined {
    if (typeof value === "number") return String(value);
    if (typeof value !== "string" || !value.trim()) {
      this.issue(where, "expected a non-empty string");
      return undefined;
    }
    return value;
  }
}

// `orderers` and `peers` take a single group (the original layout) or a list
function groupsOf(
  checker: Checker,
  value: unknown,
  section: "orderers" | "peers",
): Array<{ fields: Fields; where: string }> {
  if (value === undefined || value === null) return [];
  if (Array.isArray(value)) {
    const groups: Array<{ fields: Fields; where: string }> = [];
    value.forEach((item, i) => {
      const where = `${section}[${i}]`;
      const fields = checker.mapping(item, where);
      if (fields) groups.push({ fields, where });
    });
    return groups;
  }

  const fields = checker.mapping(value, section);
  return fields ? [{ fields, where: section }] : [];
}

function readCore(checker: Checker, value: unknown): Core | undefined {
  if (value === undefined || value === null) {
    checker.issue("core", "missing required section");
    return undefined;
  }
  const fields = checker.mapping(value, "core");
  if (!fields) return undefined;
  checker.unknownFields("core", "core", fields);

  const dirCrypto = checker.directory(
    checker.string(fields, "dir_crypto", "core"),
    "core.dir_crypto",
  );
  const dirValues = checker.directory(
    checker.string(fields, "dir_values", "core"),
    "core.dir_values",
  );
  const dirConfig = checker.directory(
    checker.optionalString(fields, "dir_config", "core"),
    "core.dir_config",
  );
  if (!dirCrypto || !dirValues) return undefined;

  return {
    cluster: checker.optionalString(fields, "cluster", "core"),
    chartRepo:
      checker.optionalString(fields, "chart_repo", "core") || DEFAULT_CHART_REPO,
    dirConfig,
    dirCrypto,
    dirValues,
  };
}

function readCas(checker: Checker, value: unknown): CertificateAuthority[] {
  if (value === undefined || value === null) return [];
  const section = checker.mapping(value, "cas");
  if (!section) return [];

  const cas: CertificateAuthority[] = [];
  for (const [name, entry] of Object.entries(section)) {
    const where = `cas.${name}`;
    const fields = checker.mapping(entry, where);
    if (!fields) continue;
    checker.unknownFields("cas", where, fields);

    const namespace = checker.string(fields, "namespace", where);
    const tlsCert = checker.file(
      checker.string(fields, "tls_cert", where),
      `${where}.tls_cert`,
    );
    const parentCa = checker.optionalString(fields, "parent_ca", where);
    if (namespace && tlsCert) cas.push({ name, namespace, tlsCert, parentCa });
  }
  return cas;
}

function readMsps(checker: Checker, value: unknown): Msp[] {
  if (value === undefined || value === null) return [];
  const section = checker.mapping(value, "msps");
  if (!section) return [];

  const msps: Msp[] = [];
  for (const [name, entry] of Object.entries(section)) {
    const where = `msps.${name}`;
    const fields = checker.mapping(entry, where);
    if (!fields) continue;
    checker.unknownFields("msps", where, fields);

    const ca = checker.string(fields, "ca", where);
    const namespace = checker.string(fields, "namespace", where);
    const orgAdmin = checker.string(fields, "org_admin", where);
    const orgAdminPw = checker.optionalString(fields, "org_adminpw", where);
    if (ca && namespace && orgAdmin)
      msps.push({ name, ca, namespace, orgAdmin, orgAdminPw });
  }
  return msps;
}

function readOrdererGroups(checker: Checker, value: unknown): OrdererGroup[] {
  const groups: OrdererGroup[] = [];
  for (const { fields, where } of groupsOf(checker, value, "orderers")) {
    checker.unknownFields("orderers", where, fields);

    const domain = checker.string(fields, "domain", where);
    const msp = checker.string(fields, "msp", where);
    const names = checker.names(fields, where);
    if (!domain || !msp || !names.length) continue;

    groups.push({
      domain,
      msp,
      names,
      secretGenesis:
        checker.optionalString(fields, "secret_genesis", where) ||
        DEFAULT_SECRET_GENESIS,
      genesisProfile:
        checker.optionalString(fields, "genesis_profile", where) ||
        DEFAULT_GENESIS_PROFILE,
    });
  }
  return groups;
}

function readPeerGroups(checker: Checker, value: unknown): PeerGroup[] {
  const groups: PeerGroup[] = [];
  for (const { fields, where } of groupsOf(checker, value, "peers")) {
    checker.unknownFields("peers", where, fields);

    const domain = checker.string(fields, "domain", where);
    const msp = checker.string(fields, "msp", where);
    const names = checker.names(fields, where);
    const channelName = checker.optionalString(fields, "channel_name", where);
    const channelProfile = checker.optionalString(
      fields,
      "channel_profile",
      where,
    );
    if (channelName && !channelProfile)
      checker.issue(where, `channel "${channelName}" requires "channel_profile"`);
    if (!domain || !msp || !names.length) continue;

    groups.push({
      domain,
      msp,
      names,
      channelName,
      channelProfile,
      secretChannel:
        checker.optionalString(fields, "secret_channel", where) ||
        DEFAULT_SECRET_CHANNEL,
      orderer: checker.optionalString(fields, "orderer", where),
    });
  }
  return groups;
}

function readComposer(checker: Checker, value: unknown): Composer | undefined {
  if (value === undefined || value === null) return undefined;
  const fields = checker.mapping(value, "composer");
  if (!fields) return undefined;
  checker.unknownFields("composer", "composer", fields);

  const name = checker.string(fields, "name", "composer");
  const secretBna = checker.string(fields, "secret_bna", "composer");
  const secretConnection = checker.string(fields, "secret_connection", "composer");
  if (!name || !secretBna || !secretConnection) return undefined;
  return { name, secretBna, secretConnection };
}

const SETTING_KEYS: ReadonlyArray<keyof Settings> = [
  "timeout",
  "maxAttempts",
  "backoffBase",
  "backoffCeiling",
  "waitTimeout",
  "pollInterval",
  "concurrency",
];

function readSettings(
  checker: Checker,
  value: unknown,
  overrides: Partial<Settings> = {},
): Settings {
  const fields =
    value === undefined || value === null
      ? {}
      : checker.mapping(value, "settings") || {};
  checker.unknownFields("settings", "settings", fields);

  const settings: Settings = {
    timeout: checker.positive(fields, "timeout", DEFAULT_GLOBAL_TIMEOUT),
    maxAttempts: checker.positive(fields, "max_attempts", DEFAULT_MAX_ATTEMPTS),
    backoffBase: checker.positive(fields, "backoff_base", DEFAULT_BACKOFF_BASE),
    backoffCeiling: checker.positive(
      fields,
      "backoff_ceiling",
      DEFAULT_BACKOFF_CEILING,
    ),
    waitTimeout: checker.positive(fields, "wait_timeout", DEFAULT_WAIT_TIMEOUT),
    pollInterval: checker.positive(fields, "poll_interval", DEFAULT_POLL_INTERVAL),
    concurrency: checker.positive(fields, "concurrency", DEFAULT_CONCURRENCY),
  };
  const resolved: { -readonly [K in keyof Settings]: Settings[K] } = {
    ...settings,
  };
  for (const key of SETTING_KEYS) {
    const override = overrides[key];
    if (override === undefined) continue;
    if (!Number.isFinite(override) || override <= 0)
      checker.issue(`settings.${key}`, "expected a positive number");
    else resolved[key] = override;
  }
  return resolved;
}

// Every cross reference must resolve; returns false when one does not.
function checkReferences(
  checker: Checker,
  cas: CertificateAuthority[],
  msps: Msp[],
  ordererGroups: OrdererGroup[],
  peerGroups: PeerGroup[],
): boolean {
  const before = checker.issues.length;
  const caNames = new Set(cas.map((ca) => ca.name));
  const mspNames = new Set(msps.map((msp) => msp.name));
  const ordererNames = ordererGroups.flatMap((group) => group.names);

  for (const ca of cas) {
    if (ca.parentCa && !caNames.has(ca.parentCa))
      checker.issue(`cas.${ca.name}`, `unknown parent_ca "${ca.parentCa}"`);
  }
  for (const msp of msps) {
    if (!caNames.has(msp.ca))
      checker.issue(`msps.${msp.name}`, `unknown ca "${msp.ca}"`);
  }
  ordererGroups.forEach((group) => {
    if (!mspNames.has(group.msp))
      checker.issue(`orderers (${group.domain})`, `unknown msp "${group.msp}"`);
  });
  peerGroups.forEach((group) => {
    const where = `peers (${group.domain})`;
    if (!mspNames.has(group.msp))
      checker.issue(where, `unknown msp "${group.msp}"`);
    if (group.orderer && !ordererNames.includes(group.orderer))
      checker.issue(where, `unknown orderer "${group.orderer}"`);
    if (group.channelName && !ordererNames.length)
      checker.issue(
        where,
        `channel "${group.channelName}" requires at least one orderer`,
      );
  });

  return checker.issues.length === before;
}

// Orderer groups writing one genesis secret must agree on its profile.
function checkSharedGenesis(
  checker: Checker,
  msps: Msp[],
  ordererGroups: OrdererGroup[],
) {
  const profiles = new Map<string, string>();
  for (const group of ordererGroups) {
    const namespace = msps.find((msp) => msp.name === group.msp)?.namespace;
    const key = `${namespace}/${group.secretGenesis}`;
    const profile = profiles.get(key);
    if (profile === undefined) profiles.set(key, group.genesisProfile);
    else if (profile !== group.genesisProfile)
      checker.issue(
        `orderers (${group.domain})`,
        `genesis secret "${group.secretGenesis}" in namespace "${namespace}" already holds profile "${profile}", not "${group.genesisProfile}"`,
      );
  }
}

function checkUniqueNames(
  checker: Checker,
  cas: CertificateAuthority[],
  msps: Msp[],
  ordererGroups: OrdererGroup[],
  peerGroups: PeerGroup[],
): boolean {
  const before = checker.issues.length;
  const seen = new Set<string>();
  const all = [
    ...cas.map((ca) => ca.name),
    ...msps.map((msp) => msp.name),
    ...ordererGroups.flatMap((group) => group.names),
    ...peerGroups.flatMap((group) => group.names),
    ...peerGroups.flatMap((group) =>
      group.channelName ? [group.channelName] : [],
    ),
  ];
  for (const name of all) {
    if (seen.has(name)) checker.issue("topology", `duplicate entity name "${name}"`);
    seen.add(name);
  }
  return checker.issues.length === before;
}

/**
 * Validate a parsed configuration document. Never throws: every issue found
 * is returned, and the topology only when there are none.
 */
export function validateTopology(
  document: ConfigDocument,
  opts: LoadOptions = {},
): ValidationResult {
  const checker = new Checker(opts.basePath || process.cwd());

  const core = readCore(checker, document.core);
  const cas = readCas(checker, document.cas);
  const msps = readMsps(checker, document.msps);
  const ordererGroups = readOrdererGroups(checker, document.orderers);
  const peerGroups = readPeerGroups(checker, document.peers);
  const composer = readComposer(checker, document.composer);
  const settings = readSettings(checker, document.settings, opts.overrides);

  const needsConfig =
    ordererGroups.length > 0 || peerGroups.some((group) => group.channelName);
  if (core && !core.dirConfig && needsConfig)
    checker.issue(
      "core",
      `missing required field "dir_config" (configtx.yaml location)`,
    );

  const namesUnique = checkUniqueNames(
    checker,
    cas,
    msps,
    ordererGroups,
    peerGroups,
  );
  const referencesResolve = checkReferences(
    checker,
    cas,
    msps,
    ordererGroups,
    peerGroups,
  );
  if (referencesResolve) checkSharedGenesis(checker, msps, ordererGroups);

  if (!core) return { issues: checker.issues, warnings: checker.warnings };

  const topology: Topology = {
    core,
    cas,
    msps,
    ordererGroups,
    peerGroups,
    composer,
    settings,
    warnings: checker.warnings,
  };

  // the graph is keyed by name: only walk it once names are unique
  if (namesUnique && referencesResolve) {
    const cycle = findCycle(buildDependencyGraph(topology));
    if (cycle) checker.issue("topology", `dependency cycle: ${cycle.join(" -> ")}`);
  }

  if (checker.issues.length)
    return { issues: checker.issues, warnings: checker.warnings };

  debug(
    `topology: ${cas.length} cas, ${msps.length} msps, ${ordererGroups.length} orderer groups, ${peerGroups.length} peer groups`,
  );
  return {
    topology: deepFreeze(topology),
    issues: [],
    warnings: checker.warnings,
  };
}

export function readTopologyConfig(configPath: string): ConfigDocument {
  const filepath = path.resolve(configPath);
  if (!isReadableFile(filepath))
    throw new ValidationError([`config file ${filepath} does not exist`]);

  try {
    return readConfigFile(filepath);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ValidationError([`${filepath}: ${message}`]);
  }
}

/**
 * Load and validate a topology from a config file path or an already parsed
 * document. Throws a `ValidationError` listing every issue found.
 */
export function loadTopology(
  source: string | TopologyConfig | ConfigDocument,
  opts: LoadOptions = {},
): Topology {
  const document: ConfigDocument =
    typeof source === "string" ? readTopologyConfig(source) : { ...source };

  const { topology, issues, warnings } = validateTopology(document, opts);
  if (!topology) throw new ValidationError(issues, warnings);

  for (const warning of warnings) debug(`warning: ${warning}`);
  return topology;
}
