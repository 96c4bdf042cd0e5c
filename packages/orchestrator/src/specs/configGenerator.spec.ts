import chai, { assert, expect } from "chai";
import chaiAsPromised from "chai-as-promised";
import fs from "fs";
import path from "path";
import { loadTopology, readTopologyConfig, validateTopology } from "../configGenerator";
import { ValidationError } from "../errors";
import { converge } from "../supervisor";
import {
  createFixture,
  FakeClient,
  FakeTools,
  Fixture,
  minimalConfig,
  networkConfig,
} from "./testHelper";

chai.use(chaiAsPromised);

function issuesOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (err) {
    if (err instanceof ValidationError) return err.issues;
    throw err;
  }
  throw new Error("expected a ValidationError");
}

describe("Tests on module 'configGenerator':", () => {
  let fixture: Fixture;

  beforeEach(() => {
    fixture = createFixture();
  });

  afterEach(() => {
    fixture.cleanup();
  });

  it("tests that a valid document loads with defaults applied", () => {
    const topology = loadTopology(networkConfig(), { basePath: fixture.root });

    assert.equal(topology.core.dirCrypto, path.join(fixture.root, "crypto"));
    assert.equal(topology.core.dirConfig, path.join(fixture.root, "config"));
    assert.equal(topology.core.chartRepo, "stable");
    assert.deepEqual(
      topology.cas.map((ca) => ca.tlsCert),
      [path.join(fixture.root, "ca-tls.pem")],
    );
    assert.deepEqual(
      topology.msps.map((msp) => msp.name),
      ["OrdererMSP", "PeerMSP"],
    );

    const [ordererGroup] = topology.ordererGroups;
    assert.equal(ordererGroup.secretGenesis, "hlf--genesis");
    assert.equal(ordererGroup.genesisProfile, "OrdererGenesis");

    const [peerGroup] = topology.peerGroups;
    assert.equal(peerGroup.secretChannel, "hlf--channel");
    assert.equal(peerGroup.channelName, "mychannel");
    assert.isUndefined(peerGroup.orderer);

    assert.deepEqual(topology.settings, {
      timeout: 1200,
      maxAttempts: 10,
      backoffBase: 1,
      backoffCeiling: 5,
      waitTimeout: 120,
      pollInterval: 1,
      concurrency: 4,
    });
    assert.isEmpty(topology.warnings);
  });

  it("tests that the loaded topology is immutable", () => {
    const topology = loadTopology(networkConfig(), { basePath: fixture.root });

    assert.isTrue(Object.isFrozen(topology));
    assert.isTrue(Object.isFrozen(topology.cas[0]));
    assert.isTrue(Object.isFrozen(topology.peerGroups[0].names));
  });

  it("tests that orderers and peers accept a list of groups", () => {
    const doc = networkConfig();
    const topology = loadTopology(
      {
        ...doc,
        orderers: [
          { domain: "ord.test", msp: "OrdererMSP", names: ["ord1"] },
          {
            domain: "ord2.test",
            msp: "OrdererMSP",
            names: ["ord2", "ord3"],
            genesis_profile: "OtherGenesis",
          },
        ],
      },
      { basePath: fixture.root },
    );

    assert.deepEqual(
      topology.ordererGroups.map((group) => [group.names, group.genesisProfile]),
      [
        [["ord1"], "OrdererGenesis"],
        [["ord2", "ord3"], "OtherGenesis"],
      ],
    );
  });

  it("tests that a dangling msp -> ca reference is rejected before any cluster call", async () => {
    const client = new FakeClient();
    const doc = minimalConfig();
    const deploy = async () => {
      const topology = loadTopology(
        {
          ...doc,
          msps: {
            PeerMSP: { ca: "nope", namespace: "peers", org_admin: "peeradmin" },
          },
        },
        { basePath: fixture.root },
      );
      return converge(topology, client, { tools: new FakeTools() });
    };

    await expect(deploy()).to.be.rejectedWith(
      ValidationError,
      'msps.PeerMSP: unknown ca "nope"',
    );
    assert.isEmpty(client.calls);
    assert.equal(client.resources.size, 0);
  });

  it("tests that a dependency cycle is rejected", () => {
    const doc = minimalConfig();
    const issues = issuesOf(() =>
      loadTopology(
        {
          ...doc,
          cas: {
            a: { namespace: "cas", tls_cert: "./ca-tls.pem", parent_ca: "b" },
            b: { namespace: "cas", tls_cert: "./ca-tls.pem", parent_ca: "a" },
          },
          msps: { PeerMSP: { ca: "a", namespace: "peers", org_admin: "peeradmin" } },
        },
        { basePath: fixture.root },
      ),
    );

    assert.deepEqual(issues, ["topology: dependency cycle: a -> b -> a"]);
  });

  it("tests that every issue of a document is reported at once", () => {
    const issues = issuesOf(() =>
      loadTopology(
        {
          core: { dir_crypto: "./missing", dir_values: "./values" },
          cas: { ca: { namespace: "cas", tls_cert: "./ca-tls.pem" } },
          msps: { PeerMSP: { ca: "ca", namespace: "peers", org_admin: "peeradmin" } },
          peers: {
            domain: "peer.test",
            msp: "OtherMSP",
            names: ["peer1", "peer1"],
            channel_name: "mychannel",
          },
        },
        { basePath: fixture.root },
      ),
    );

    assert.deepEqual(issues, [
      `core.dir_crypto: directory ${path.join(
        fixture.root,
        "missing",
      )} does not exist or is not readable`,
      'peers.names: duplicate name "peer1"',
      'peers: channel "mychannel" requires "channel_profile"',
      'core: missing required field "dir_config" (configtx.yaml location)',
      'peers (peer.test): unknown msp "OtherMSP"',
      'peers (peer.test): channel "mychannel" requires at least one orderer',
    ]);
  });

  it("tests that missing fields and dangling references are issues", () => {
    const doc = minimalConfig();
    const { topology, issues } = validateTopology(
      {
        ...doc,
        cas: { ca: { namespace: "cas" } },
        msps: {
          ca: { ca: "ca", namespace: "peers", org_admin: "peeradmin" },
          PeerMSP: { ca: "ca", namespace: "peers", org_admin: "peeradmin" },
        },
      },
      { basePath: fixture.root },
    );

    assert.isUndefined(topology);
    assert.deepEqual(issues, [
      'cas.ca: missing required field "tls_cert"',
      'msps.ca: unknown ca "ca"',
      'msps.PeerMSP: unknown ca "ca"',
    ]);
  });

  it("tests that a name used by two entities is an issue", () => {
    const doc = minimalConfig();
    const { issues } = validateTopology(
      {
        ...doc,
        msps: {
          ca: { ca: "ca", namespace: "peers", org_admin: "peeradmin" },
          PeerMSP: { ca: "ca", namespace: "peers", org_admin: "peeradmin" },
        },
      },
      { basePath: fixture.root },
    );

    assert.deepEqual(issues, ['topology: duplicate entity name "ca"']);
  });

  it("tests that orderer groups sharing a genesis secret must share its profile", () => {
    const { issues } = validateTopology(
      {
        ...networkConfig(),
        orderers: [
          { domain: "ord.test", msp: "OrdererMSP", names: ["ord1"], genesis_profile: "G1" },
          { domain: "ord2.test", msp: "OrdererMSP", names: ["ord2"], genesis_profile: "G2" },
        ],
      },
      { basePath: fixture.root },
    );

    assert.deepEqual(issues, [
      'orderers (ord2.test): genesis secret "hlf--genesis" in namespace "orderers" already holds profile "G1", not "G2"',
    ]);
  });

  it("tests that a separate genesis secret allows another profile", () => {
    const { issues } = validateTopology(
      {
        ...networkConfig(),
        orderers: [
          { domain: "ord.test", msp: "OrdererMSP", names: ["ord1"], genesis_profile: "G1" },
          {
            domain: "ord2.test",
            msp: "OrdererMSP",
            names: ["ord2"],
            genesis_profile: "G2",
            secret_genesis: "hlf--genesis-g2",
          },
        ],
      },
      { basePath: fixture.root },
    );

    assert.isEmpty(issues);
  });

  it("tests that unknown fields are warnings, not issues", () => {
    const doc = minimalConfig();
    const { topology, issues, warnings } = validateTopology(
      {
        ...doc,
        cas: {
          ca: { namespace: "cas", tls_cert: "./ca-tls.pem", replicas: 2 },
        },
      },
      { basePath: fixture.root },
    );

    assert.isEmpty(issues);
    assert.isDefined(topology);
    assert.deepEqual(warnings, ['cas.ca: unknown field "replicas"']);
  });

  it("tests that overrides win over the settings section", () => {
    const topology = loadTopology(minimalConfig(), {
      basePath: fixture.root,
      overrides: { concurrency: 2, timeout: undefined },
    });

    assert.equal(topology.settings.concurrency, 2);
    assert.equal(topology.settings.timeout, 1200);
    assert.equal(topology.settings.backoffBase, 1);
  });

  it("tests that invalid settings are issues", () => {
    const doc = minimalConfig();
    const issues = issuesOf(() =>
      loadTopology(
        { ...doc, settings: { max_attempts: 0 } },
        { basePath: fixture.root, overrides: { timeout: -1 } },
      ),
    );

    assert.deepEqual(issues, [
      "settings.max_attempts: expected a positive number",
      "settings.timeout: expected a positive number",
    ]);
  });

  it("tests that readTopologyConfig reads a yaml file with env values", () => {
    const configPath = path.join(fixture.root, "network.yaml");
    fs.writeFileSync(
      configPath,
      [
        "core:",
        "  dir_crypto: ./crypto",
        "  dir_values: ./values",
        "cas:",
        "  ca:",
        "    namespace: {{ CA_NAMESPACE }}",
        "    tls_cert: ./ca-tls.pem",
        "",
      ].join("\n"),
    );
    process.env.CA_NAMESPACE = "cas";
    try {
      const doc = readTopologyConfig(configPath);
      const topology = loadTopology(doc, { basePath: fixture.root });
      assert.equal(topology.cas[0].namespace, "cas");
    } finally {
      delete process.env.CA_NAMESPACE;
    }
  });

  it("tests that the example network loads as shipped", () => {
    const configPath = path.resolve(__dirname, "../../../../examples/network.yaml");
    const topology = loadTopology(configPath, { basePath: path.dirname(configPath) });

    assert.equal(topology.cas[0].namespace, "cas");
    assert.deepEqual(topology.peerGroups[0].names, ["peer0", "peer1"]);
    assert.equal(topology.peerGroups[0].channelName, "mychannel");
    assert.isEmpty(topology.warnings);
  });

  it("tests that readTopologyConfig reports a missing file", () => {
    const configPath = path.join(fixture.root, "nope.yaml");
    const issues = issuesOf(() => readTopologyConfig(configPath));

    assert.deepEqual(issues, [`config file ${configPath} does not exist`]);
  });
});
