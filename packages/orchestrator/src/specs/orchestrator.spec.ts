import { setLogType } from "@fabkube/utils";
import { assert } from "chai";
import fs from "fs";
import path from "path";
import { loadTopology } from "../configGenerator";
import { TopologyConfig } from "../configTypes";
import { PermanentResourceError } from "../errors";
import { buildDependencyGraph } from "../graph";
import { orchestrate } from "../orchestrator";
import { encode } from "../reconcilers/apply";
import { StatusMap } from "../status";
import {
  ClientCall,
  createFixture,
  FakeClient,
  FakeTools,
  Fixture,
  minimalConfig,
  networkConfig,
} from "./testHelper";

const indexOfCall = (calls: ClientCall[], kind: string, name: string) => {
  const index = calls.findIndex((call) => call.kind === kind && call.name === name);
  assert.notEqual(index, -1, `no call for ${kind} ${name}`);
  return index;
};

// two peer groups of one msp, so both channels share the channel secret
const twoChannelsConfig = (): TopologyConfig => ({
  ...networkConfig(),
  peers: [
    {
      domain: "peer.test",
      msp: "PeerMSP",
      names: ["peer1"],
      channel_name: "ch1",
      channel_profile: "Ch1",
    },
    {
      domain: "peer2.test",
      msp: "PeerMSP",
      names: ["peer2"],
      channel_name: "ch2",
      channel_profile: "Ch2",
    },
  ],
});

describe("Tests on module 'orchestrator':", () => {
  let fixture: Fixture;
  let client: FakeClient;
  let tools: FakeTools;

  const load = (doc: TopologyConfig) => loadTopology(doc, { basePath: fixture.root });

  const pass = async (doc: TopologyConfig, statuses?: StatusMap) => {
    const topology = load(doc);
    const current =
      statuses || new StatusMap(buildDependencyGraph(topology).entities);
    await orchestrate(topology, client, current, { tools });
    return current;
  };

  before(() => {
    setLogType("silent");
  });

  beforeEach(() => {
    fixture = createFixture();
    client = new FakeClient();
    tools = new FakeTools();
  });

  afterEach(() => {
    fixture.cleanup();
  });

  it("tests that one pass converges the network in dependency order", async () => {
    const statuses = await pass(networkConfig());

    assert.isTrue(statuses.allReady());
    const { calls } = client;
    assert.isBelow(indexOfCall(calls, "Release", "ca"), indexOfCall(calls, "Identity", "ca/ordadmin"));
    assert.isBelow(indexOfCall(calls, "Release", "ca"), indexOfCall(calls, "Identity", "ca/peeradmin"));
    assert.isBelow(
      indexOfCall(calls, "Secret", "hlf--peeradmin-idcert"),
      indexOfCall(calls, "Identity", "ca/peer1"),
    );
    assert.isBelow(
      indexOfCall(calls, "Secret", "hlf--ordadmin-idcert"),
      indexOfCall(calls, "Identity", "ca/ord1"),
    );
    assert.isBelow(indexOfCall(calls, "Release", "ord1"), indexOfCall(calls, "Channel", "mychannel"));
    assert.isBelow(indexOfCall(calls, "Release", "peer1"), indexOfCall(calls, "Channel", "mychannel"));
    assert.isBelow(
      indexOfCall(calls, "Channel", "mychannel"),
      indexOfCall(calls, "ChannelMembership", "mychannel@peer1"),
    );
  });

  it("tests that the artifacts are generated once and stored in secrets", async () => {
    await pass(networkConfig());

    assert.sameMembers(tools.generated, ["OrdererGenesis.genesis.block", "mychannel.tx"]);
    const genesis = await client.getResource("Secret", "hlf--genesis", "orderers");
    assert.deepEqual(genesis?.data, { "genesis.block": encode("genesis OrdererGenesis") });
    const channelTx = await client.getResource("Secret", "hlf--channel", "peers");
    assert.deepEqual(channelTx?.data, { "mychannel.tx": encode("channel mychannel MyChannel") });
  });

  it("tests that the msp admin material lands in secrets", async () => {
    await pass(networkConfig());

    const idcert = await client.getResource("Secret", "hlf--peeradmin-idcert", "peers");
    assert.deepEqual(idcert?.data, { "cert.pem": encode("peeradmin signcerts") });
    const idkey = await client.getResource("Secret", "hlf--peeradmin-idkey", "peers");
    assert.deepEqual(idkey?.data, { "key.pem": encode("peeradmin keystore") });
    const cacert = await client.getResource("Secret", "hlf--peeradmin-cacert", "peers");
    assert.deepEqual(cacert?.data, { "cacert.pem": encode("peeradmin cacerts") });
    assert.isUndefined(await client.getResource("Secret", "hlf--peeradmin-caintcert", "peers"));

    const admincerts = path.join(fixture.root, "crypto", "PeerMSP", "admincerts", "cert.pem");
    assert.equal(fs.readFileSync(admincerts, "utf8"), "peeradmin signcerts");
  });

  it("tests that peer groups sharing a channel secret each keep their transaction", async () => {
    await pass(twoChannelsConfig());

    const secret = await client.getResource("Secret", "hlf--channel", "peers");
    assert.deepEqual(secret?.data, {
      "ch1.tx": encode("channel ch1 Ch1"),
      "ch2.tx": encode("channel ch2 Ch2"),
    });

    const calls = client.calls.length;
    const statuses = await pass(twoChannelsConfig());

    assert.isTrue(statuses.allReady());
    assert.lengthOf(client.calls, calls);
  });

  it("tests that a failed msp blocks the orderers whose genesis block needs it", async () => {
    client.failOn("ca/peeradmin", "permanent");

    const statuses = await pass(networkConfig());

    assert.equal(statuses.state("OrdererMSP"), "Ready");
    assert.equal(statuses.state("PeerMSP"), "Failed");
    assert.equal(statuses.state("ord1"), "Blocked");
    assert.equal(statuses.get("ord1").detail, "ord1 is blocked by PeerMSP");
    assert.equal(statuses.state("mychannel"), "Blocked");
    assert.isEmpty(tools.generated);
    assert.isFalse(client.calls.some((call) => call.name === "ord1"));
  });

  it("tests that a converged network takes no mutating call on a re-run", async () => {
    await pass(networkConfig());
    const callsAfterFirstRun = client.calls.length;
    const generated = tools.generated.length;
    const enrollments = tools.enrollments.length;

    const statuses = await pass(networkConfig());

    assert.isTrue(statuses.allReady());
    assert.lengthOf(client.calls, callsAfterFirstRun);
    assert.lengthOf(tools.generated, generated);
    assert.lengthOf(tools.enrollments, enrollments);
  });

  it("tests that a changed values file only upgrades its release", async () => {
    await pass(networkConfig());
    const before = client.calls.length;

    fs.mkdirSync(path.join(fixture.root, "values", "hlf-peer"));
    fs.writeFileSync(
      path.join(fixture.root, "values", "hlf-peer", "peer1.yaml"),
      "image:\n  tag: 2.5.4\n",
    );
    await pass(networkConfig());

    assert.deepEqual(client.calls.slice(before), [
      { method: "installOrUpgradeRelease", kind: "Release", name: "peer1" },
    ]);
  });

  it("tests that a permanent peer failure blocks the channel while the orderer gets Ready", async () => {
    client.failOn("peer1", "permanent");

    const statuses = await pass(networkConfig());

    assert.equal(statuses.state("ord1"), "Ready");
    assert.equal(statuses.state("peer1"), "Failed");
    assert.isFalse(statuses.get("peer1").retryable);
    assert.instanceOf(statuses.get("peer1").error, PermanentResourceError);
    assert.equal(statuses.get("peer1").detail, 'Release "peer1" is invalid');
    assert.equal(statuses.state("mychannel"), "Blocked");
    assert.equal(statuses.get("mychannel").detail, "mychannel is blocked by peer1");
    assert.isFalse(statuses.canProgress());
    assert.isFalse(client.calls.some((call) => call.kind === "Channel"));
  });

  it("tests that dependents of a pending entity wait for a later pass", async () => {
    client.pendingFor("peer1", 1);

    const statuses = await pass(networkConfig());

    assert.equal(statuses.state("peer1"), "Pending");
    assert.equal(statuses.get("peer1").detail, "release peer1 not ready yet");
    assert.equal(statuses.state("mychannel"), "NotStarted");

    await pass(networkConfig(), statuses);

    assert.isTrue(statuses.allReady());
    assert.equal(statuses.get("peer1").attempts, 2);
    assert.equal(statuses.get("mychannel").attempts, 1);
  });

  it("tests that the retry budget is enforced per entity", async () => {
    client.pendingFor("peer1", Infinity);
    const doc: TopologyConfig = {
      ...networkConfig(),
      settings: { max_attempts: 2, backoff_base: 1 },
    };

    const statuses = await pass(doc);
    await pass(doc, statuses);

    assert.equal(statuses.state("peer1"), "Failed");
    assert.equal(
      statuses.get("peer1").detail,
      "retry budget exhausted after 2 attempts (last: release peer1 not ready yet)",
    );
    assert.equal(statuses.state("mychannel"), "Blocked");
  });

  it("tests the ca -> PeerMSP -> peer1 scenario", async () => {
    const statuses = await pass(minimalConfig());

    assert.deepEqual(
      statuses.all().map((status) => [status.name, status.state]),
      [
        ["ca", "Ready"],
        ["PeerMSP", "Ready"],
        ["peer1", "Ready"],
      ],
    );
    assert.deepEqual(
      tools.enrollments.map((spec) => [spec.username, spec.caHost]),
      [
        ["peeradmin", "ca.ca.test"],
        ["peer1", "ca.ca.test"],
      ],
    );
    assert.deepEqual(
      client.calls
        .filter((call) => call.kind === "Release")
        .map((call) => call.name),
      ["ca", "peer1"],
    );
    assert.equal(client.identities[0].password, "test-secret");
  });

  it("tests that a password already stored in the cluster wins", async () => {
    client.seed({
      kind: "Secret",
      name: "hlf--peeradmin-admincred",
      namespace: "peers",
      data: {
        CA_USERNAME: encode("peeradmin"),
        CA_PASSWORD: encode("stored-secret"),
      },
    });

    await pass(minimalConfig());

    assert.deepEqual(client.identities[0], { name: "peeradmin", password: "stored-secret" });
    assert.equal(tools.enrollments[0].password, "stored-secret");
    assert.isFalse(
      client.calls.some((call) => call.name === "hlf--peeradmin-admincred"),
    );
  });

  it("tests that nodes without a configured password get a generated one", async () => {
    await pass(minimalConfig());

    const cred = await client.getResource("Secret", "hlf--peer1-cred", "peers");
    const password = Buffer.from(cred?.data?.CA_PASSWORD || "", "base64").toString("utf8");
    assert.match(password, /^[A-Za-z0-9]{16,24}$/);
    assert.deepEqual(client.identities[1], { name: "peer1", password });
  });

  it("tests that an intermediate ca registers with its parent", async () => {
    const doc = minimalConfig();
    const statuses = await pass({
      ...doc,
      cas: {
        root: { namespace: "cas", tls_cert: "./ca-tls.pem" },
        ca: { namespace: "cas", tls_cert: "./ca-tls.pem", parent_ca: "root" },
      },
    });

    assert.isTrue(statuses.allReady());
    assert.equal(client.identities[0].name, "ca");
    assert.isBelow(
      indexOfCall(client.calls, "Identity", "root/ca"),
      indexOfCall(client.calls, "Release", "ca"),
    );
  });
});
