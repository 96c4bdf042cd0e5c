import { setLogType } from "@fabkube/utils";
import { assert } from "chai";
import { loadTopology } from "../configGenerator";
import { TopologyConfig } from "../configTypes";
import { converge, ConvergeOptions } from "../supervisor";
import {
  createFixture,
  FakeClient,
  FakeTools,
  Fixture,
  minimalConfig,
  networkConfig,
} from "./testHelper";

const stateOf = (entities: Array<{ name: string; state: string }>, name: string) =>
  entities.find((entity) => entity.name === name)?.state;

describe("Tests on module 'supervisor':", () => {
  let fixture: Fixture;
  let client: FakeClient;
  let tools: FakeTools;

  const run = (doc: TopologyConfig, opts: ConvergeOptions = {}) =>
    converge(loadTopology(doc, { basePath: fixture.root }), client, {
      tools,
      ...opts,
    });

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

  it("tests that a healthy network converges in one pass", async () => {
    const report = await run(networkConfig());

    assert.equal(report.outcome, "converged");
    assert.equal(report.iterations, 1);
    assert.isUndefined(report.reason);
    assert.isTrue(report.entities.every((entity) => entity.state === "Ready"));
    assert.isAtLeast(report.finishedAt, report.startedAt);
  });

  it("tests that the poll interval of the settings reaches the client", async () => {
    client.pollInterval = 3000;
    await run(networkConfig());

    assert.equal(client.pollInterval, 1);
  });

  it("tests that an entity pending N times is Ready within N+1 passes", async () => {
    client.pendingFor("peer1", 2);
    const passes: number[] = [];

    const report = await run(networkConfig(), {
      onPass: (iteration, statuses) => {
        if (statuses.state("peer1") === "Pending") passes.push(iteration);
      },
    });

    assert.equal(report.outcome, "converged");
    assert.equal(report.iterations, 3);
    assert.deepEqual(passes, [1, 2]);
    assert.equal(report.entities.find((e) => e.name === "peer1")?.attempts, 3);
  });

  it("tests that a transient failure is retried on the next pass", async () => {
    client.failOn("ca/peer1", "transient", 1);

    const report = await run(networkConfig());

    assert.equal(report.outcome, "converged");
    assert.equal(report.iterations, 2);
  });

  it("tests that an unreachable entity fails the run and blocks its dependents", async () => {
    client.pendingFor("peer1", Infinity);

    const report = await run({
      ...networkConfig(),
      settings: { max_attempts: 3, backoff_base: 1, backoff_ceiling: 2 },
    });

    assert.equal(report.outcome, "failed");
    assert.equal(report.reason, "no entity can make further progress");
    assert.equal(report.iterations, 3);
    assert.equal(stateOf(report.entities, "peer1"), "Failed");
    assert.equal(stateOf(report.entities, "mychannel"), "Blocked");
    assert.equal(stateOf(report.entities, "ord1"), "Ready");
  });

  it("tests that a permanent failure stops after the first pass", async () => {
    client.failOn("peer1", "permanent");

    const report = await run(networkConfig());

    assert.equal(report.outcome, "failed");
    assert.equal(report.iterations, 1);
    assert.equal(stateOf(report.entities, "mychannel"), "Blocked");
  });

  it("tests that an aborted run is reported as cancelled", async () => {
    const controller = new AbortController();
    controller.abort(new Error("interrupted by SIGINT"));

    const report = await run(networkConfig(), { signal: controller.signal });

    assert.equal(report.outcome, "cancelled");
    assert.equal(report.reason, "interrupted by SIGINT");
    assert.isEmpty(client.calls);
    assert.isTrue(report.entities.every((entity) => entity.state === "NotStarted"));
  });

  it("tests that an abort stops a readiness wait in flight within one poll interval", async () => {
    client.holdReady("peer1");
    const controller = new AbortController();
    let abortedAt = 0;
    const timer = setTimeout(() => {
      abortedAt = Date.now();
      controller.abort(new Error("interrupted by SIGINT"));
    }, 50);

    const report = await run(
      {
        ...networkConfig(),
        settings: { poll_interval: 100, wait_timeout: 60, backoff_base: 1 },
      },
      { signal: controller.signal },
    );
    clearTimeout(timer);

    assert.equal(report.outcome, "cancelled");
    assert.equal(report.reason, "interrupted by SIGINT");
    assert.isAbove(abortedAt, 0);
    assert.isAtMost(Date.now() - abortedAt, 100);
    assert.equal(stateOf(report.entities, "peer1"), "Pending");
    assert.equal(stateOf(report.entities, "ord1"), "Ready");
  });

  it("tests that the global timeout cancels a run that never converges", async () => {
    client.pendingFor("peer1", Infinity);

    const report = await run({
      ...networkConfig(),
      settings: {
        timeout: 0.05,
        max_attempts: 1000,
        backoff_base: 20,
        backoff_ceiling: 20,
      },
    });

    assert.equal(report.outcome, "cancelled");
    assert.equal(report.reason, "GLOBAL TIMEOUT (0.05 secs)");
    assert.equal(stateOf(report.entities, "peer1"), "Pending");
  });

  it("tests that targets restrict the run to what they depend on", async () => {
    const report = await run(minimalConfig(), { targets: ["PeerMSP"] });

    assert.equal(report.outcome, "converged");
    assert.deepEqual(
      report.entities.map((entity) => entity.name),
      ["ca", "PeerMSP"],
    );
    assert.isFalse(client.calls.some((call) => call.name === "peer1"));
  });

  it("tests that a second run over a converged network changes nothing", async () => {
    await run(networkConfig());
    const calls = client.calls.length;

    const report = await run(networkConfig());

    assert.equal(report.outcome, "converged");
    assert.lengthOf(client.calls, calls);
  });
});
