import { assert, expect } from "chai";
import {
  DependencyBlockedError,
  PermanentResourceError,
  TransientClusterError,
} from "../errors";
import { buildDependencyGraph } from "../graph";
import { IllegalTransitionError, StatusMap } from "../status";
import { Topology } from "../types";

// ca -> msp -> {peer1, peer2}
const topology: Topology = {
  core: { chartRepo: "stable", dirCrypto: "/tmp/crypto", dirValues: "/tmp/values" },
  cas: [{ name: "ca", namespace: "cas", tlsCert: "/tmp/ca.pem" }],
  msps: [{ name: "msp", ca: "ca", namespace: "peers", orgAdmin: "admin" }],
  ordererGroups: [],
  peerGroups: [
    {
      domain: "peer.test",
      msp: "msp",
      names: ["peer1", "peer2"],
      secretChannel: "hlf--channel",
    },
  ],
  settings: {
    timeout: 10,
    maxAttempts: 3,
    backoffBase: 1,
    backoffCeiling: 5,
    waitTimeout: 1,
    pollInterval: 1,
    concurrency: 2,
  },
  warnings: [],
};

describe("Tests on module 'status':", () => {
  const graph = buildDependencyGraph(topology);
  let statuses: StatusMap;

  beforeEach(() => {
    statuses = new StatusMap(graph.entities);
  });

  it("tests that every entity starts NotStarted", () => {
    assert.deepEqual(
      statuses.all().map((status) => [status.name, status.state, status.attempts]),
      [
        ["ca", "NotStarted", 0],
        ["msp", "NotStarted", 0],
        ["peer1", "NotStarted", 0],
        ["peer2", "NotStarted", 0],
      ],
    );
    assert.isFalse(statuses.allReady());
    assert.isTrue(statuses.canProgress());
  });

  it("tests that an attempt goes Pending then Ready", () => {
    statuses.startAttempt("ca");
    statuses.record("ca", { status: "Pending", reason: "release ca not ready yet" });
    assert.equal(statuses.get("ca").detail, "release ca not ready yet");

    statuses.startAttempt("ca");
    statuses.record("ca", { status: "Ready" });

    const status = statuses.get("ca");
    assert.equal(status.state, "Ready");
    assert.equal(status.attempts, 2);
    assert.isUndefined(status.detail);
    assert.isTrue(statuses.isSettled("ca"));
    assert.isFalse(statuses.isDead("ca"));
  });

  it("tests that Ready is terminal", () => {
    statuses.startAttempt("ca");
    statuses.record("ca", { status: "Ready" });

    expect(() => statuses.startAttempt("ca")).to.throw(
      IllegalTransitionError,
      "illegal state transition for ca: Ready -> Pending",
    );
  });

  it("tests that a transient failure may be retried", () => {
    statuses.startAttempt("ca");
    statuses.record("ca", {
      status: "Failed",
      error: new TransientClusterError("connection refused"),
    });

    assert.isTrue(statuses.get("ca").retryable);
    assert.isFalse(statuses.isSettled("ca"));

    statuses.startAttempt("ca");
    assert.equal(statuses.state("ca"), "Pending");
    assert.isFalse(statuses.get("ca").retryable);
  });

  it("tests that a permanent failure settles the entity", () => {
    statuses.startAttempt("ca");
    statuses.record("ca", {
      status: "Failed",
      error: new PermanentResourceError("release ca is invalid"),
    });

    assert.isTrue(statuses.isDead("ca"));
    expect(() => statuses.startAttempt("ca")).to.throw(IllegalTransitionError);
  });

  it("tests that an exhausted retry budget keeps the last reason", () => {
    statuses.startAttempt("ca");
    statuses.record("ca", { status: "Pending", reason: "release ca not ready yet" });
    statuses.exhaust("ca");

    const status = statuses.get("ca");
    assert.equal(status.state, "Failed");
    assert.isFalse(status.retryable);
    assert.equal(
      status.detail,
      "retry budget exhausted after 1 attempts (last: release ca not ready yet)",
    );
  });

  it("tests that NotStarted can't be exhausted", () => {
    expect(() => statuses.exhaust("ca")).to.throw(
      IllegalTransitionError,
      "NotStarted -> Failed",
    );
  });

  it("tests that dependents of a dead entity are blocked transitively", () => {
    statuses.startAttempt("ca");
    statuses.record("ca", {
      status: "Failed",
      error: new PermanentResourceError("release ca is invalid"),
    });

    statuses.propagateBlocks(graph, graph.entities);

    for (const name of ["msp", "peer1", "peer2"])
      assert.equal(statuses.state(name), "Blocked", name);

    const error = statuses.get("peer1").error;
    assert.instanceOf(error, DependencyBlockedError);
    assert.equal(statuses.get("msp").detail, "msp is blocked by ca");
    assert.equal(statuses.get("peer1").detail, "peer1 is blocked by msp");
    assert.isFalse(statuses.canProgress());
  });

  it("tests that a pending dependency blocks nothing", () => {
    statuses.startAttempt("ca");
    statuses.record("ca", { status: "Pending", reason: "waiting" });

    statuses.propagateBlocks(graph, graph.entities);

    assert.equal(statuses.state("msp"), "NotStarted");
  });

  it("tests that unknown entities are refused", () => {
    expect(() => statuses.get("nope")).to.throw("unknown entity: nope");
  });
});
