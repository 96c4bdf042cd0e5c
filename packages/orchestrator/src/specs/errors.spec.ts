import { assert } from "chai";
import {
  classifyClusterError,
  PermanentResourceError,
  serialize,
  TransientClusterError,
  ValidationError,
} from "../errors";

describe("Tests on module 'errors':", () => {
  it("tests that an unreachable api server is transient", () => {
    const error = classifyClusterError(
      {
        stderr: "Unable to connect to the server: dial tcp 10.0.0.1:6443: i/o timeout",
        shortMessage: "Command failed with exit code 1: kubectl apply -f -",
      },
      "kubectl apply",
    );

    assert.instanceOf(error, TransientClusterError);
    assert.equal(
      error.message,
      "kubectl apply: Unable to connect to the server: dial tcp 10.0.0.1:6443: i/o timeout",
    );
  });

  it("tests that a rejected spec is permanent and keeps its cause", () => {
    const cause = new Error('Secret "hlf--peer1-cred" is invalid: data[CA_PASSWORD]: Invalid value');
    const error = classifyClusterError(cause);

    assert.instanceOf(error, PermanentResourceError);
    assert.strictEqual(error.cause, cause);
    assert.equal(
      error.message,
      `${cause.message}; caused by ${cause.message}`,
    );
  });

  it("tests that permanent patterns win over transient ones", () => {
    const error = classifyClusterError({
      stderr: "connection refused\nError from server (Forbidden): secrets is forbidden",
    });

    assert.instanceOf(error, PermanentResourceError);
    assert.equal(error.message, "connection refused");
  });

  it("tests that unknown failures are left to the retry budget", () => {
    const error = classifyClusterError("something odd happened");

    assert.instanceOf(error, TransientClusterError);
    assert.equal(error.message, "something odd happened");
  });

  it("tests that classified errors pass through unchanged", () => {
    const permanent = new PermanentResourceError("chart hlf-peer not found");
    assert.strictEqual(classifyClusterError(permanent, "helm"), permanent);
  });

  it("tests that serialize keeps the error class and the cause chain", () => {
    const error = new TransientClusterError(new Error("boom"), "apply failed");

    assert.deepEqual(serialize(error), {
      errorClass: "TransientClusterError",
      message: "apply failed; caused by boom",
      cause: { errorClass: "Error", message: "boom" },
    });
    assert.include(error.fullStack(), "caused by: Error: boom");
  });

  it("tests that a validation error lists every issue", () => {
    const error = new ValidationError(
      ['msps.PeerMSP: unknown ca "nope"', "settings.timeout: expected a positive number"],
      ["cas.ca: unknown field \"replicas\""],
    );

    assert.equal(
      error.message,
      [
        "invalid topology configuration (2 issues):",
        '  - msps.PeerMSP: unknown ca "nope"',
        "  - settings.timeout: expected a positive number",
      ].join("\n"),
    );
    assert.deepEqual(error.warnings, ['cas.ca: unknown field "replicas"']);
  });
});
