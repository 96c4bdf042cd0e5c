import chai, { assert, expect } from "chai";
import deepEqualInAnyOrder from "deep-equal-in-any-order";
import fs from "fs";
import os from "os";
import path from "path";
import {
  getReplacementInText,
  isReadableDir,
  isReadableFile,
  parseConfigContent,
  readConfigFile,
  writeLocalJsonFile,
} from "../fs";

chai.use(deepEqualInAnyOrder);

describe("Tests on module 'fs';", () => {
  let tmpDir: string;

  before(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "fabkube-fs-"));
  });

  after(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("tests that fs/writeLocalJsonFile is success", () => {
    const jsonTest = {
      outcome: "converged",
      entities: [{ name: "ca", state: "Ready" }],
    };

    writeLocalJsonFile(tmpDir, "writeLocalJsonFile.json", jsonTest);

    const data = fs.readFileSync(
      path.join(tmpDir, "writeLocalJsonFile.json"),
      "utf8",
    );
    expect(JSON.parse(data)).to.deep.equalInAnyOrder(jsonTest);
  });

  it("tests fs/isReadableDir and fs/isReadableFile", () => {
    const file = path.join(tmpDir, "cert.pem");
    fs.writeFileSync(file, "test-cert");

    assert.isTrue(isReadableDir(tmpDir));
    assert.isFalse(isReadableDir(file));
    assert.isTrue(isReadableFile(file));
    assert.isFalse(isReadableFile(tmpDir));
    assert.isFalse(isReadableFile(path.join(tmpDir, "missing.pem")));
  });

  it("tests that fs/getReplacementInText lists each variable once", () => {
    const content = "a: {{ NS }}\nb: {{NS}}\nc: {{ DIR_CRYPTO }}";
    assert.deepEqual(getReplacementInText(content), ["NS", "DIR_CRYPTO"]);
  });

  it("tests that fs/parseConfigContent reads yaml and json", () => {
    const yamlDoc = parseConfigContent(
      "# comment\ncore:\n  dir_crypto: ./crypto\n",
      "net.yaml",
    );
    assert.deepEqual(yamlDoc, { core: { dir_crypto: "./crypto" } });

    const jsonDoc = parseConfigContent('{"core": {"cluster": "kind"}}', "net.json");
    assert.deepEqual(jsonDoc, { core: { cluster: "kind" } });
  });

  it("tests that fs/parseConfigContent rejects unknown types", () => {
    expect(() => parseConfigContent("core: {}", "net.toml")).to.throw(
      "config file is not one of the known types: 'json' or 'yaml'.",
    );
    expect(() => parseConfigContent("- a\n- b\n", "net.yaml")).to.throw(
      "is not a mapping",
    );
  });

  it("tests that fs/readConfigFile renders env values and includes", () => {
    fs.writeFileSync(
      path.join(tmpDir, "cas.yaml"),
      "cas:\n  ca:\n    namespace: {{ CA_NS }}\n",
    );
    const configPath = path.join(tmpDir, "network.yaml");
    fs.writeFileSync(
      configPath,
      'core:\n  cluster: {{ CLUSTER }}\n{% include "cas.yaml" %}',
    );

    const doc = readConfigFile(configPath, { CLUSTER: "kind", CA_NS: "cas" });
    assert.deepEqual(doc, {
      core: { cluster: "kind" },
      cas: { ca: { namespace: "cas" } },
    });
  });

  it("tests that fs/readConfigFile names missing env variables", () => {
    const configPath = path.join(tmpDir, "missing.yaml");
    fs.writeFileSync(configPath, "core:\n  cluster: {{ CLUSTER }}\n  x: {{ OTHER }}\n");

    expect(() => readConfigFile(configPath, {})).to.throw(
      "Environment not set for : CLUSTER,OTHER",
    );
  });
});
