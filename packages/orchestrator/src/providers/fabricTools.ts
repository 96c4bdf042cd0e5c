import execa from "execa";
import fs from "fs";
import path from "path";
import Debug from "debug";
import { classifyClusterError } from "../errors";

const debug = Debug("fabkube::tools");

export interface EnrollmentSpec {
  username: string;
  password: string;
  caHost: string;
  tlsCert: string;
  // local directory receiving the MSP material
  mspDir: string;
}

/**
 * Local Fabric tooling: enrollment against a CA and generation of the
 * channel artifacts. Every operation leaves existing output untouched.
 */
export interface FabricTools {
  isEnrolled(mspDir: string): Promise<boolean>;
  enroll(spec: EnrollmentSpec): Promise<void>;
  generateGenesisBlock(
    profile: string,
    outputFile: string,
    configDir: string,
  ): Promise<void>;
  generateChannelTx(
    profile: string,
    channel: string,
    outputFile: string,
    configDir: string,
  ): Promise<void>;
}

export async function hasFiles(dir: string): Promise<boolean> {
  try {
    const entries = await fs.promises.readdir(dir);
    return entries.length > 0;
  } catch {
    return false;
  }
}

export class FabricCliTools implements FabricTools {
  // generations in flight, by output file
  private pending = new Map<string, Promise<void>>();

  async isEnrolled(mspDir: string): Promise<boolean> {
    return hasFiles(path.join(mspDir, "keystore"));
  }

  async enroll(spec: EnrollmentSpec): Promise<void> {
    if (await this.isEnrolled(spec.mspDir)) return;

    const url = `https://${encodeURIComponent(
      spec.username,
    )}:${encodeURIComponent(spec.password)}@${spec.caHost}`;
    await this.run(
      "fabric-ca-client",
      [
        "enroll",
        "-u",
        url,
        "-M",
        spec.mspDir,
        "--tls.certfiles",
        spec.tlsCert,
      ],
      { FABRIC_CA_CLIENT_HOME: path.dirname(spec.mspDir) },
      `enroll ${spec.username}`,
    );
  }

  async generateGenesisBlock(
    profile: string,
    outputFile: string,
    configDir: string,
  ): Promise<void> {
    await this.once(outputFile, () =>
      this.run(
        "configtxgen",
        ["-profile", profile, "-outputBlock", outputFile],
        { FABRIC_CFG_PATH: configDir },
        `genesis block (${profile})`,
      ),
    );
  }

  async generateChannelTx(
    profile: string,
    channel: string,
    outputFile: string,
    configDir: string,
  ): Promise<void> {
    await this.once(outputFile, () =>
      this.run(
        "configtxgen",
        [
          "-profile",
          profile,
          "-channelID",
          channel,
          "-outputCreateChannelTx",
          outputFile,
        ],
        { FABRIC_CFG_PATH: configDir },
        `channel transaction (${channel})`,
      ),
    );
  }

  // artifacts embed a timestamp: concurrent callers must share one generation
  private async once(
    outputFile: string,
    generate: () => Promise<unknown>,
  ): Promise<void> {
    if (fs.existsSync(outputFile)) {
      debug(`${outputFile} already exists`);
      return;
    }

    const inFlight = this.pending.get(outputFile);
    if (inFlight) return inFlight;

    const generation = (async () => {
      await fs.promises.mkdir(path.dirname(outputFile), { recursive: true });
      await generate();
    })();
    this.pending.set(outputFile, generation);
    try {
      await generation;
    } finally {
      this.pending.delete(outputFile);
    }
  }

  private async run(
    cmd: string,
    args: string[],
    env: NodeJS.ProcessEnv,
    context: string,
  ): Promise<string> {
    debug(`${cmd}: ${context}`);
    try {
      const result = await execa(cmd, args, { env });
      return result.stdout;
    } catch (error) {
      throw classifyClusterError(error, context);
    }
  }
}
