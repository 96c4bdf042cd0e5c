import { CHANNEL_MARKER_PREFIX } from "../../../constants";
import { ChannelSpec } from "../../client";
import { generateMetadata } from "./metadata";
import { ConfigMapDef } from "./types";

export const channelMarkerName = (channel: string) =>
  `${CHANNEL_MARKER_PREFIX}${channel}`;

// Records that a channel was created, since the ordering service can't be
// listed from the cluster side.
export class ChannelMarkerResource {
  constructor(
    private readonly spec: ChannelSpec,
    private readonly specHash: string,
  ) {}

  public generateSpec(): ConfigMapDef {
    const { name, namespace, orderer, peer } = this.spec;
    return {
      apiVersion: "v1",
      kind: "ConfigMap",
      metadata: generateMetadata(channelMarkerName(name), this.specHash, namespace),
      data: { channel: name, orderer, createdThrough: peer },
    };
  }
}
