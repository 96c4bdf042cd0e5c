export { ChannelMarkerResource, channelMarkerName } from "./channelMarkerResource";
export { NamespaceResource } from "./namespaceResource";
export { SecretResource } from "./secretResource";
export type { ResourceDef } from "./types";
