import {
  genChannelMarkerDef,
  genHelmUpgradeArgs,
  genNamespaceDef,
  genRegisterArgs,
  genSecretDef,
} from "./dynResourceDefinition";
import { KubeClient, initClient } from "./kubeClient";

export const provider = {
  KubeClient,
  initClient,
  genNamespaceDef,
  genSecretDef,
  genChannelMarkerDef,
  genHelmUpgradeArgs,
  genRegisterArgs,
};
