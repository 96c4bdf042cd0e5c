import { MANAGED_BY_LABEL, SPEC_HASH_ANNOTATION } from "../../../constants";
import { ObjectMeta } from "./types";

export function generateMetadata(
  name: string,
  specHash: string,
  namespace?: string,
): ObjectMeta {
  const metadata: ObjectMeta = {
    name,
    labels: { "app.kubernetes.io/managed-by": MANAGED_BY_LABEL },
    annotations: { [SPEC_HASH_ANNOTATION]: specHash },
  };
  if (namespace) metadata.namespace = namespace;
  return metadata;
}
