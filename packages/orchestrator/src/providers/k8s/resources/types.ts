export interface Labels {
  "app.kubernetes.io/managed-by": string;
  [label: string]: string;
}

export interface Annotations {
  [annotation: string]: string;
}

export interface ObjectMeta {
  name: string;
  namespace?: string;
  labels: Labels;
  annotations: Annotations;
}

export interface NamespaceDef {
  apiVersion: "v1";
  kind: "Namespace";
  metadata: ObjectMeta;
}

export interface SecretDef {
  apiVersion: "v1";
  kind: "Secret";
  type: "Opaque";
  metadata: ObjectMeta;
  data: { [key: string]: string };
}

export interface ConfigMapDef {
  apiVersion: "v1";
  kind: "ConfigMap";
  metadata: ObjectMeta;
  data: { [key: string]: string };
}

export type ResourceDef = NamespaceDef | SecretDef | ConfigMapDef;
