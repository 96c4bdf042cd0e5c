import { NamespaceSpec } from "../../client";
import { generateMetadata } from "./metadata";
import { NamespaceDef } from "./types";

export class NamespaceResource {
  constructor(
    private readonly spec: NamespaceSpec,
    private readonly specHash: string,
  ) {}

  public generateSpec(): NamespaceDef {
    return {
      apiVersion: "v1",
      kind: "Namespace",
      metadata: generateMetadata(this.spec.name, this.specHash),
    };
  }
}
