import { SecretSpec } from "../../client";
import { generateMetadata } from "./metadata";
import { SecretDef } from "./types";

export class SecretResource {
  constructor(
    private readonly spec: SecretSpec,
    private readonly specHash: string,
  ) {}

  public generateSpec(): SecretDef {
    const { name, namespace, data } = this.spec;
    return {
      apiVersion: "v1",
      kind: "Secret",
      type: "Opaque",
      metadata: generateMetadata(name, this.specHash, namespace),
      data: { ...data },
    };
  }
}
