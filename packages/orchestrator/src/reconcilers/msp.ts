import path from "path";
import { MspEntity } from "../types";
import {
  adminCredSecretName,
  caHost,
  cryptoSecretName,
  ensureCredentials,
  ensureResource,
  pending,
} from "./apply";
import { CA_ITEMS, copySignCert, cryptoSecrets, ID_ITEMS } from "./cryptoMaterial";
import { EntityReconciler } from "./types";

export interface MspDesired {
  namespace: string;
  credSecret: string;
  mspDir: string;
}

// Organisation admin: credentials, CA registration, enrollment and the
// secrets the nodes of the organisation mount.
export const mspReconciler: EntityReconciler<MspEntity, MspDesired> = {
  desiredState({ msp }, { topology }) {
    return {
      namespace: msp.namespace,
      credSecret: adminCredSecretName(msp.orgAdmin),
      mspDir: path.join(topology.core.dirCrypto, msp.name),
    };
  },

  async apply({ msp, ca }, desired, ctx) {
    await ensureResource(ctx, "Namespace", { name: desired.namespace });

    const host = await caHost(ctx, ca);
    if (!host) return pending(`waiting for ingress of ca ${ca.name}`);

    const password = await ensureCredentials(
      ctx,
      desired.credSecret,
      desired.namespace,
      msp.orgAdmin,
      msp.orgAdminPw,
    );
    await ensureResource(ctx, "Identity", {
      name: msp.orgAdmin,
      ca: ca.name,
      namespace: ca.namespace,
      password,
      type: "client",
      admin: true,
    });

    await ctx.tools.enroll({
      username: msp.orgAdmin,
      password,
      caHost: host,
      tlsCert: ca.tlsCert,
      mspDir: desired.mspDir,
    });
    await copySignCert(desired.mspDir);

    const secrets = await cryptoSecrets(
      desired.mspDir,
      msp.orgAdmin,
      desired.namespace,
      [...ID_ITEMS, ...CA_ITEMS],
    );
    for (const secret of secrets) await ensureResource(ctx, "Secret", secret);
    return undefined;
  },

  async probe({ msp }, desired, { client }) {
    const idcert = await client.getResource(
      "Secret",
      cryptoSecretName(msp.orgAdmin, "idcert"),
      desired.namespace,
    );
    return idcert
      ? { status: "Ready" }
      : pending(`admin certificate secret of ${msp.name} not found yet`);
  },
};
