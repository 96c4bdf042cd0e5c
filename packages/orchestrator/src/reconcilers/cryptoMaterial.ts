import fs from "fs";
import path from "path";
import { PermanentResourceError } from "../errors";
import { SecretSpec } from "../providers/client";
import { cryptoSecretName, encode } from "./apply";

interface CryptoItem {
  secretType: string;
  subfolder: string;
  key: string;
  required: boolean;
}

// identity certificate and key
export const ID_ITEMS: readonly CryptoItem[] = [
  { secretType: "idcert", subfolder: "signcerts", key: "cert.pem", required: true },
  { secretType: "idkey", subfolder: "keystore", key: "key.pem", required: true },
];

// certificates of the issuing CA chain
export const CA_ITEMS: readonly CryptoItem[] = [
  { secretType: "cacert", subfolder: "cacerts", key: "cacert.pem", required: true },
  {
    secretType: "caintcert",
    subfolder: "intermediatecerts",
    key: "intermediatecacert.pem",
    required: false,
  },
];

// The single file of an MSP subfolder; undefined when the folder is empty or missing.
export async function singleFile(dir: string): Promise<string | undefined> {
  let entries: string[];
  try {
    entries = await fs.promises.readdir(dir);
  } catch {
    return undefined;
  }

  if (entries.length > 1)
    throw new PermanentResourceError(
      `${dir} contains ${entries.length} files - ${entries.join(", ")}`,
    );
  return entries.length ? path.join(dir, entries[0]) : undefined;
}

// Fabric expects the admin's own certificate in `admincerts`.
export async function copySignCert(mspDir: string): Promise<void> {
  const signCert = await singleFile(path.join(mspDir, "signcerts"));
  if (!signCert)
    throw new PermanentResourceError(`no signcert found in ${mspDir}`);

  const adminCerts = path.join(mspDir, "admincerts");
  const target = path.join(adminCerts, path.basename(signCert));
  if (fs.existsSync(target)) return;

  await fs.promises.mkdir(adminCerts, { recursive: true });
  await fs.promises.copyFile(signCert, target);
}

/** Secrets holding the crypto material of an enrolled MSP directory. */
export async function cryptoSecrets(
  mspDir: string,
  username: string,
  namespace: string,
  items: readonly CryptoItem[],
): Promise<SecretSpec[]> {
  const secrets: SecretSpec[] = [];
  for (const item of items) {
    const name = cryptoSecretName(username, item.secretType);
    const file = await singleFile(path.join(mspDir, item.subfolder));
    if (!file) {
      if (item.required)
        throw new PermanentResourceError(
          `no ${item.subfolder} found in ${mspDir} for secret ${name}`,
        );
      continue;
    }

    const content = await fs.promises.readFile(file);
    secrets.push({ name, namespace, data: { [item.key]: encode(content) } });
  }
  return secrets;
}
