import { isRecord } from "@fabkube/utils";

// Walk a parsed JSON value; undefined as soon as a step is missing.
export function readPath(value: unknown, ...keys: Array<string | number>): unknown {
  let current = value;
  for (const key of keys) {
    if (typeof key === "number") {
      if (!Array.isArray(current)) return undefined;
      current = current[key];
    } else {
      if (!isRecord(current)) return undefined;
      current = current[key];
    }
  }
  return current;
}

export function readString(value: unknown, ...keys: Array<string | number>): string | undefined {
  const found = readPath(value, ...keys);
  return typeof found === "string" ? found : undefined;
}

export function readStringMap(
  value: unknown,
  ...keys: Array<string | number>
): { [key: string]: string } | undefined {
  const found = readPath(value, ...keys);
  if (!isRecord(found)) return undefined;
  const result: { [key: string]: string } = {};
  for (const [k, v] of Object.entries(found)) {
    if (typeof v === "string") result[k] = v;
  }
  return result;
}

export function parseJson(text: string): unknown {
  return text.trim() ? JSON.parse(text) : undefined;
}

// pods of a `kubectl get pods -o json` listing are all running with every container ready
export function podsReady(podList: unknown): boolean {
  const items = readPath(podList, "items");
  if (!Array.isArray(items) || items.length === 0) return false;

  return items.every((pod) => {
    if (readString(pod, "status", "phase") !== "Running") return false;
    const statuses = readPath(pod, "status", "containerStatuses");
    return (
      Array.isArray(statuses) &&
      statuses.length > 0 &&
      statuses.every((status) => readPath(status, "ready") === true)
    );
  });
}
