import * as crypto from "node:crypto";
import path from "node:path";

/**
 * Sibling path for staging a write to `destination`. It stays in the same
 * directory so the final rename never crosses a file system.
 */
export function createTemporaryPath(destination: string): string {
  const directory = path.dirname(destination);
  const fileName = path.basename(destination);
  const randomString = crypto.randomBytes(8).toString("hex");

  return path.join(directory, `.${fileName}.${randomString}.tmp`);
}

export function describeIssuePath(issuePath: ReadonlyArray<string | number>): string {
  if (!issuePath.length) return "top-level value";
  const [first, ...rest] = issuePath;
  const head = typeof first === "number" ? `element ${first}` : `key "${first}"`;
  return rest.length ? `${head} (at ${rest.join(".")})` : head;
}
