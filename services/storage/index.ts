import type { EnvVars } from "../../utils/env-vars";
import type { DocumentStore } from "./document-store";
import { LocalDocumentStore } from "./local-document-store";

export { MalformedDocumentError } from "./document-store";
export type { DocumentStore, JsonDocument } from "./document-store";
export { LocalDocumentStore } from "./local-document-store";

export function getDocumentStore(
  env: Pick<EnvVars, "OUTPUT_DIRECTORY">,
  directory: string = env.OUTPUT_DIRECTORY
): DocumentStore {
  return new LocalDocumentStore({ directory });
}
