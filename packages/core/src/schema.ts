import { errorMessage } from "./errors.js";
import type { FieldTypeMap, LogSink, RemoteTable } from "./types.js";

/**
 * Fetch the remote table's field definitions as a name → type map.
 * Failures propagate; no default map is substituted here.
 */
export async function inspectSchema(
  table: RemoteTable,
  sink: LogSink = () => {}
): Promise<FieldTypeMap> {
  try {
    return await table.retrieveSchema();
  } catch (error) {
    sink(`Could not fetch database schema: ${errorMessage(error)}`);
    throw error;
  }
}
