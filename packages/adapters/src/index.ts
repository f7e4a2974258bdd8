export {
  InMemoryTable,
  DEFAULT_SCHEMA,
  type InMemoryTableOptions,
  type CreateFailure,
} from "./in-memory-table.js";
