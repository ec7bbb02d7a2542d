/**
 * Database module exports
 */

// Connection
export { closeDatabase, getDatabase, initDatabase } from "./connection";
export type { StatusColumns } from "./mappers";
// Mappers
export { parsePolicyRow, serializeSpec, serializeStatus } from "./mappers";
// Migrations
export {
  getAllMigrations,
  getCurrentVersion,
  getLatestVersion,
  getPendingMigrations,
} from "./migrations";
// Policy repository
export {
  applyPolicy,
  createPolicyStore,
  deletePolicy,
  getPolicy,
  listPolicies,
  updatePolicyStatus,
} from "./policy-repository";
