/**
 * Route barrel - re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createAccountRoutes } from "./accounts.js";
export { createStreamRoutes } from "./streams.js";
export { createLedgerRoutes } from "./ledger.js";
