/**
 * Route barrel.
 */

export { createHealthRoutes } from "./health.js";
export type { ReadinessProbe } from "./health.js";
export { createIntentRoutes } from "./intents.js";
export { createReconcileRoutes } from "./reconcile.js";
export { createWalletRoutes } from "./wallets.js";
