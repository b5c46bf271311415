/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createAccountRoutes } from "./accounts.js";
export { createCategoryRoutes } from "./categories.js";
export { createExpenseRoutes } from "./expenses.js";
export { createIncomeRoutes } from "./incomes.js";
export { createTransferRoutes } from "./transfers.js";
export { createSummaryRoutes } from "./summary.js";
