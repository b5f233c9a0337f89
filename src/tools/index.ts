export { registerForecastTools } from "./forecast.js";
export { registerTransactionTools } from "./transactions.js";
export { registerRecurringTools } from "./recurring.js";
export { registerBalanceTools } from "./balance.js";
export { registerResources } from "./resources.js";
export { registerPrompts } from "./prompts.js";
