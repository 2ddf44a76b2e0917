export * from "./admin.js";
export * from "./authorization.js";
export * from "./collectibles.js";
export * from "./context.js";
export * from "./currency.js";
export * from "./custody.js";
export * from "./engine.js";
export * from "./errors.js";
export * from "./inventory.js";
export * from "./payments.js";
export * from "./queries.js";
export * from "./settlement.js";
