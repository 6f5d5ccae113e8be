export * from "./models.js";
export * from "./dtos.js";
export * from "./policy.js";
