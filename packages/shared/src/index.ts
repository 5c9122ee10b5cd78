export * from "./identifier.js";
export * from "./identifierSet.js";
export * from "./mergeIdentifierSets.js";
export * from "./event.js";
export * from "./notification.js";
export * from "./preferences.js";
export * from "./validation.js";
