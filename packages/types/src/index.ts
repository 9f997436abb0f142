export * from "./messages";
export * from "./variables";
export * from "./prompt";
export * from "./agents";
export * from "./model";
export * from "./options";
export * from "./tools";
export * from "./memory";
export * from "./retrieval";
export * from "./errors";
