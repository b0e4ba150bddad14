export * from "./dateParser";
export * from "./errors";
export * from "./formatter";
export * from "./instant";
export * from "./mode";
export * from "./options";
export * from "./report";
export * from "./zone";
