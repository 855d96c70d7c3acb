export * from "./errors";
export * from "./rect";
export * from "./size";
export * from "./split";
export * from "./transform";
export * from "./layout";
export * from "./columns";
export * from "./resolve";
