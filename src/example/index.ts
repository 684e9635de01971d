export * from "./employee";
export * from "./point";
export * from "./user";
