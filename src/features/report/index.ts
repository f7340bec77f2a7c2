export * from "./panels";
export * from "./service";
