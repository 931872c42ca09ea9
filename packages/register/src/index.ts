export { Registrable } from "./Registrable";
export { RegisterBase } from "./RegisterBase";
export type { RegisterBaseOptions } from "./RegisterBase";
export { Registration } from "./Registration";
export { RegistryTable } from "./RegistryTable";
export { createCreator } from "./Creator";
export type { Creator } from "./Creator";
export { UniqueHandle, SharedHandle } from "./handles";
export { RegistryError } from "./errors";
export { parseLogLevel } from "./config";
export type { AbstractConstructor, ChildConstructor, Destructible } from "./types";
