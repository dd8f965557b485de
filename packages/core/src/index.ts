export * as Config from "./config_manager";
export * as Crypto from "./crypto";
export * as Interchange from "./interchange";
export * as Logger from "./logger";
export * as Schemas from "./schemas";

export * from "./errors";
export * from "./models";

export type { ConfigStore } from "./config_store";
export type { DataInterchange } from "./interchange";
export { Json, JsonInterchange } from "./interchange";
export { PrivateKey, PublicKey } from "./crypto";
export type { KeyId, Signature, Signer, Verifier } from "./crypto";
