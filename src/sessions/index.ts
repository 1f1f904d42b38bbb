export { SessionRegistry, type RegistryStats } from "./SessionRegistry.js";
export { toSnapshot, userMessageHistory, lastMessages, lastUserText } from "./snapshot.js";
