export { SupportRuntime, createSupportRuntime, type SupportRuntimeOptions, type RuntimeStats } from "./SupportRuntime.js";
