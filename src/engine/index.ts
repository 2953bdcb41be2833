export {
  Arena,
  type ArenaMark,
  type ArenaOptions,
  type AttachOptions,
  type NodeRef,
  type NodeSnapshot,
} from "./arena";
export type { BackwardNodeHook, BackwardNodeInfo } from "./backward";
export * from "./engine-errors";
export type { SharedStoreDescriptor, SharingMode } from "./node-store";
export { OP_NAMES, type OpName, type RuleKind } from "./ops";
export { type TraceEvent, TraceRecorder } from "./trace";
