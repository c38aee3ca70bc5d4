export { MemoryStore, type MemoryUpdate, type PartitionCount, type ScanOptions, type HistoryEntry } from "./memory-store.js";
export { PartitionLocks } from "./partition-lock.js";
