export { TieredMemoryManager, type TieredMemoryManagerOptions, type SweepReport } from "./tiered-memory-manager.js";
