// src/storage/index.ts

export { acquireWriterLock, releaseWriterLock, LockHeldError, errnoCode } from "./lock";
export type { LockHandle, LockIdentity } from "./lock";
export { atomicWriteFileSync, atomicWriteJsonSync } from "./atomic_write";
export type { FsyncMode } from "./atomic_write";
