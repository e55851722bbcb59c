export { type DrizzleAdapterOptions, type DrizzleExecutor, drizzleAdapter } from "./adapter.js";
export { type LipaRecordInsert, type LipaRecordRow, lipaRecord } from "./schema.js";
