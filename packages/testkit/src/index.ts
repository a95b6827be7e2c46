/**
 * Test helpers for kvlog packages
 */

export { createTempDir, removeDir, tempFiles, withTempDir, withTempSession } from "./fs.js";
export type { TempFiles } from "./fs.js";
