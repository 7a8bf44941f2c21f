/**
 * Test helpers for searchmap packages
 */

export { createManualClock, type ManualClock } from "./clock.js";
export { arraySource, generatedSource, asyncSource } from "./records.js";
export { createTempDir, removeDir, writeJsonFile, writeTextFile } from "./fs.js";
export { ARTICLE_SCHEMA } from "./fixtures.js";
