export { createTempDir, removeDir, writeJsonFile, withTempDir } from "./fs.js";
