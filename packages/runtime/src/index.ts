export {
  PidFileManager,
  writePidFile,
  cleanupPidFile,
  type PidFileManagerOptions,
} from "./pid.js";
