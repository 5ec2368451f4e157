// pattern: Imperative Shell
// Shared CLI dependencies, imported by every command module.
export {
  CLI_LOGGER,
  initializeLogger,
  setCliLogLevel,
} from "../logger/index.js";
