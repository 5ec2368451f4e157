// pattern: Functional Core
export { devProfile } from "./dev.js";
export { minimalProfile } from "./minimal.js";
export { paranoidProfile } from "./paranoid.js";
export { standardProfile } from "./standard.js";
