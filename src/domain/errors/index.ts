export { IllegalTransitionError } from "./IllegalTransitionError.js";
export { InvalidConfigurationError } from "./InvalidConfigurationError.js";
export { InvalidGameStateError } from "./InvalidGameStateError.js";
export { NoActiveGameError } from "./NoActiveGameError.js";
export { ResourceUnavailableError } from "./ResourceUnavailableError.js";
