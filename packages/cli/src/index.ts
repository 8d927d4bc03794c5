/**
 * @ghexpr/cli - CLI entry point re-exports
 */
export { runCall, parseCliArg } from "./cmd-call.js";
export { runList } from "./cmd-list.js";
export { runConfig } from "./cmd-config.js";
