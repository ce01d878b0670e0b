export type { CommandIds, CommandSuccess, CommandRejected, CommandResult } from "./result.js";
export { successResult, rejectedResult } from "./result.js";
