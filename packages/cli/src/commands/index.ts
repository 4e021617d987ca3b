// ============================================
// CLI Commands - Barrel Export
// ============================================

export { EXIT_CODES, type ExitCode, ExitCodeMapper } from "./exit-codes.js";
export { registerInfoCommand } from "./info.js";
export { registerResetCommand } from "./reset.js";
export { parseIdArgument, registerTaskCommands } from "./tasks.js";
