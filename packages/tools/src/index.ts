/**
 * @stepwise/tools
 *
 * Ready-made tools for Stepwise agents
 */

export { createFileTools, numberLines, type FileToolsOptions } from "./files.js";
export {
  createShellTool,
  formatCommandOutput,
  runCommand,
  type CommandOutput,
  type CommandRunner,
  type ShellToolOptions,
} from "./shell.js";
export { createNoteTools, type Note, type NoteToolsOptions } from "./notes.js";
