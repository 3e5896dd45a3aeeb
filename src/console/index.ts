export { LibraryShell, MENU } from "./shell.js";
export { createTerminalIO, createScriptedIO, type ConsoleIO } from "./io.js";
