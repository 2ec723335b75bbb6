export { defaultViewerConfig, viewerConfig, type ViewerConfig } from "./config.js";
export { createSession, type FrameStats, type RenderSession, type SessionOverrides } from "./session.js";
export { advanceFrame, applyInput, nextGlyphMode, type InputEvent } from "./input.js";
export { formatStatus, type StatusInfo } from "./status.js";
export { createKitTerminal, mouseEvent, type TerminalPort, type TerminalSize } from "./terminal.js";
export { InputQueue, runRenderLoop, withTerminal, type Clock, type SignalSource, type WithTerminalOptions } from "./loop.js";
export { parseArgs, type CliCommand, type ParseResult, type ViewOptions } from "./cli/args.js";
export { helpText, versionText } from "./cli/help.js";
export { runCli, type CliDeps } from "./cli/main.js";
export { VERSION } from "./version.js";
