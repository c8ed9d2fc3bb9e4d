export * from './types/terminal-contract.js';
export { SessionStartError, isSessionStartError, getErrorMessage } from './types/errors.js';
export { loadTerminalConfig, parseTermKey, DEFAULT_TERM_KEY } from './config/index.js';
export type { TerminalConfig, TerminalBackground } from './config/index.js';
export { parseOpenArgs, parseTermSize } from './cli/common/command-parsers.js';
export type { ParsedOpenArgs, ParsedTermSize } from './cli/common/command-parsers.js';
export { createLogger, setDebugLogging, isDebugLogging } from './infra/logger.js';
export { isEnvFlagSet } from './infra/env-flag.js';
export type { Logger } from './infra/logger.js';
export { getMetric, getMetricSnapshot, getMetricTotal, incMetric, resetMetrics } from './infra/diagnostics.js';
export type { MetricName, MetricTagMap } from './infra/diagnostics.js';

export { ScrollbackStore, capturedLineText, effectiveWidth } from './session/scrollback-store.js';
export type { CapturedLine } from './session/scrollback-store.js';
export { TerminalSession } from './session/session.js';
export type { SessionState, SessionCursor, ScrapedCell, SessionContext } from './session/session.js';
export { SessionRegistry } from './session/session-registry.js';
export { SessionManager } from './session/session-manager.js';
export type { OpenRequest, SessionManagerDeps, SessionSummary } from './session/session-manager.js';
export { computeStatusText } from './session/status-text.js';

export { DirtyRows, ALL_ROWS } from './emulation/dirty-rows.js';
export type { RowRange } from './emulation/dirty-rows.js';
export { feedJobOutput, ScreenAdapter } from './emulation/screen-adapter.js';

export { AttrTable, AttrFlag, cellToAttr, hasAttrFlag, hostPalette, PLAIN_ATTR } from './render/cell-attr.js';
export type { AttrColor, HostAttr, ColorPalette } from './render/cell-attr.js';
export { colorToIndex, colorToHex } from './render/color-index.js';
export { updateWindow, redrawSession, getAttr, changeInDocument } from './render/render-sync.js';
export { negotiateSize, applyNegotiatedSize } from './render/resize-negotiator.js';

export { translateInput, resolveInput } from './input/key-translator.js';
export type { HostInput, KeyAction } from './input/key-translator.js';
export { InputRouter, windowContains } from './input/input-router.js';
export type { RouteOutcome } from './input/input-router.js';

export { createMemoryHost, MemoryHost, MemoryDocument, MemoryWindow } from './host/memory-host.js';
export type { MemoryHostOptions, WindowGeometry } from './host/memory-host.js';
export { ChildProcessLauncher, ChildProcessJob } from './channel/child-process-channel.js';
export type { ChildProcessLauncherOptions } from './channel/child-process-channel.js';
