export { Converter, DOCUMENT_EXTENSIONS, snapshotPath } from './converter.js';
export type { BrowserHost } from './converter.js';
export { ChromeSupervisor } from './supervisor.js';
export type { SupervisorOptions } from './supervisor.js';
export { ChromeArguments, WINDOW_SIZES } from './chrome-arguments.js';
export { resolveBrowserExecutable } from './chrome-launcher.js';
export { BrowserClient } from './browser.js';
export type { BrowserClientOptions } from './browser.js';
export { CdpConnection } from './connection.js';
export type { CdpParams, EventMatcher, WaitOptions } from './connection.js';
export { CountdownTimer } from './countdown-timer.js';
export type { CountdownState } from './countdown-timer.js';
export { navigateTo, setDocumentContent } from './actions/navigation.js';
export type { NavigateOptions } from './actions/navigation.js';
export { waitForWindowStatus } from './actions/wait.js';
export { runJavascript } from './actions/evaluate.js';
export { printToPdf } from './capture/pdf.js';
export { takeScreenshot } from './capture/screenshot.js';
export { captureMhtml } from './capture/snapshot.js';
export { compileBlacklist, isBlocked } from './url-filter.js';
export { PAPER_SIZES, isPaperFormat, toPrintToPdfParams } from './page-settings.js';
export type { ColorMode, PageSettings, PaperFormat, PrintToPdfParams } from './page-settings.js';
export { preWrapFile } from './pre-wrap.js';
export { createLogger } from './logger.js';
export type { LogLevel } from './logger.js';
export { assertDirectoryExists, loadEnvConfig, parsePositiveInt } from './config.js';
export type { EnvConfig } from './config.js';

// Errors
export {
  RenderError,
  ProcessError,
  ProtocolError,
  ProtocolParseError,
  ProtocolTimeoutError,
  ProtocolConnectionError,
  ConfigurationError,
  ConversionTimeoutError,
  NavigationError,
  ConversionError,
  ErrorCode,
  describeError,
} from './errors.js';

// Types
export type {
  ChromeKind,
  ChromeExecutable,
  CollaboratorContext,
  ContentFitter,
  ControlEndpoint,
  ConversionPhase,
  ConversionResult,
  ConvertInput,
  ConvertOptions,
  ConverterOptions,
  DiscoveryMode,
  ImageTransformOptions,
  ImageTransformer,
  NetworkTrafficEntry,
  OutputTarget,
  RunAsUser,
  RunningChrome,
  Sanitizer,
  WindowSizePreset,
} from './types.js';
