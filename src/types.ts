import type { ChildProcess } from 'node:child_process';
import type { Writable } from 'node:stream';
import type winston from 'winston';
import type { PageSettings } from './page-settings.js';

// ── Chrome Launcher ──

/** Supported browser types that can be detected and launched. */
export type ChromeKind = 'chrome' | 'chromium' | 'edge' | 'brave' | 'custom';

/** A detected browser executable on the system. */
export interface ChromeExecutable {
  /** The type of browser (chrome, chromium, edge, ...) */
  kind: ChromeKind;
  /** Absolute path to the browser executable */
  path: string;
}

/** How the DevTools endpoint of a freshly spawned browser is found. */
export type DiscoveryMode = 'stderr' | 'active-port-file';

/** Where the browser's remote-debugging WebSocket can be reached. */
export interface ControlEndpoint {
  host: string;
  port: number;
  /** Path part of the WebSocket URL, e.g. `/devtools/browser/<uuid>` */
  path: string;
  /** The complete `ws://` URL */
  url: string;
}

/** A running Chrome process owned by a supervisor. */
export interface RunningChrome {
  /** Process ID of the Chrome process */
  pid: number;
  /** The browser executable that was launched */
  exe: ChromeExecutable;
  /** The argv Chrome was started with */
  args: string[];
  /** How the endpoint was discovered */
  discovery: DiscoveryMode;
  /** Where the DevTools protocol is listening */
  endpoint: ControlEndpoint;
  /** Unix timestamp (ms) when the browser was started */
  startedAt: number;
  /** The child process handle */
  proc: ChildProcess;
}

/** POSIX credentials to run the browser under. Ignored on Windows. */
export interface RunAsUser {
  uid: number;
  gid?: number;
}

// ── Converter ──

/** Viewport presets accepted by `ChromeArguments.setWindowSize()`. */
export type WindowSizePreset =
  | 'SVGA' | 'WSVGA' | 'XGA' | 'XGAPLUS' | 'WXGA_5_3' | 'WXGA_16_10' | 'SXGA'
  | 'HD_1360_768' | 'HD_1366_768' | 'OTHER_1536_864' | 'HD_PLUS' | 'WSXGA_PLUS'
  | 'FHD' | 'WUXGA' | 'OTHER_2560_1070' | 'WQHD' | 'OTHER_3440_1440' | '4K_UHD';

/** Options fixed for the lifetime of a `Converter` and its browser. */
export interface ConverterOptions {
  /** Path to a specific browser executable. Auto-detected if omitted. */
  executablePath?: string;
  /**
   * Existing directory to keep a persistent Chrome profile in. When set, the
   * endpoint is read from the `DevToolsActivePort` file Chrome writes there
   * instead of from stderr.
   */
  userProfile?: string;
  /** Logger for every conversion. A quiet stderr logger is created if omitted. */
  logger?: winston.Logger;
  /** Identifies this converter in log lines. Default: a random UUID */
  instanceId?: string;
  /** Let Chrome use its disk cache. Default: `true` */
  useCache?: boolean;
  /** Additional Chrome command-line arguments (e.g. `['--no-sandbox']`). */
  chromeArgs?: string[];
  /** Viewport as a preset or explicit size. Default: `'HD_1366_768'` */
  windowSize?: WindowSizePreset | { width: number; height: number };
  /** Proxy server, e.g. `'http=foopy:80;ftp=foopy2'` or `'foopy:8080'` */
  proxyServer?: string;
  /** Semicolon-separated hosts that bypass `proxyServer` */
  proxyBypassList?: string;
  /** URL of a PAC file */
  proxyPacUrl?: string;
  /** User-agent string Chrome sends */
  userAgent?: string;
  /**
   * Existing directory for Chrome's disk cache, and an optional size in megabytes.
   * A cache directory can not be shared by browsers running at the same time.
   */
  diskCache?: { directory: string; sizeMb?: number };
  /** Run the browser as another POSIX user */
  runAs?: RunAsUser;
  /** URL patterns (`*` wildcard) whose requests are blocked while a page loads */
  urlBlacklist?: string[];
  /** Extensions of text files to wrap in `<pre>` before loading (e.g. `['.txt', '.log']`). Case-insensitive. */
  preWrapExtensions?: string[];
  /** Existing directory for per-conversion temp folders. Default: the OS temp dir */
  tempDirectory?: string;
  /** Keep per-conversion temp folders after the conversion, for debugging. Default: `false` */
  keepTempDirectory?: boolean;
  /** Log every request and response while a page loads. Default: `false` */
  logNetworkTraffic?: boolean;
  /** HTML sanitizer applied to URL inputs before loading */
  sanitizer?: Sanitizer;
  /** Transformer for `<img>` resizing/rotation applied to URL inputs before loading */
  imageTransform?: {
    transformer: ImageTransformer;
    /** Shrink images to fit the paper width */
    resize?: boolean;
    /** Rotate images following their EXIF orientation */
    rotate?: boolean;
    /** Abort image downloads after this many milliseconds */
    loadTimeoutMs?: number;
  };
  /** Rewrites a URL input so the PDF page matches the content size. Needed for `paperFormat: 'FitPageToContent'`. */
  contentFitter?: ContentFitter;
}

/** What to convert: a page address (http(s), file URL or filesystem path) or inline markup. */
export type ConvertInput = { url: string | URL } | { html: string };

/** Where converted bytes go besides the returned buffer. */
export type OutputTarget = string | Writable;

export interface ConvertOptions {
  /** PDF layout. Ignored for images except `paperFormat: 'FitPageToContent'`. */
  pageSettings?: PageSettings;
  /** File path or stream to write the result to. A path gets a `.mhtml` sibling when a snapshot is captured. */
  output?: OutputTarget;
  /** Abort with `ConversionTimeoutError` when the conversion takes longer (ms, >= 1) */
  conversionTimeoutMs?: number;
  /** Stop waiting for images and other media this long (ms) after DOMContentLoaded and render what is there */
  mediaLoadTimeoutMs?: number;
  /** Bound on each navigation wait (ms). Default: unbounded unless a conversion timeout is set */
  navigationTimeoutMs?: number;
  /** Wait until the page sets `window.status` to this value before rendering */
  waitForWindowStatus?: string;
  /** How long to wait for `waitForWindowStatus` (ms). Not counted against the conversion timeout. Default: `60000` */
  waitForWindowStatusTimeoutMs?: number;
  /** JavaScript run in the page after it loaded and before rendering */
  runJavascript?: string;
  /** Capture an MHTML snapshot of the loaded page. Default: `false` */
  captureSnapshot?: boolean;
  /** Image format for `convertToImage()`. Default: `'png'` */
  imageFormat?: 'png' | 'jpeg';
  /** JPEG quality 0-100 */
  imageQuality?: number;
  /** Capture the full scrollable page instead of just the viewport. Default: `false` */
  fullPage?: boolean;
  /** Logger for this conversion only */
  logger?: winston.Logger;
}

/** Result of a conversion. */
export interface ConversionResult {
  /** The PDF or image bytes */
  data: Buffer;
  /** MHTML snapshot bytes when `captureSnapshot` was set */
  snapshot?: Buffer;
}

/** Steps of a conversion, in order. `failed` can follow any of them. */
export type ConversionPhase =
  | 'init'
  | 'preprocess'
  | 'ensure-running'
  | 'navigate'
  | 'wait-window-status'
  | 'run-script'
  | 'capture-snapshot'
  | 'render'
  | 'cleanup'
  | 'done'
  | 'failed';

// ── Pre-processing collaborators ──

/** Handed to every collaborator. */
export interface CollaboratorContext {
  /** The conversion's scoped temp directory; write intermediate files here */
  tempDirectory: string;
  logger: winston.Logger;
}

/** Returns the URL of a sanitized copy, or `undefined` to keep the input. */
export interface Sanitizer {
  sanitize(url: string, ctx: CollaboratorContext & { mediaLoadTimeoutMs?: number }): Promise<string | undefined>;
}

export interface ImageTransformOptions {
  resize: boolean;
  rotate: boolean;
  pageSettings: PageSettings;
  /** Compiled URL blacklist, so the transformer skips blocked images */
  blacklist: RegExp[];
  loadTimeoutMs?: number;
}

/** Returns the URL of a copy with transformed images, or `undefined` when nothing changed. */
export interface ImageTransformer {
  transform(url: string, opts: ImageTransformOptions, ctx: CollaboratorContext): Promise<string | undefined>;
}

/** Returns the URL of a copy sized to its content, or `undefined` when nothing changed. */
export interface ContentFitter {
  fit(url: string, ctx: CollaboratorContext): Promise<string | undefined>;
}

// ── Network ──

/** A network event observed while loading a page, as written to the traffic log. */
export interface NetworkTrafficEntry {
  /** `request`, `response`, `failed`, `blocked` or `allowed` */
  kind: 'request' | 'response' | 'failed' | 'blocked' | 'allowed';
  url: string;
  /** HTTP method, for requests */
  method?: string;
  /** HTTP status, for responses */
  status?: number;
  /** Error text, for failed requests */
  errorText?: string;
}
