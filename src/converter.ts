import { randomUUID } from 'node:crypto';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { Writable } from 'node:stream';
import { fileURLToPath, pathToFileURL } from 'node:url';
import type winston from 'winston';
import { runJavascript } from './actions/evaluate.js';
import { navigateTo, setDocumentContent } from './actions/navigation.js';
import { waitForWindowStatus } from './actions/wait.js';
import type { BrowserClient } from './browser.js';
import { printToPdf } from './capture/pdf.js';
import { takeScreenshot } from './capture/screenshot.js';
import { captureMhtml } from './capture/snapshot.js';
import type { ChromeArguments } from './chrome-arguments.js';
import { assertDirectoryExists } from './config.js';
import { CountdownTimer } from './countdown-timer.js';
import { ConfigurationError, ConversionError, ErrorCode, ProcessError, RenderError, describeError } from './errors.js';
import { createLogger } from './logger.js';
import type { PageSettings } from './page-settings.js';
import { preWrapFile } from './pre-wrap.js';
import { ChromeSupervisor } from './supervisor.js';
import type {
  CollaboratorContext,
  ConversionPhase,
  ConversionResult,
  ConvertInput,
  ConvertOptions,
  ConverterOptions,
  OutputTarget,
} from './types.js';
import { compileBlacklist } from './url-filter.js';

/** Extensions Chrome can load as a document without pre-wrapping. */
export const DOCUMENT_EXTENSIONS: readonly string[] = ['.htm', '.html', '.mht', '.mhtml', '.svg', '.xml'];

export const DEFAULT_WINDOW_STATUS_TIMEOUT_MS = 60_000;

/** What a converter needs from the process supervisor. */
export interface BrowserHost {
  readonly arguments: ChromeArguments;
  readonly isRunning: boolean;
  ensureRunning(countdown?: CountdownTimer): Promise<BrowserClient>;
  dispose(): Promise<void>;
}

type RenderKind = 'pdf' | 'image';

type Target =
  | { kind: 'url'; url: string; file?: string; preWrap: boolean }
  | { kind: 'html'; html: string };

// scheme of at least two characters, so `C:\...` stays a path
const SCHEME = /^[a-z][a-z0-9+.-]+:/i;

function normalizeExtensions(extensions: readonly string[]): string[] {
  return extensions
    .map(e => e.trim().toLowerCase())
    .filter(Boolean)
    .map(e => (e.startsWith('.') ? e : `.${e}`));
}

/** `report.pdf` → `report.mhtml` in the same directory. */
export function snapshotPath(output: string): string {
  return path.join(path.dirname(output), `${path.basename(output, path.extname(output))}.mhtml`);
}

function writeToStream(stream: Writable, data: Buffer): Promise<void> {
  return new Promise((resolve, reject) => {
    stream.write(data, err => (err ? reject(err) : resolve()));
  });
}

/**
 * Converts pages to PDF or images with one headless Chrome it starts on the
 * first conversion and keeps until `dispose()`.
 *
 * Conversions on one instance run one at a time, in call order.
 *
 * @example
 * ```ts
 * const converter = new Converter({ urlBlacklist: ['https://ads.example.com/*'] });
 * try {
 *   const { data } = await converter.convertToPdf({ url: 'https://example.com' }, {
 *     pageSettings: { paperFormat: 'A4', printBackground: true },
 *     conversionTimeoutMs: 30_000,
 *   });
 * } finally {
 *   await converter.dispose();
 * }
 * ```
 */
export class Converter {
  readonly instanceId: string;
  private readonly logger: winston.Logger;
  private readonly options: ConverterOptions;
  private readonly host: BrowserHost;
  private blacklist: RegExp[];
  private preWrapExtensions: string[];
  private queue: Promise<void> = Promise.resolve();
  private started = false;

  constructor(options: ConverterOptions = {}, deps: { host?: BrowserHost } = {}) {
    this.options = options;
    this.instanceId = options.instanceId ?? randomUUID();
    this.logger = (options.logger ?? createLogger()).child({ instanceId: this.instanceId });
    if (options.tempDirectory !== undefined) assertDirectoryExists(options.tempDirectory, 'temp directory');

    this.host = deps.host ?? new ChromeSupervisor({
      logger: this.logger,
      executablePath: options.executablePath,
      userProfile: options.userProfile,
      runAs: options.runAs,
      logTraffic: options.logNetworkTraffic,
    });
    this.blacklist = compileBlacklist(options.urlBlacklist ?? []);
    this.preWrapExtensions = normalizeExtensions(options.preWrapExtensions ?? []);
    this.applyChromeOptions(options);
  }

  private applyChromeOptions(options: ConverterOptions): void {
    const args = this.host.arguments;
    for (const arg of options.chromeArgs ?? []) args.add(arg);
    if (typeof options.windowSize === 'string') args.setWindowSize(options.windowSize);
    else if (options.windowSize) args.setWindowSize(options.windowSize.width, options.windowSize.height);
    if (options.proxyServer !== undefined) args.setProxyServer(options.proxyServer);
    if (options.proxyBypassList !== undefined) args.setProxyBypassList(options.proxyBypassList);
    if (options.proxyPacUrl !== undefined) args.setProxyPacUrl(options.proxyPacUrl);
    if (options.userAgent !== undefined) args.setUserAgent(options.userAgent);
    if (options.diskCache) args.setDiskCache(options.diskCache.directory, options.diskCache.sizeMb);
  }

  /** Chrome's command line. Editable until the first conversion starts the browser. */
  get chromeArguments(): ChromeArguments {
    return this.host.arguments;
  }

  get isRunning(): boolean {
    return this.host.isRunning;
  }

  setUrlBlacklist(patterns: readonly string[]): void {
    this.assertNotStarted('urlBlacklist');
    this.blacklist = compileBlacklist(patterns);
  }

  setPreWrapExtensions(extensions: readonly string[]): void {
    this.assertNotStarted('preWrapExtensions');
    this.preWrapExtensions = normalizeExtensions(extensions);
  }

  private assertNotStarted(setting: string): void {
    if (this.started) {
      throw new ProcessError(ErrorCode.ALREADY_RUNNING, `Set '${setting}' before the first conversion`);
    }
  }

  convertToPdf(input: ConvertInput, options: ConvertOptions = {}): Promise<ConversionResult> {
    return this.enqueue(() => this.convert('pdf', input, options));
  }

  convertToImage(input: ConvertInput, options: ConvertOptions = {}): Promise<ConversionResult> {
    return this.enqueue(() => this.convert('image', input, options));
  }

  /** Stops Chrome. The next conversion starts a new one. */
  async dispose(): Promise<void> {
    await this.host.dispose();
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.then(() => undefined, () => undefined);
    return run;
  }

  private async convert(kind: RenderKind, input: ConvertInput, options: ConvertOptions): Promise<ConversionResult> {
    this.started = true;
    const logger = options.logger ? options.logger.child({ instanceId: this.instanceId }) : this.logger;
    const pageSettings = options.pageSettings ?? {};
    let phase: ConversionPhase = 'init';
    let failed = false;
    let tempDirectory: string | undefined;
    const enter = (next: ConversionPhase) => {
      phase = next;
      logger.info(`Phase ${next}`);
    };
    const ensureTempDirectory = async (): Promise<string> => {
      tempDirectory ??= await fs.promises.mkdtemp(path.join(this.options.tempDirectory ?? os.tmpdir(), 'pagepress-'));
      return tempDirectory;
    };

    try {
      enter('init');
      const countdown = options.conversionTimeoutMs !== undefined ? new CountdownTimer(options.conversionTimeoutMs) : undefined;
      if (typeof options.output === 'string') {
        assertDirectoryExists(path.dirname(path.resolve(options.output)), 'output directory');
      }
      const target = this.resolveTarget(input);

      enter('preprocess');
      const allowList = new Set<string>();
      if (target.kind === 'url') {
        target.url = await this.preprocess(target, pageSettings, options, allowList, {
          logger,
          tempDirectory: ensureTempDirectory,
        });
      }

      countdown?.start();
      enter('ensure-running');
      const client = await this.host.ensureRunning(countdown);
      const page = client.page;

      enter('navigate');
      if (target.kind === 'html') {
        await setDocumentContent(page, target.html, { countdown });
      } else {
        await navigateTo(page, target.url, {
          logger,
          countdown,
          useCache: this.options.useCache,
          blacklist: this.blacklist,
          allowList,
          logNetworkTraffic: this.options.logNetworkTraffic,
          navigationTimeoutMs: options.navigationTimeoutMs,
          mediaLoadTimeoutMs: options.mediaLoadTimeoutMs,
        });
      }

      if (options.waitForWindowStatus !== undefined) {
        enter('wait-window-status');
        const timeoutMs = options.waitForWindowStatusTimeoutMs ?? DEFAULT_WINDOW_STATUS_TIMEOUT_MS;
        countdown?.stop();
        try {
          const matched = await waitForWindowStatus(page, options.waitForWindowStatus, timeoutMs, { logger });
          if (!matched) {
            logger.warn(`window.status did not become '${options.waitForWindowStatus}' within ${timeoutMs} ms, rendering anyway`);
          }
        } finally {
          countdown?.start();
        }
      }

      if (options.runJavascript) {
        enter('run-script');
        await runJavascript(page, options.runJavascript, { countdown });
      }

      let snapshot: Buffer | undefined;
      if (options.captureSnapshot) {
        enter('capture-snapshot');
        snapshot = (await captureMhtml(page, { countdown })).buffer;
      }

      enter('render');
      const { buffer } = kind === 'pdf'
        ? await printToPdf(page, pageSettings, { countdown })
        : await takeScreenshot(page, {
          type: options.imageFormat,
          quality: options.imageQuality,
          fullPage: options.fullPage,
          countdown,
        });
      if (options.output !== undefined) await this.writeOutput(options.output, buffer, snapshot, logger);

      const result: ConversionResult = { data: buffer };
      if (snapshot) result.snapshot = snapshot;
      return result;
    } catch (err) {
      failed = true;
      if (err instanceof RenderError && err.phase === undefined) err.phase = phase;
      logger.error(`Conversion failed during ${phase}: ${describeError(err)}`);
      enter('failed');
      throw err;
    } finally {
      enter('cleanup');
      await this.cleanup(tempDirectory, logger);
      if (!failed) enter('done');
    }
  }

  private resolveTarget(input: ConvertInput): Target {
    if ('html' in input) return { kind: 'html', html: input.html };

    const raw = input.url instanceof URL ? input.url.href : input.url.trim();
    if (!raw) throw new ConfigurationError(ErrorCode.INVALID_ARGUMENT, 'The input url is empty');
    let file: string | undefined;
    let url: string;
    if (SCHEME.test(raw)) {
      url = raw;
      if (/^file:/i.test(raw)) file = fileURLToPath(raw);
    } else {
      file = path.resolve(raw);
      url = pathToFileURL(file).href;
    }
    if (file === undefined) return { kind: 'url', url, preWrap: false };
    return { kind: 'url', url, file, preWrap: this.validateFile(file) };
  }

  /** Returns true when the file needs pre-wrapping. */
  private validateFile(file: string): boolean {
    if (!fs.existsSync(file)) {
      throw new ConversionError(ErrorCode.INPUT_NOT_FOUND, `The input file '${file}' does not exist`, { file });
    }
    const extension = path.extname(file).toLowerCase();
    if (this.preWrapExtensions.includes(extension)) return true;
    if (!DOCUMENT_EXTENSIONS.includes(extension)) {
      throw new ConversionError(
        ErrorCode.UNSUPPORTED_INPUT,
        `The file '${file}' has an unsupported extension '${extension}', supported are ${[...DOCUMENT_EXTENSIONS, ...this.preWrapExtensions].join(', ')}`,
        { file, extension },
      );
    }
    return false;
  }

  /**
   * Runs the pre-wrap and the collaborators over a url target. Every URL they
   * hand back is allow-listed so the blacklist can not block the document itself.
   */
  private async preprocess(
    target: { url: string; file?: string; preWrap: boolean },
    pageSettings: PageSettings,
    options: ConvertOptions,
    allowList: Set<string>,
    env: { logger: winston.Logger; tempDirectory: () => Promise<string> },
  ): Promise<string> {
    let url = target.url;
    const { logger } = env;
    const context = async (): Promise<CollaboratorContext> => ({ tempDirectory: await env.tempDirectory(), logger });

    if (target.preWrap && target.file !== undefined) {
      const wrapped = await preWrapFile(target.file, await env.tempDirectory());
      url = pathToFileURL(wrapped).href;
      allowList.add(url);
      logger.info(`Wrapped '${target.file}' into '${wrapped}'`);
    }

    const { sanitizer, contentFitter, imageTransform } = this.options;
    if (sanitizer) {
      const sanitized = await sanitizer.sanitize(url, { ...(await context()), mediaLoadTimeoutMs: options.mediaLoadTimeoutMs });
      if (sanitized) url = sanitized;
      allowList.add(url);
    }

    if (pageSettings.paperFormat === 'FitPageToContent') {
      if (!contentFitter) {
        throw new ConfigurationError(ErrorCode.INVALID_ARGUMENT, "paperFormat 'FitPageToContent' needs a contentFitter");
      }
      const fitted = await contentFitter.fit(url, await context());
      if (fitted) {
        url = fitted;
        allowList.add(url);
      }
    }

    if (imageTransform && (imageTransform.resize || imageTransform.rotate)) {
      const transformed = await imageTransform.transformer.transform(url, {
        resize: imageTransform.resize ?? false,
        rotate: imageTransform.rotate ?? false,
        pageSettings,
        blacklist: this.blacklist,
        loadTimeoutMs: imageTransform.loadTimeoutMs,
      }, await context());
      if (transformed) {
        url = transformed;
        allowList.add(url);
      }
    }
    return url;
  }

  private async writeOutput(output: OutputTarget, data: Buffer, snapshot: Buffer | undefined, logger: winston.Logger): Promise<void> {
    if (typeof output !== 'string') {
      await writeToStream(output, data);
      return;
    }
    await fs.promises.writeFile(output, data);
    logger.info(`Wrote ${data.length} bytes to '${output}'`);
    if (snapshot) {
      const file = snapshotPath(output);
      await fs.promises.writeFile(file, snapshot);
      logger.info(`Wrote the snapshot to '${file}'`);
    }
  }

  private async cleanup(tempDirectory: string | undefined, logger: winston.Logger): Promise<void> {
    if (tempDirectory === undefined) return;
    if (this.options.keepTempDirectory) {
      logger.info(`Keeping temp directory '${tempDirectory}'`);
      return;
    }
    try {
      await fs.promises.rm(tempDirectory, { recursive: true, force: true });
    } catch (err) {
      logger.warn(`Could not delete temp directory '${tempDirectory}': ${describeError(err)}`);
    }
  }
}
