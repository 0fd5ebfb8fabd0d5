import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { PassThrough } from 'node:stream';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { BrowserClient } from './browser.js';
import { ChromeArguments } from './chrome-arguments.js';
import { parseDevToolsUrl } from './chrome-launcher.js';
import { type BrowserHost, Converter } from './converter.js';
import {
  ConfigurationError,
  ConversionError,
  ConversionTimeoutError,
  ErrorCode,
  NavigationError,
  ProcessError,
} from './errors.js';
import { createLogger } from './logger.js';
import { GRAYSCALE_SCRIPT } from './page-settings.js';
import { FAKE_FRAME_ID, FakeChrome } from './testing/fake-chrome.js';
import type { ConverterOptions, Sanitizer } from './types.js';

const logger = createLogger({ silent: true });

/** Connects to the fake endpoint instead of starting Chrome. */
class FakeHost implements BrowserHost {
  readonly arguments = new ChromeArguments();
  startDelayMs = 0;
  starts = 0;
  private readonly fake: FakeChrome;
  private client: BrowserClient | undefined;

  constructor(fake: FakeChrome) {
    this.fake = fake;
  }

  get isRunning(): boolean {
    return this.client !== undefined;
  }

  async ensureRunning(): Promise<BrowserClient> {
    if (this.startDelayMs) await new Promise(r => setTimeout(r, this.startDelayMs));
    if (!this.client) {
      this.starts++;
      this.client = await BrowserClient.connect(parseDevToolsUrl(this.fake.browserUrl), { logger });
    }
    return this.client;
  }

  async dispose(): Promise<void> {
    await this.client?.close();
    this.client = undefined;
  }
}

function windowStatusAfter(readyAt: number) {
  return (params: Record<string, unknown>) => {
    if (params.expression === 'window.status') {
      return { result: { type: 'string', value: Date.now() >= readyAt ? 'ready' : '' } };
    }
    return { result: { type: 'undefined' } };
  };
}

describe('Converter', () => {
  let fake: FakeChrome;
  let host: FakeHost;
  let converter: Converter;
  let workDir: string;

  const create = (options: ConverterOptions = {}) => {
    converter = new Converter({ logger, instanceId: 'test-instance', ...options }, { host });
    return converter;
  };

  beforeEach(async () => {
    fake = await FakeChrome.start();
    host = new FakeHost(fake);
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pp-converter-'));
    create();
  });

  afterEach(async () => {
    await converter.dispose();
    await fake.close();
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  describe('inline markup', () => {
    it('sets the document without waiting for navigation events', async () => {
      const result = await converter.convertToPdf({ html: '<h1>Invoice</h1>' });

      expect(result.data.toString('utf8')).toBe('%PDF-1.4 fake');
      expect(result.snapshot).toBeUndefined();
      expect(fake.methods({ pageOnly: true })).toEqual([
        'Page.enable',
        'Page.setLifecycleEventsEnabled',
        'Page.getFrameTree',
        'Page.setDocumentContent',
        'Page.printToPDF',
      ]);
      expect(fake.find('Page.setDocumentContent')[0]?.params).toEqual({ frameId: FAKE_FRAME_ID, html: '<h1>Invoice</h1>' });
      expect(fake.failures).toEqual([]);
    });

    it('renders images with the requested format', async () => {
      const result = await converter.convertToImage({ html: '<p>x</p>' }, { imageFormat: 'jpeg', imageQuality: 80 });

      expect(result.data.toString('utf8')).toBe('fake-png');
      expect(fake.find('Page.captureScreenshot')[0]?.params).toEqual({ format: 'jpeg', captureBeyondViewport: false, quality: 80 });
    });

    it('turns the page gray before printing in grayscale', async () => {
      await converter.convertToPdf({ html: '<p>x</p>' }, { pageSettings: { colorMode: 'grayscale' } });

      expect(fake.methods({ pageOnly: true }).slice(-2)).toEqual(['Runtime.evaluate', 'Page.printToPDF']);
      expect(fake.find('Runtime.evaluate')[0]?.params.expression).toBe(GRAYSCALE_SCRIPT);
    });
  });

  describe('navigation', () => {
    it('blocks blacklisted requests but never the allow-listed document', async () => {
      let sanitizerTemp = '';
      const sanitizer: Sanitizer = {
        sanitize: async (_url, ctx) => {
          sanitizerTemp = ctx.tempDirectory;
          return undefined;
        },
      };
      create({ urlBlacklist: ['https://ads.example.com/*', 'https://www.example.com/*'], sanitizer });
      fake.handle('Page.navigate', (params, _command, chrome) => {
        chrome.emit('Fetch.requestPaused', { requestId: 'r-doc', request: { url: String(params.url) } });
        chrome.emit('Fetch.requestPaused', { requestId: 'r-ad', request: { url: 'https://ads.example.com/banner.js' } });
        setTimeout(() => {
          chrome.emit('Page.lifecycleEvent', { frameId: FAKE_FRAME_ID, name: 'DOMContentLoaded' });
          chrome.emit('Page.loadEventFired', { timestamp: 1 });
        }, 5);
        return { frameId: FAKE_FRAME_ID, loaderId: 'loader-1' };
      });

      const result = await converter.convertToPdf({ url: 'https://www.example.com/report.html' });

      expect(result.data.toString('utf8')).toBe('%PDF-1.4 fake');
      expect(fake.find('Page.navigate')[0]?.params).toEqual({ url: 'https://www.example.com/report.html' });
      expect(fake.find('Fetch.enable')[0]?.params).toEqual({ patterns: [{ urlPattern: '*' }] });
      expect(fake.find('Fetch.failRequest').map(c => c.params)).toEqual([{ requestId: 'r-ad', errorReason: 'BlockedByClient' }]);
      expect(fake.find('Fetch.continueRequest').map(c => c.params)).toEqual([{ requestId: 'r-doc' }]);
      expect(fake.find('Fetch.disable')).toHaveLength(1);
      expect(fake.find('Network.setCacheDisabled')[0]?.params).toEqual({ cacheDisabled: false });
      expect(sanitizerTemp).not.toBe('');
      expect(fs.existsSync(sanitizerTemp)).toBe(false);
    });

    it('fails with the navigation error text', async () => {
      fake.handle('Page.navigate', () => ({ frameId: FAKE_FRAME_ID, errorText: 'net::ERR_NAME_NOT_RESOLVED' }));

      const error = await converter.convertToPdf({ url: 'https://missing.example.com/' }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NavigationError);
      expect(error).toMatchObject({
        phase: 'navigate',
        message: "Navigation to 'https://missing.example.com/' failed: net::ERR_NAME_NOT_RESOLVED",
      });
      expect(fake.find('Page.printToPDF')).toHaveLength(0);
    });
  });

  describe('timeouts', () => {
    it('stops before rendering when the conversion timeout runs out', async () => {
      host.startDelayMs = 20;

      const error = await converter.convertToPdf({ html: '<p>x</p>' }, { conversionTimeoutMs: 1 }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConversionTimeoutError);
      expect(error).toMatchObject({ code: ErrorCode.CONVERSION_TIMEOUT, phase: 'navigate' });
      expect(fake.find('Page.getFrameTree')).toHaveLength(0);
      expect(fake.find('Page.printToPDF')).toHaveLength(0);
    });

    it('rejects a conversion timeout below 1 ms', async () => {
      await expect(converter.convertToPdf({ html: '<p>x</p>' }, { conversionTimeoutMs: 0 }))
        .rejects.toMatchObject({ code: ErrorCode.INVALID_ARGUMENT, phase: 'init' });
      expect(host.starts).toBe(0);
    });

    it('does not count the window status wait against the conversion timeout', async () => {
      fake.handle('Runtime.evaluate', windowStatusAfter(Date.now() + 400));

      const result = await converter.convertToPdf(
        { html: '<p>x</p>' },
        { conversionTimeoutMs: 250, waitForWindowStatus: 'ready', waitForWindowStatusTimeoutMs: 5_000 },
      );

      expect(result.data.toString('utf8')).toBe('%PDF-1.4 fake');
      expect(fake.find('Runtime.evaluate').length).toBeGreaterThan(1);
    });

    it('renders anyway when the window status never matches', async () => {
      fake.handle('Runtime.evaluate', windowStatusAfter(Infinity));

      const result = await converter.convertToPdf(
        { html: '<p>x</p>' },
        { waitForWindowStatus: 'ready', waitForWindowStatusTimeoutMs: 50 },
      );

      expect(result.data.toString('utf8')).toBe('%PDF-1.4 fake');
    });
  });

  describe('scripts and snapshots', () => {
    it('stamps a failing script with its phase', async () => {
      fake.handle('Runtime.evaluate', () => ({
        result: { type: 'object' },
        exceptionDetails: { text: 'Uncaught', exception: { description: 'ReferenceError: missing is not defined' } },
      }));

      const error = await converter.convertToPdf({ html: '<p>x</p>' }, { runJavascript: 'missing()' }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConversionError);
      expect(error).toMatchObject({
        code: ErrorCode.SCRIPT_FAILED,
        phase: 'run-script',
        message: 'Script failed: ReferenceError: missing is not defined',
      });
    });

    it('writes the output and an .mhtml snapshot next to it', async () => {
      const output = path.join(workDir, 'report.pdf');

      const result = await converter.convertToPdf({ html: '<p>x</p>' }, { output, captureSnapshot: true });

      expect(fs.readFileSync(output, 'utf8')).toBe('%PDF-1.4 fake');
      expect(fs.readFileSync(path.join(workDir, 'report.mhtml'), 'latin1')).toBe('MIME-Version: 1.0\r\n\r\nfake');
      expect(result.snapshot?.toString('latin1')).toBe('MIME-Version: 1.0\r\n\r\nfake');
      expect(fake.methods({ pageOnly: true }).slice(-2)).toEqual(['Page.captureSnapshot', 'Page.printToPDF']);
    });

    it('writes to a stream without ending it', async () => {
      const stream = new PassThrough();
      const chunks: Buffer[] = [];
      stream.on('data', (chunk: Buffer) => chunks.push(chunk));

      await converter.convertToPdf({ html: '<p>x</p>' }, { output: stream });

      expect(Buffer.concat(chunks).toString('utf8')).toBe('%PDF-1.4 fake');
      expect(stream.writableEnded).toBe(false);
    });

    it('checks the output directory before starting Chrome', async () => {
      const output = path.join(workDir, 'missing', 'report.pdf');

      const error = await converter.convertToPdf({ html: '<p>x</p>' }, { output }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({ code: ErrorCode.DIRECTORY_NOT_FOUND, phase: 'init' });
      expect(host.starts).toBe(0);
    });
  });

  describe('file inputs', () => {
    it('rejects a file that does not exist', async () => {
      const file = path.join(workDir, 'nope.html');

      await expect(converter.convertToPdf({ url: file })).rejects.toMatchObject({
        code: ErrorCode.INPUT_NOT_FOUND,
        message: `The input file '${file}' does not exist`,
      });
    });

    it('rejects an extension that is neither a document nor pre-wrapped', async () => {
      const file = path.join(workDir, 'notes.txt');
      fs.writeFileSync(file, 'hello');

      await expect(converter.convertToPdf({ url: file })).rejects.toMatchObject({ code: ErrorCode.UNSUPPORTED_INPUT });
    });

    it('pre-wraps text files and loads the wrapped copy', async () => {
      const file = path.join(workDir, 'notes.txt');
      fs.writeFileSync(file, 'a < b');
      create({ preWrapExtensions: ['TXT'] });

      await converter.convertToPdf({ url: file });

      const url = fake.find('Page.navigate')[0]?.params.url;
      expect(typeof url).toBe('string');
      expect(String(url)).toMatch(/^file:\/\/.*\/pagepress-[^/]+\/notes\.txt\.html$/);
    });

    it('needs a content fitter for FitPageToContent', async () => {
      const file = path.join(workDir, 'page.html');
      fs.writeFileSync(file, '<p>x</p>');

      await expect(converter.convertToPdf({ url: file }, { pageSettings: { paperFormat: 'FitPageToContent' } }))
        .rejects.toMatchObject({ code: ErrorCode.INVALID_ARGUMENT, phase: 'preprocess' });
    });
  });

  describe('instance state', () => {
    it('runs overlapping conversions one after the other', async () => {
      await Promise.all([
        converter.convertToPdf({ html: '<p>first</p>' }),
        converter.convertToPdf({ html: '<p>second</p>' }),
      ]);

      expect(fake.methods({ pageOnly: true }).slice(2)).toEqual([
        'Page.getFrameTree', 'Page.setDocumentContent', 'Page.printToPDF',
        'Page.getFrameTree', 'Page.setDocumentContent', 'Page.printToPDF',
      ]);
      expect(fake.find('Page.setDocumentContent').map(c => c.params.html)).toEqual(['<p>first</p>', '<p>second</p>']);
      expect(host.starts).toBe(1);
    });

    it('freezes settings after the first conversion', async () => {
      converter.setUrlBlacklist(['https://ads.example.com/*']);
      await converter.convertToPdf({ html: '<p>x</p>' });

      expect(() => converter.setUrlBlacklist([])).toThrow(ProcessError);
      expect(() => converter.setPreWrapExtensions(['.log'])).toThrow(ProcessError);
    });

    it('applies chrome options to the argument list', () => {
      create({ windowSize: { width: 800, height: 600 }, userAgent: 'test-agent', chromeArgs: ['--no-sandbox'] });

      expect(converter.chromeArguments.get('--window-size')).toBe('800,600');
      expect(converter.chromeArguments.get('--user-agent')).toBe('test-agent');
      expect(converter.chromeArguments.has('--no-sandbox')).toBe(true);
    });
  });
});
