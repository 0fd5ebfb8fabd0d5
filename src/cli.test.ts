import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect, vi } from 'vitest';
import { buildProgram, buildRequest, formatCliError, type CliOptions, type ConversionRunner } from './cli.js';
import { ConversionError, ErrorCode } from './errors.js';

const env = { logLevel: 'warn' as const, noSandbox: false };

async function parse(args: string[]) {
  const run = vi.fn<ConversionRunner>(async () => undefined);
  await buildProgram(run).parseAsync(['node', 'pagepress', ...args]);
  return run;
}

describe('pagepress command line', () => {
  it('parses pdf options', async () => {
    const run = await parse([
      'pdf', 'https://www.example.com/', '-o', 'out.pdf',
      '--timeout', '5000', '--paper', 'A4', '--landscape', '--no-sandbox',
      '--blacklist', 'https://ads.example.com/*', '*.woff2',
    ]);

    expect(run).toHaveBeenCalledTimes(1);
    expect(run.mock.calls[0]?.[0]).toBe('pdf');
    expect(run.mock.calls[0]?.[1]).toBe('https://www.example.com/');
    expect(run.mock.calls[0]?.[2]).toMatchObject({
      output: 'out.pdf',
      timeout: 5000,
      paper: 'A4',
      landscape: true,
      sandbox: false,
      blacklist: ['https://ads.example.com/*', '*.woff2'],
    });
  });

  it('defaults images to png', async () => {
    const run = await parse(['image', 'page.html', '-o', 'out.png']);

    expect(run.mock.calls[0]?.[2]).toMatchObject({ output: 'out.png', format: 'png', sandbox: true });
  });

  it('rejects a timeout that is not a positive integer', async () => {
    await expect(parse(['pdf', 'page.html', '-o', 'out.pdf', '--timeout', '0'])).rejects.toMatchObject({
      code: ErrorCode.INVALID_ARGUMENT,
      message: "--timeout has to be a positive integer, got '0'",
    });
  });
});

describe('buildRequest', () => {
  const base: CliOptions = { output: 'out.pdf', sandbox: true };

  it('maps options onto converter and conversion options', async () => {
    const request = await buildRequest('pdf', 'https://www.example.com/', {
      ...base,
      paper: 'Legal',
      grayscale: true,
      background: true,
      userAgent: 'test-agent',
      sandbox: false,
      snapshot: true,
    }, { ...env, conversionTimeoutMs: 9000 });

    expect(request.input).toEqual({ url: 'https://www.example.com/' });
    expect(request.converter).toMatchObject({ userAgent: 'test-agent', chromeArgs: ['--no-sandbox'] });
    expect(request.convert).toMatchObject({
      pageSettings: { paperFormat: 'Legal', colorMode: 'grayscale', printBackground: true },
      conversionTimeoutMs: 9000,
      captureSnapshot: true,
    });
  });

  it('reads --html files as inline markup', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pp-cli-'));
    try {
      const file = path.join(dir, 'body.html');
      fs.writeFileSync(file, '<p>inline</p>');

      const request = await buildRequest('pdf', undefined, { ...base, html: file }, env);

      expect(request.input).toEqual({ html: '<p>inline</p>' });
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('rejects an unknown paper format', async () => {
    await expect(buildRequest('pdf', 'page.html', { ...base, paper: 'B5' }, env)).rejects.toMatchObject({
      code: ErrorCode.INVALID_ARGUMENT,
      message: "Unknown paper format 'B5'",
    });
  });

  it('refuses an input together with --html', async () => {
    await expect(buildRequest('pdf', 'https://www.example.com/', { ...base, html: 'body.html' }, env)).rejects.toMatchObject({
      code: ErrorCode.INVALID_ARGUMENT,
      message: "Give either the input 'https://www.example.com/' or --html <file>, not both",
    });
  });

  it('needs an input', async () => {
    await expect(buildRequest('pdf', undefined, base, env)).rejects.toMatchObject({ code: ErrorCode.INVALID_ARGUMENT });
  });
});

describe('formatCliError', () => {
  it('prefixes the error code', () => {
    expect(formatCliError(new ConversionError(ErrorCode.INPUT_NOT_FOUND, "The input file 'x.html' does not exist")))
      .toBe("INPUT_NOT_FOUND: The input file 'x.html' does not exist");
  });
});
