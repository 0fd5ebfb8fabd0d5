#!/usr/bin/env node

import fs from 'node:fs';
import { Command } from 'commander';
import { loadEnvConfig, parsePositiveInt, type EnvConfig } from './config.js';
import { Converter } from './converter.js';
import { ConfigurationError, ErrorCode, RenderError } from './errors.js';
import { createLogger, isLogLevel } from './logger.js';
import { isPaperFormat, type PageSettings } from './page-settings.js';
import type { ConvertInput, ConvertOptions, ConverterOptions } from './types.js';

export type RenderKind = 'pdf' | 'image';

export interface CliOptions {
  output: string;
  html?: string;
  timeout?: number;
  mediaTimeout?: number;
  windowStatus?: string;
  windowStatusTimeout?: number;
  landscape?: boolean;
  paper?: string;
  background?: boolean;
  grayscale?: boolean;
  blacklist?: string[];
  chrome?: string;
  userAgent?: string;
  proxy?: string;
  sandbox: boolean;
  snapshot?: boolean;
  logLevel?: string;
  logTraffic?: boolean;
  format?: string;
  quality?: number;
  fullPage?: boolean;
}

export interface ConversionRequest {
  converter: ConverterOptions;
  input: ConvertInput;
  convert: ConvertOptions;
}

export type ConversionRunner = (kind: RenderKind, input: string | undefined, opts: CliOptions) => Promise<void>;

const positiveInt = (name: string) => (value: string) => parsePositiveInt(value, name);

function quality(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || parsed > 100) {
    throw new ConfigurationError(ErrorCode.INVALID_ARGUMENT, `--quality has to be an integer from 0 to 100, got '${value}'`);
  }
  return parsed;
}

/** Maps parsed command line options and the environment onto converter options. */
export async function buildRequest(
  kind: RenderKind,
  input: string | undefined,
  opts: CliOptions,
  env: EnvConfig,
): Promise<ConversionRequest> {
  if (opts.html === undefined && !input) {
    throw new ConfigurationError(ErrorCode.INVALID_ARGUMENT, 'Give an input url or file, or --html <file>');
  }
  if (opts.html !== undefined && input) {
    throw new ConfigurationError(ErrorCode.INVALID_ARGUMENT, `Give either the input '${input}' or --html <file>, not both`);
  }
  if (opts.paper !== undefined && !isPaperFormat(opts.paper)) {
    throw new ConfigurationError(ErrorCode.INVALID_ARGUMENT, `Unknown paper format '${opts.paper}'`);
  }
  if (kind === 'image' && opts.format !== undefined && opts.format !== 'png' && opts.format !== 'jpeg') {
    throw new ConfigurationError(ErrorCode.INVALID_ARGUMENT, `--format has to be png or jpeg, got '${opts.format}'`);
  }

  const converter: ConverterOptions = {
    executablePath: opts.chrome ?? env.chromePath,
    tempDirectory: env.tempDirectory,
    logNetworkTraffic: opts.logTraffic ?? false,
  };
  if (opts.blacklist?.length) converter.urlBlacklist = opts.blacklist;
  if (opts.userAgent !== undefined) converter.userAgent = opts.userAgent;
  if (opts.proxy !== undefined) converter.proxyServer = opts.proxy;
  if (!opts.sandbox || env.noSandbox) converter.chromeArgs = ['--no-sandbox'];

  const pageSettings: PageSettings = {};
  if (opts.landscape) pageSettings.landscape = true;
  if (opts.background) pageSettings.printBackground = true;
  if (opts.grayscale) pageSettings.colorMode = 'grayscale';
  if (opts.paper !== undefined && isPaperFormat(opts.paper)) pageSettings.paperFormat = opts.paper;

  const convert: ConvertOptions = {
    pageSettings,
    conversionTimeoutMs: opts.timeout ?? env.conversionTimeoutMs,
    mediaLoadTimeoutMs: opts.mediaTimeout,
    waitForWindowStatus: opts.windowStatus,
    waitForWindowStatusTimeoutMs: opts.windowStatusTimeout,
    captureSnapshot: opts.snapshot ?? false,
  };
  if (kind === 'image') {
    if (opts.format === 'jpeg' || opts.format === 'png') convert.imageFormat = opts.format;
    convert.imageQuality = opts.quality;
    convert.fullPage = opts.fullPage ?? false;
  }

  const source: ConvertInput = opts.html !== undefined
    ? { html: await fs.promises.readFile(opts.html, 'utf8') }
    : { url: input ?? '' };
  return { converter, input: source, convert };
}

async function runConversion(kind: RenderKind, input: string | undefined, opts: CliOptions): Promise<void> {
  const env = loadEnvConfig();
  const level = opts.logLevel ?? env.logLevel;
  if (!isLogLevel(level)) {
    throw new ConfigurationError(ErrorCode.INVALID_ARGUMENT, `--log-level has to be error, warn, info or debug, got '${level}'`);
  }
  const request = await buildRequest(kind, input, opts, env);
  const converter = new Converter({ ...request.converter, logger: createLogger({ level }) });
  const output = opts.output === '-' ? process.stdout : opts.output;
  try {
    const options = { ...request.convert, output };
    if (kind === 'pdf') await converter.convertToPdf(request.input, options);
    else await converter.convertToImage(request.input, options);
  } finally {
    await converter.dispose();
  }
}

function addCommonOptions(command: Command): Command {
  return command
    .requiredOption('-o, --output <file>', "File to write, or '-' for stdout")
    .option('--html <file>', 'Read the file and convert its contents as inline markup')
    .option('--timeout <ms>', 'Conversion timeout', positiveInt('--timeout'))
    .option('--media-timeout <ms>', 'Stop waiting for media this long after DOMContentLoaded', positiveInt('--media-timeout'))
    .option('--window-status <status>', 'Wait until the page sets window.status to this value')
    .option('--window-status-timeout <ms>', 'How long to wait for --window-status', positiveInt('--window-status-timeout'))
    .option('--paper <format>', 'Paper format, e.g. A4, Letter or FitPageToContent')
    .option('--blacklist <pattern...>', 'Block requests whose url matches (* wildcard)')
    .option('--chrome <path>', 'Chrome executable')
    .option('--user-agent <ua>', 'User agent Chrome sends')
    .option('--proxy <server>', 'Proxy server, e.g. foopy:8080')
    .option('--no-sandbox', 'Start Chrome without its sandbox')
    .option('--snapshot', 'Also write an .mhtml snapshot next to the output')
    .option('--log-level <level>', 'error, warn, info or debug')
    .option('--log-traffic', 'Log every request and response');
}

export function buildProgram(run: ConversionRunner = runConversion): Command {
  const program = new Command();

  program
    .name('pagepress')
    .description('Render a url, a file or inline markup to PDF or an image with headless Chrome')
    .version('0.1.0');

  addCommonOptions(program.command('pdf [input]').description('Convert to PDF'))
    .option('--landscape', 'Landscape orientation')
    .option('--background', 'Print background graphics')
    .option('--grayscale', 'Print in grayscale')
    .action((input: string | undefined, opts: CliOptions) => run('pdf', input, opts));

  addCommonOptions(program.command('image [input]').description('Convert to an image'))
    .option('--format <format>', 'png or jpeg', 'png')
    .option('--quality <n>', 'JPEG quality 0-100', quality)
    .option('--full-page', 'Capture the whole scrollable page')
    .action((input: string | undefined, opts: CliOptions) => run('image', input, opts));

  return program;
}

export function formatCliError(error: unknown): string {
  if (error instanceof RenderError) return `${error.code}: ${error.message}`;
  if (error instanceof Error) return `ERROR: ${error.message}`;
  return `ERROR: ${String(error)}`;
}

export async function runCli(argv: string[] = process.argv): Promise<number> {
  try {
    await buildProgram().parseAsync(argv);
    return 0;
  } catch (error) {
    process.stderr.write(`${formatCliError(error)}\n`);
    return 1;
  }
}

if (process.env.NODE_ENV !== 'test') {
  runCli().then(
    (code) => { process.exitCode = code; },
    (error: unknown) => {
      process.stderr.write(`${formatCliError(error)}\n`);
      process.exitCode = 1;
    },
  );
}
