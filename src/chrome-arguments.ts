import type winston from 'winston';
import { assertDirectoryExists } from './config.js';
import { ConfigurationError, ErrorCode, ProcessError } from './errors.js';
import type { WindowSizePreset } from './types.js';

interface Flag {
  name: string;
  value?: string;
}

const MANDATORY = new Set(['--headless', '--no-first-run', '--remote-debugging-port']);

const DEFAULT_FLAGS: readonly Flag[] = [
  { name: '--headless' },
  { name: '--disable-gpu' },
  { name: '--hide-scrollbars' },
  { name: '--mute-audio' },
  { name: '--disable-background-networking' },
  { name: '--disable-background-timer-throttling' },
  { name: '--disable-default-apps' },
  { name: '--disable-extensions' },
  { name: '--disable-hang-monitor' },
  { name: '--disable-prompt-on-repost' },
  { name: '--disable-sync' },
  { name: '--disable-translate' },
  { name: '--metrics-recording-only' },
  { name: '--no-first-run' },
  { name: '--disable-crash-reporter' },
  { name: '--remote-debugging-port', value: '0' },
];

export const WINDOW_SIZES: Readonly<Record<WindowSizePreset, readonly [number, number]>> = {
  SVGA: [800, 600],
  WSVGA: [1024, 600],
  XGA: [1024, 768],
  XGAPLUS: [1152, 864],
  WXGA_5_3: [1280, 768],
  WXGA_16_10: [1280, 800],
  SXGA: [1280, 1024],
  HD_1360_768: [1360, 768],
  HD_1366_768: [1366, 768],
  OTHER_1536_864: [1536, 864],
  HD_PLUS: [1600, 900],
  WSXGA_PLUS: [1680, 1050],
  FHD: [1920, 1080],
  WUXGA: [1920, 1200],
  OTHER_2560_1070: [2560, 1070],
  WQHD: [2560, 1440],
  OTHER_3440_1440: [3440, 1440],
  '4K_UHD': [3840, 2160],
};

function splitFlag(argument: string): Flag {
  const eq = argument.indexOf('=');
  if (eq === -1) return { name: argument };
  let value = argument.slice(eq + 1);
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) value = value.slice(1, -1);
  return { name: argument.slice(0, eq), value };
}

function sameName(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

/**
 * The ordered command line Chrome is started with.
 *
 * Values are shown quoted (`--user-agent="x y"`) in `toString()` and logs, and
 * passed unquoted in `toArgv()`, since `spawn` hands each entry over as is.
 */
export class ChromeArguments {
  private flags: Flag[] = [];
  private readonly isRunning: () => boolean;
  private readonly logger?: winston.Logger;

  constructor(opts: { isRunning?: () => boolean; logger?: winston.Logger } = {}) {
    this.isRunning = opts.isRunning ?? (() => false);
    this.logger = opts.logger;
    this.reset();
  }

  /** Restores the default flags and a 1366x768 window. */
  reset(): void {
    this.assertNotRunning('reset');
    this.flags = DEFAULT_FLAGS.map(flag => ({ ...flag }));
    this.setWindowSize('HD_1366_768');
  }

  /**
   * Adds a flag. `add('--foo=bar')` and `add('--foo', 'bar')` are the same.
   * A valued flag that is already present gets its value replaced in place.
   */
  add(argument: string, value?: string): void {
    this.assertNotRunning(argument);
    if (!argument.trim()) throw new ConfigurationError(ErrorCode.INVALID_ARGUMENT, 'Chrome argument is empty');
    const flag: Flag = value === undefined ? splitFlag(argument.trim()) : { name: argument.trim(), value };

    const existing = this.flags.find(f => sameName(f.name, flag.name));
    if (existing) {
      if (flag.value === undefined && existing.value === undefined) return;
      existing.value = flag.value;
      this.logger?.debug(`Replaced Chrome argument '${formatFlag(existing, true)}'`);
      return;
    }
    this.flags.push(flag);
    this.logger?.debug(`Added Chrome argument '${formatFlag(flag, true)}'`);
  }

  /** Removes a flag by name. The mandatory flags can not be removed. */
  remove(argument: string): void {
    this.assertNotRunning(argument);
    const { name } = splitFlag(argument.trim());
    if ([...MANDATORY].some(m => sameName(m, name))) {
      throw new ConfigurationError(ErrorCode.INVALID_ARGUMENT, `Can't remove '${name}', Chrome can not be driven without it`);
    }
    const before = this.flags.length;
    this.flags = this.flags.filter(f => !sameName(f.name, name));
    if (this.flags.length !== before) this.logger?.debug(`Removed Chrome argument '${name}'`);
  }

  has(name: string): boolean {
    return this.flags.some(f => sameName(f.name, name));
  }

  get(name: string): string | undefined {
    return this.flags.find(f => sameName(f.name, name))?.value;
  }

  setWindowSize(preset: WindowSizePreset): void;
  setWindowSize(width: number, height: number): void;
  setWindowSize(presetOrWidth: WindowSizePreset | number, height?: number): void {
    let size: readonly [number, number];
    if (typeof presetOrWidth === 'number') {
      if (!Number.isInteger(presetOrWidth) || presetOrWidth <= 0 || height === undefined || !Number.isInteger(height) || height <= 0) {
        throw new ConfigurationError(ErrorCode.INVALID_SIZE, `Window size ${presetOrWidth}x${height ?? '?'} is not valid`);
      }
      size = [presetOrWidth, height];
    } else {
      size = WINDOW_SIZES[presetOrWidth];
    }
    this.add('--window-size', `${size[0]},${size[1]}`);
  }

  /** e.g. `'http=foopy:80;ftp=foopy2'`, `'foopy:8080'` or `'direct://'` */
  setProxyServer(value: string): void {
    this.add('--proxy-server', value);
  }

  /** Semicolon-separated hosts that skip the proxy, e.g. `'*.example.com;127.0.0.1:8080'` */
  setProxyBypassList(value: string): void {
    this.add('--proxy-bypass-list', value);
  }

  setProxyPacUrl(value: string): void {
    this.add('--proxy-pac-url', value);
  }

  setUserAgent(value: string): void {
    this.add('--user-agent', value);
  }

  /**
   * Caches to `directory` instead of the profile. A running Chrome locks its
   * cache directory, so concurrent browsers each need their own.
   */
  setDiskCache(directory: string, sizeMb?: number): void {
    assertDirectoryExists(directory, 'disk cache directory');
    if (sizeMb !== undefined && (!Number.isInteger(sizeMb) || sizeMb < 1)) {
      throw new ConfigurationError(ErrorCode.INVALID_SIZE, `Disk cache size has to be 1 megabyte or more, got ${sizeMb}`);
    }
    this.add('--disk-cache-dir', directory.replace(/[\\/]+$/, ''));
    if (sizeMb !== undefined) this.add('--disk-cache-size', String(sizeMb * 1024 * 1024));
  }

  setUserDataDir(directory: string): void {
    assertDirectoryExists(directory, 'user profile directory');
    this.add('--user-data-dir', directory);
  }

  /** The flags as handed to `spawn`. */
  toArgv(): string[] {
    return this.flags.map(f => formatFlag(f, false));
  }

  /** The flags as shown in logs. */
  toList(): string[] {
    return this.flags.map(f => formatFlag(f, true));
  }

  toString(): string {
    return this.toList().join(' ');
  }

  private assertNotRunning(argument: string): void {
    if (this.isRunning()) {
      throw new ProcessError(ErrorCode.ALREADY_RUNNING, `Chrome is already running, set '${argument}' before the first conversion`);
    }
  }
}

function formatFlag(flag: Flag, quoted: boolean): string {
  if (flag.value === undefined) return flag.name;
  return quoted ? `${flag.name}="${flag.value}"` : `${flag.name}=${flag.value}`;
}
