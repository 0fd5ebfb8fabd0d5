import os from 'node:os';
import path from 'node:path';
import fs from 'node:fs';
import readline from 'node:readline';
import { execFileSync, spawn, type ChildProcess, type SpawnOptions } from 'node:child_process';
import type winston from 'winston';
import { ConfigurationError, ErrorCode, ProcessError, ProtocolParseError, describeError } from './errors.js';
import type { ChromeExecutable, ControlEndpoint, RunAsUser } from './types.js';

// ── Executable Detection ──

function fileExists(filePath: string): boolean {
  return fs.existsSync(filePath);
}

function findFirstExe(candidates: ChromeExecutable[]): ChromeExecutable | null {
  for (const c of candidates) if (fileExists(c.path)) return c;
  return null;
}

function findChromeMac(): ChromeExecutable | null {
  return findFirstExe([
    { kind: 'chrome', path: '/Applications/Google Chrome.app/Contents/MacOS/Google Chrome' },
    { kind: 'chrome', path: path.join(os.homedir(), 'Applications/Google Chrome.app/Contents/MacOS/Google Chrome') },
    { kind: 'chromium', path: '/Applications/Chromium.app/Contents/MacOS/Chromium' },
    { kind: 'chromium', path: path.join(os.homedir(), 'Applications/Chromium.app/Contents/MacOS/Chromium') },
    { kind: 'edge', path: '/Applications/Microsoft Edge.app/Contents/MacOS/Microsoft Edge' },
    { kind: 'brave', path: '/Applications/Brave Browser.app/Contents/MacOS/Brave Browser' },
  ]);
}

function findChromeLinux(): ChromeExecutable | null {
  return findFirstExe([
    { kind: 'chrome', path: '/usr/bin/google-chrome' },
    { kind: 'chrome', path: '/usr/bin/google-chrome-stable' },
    { kind: 'chrome', path: '/usr/bin/chrome' },
    { kind: 'chromium', path: '/usr/bin/chromium' },
    { kind: 'chromium', path: '/usr/bin/chromium-browser' },
    { kind: 'chromium', path: '/snap/bin/chromium' },
    { kind: 'edge', path: '/usr/bin/microsoft-edge' },
    { kind: 'edge', path: '/usr/bin/microsoft-edge-stable' },
    { kind: 'brave', path: '/usr/bin/brave-browser' },
    { kind: 'brave', path: '/usr/bin/brave' },
  ]);
}

function findChromeWindows(env: NodeJS.ProcessEnv): ChromeExecutable | null {
  const localAppData = env.LOCALAPPDATA ?? '';
  const programFiles = env.ProgramFiles ?? 'C:\\Program Files';
  const programFilesX86 = env['ProgramFiles(x86)'] ?? 'C:\\Program Files (x86)';
  const j = path.win32.join;
  const candidates: ChromeExecutable[] = [];
  if (localAppData) {
    candidates.push({ kind: 'chrome', path: j(localAppData, 'Google', 'Chrome', 'Application', 'chrome.exe') });
    candidates.push({ kind: 'chromium', path: j(localAppData, 'Chromium', 'Application', 'chrome.exe') });
  }
  candidates.push({ kind: 'chrome', path: j(programFiles, 'Google', 'Chrome', 'Application', 'chrome.exe') });
  candidates.push({ kind: 'chrome', path: j(programFilesX86, 'Google', 'Chrome', 'Application', 'chrome.exe') });
  candidates.push({ kind: 'edge', path: j(programFiles, 'Microsoft', 'Edge', 'Application', 'msedge.exe') });
  candidates.push({ kind: 'edge', path: j(programFilesX86, 'Microsoft', 'Edge', 'Application', 'msedge.exe') });
  candidates.push({ kind: 'brave', path: j(programFiles, 'BraveSoftware', 'Brave-Browser', 'Application', 'brave.exe') });
  return findFirstExe(candidates);
}

// ── Resolve Executable ──

/**
 * Finds the browser to launch: `executablePath`, then `PAGEPRESS_CHROME_PATH`,
 * then the usual install locations of Chrome, Chromium, Edge and Brave.
 */
export function resolveBrowserExecutable(opts: { executablePath?: string; env?: NodeJS.ProcessEnv } = {}): ChromeExecutable {
  const env = opts.env ?? process.env;
  const explicit = opts.executablePath ?? env.PAGEPRESS_CHROME_PATH?.trim();
  if (explicit) {
    if (!fileExists(explicit)) {
      throw new ConfigurationError(ErrorCode.EXECUTABLE_NOT_FOUND, `Chrome executable not found: ${explicit}`, { path: explicit });
    }
    return { kind: 'custom', path: explicit };
  }
  let found: ChromeExecutable | null = null;
  if (process.platform === 'darwin') found = findChromeMac();
  else if (process.platform === 'linux') found = findChromeLinux();
  else if (process.platform === 'win32') found = findChromeWindows(env);
  if (!found) {
    throw new ConfigurationError(
      ErrorCode.EXECUTABLE_NOT_FOUND,
      'No supported browser found (Chrome/Chromium/Edge/Brave). Install one or set executablePath or PAGEPRESS_CHROME_PATH.',
    );
  }
  return found;
}

// ── Spawn ──

/**
 * Starts the browser. On POSIX the child is detached so it leads its own
 * process group, which `killProcessTree` takes down as a whole.
 */
export function spawnChrome(
  exe: ChromeExecutable,
  argv: string[],
  opts: { runAs?: RunAsUser; logger?: winston.Logger } = {},
): ChildProcess {
  const options: SpawnOptions = {
    stdio: ['ignore', 'ignore', 'pipe'],
    env: { ...process.env, HOME: os.homedir() },
    detached: process.platform !== 'win32',
    windowsHide: true,
  };
  if (opts.runAs) {
    if (process.platform === 'win32') {
      opts.logger?.warn('Running Chrome as another user is not supported on Windows, starting it as the current user');
    } else {
      options.uid = opts.runAs.uid;
      if (opts.runAs.gid !== undefined) options.gid = opts.runAs.gid;
    }
  }
  return spawn(exe.path, argv, options);
}

export function hasExited(proc: ChildProcess): boolean {
  return proc.exitCode !== null || proc.signalCode !== null;
}

function exitedError(proc: ChildProcess, display: string): ProcessError {
  const how = proc.exitCode !== null ? `exit code ${proc.exitCode}` : `signal ${proc.signalCode ?? 'unknown'}`;
  return new ProcessError(ErrorCode.EXITED, `Chrome exited unexpectedly with ${how}, arguments used: ${display}`, {
    exitCode: proc.exitCode,
    signal: proc.signalCode,
  });
}

function startFailed(err: Error): ProcessError {
  return new ProcessError(ErrorCode.START_FAILED, `Could not start Chrome: ${err.message}`, undefined, { cause: err });
}

// ── Endpoint Discovery ──

export function parseDevToolsUrl(url: string): ControlEndpoint {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (err) {
    throw new ProtocolParseError(`Not a DevTools URL: '${url}'`, { url }, { cause: err });
  }
  const port = Number(parsed.port);
  if (parsed.protocol !== 'ws:' || !Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ProtocolParseError(`Not a DevTools URL: '${url}'`, { url });
  }
  const host = parsed.hostname;
  return { host, port, path: parsed.pathname, url: `ws://${parsed.host}${parsed.pathname}` };
}

/** Parses the two-line `DevToolsActivePort` file. A half-written file is a `ProtocolParseError`. */
export function parseActivePortFile(text: string): ControlEndpoint {
  const [portLine = '', pathLine = ''] = text.split(/\r?\n/).map(l => l.trim());
  const port = Number(portLine);
  if (!/^\d+$/.test(portLine) || port < 1 || port > 65535) {
    throw new ProtocolParseError(`Invalid port '${portLine}' in DevToolsActivePort`);
  }
  if (!pathLine.startsWith('/')) {
    throw new ProtocolParseError(`Invalid path '${pathLine}' in DevToolsActivePort`);
  }
  return { host: '127.0.0.1', port, path: pathLine, url: `ws://127.0.0.1:${port}${pathLine}` };
}

/**
 * Reads stderr line by line until Chrome prints `DevTools listening on ws://…`.
 * `timeoutMs` of `Infinity` waits for as long as the process lives.
 */
export function waitForStderrEndpoint(
  proc: ChildProcess,
  opts: { timeoutMs: number; logger: winston.Logger; display: string },
): Promise<ControlEndpoint> {
  return new Promise<ControlEndpoint>((resolve, reject) => {
    const stderr = proc.stderr;
    if (!stderr) {
      reject(new ProcessError(ErrorCode.START_FAILED, 'Chrome was started without a stderr pipe'));
      return;
    }
    const rl = readline.createInterface({ input: stderr, crlfDelay: Infinity });
    let timer: NodeJS.Timeout | undefined;

    const finish = (settle: () => void) => {
      if (timer) clearTimeout(timer);
      rl.off('line', onLine);
      proc.off('exit', onExit);
      proc.off('error', onError);
      rl.close();
      // keep draining so Chrome never blocks on a full pipe
      stderr.resume();
      settle();
    };
    const onLine = (line: string) => {
      const text = line.trim();
      if (!text || text.startsWith('[')) return;
      opts.logger.info(`Chrome: ${text}`);
      const url = /^DevTools listening on (ws:\/\/\S+)/.exec(text)?.[1];
      if (!url) return;
      try {
        const endpoint = parseDevToolsUrl(url);
        finish(() => resolve(endpoint));
      } catch (err) {
        finish(() => reject(err));
      }
    };
    const onExit = () => finish(() => reject(exitedError(proc, opts.display)));
    const onError = (err: Error) => finish(() => reject(startFailed(err)));

    rl.on('line', onLine);
    proc.once('exit', onExit);
    proc.once('error', onError);
    if (Number.isFinite(opts.timeoutMs)) {
      timer = setTimeout(() => finish(() => reject(new ProcessError(
        ErrorCode.START_TIMEOUT,
        `A timeout of '${opts.timeoutMs}' milliseconds exceeded, Chrome did not report its DevTools endpoint`,
        { timeoutMs: opts.timeoutMs },
      ))), opts.timeoutMs);
    }
    if (hasExited(proc)) onExit();
  });
}

export const ACTIVE_PORT_POLL_MS = 5;

/**
 * Polls the `DevToolsActivePort` marker Chrome writes into a named profile.
 * The file may be caught half-written, in which case polling goes on.
 */
export async function waitForActivePortFile(
  file: string,
  proc: ChildProcess,
  opts: { timeoutMs: number; logger: winston.Logger; display: string },
): Promise<ControlEndpoint> {
  const deadline = Date.now() + opts.timeoutMs;
  let spawnError: Error | undefined;
  const onError = (err: Error) => { spawnError = err; };
  proc.once('error', onError);
  let seen = false;
  try {
    for (;;) {
      if (spawnError) throw startFailed(spawnError);
      if (hasExited(proc)) throw exitedError(proc, opts.display);

      let text: string | undefined;
      try {
        text = await fs.promises.readFile(file, 'utf8');
        seen = true;
      } catch (err) {
        if (!isErrno(err, 'ENOENT')) opts.logger.debug(`Could not read '${file}': ${describeError(err)}`);
      }
      if (text !== undefined) {
        try {
          return parseActivePortFile(text);
        } catch (err) {
          if (!(err instanceof ProtocolParseError)) throw err;
          opts.logger.debug(`'${file}' is not complete yet: ${err.message}`);
        }
      }

      if (Date.now() >= deadline) {
        throw new ProcessError(
          ErrorCode.START_TIMEOUT,
          `A timeout of '${opts.timeoutMs}' milliseconds exceeded, the file '${file}' ${seen ? 'could not be read' : 'did not exist'}`,
          { file, timeoutMs: opts.timeoutMs },
        );
      }
      await new Promise(r => setTimeout(r, ACTIVE_PORT_POLL_MS));
    }
  } finally {
    proc.off('error', onError);
  }
}

// ── Stop Chrome ──

export function isErrno(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}

/**
 * Kills Chrome and every child it started. Synchronous so it can run from a
 * process `exit` hook. A process that is already gone is not an error.
 */
export function killProcessTree(proc: ChildProcess, logger?: winston.Logger): void {
  const pid = proc.pid;
  if (pid === undefined || hasExited(proc)) return;

  if (process.platform === 'win32') {
    try {
      execFileSync('taskkill', ['/pid', String(pid), '/T', '/F'], { stdio: 'ignore', windowsHide: true });
    } catch (err) {
      logger?.warn(`taskkill failed for Chrome pid ${pid}: ${describeError(err)}`);
    }
    return;
  }

  try {
    process.kill(-pid, 'SIGKILL');
    return;
  } catch (err) {
    if (!isErrno(err, 'ESRCH')) logger?.warn(`Could not kill Chrome process group ${pid}: ${describeError(err)}`);
  }
  try {
    proc.kill('SIGKILL');
  } catch (err) {
    if (!isErrno(err, 'ESRCH')) logger?.warn(`Could not kill Chrome pid ${pid}: ${describeError(err)}`);
  }
}
