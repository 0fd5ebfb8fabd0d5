import fs from 'node:fs';
import path from 'node:path';
import type winston from 'winston';
import { BrowserClient } from './browser.js';
import { ChromeArguments } from './chrome-arguments.js';
import {
  hasExited,
  killProcessTree,
  resolveBrowserExecutable,
  spawnChrome,
  waitForActivePortFile,
  waitForStderrEndpoint,
} from './chrome-launcher.js';
import type { CountdownTimer } from './countdown-timer.js';
import { ConversionTimeoutError, ErrorCode, ProcessError, describeError } from './errors.js';
import type { ControlEndpoint, DiscoveryMode, RunAsUser, RunningChrome } from './types.js';

/** How long a named profile gets to write `DevToolsActivePort` when no conversion timeout applies. */
export const ACTIVE_PORT_TIMEOUT_MS = 10_000;
const CONNECT_TIMEOUT_MS = 10_000;
export const ACTIVE_PORT_FILE = 'DevToolsActivePort';

export interface SupervisorOptions {
  logger: winston.Logger;
  /** Path to a specific browser executable. Auto-detected if omitted. */
  executablePath?: string;
  /** Existing directory for a persistent profile; switches discovery to the `DevToolsActivePort` file */
  userProfile?: string;
  runAs?: RunAsUser;
  /** Log every CDP frame at `debug`. Default: `false` */
  logTraffic?: boolean;
  /** Bound on the `DevToolsActivePort` wait when no countdown is given. Default: `10000` */
  activePortTimeoutMs?: number;
  env?: NodeJS.ProcessEnv;
}

// ── Exit Hook ──

const liveSupervisors = new Set<ChromeSupervisor>();
let exitHookInstalled = false;

function installExitHook(): void {
  if (exitHookInstalled) return;
  exitHookInstalled = true;
  process.once('exit', () => {
    for (const supervisor of liveSupervisors) supervisor.disposeSync();
  });
}

/**
 * Owns one headless Chrome process and the DevTools client attached to it.
 *
 * The process is started lazily by `ensureRunning()` and restarted there if it
 * died in between. Chrome processes left running when Node exits are killed
 * from an `exit` hook.
 */
export class ChromeSupervisor {
  /** The command line of the next start. Frozen while Chrome runs. */
  readonly arguments: ChromeArguments;
  private readonly opts: SupervisorOptions;
  private readonly logger: winston.Logger;
  private chrome: RunningChrome | null = null;
  private browserClient: BrowserClient | null = null;
  private starting: Promise<BrowserClient> | null = null;

  constructor(opts: SupervisorOptions) {
    this.opts = opts;
    this.logger = opts.logger;
    this.arguments = new ChromeArguments({ isRunning: () => this.isRunning, logger: opts.logger });
    if (opts.userProfile !== undefined) this.arguments.setUserDataDir(opts.userProfile);
  }

  get isRunning(): boolean {
    return this.chrome !== null && !hasExited(this.chrome.proc);
  }

  get endpoint(): ControlEndpoint | undefined {
    return this.chrome?.endpoint;
  }

  get client(): BrowserClient | undefined {
    return this.browserClient ?? undefined;
  }

  get pid(): number | undefined {
    return this.chrome?.pid;
  }

  /**
   * Starts Chrome and connects to it unless that already happened. Endpoint
   * discovery is bounded by `countdown` when given.
   */
  async ensureRunning(countdown?: CountdownTimer): Promise<BrowserClient> {
    if (this.isRunning && this.browserClient && !this.browserClient.closed) return this.browserClient;
    if (this.starting) return this.starting;
    this.starting = this.restart(countdown);
    try {
      return await this.starting;
    } finally {
      this.starting = null;
    }
  }

  private async restart(countdown?: CountdownTimer): Promise<BrowserClient> {
    if (this.chrome) {
      this.logger.warn('Chrome is not responding anymore, starting a new instance');
      await this.dispose();
    }
    const chrome = await this.start(countdown);
    this.chrome = chrome;
    liveSupervisors.add(this);
    try {
      this.browserClient = await BrowserClient.connect(chrome.endpoint, {
        logger: this.logger,
        logTraffic: this.opts.logTraffic,
        connectTimeoutMs: CONNECT_TIMEOUT_MS,
        countdown,
      });
    } catch (err) {
      this.disposeSync();
      throw err;
    }
    return this.browserClient;
  }

  private async start(countdown?: CountdownTimer): Promise<RunningChrome> {
    if (countdown?.expired) {
      throw new ConversionTimeoutError(`The conversion timed out after ${countdown.budgetMs} ms before Chrome was started`, {
        budgetMs: countdown.budgetMs,
      });
    }
    const exe = resolveBrowserExecutable({ executablePath: this.opts.executablePath, env: this.opts.env });
    const userDataDir = this.arguments.get('--user-data-dir');
    const argv = this.arguments.toArgv();
    const display = this.arguments.toString();

    let marker: string | undefined;
    if (userDataDir !== undefined) {
      marker = path.join(userDataDir, ACTIVE_PORT_FILE);
      await fs.promises.rm(marker, { force: true });
    }

    this.logger.info(`Starting Chrome '${exe.path}' with arguments: ${display}`);
    const startedAt = Date.now();
    const proc = spawnChrome(exe, argv, { runAs: this.opts.runAs, logger: this.logger });
    proc.once('exit', (code, signal) => {
      this.logger.info(`Chrome pid ${proc.pid ?? '?'} exited with ${code !== null ? `code ${code}` : `signal ${signal ?? 'unknown'}`}`);
    });

    let discovery: DiscoveryMode;
    let endpoint: ControlEndpoint;
    try {
      if (marker !== undefined) {
        discovery = 'active-port-file';
        const timeoutMs = countdown ? countdown.remaining : this.opts.activePortTimeoutMs ?? ACTIVE_PORT_TIMEOUT_MS;
        endpoint = await waitForActivePortFile(marker, proc, { timeoutMs, logger: this.logger, display });
      } else {
        discovery = 'stderr';
        const timeoutMs = countdown ? countdown.remaining : Infinity;
        endpoint = await waitForStderrEndpoint(proc, { timeoutMs, logger: this.logger, display });
      }
    } catch (err) {
      killProcessTree(proc, this.logger);
      // with a countdown, the countdown is what bounded the discovery wait
      if (countdown && err instanceof ProcessError && err.code === ErrorCode.START_TIMEOUT) {
        throw new ConversionTimeoutError(
          `The conversion timed out after ${countdown.budgetMs} ms while starting Chrome: ${err.message}`,
          { ...err.context, budgetMs: countdown.budgetMs },
          { cause: err },
        );
      }
      throw err;
    }

    const pid = proc.pid ?? -1;
    this.logger.info(`Chrome pid ${pid} is listening on ${endpoint.url}`);
    return { pid, exe, args: argv, discovery, endpoint, startedAt, proc };
  }

  /** Closes the client and kills the process tree. Safe to call any number of times. */
  async dispose(): Promise<void> {
    const client = this.browserClient;
    this.browserClient = null;
    if (client) {
      try {
        await client.close();
      } catch (err) {
        this.logger.warn(`Could not close the DevTools connection: ${describeError(err)}`);
      }
    }
    this.disposeSync();
  }

  /** Kills the process tree without waiting for the browser to close. */
  disposeSync(): void {
    const chrome = this.chrome;
    this.chrome = null;
    liveSupervisors.delete(this);
    if (this.browserClient) {
      const client = this.browserClient;
      this.browserClient = null;
      client.close().catch((err: unknown) => this.logger.debug(`Closing the DevTools connection failed: ${describeError(err)}`));
    }
    if (!chrome) return;
    this.logger.info(`Stopping Chrome pid ${chrome.pid}`);
    killProcessTree(chrome.proc, this.logger);
  }
}

installExitHook();
