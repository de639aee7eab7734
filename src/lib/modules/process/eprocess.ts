import { posix, win32 } from "path";
import {
  getErrorMessage,
  getOsErrorCode,
  LaunchError,
  MissingContextError,
  ProcessStateError,
  TimeoutError,
  UnknownContextError,
} from "../../errors.js";
import { expandHome, isExecutableFile, isFile } from "../../fs-util.js";
import { logger } from "../../logger.js";
import { isPathValue, pathValueToString, type HostPath } from "../path-translator/host-path.js";
import {
  isWindowsDrivePath,
  NativePathTranslator,
  type PathTranslator,
} from "../path-translator/translator.js";
import { WineContext } from "../wine-context/context.js";
import { applyOverrides } from "../wine-context/env-builder.js";
import { defaultRegistry, type ContextRegistry } from "../wine-context/registry.js";
import { decodeOutput, splitLines, type DecodedOutput, type Decoder } from "./decode.js";
import { nodeSpawner, type ChildHandle, type Spawner } from "./spawner.js";
import {
  isWindowsProgram,
  NativeStrategy,
  WineStrategy,
  type ExecutionStrategy,
} from "./strategy.js";
import type {
  ArgumentGroup,
  ArgValue,
  EnvPatch,
  EProcessOptions,
  LaunchPlan,
  ProcessState,
  RunOptions,
} from "./types.js";

const log = logger.child({ module: "eprocess" });

const DEFAULT_KILL_GRACE_MS = 2000;
const DEFAULT_DRAIN_MS = 1000;

const EMPTY_OUTPUT: DecodedOutput = { text: "", encoding: "utf-8" };

interface ChildOutcome {
  code: number | null;
  signal: NodeJS.Signals | null;
  timedOut: boolean;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function assertGroup(group: unknown): asserts group is ArgumentGroup {
  if (!Array.isArray(group) || (group.length !== 1 && group.length !== 2)) {
    throw new TypeError(
      `Argument groups must be [value] or [flag, value], got ${JSON.stringify(group)}`
    );
  }
}

/** A path with a directory part, as opposed to a bare program name. */
function hasDirectory(executable: string): boolean {
  return /[\\/]/.test(executable);
}

function toPatchMap(patch: EnvPatch | undefined): Map<string, string | null> {
  return new Map(Object.entries(patch ?? {}));
}

// ---------------------------------------------------------------------------
// EProcess
// ---------------------------------------------------------------------------

/**
 * Runs one program, natively or through Wine, and keeps its result.
 *
 * ```ts
 * const proc = await new EProcess("setup.exe")
 *   .setArguments(["/S"], ["/D", hostPath("/games/app")])
 *   .run({ timeout: 60_000 });
 * console.log(proc.exitCode, proc.stdout);
 * ```
 *
 * An instance runs at most once: calling run() again, while running or
 * after it finished, throws ProcessStateError. A nonzero exit code is
 * reported through `exitCode` and never thrown.
 */
export class EProcess {
  readonly executable: string;

  private groups: ArgumentGroup[] = [];
  private readonly registry: ContextRegistry;
  private readonly platform: NodeJS.Platform;
  private readonly spawner: Spawner;
  private readonly decoder: Decoder;
  private readonly killGraceMs: number;
  private readonly drainMs: number;

  private _state: ProcessState = "not-started";
  private _plan: LaunchPlan | null = null;
  private _child: ChildHandle | null = null;
  private _pid: number | undefined;
  private _exitCode: number | null = null;
  private _signal: NodeJS.Signals | null = null;
  private _timedOut = false;
  private _error: Error | null = null;
  private _startedAt: number | null = null;
  private _finishedAt: number | null = null;
  private stdoutChunks: Buffer[] = [];
  private stderrChunks: Buffer[] = [];
  private _stdout: DecodedOutput = EMPTY_OUTPUT;
  private _stderr: DecodedOutput = EMPTY_OUTPUT;

  constructor(executable: string | HostPath | URL, private readonly options: EProcessOptions = {}) {
    this.executable = isPathValue(executable) ? pathValueToString(executable) : executable;
    this.registry = options.registry ?? defaultRegistry;
    this.platform = options.platform ?? process.platform;
    this.spawner = options.spawner ?? nodeSpawner;
    this.decoder = options.decoder ?? decodeOutput;
    this.killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
    this.drainMs = options.drainMs ?? DEFAULT_DRAIN_MS;
  }

  // -------------------------------------------------------------------------
  // Arguments
  // -------------------------------------------------------------------------

  /** Replaces every argument group. */
  setArguments(...groups: ArgumentGroup[]): this {
    groups.forEach(assertGroup);
    this.groups = [...groups];
    return this;
  }

  /** Appends argument groups after the existing ones. */
  addArguments(...groups: ArgumentGroup[]): this {
    groups.forEach(assertGroup);
    this.groups.push(...groups);
    return this;
  }

  /**
   * Flattened argument tokens. Path-typed values go through the translator
   * of `target` (identity by default); everything else is stringified.
   */
  getArguments(target?: WineContext | PathTranslator): string[] {
    const translator = target instanceof WineContext
      ? target.translator()
      : (target ?? new NativePathTranslator(this.platform));
    const token = (value: ArgValue): string =>
      isPathValue(value) ? translator.toTarget(pathValueToString(value)) : String(value);
    return this.groups.flatMap((group) => group.map(token));
  }

  // -------------------------------------------------------------------------
  // Planning
  // -------------------------------------------------------------------------

  /**
   * Works out the exact launch — mode, argv, environment and cwd — without
   * spawning anything.
   *
   * Throws MissingContextError when Wine is needed but no context resolves,
   * and UnknownContextError for a context name that is not registered.
   */
  plan(options: RunOptions = {}): LaunchPlan {
    const strategy = this.resolveStrategy(options.context);

    const prepend = this.options.prependCommand ?? [];
    const command = [
      ...prepend,
      ...strategy.command(this.launchExecutable(), this.getArguments(strategy.translator)),
    ];

    const env = strategy.environment(this.options.ambientEnv ?? process.env);
    applyOverrides(env, toPatchMap(this.options.env));
    applyOverrides(env, toPatchMap(options.env));

    const cwd = options.cwd !== undefined
      ? this.resolveHostPath(isPathValue(options.cwd) ? pathValueToString(options.cwd) : options.cwd)
      : this.defaultCwd(strategy.translator);

    return {
      mode: strategy.mode,
      command,
      env,
      cwd,
      context: strategy.context,
      translator: strategy.translator,
      launcher: strategy.launcher,
      launcherKind: strategy.launcherKind,
    };
  }

  private resolveStrategy(runContext?: WineContext | string): ExecutionStrategy {
    if (this.platform === "win32" || !isWindowsProgram(this.executable)) {
      return new NativeStrategy(this.platform);
    }
    const context = this.resolveContext(runContext ?? this.options.context);
    return new WineStrategy(context, {
      launcher: this.options.launcher,
      protonVerb: this.options.protonVerb,
      steamAppId: this.options.steamAppId,
      useSteam: this.options.useSteam,
    });
  }

  private resolveContext(ref?: WineContext | string): WineContext {
    if (ref instanceof WineContext) return ref;
    if (typeof ref === "string") return this.registry.resolve(ref);

    try {
      return this.registry.resolve();
    } catch (err) {
      if (err instanceof UnknownContextError) {
        throw new MissingContextError(
          `"${this.executable}" needs Wine but no context was given and none is registered as default`,
          this.executable
        );
      }
      throw err;
    }
  }

  /** Bare names and Windows paths go through as given; host paths become absolute. */
  private launchExecutable(): string {
    if (!hasDirectory(this.executable) || isWindowsDrivePath(this.executable)) {
      return this.executable;
    }
    return this.resolveHostPath(this.executable);
  }

  /** Host-side location of the executable, or null for a bare program name. */
  private hostExecutable(translator: PathTranslator): string | null {
    if (!hasDirectory(this.executable)) return null;
    if (isWindowsDrivePath(this.executable) && this.platform !== "win32") {
      const native = translator.fromTarget(this.executable);
      return native === this.executable ? null : native;
    }
    return this.resolveHostPath(this.executable);
  }

  private defaultCwd(translator: PathTranslator): string | undefined {
    const host = this.hostExecutable(translator);
    if (host === null) return undefined;
    return this.hostPathApi().dirname(host);
  }

  private hostPathApi(): typeof posix {
    return this.platform === "win32" ? win32 : posix;
  }

  private resolveHostPath(path: string): string {
    return this.hostPathApi().resolve(expandHome(path));
  }

  // -------------------------------------------------------------------------
  // Execution
  // -------------------------------------------------------------------------

  /**
   * Launches the program and waits for it.
   *
   * Rejects with:
   *   - MissingContextError / UnknownContextError — before anything is spawned
   *   - LaunchError  — executable or launcher missing, or the OS refused the spawn
   *   - TimeoutError — `timeout` elapsed; the child was terminated and the
   *                    output captured so far is kept on this instance
   *   - ProcessStateError — this instance has already been started
   */
  async run(options: RunOptions = {}): Promise<this> {
    if (this._state !== "not-started") {
      throw new ProcessStateError(`Process "${this.executable}" has already been started`, this._state);
    }

    const plan = this.plan(options);
    this._state = "running";
    this._plan = plan;
    this._startedAt = Date.now();

    log.debug({ mode: plan.mode, command: plan.command, cwd: plan.cwd }, "Launching process");

    try {
      this.assertLaunchable(plan);
      const outcome = await this.execute(plan, options.timeout);

      this._exitCode = outcome.code;
      this._signal = outcome.signal;
      this._timedOut = outcome.timedOut;

      if (outcome.timedOut) {
        const timeout = options.timeout ?? 0;
        log.warn({ pid: this._pid, timeout, command: plan.command }, "Process timed out and was terminated");
        throw new TimeoutError(
          `"${this.executable}" did not finish within ${timeout} ms and was terminated`,
          timeout
        );
      }

      log.info(
        { pid: this._pid, exitCode: outcome.code, signal: outcome.signal, durationMs: this.durationMs },
        "Process exited"
      );
      return this;
    } catch (err) {
      this._error = err instanceof Error ? err : new Error(getErrorMessage(err));
      if (err instanceof LaunchError) {
        log.warn({ command: plan.command, osCode: err.osCode }, err.message);
      }
      throw err;
    } finally {
      this._finishedAt = Date.now();
      this._state = "finished";
      this._stdout = this.decode(this.stdoutChunks);
      this._stderr = this.decode(this.stderrChunks);
    }
  }

  /** Runs the configured decoder; a custom one that throws falls back to decodeOutput. */
  private decode(chunks: Buffer[]): DecodedOutput {
    const bytes = Buffer.concat(chunks);
    if (this.decoder === decodeOutput) return decodeOutput(bytes, this.options.encoding);
    try {
      return this.decoder(bytes, this.options.encoding);
    } catch (err) {
      log.warn({ err }, "Output decoder failed, using the default one");
      return decodeOutput(bytes, this.options.encoding);
    }
  }

  private assertLaunchable(plan: LaunchPlan): void {
    if (plan.launcher !== null && !isExecutableFile(plan.launcher)) {
      const what = plan.launcherKind === "proton" ? "Proton script" : "Wine loader";
      throw new LaunchError(
        `${what} not found or not executable: "${plan.launcher}"`,
        plan.command,
        "ENOENT"
      );
    }

    const host = this.hostExecutable(plan.translator);
    if (host !== null && !isFile(host)) {
      throw new LaunchError(`Executable not found: "${host}"`, plan.command, "ENOENT");
    }
  }

  private execute(plan: LaunchPlan, timeout: number | undefined): Promise<ChildOutcome> {
    const [command, ...args] = plan.command;

    let child: ChildHandle;
    try {
      child = this.spawner({ command, args, env: plan.env, cwd: plan.cwd });
    } catch (err) {
      throw new LaunchError(
        `Failed to launch "${command}": ${getErrorMessage(err)}`,
        plan.command,
        getOsErrorCode(err)
      );
    }

    this._child = child;
    this._pid = child.pid;

    child.stdout.on("data", (chunk: Buffer) => this.stdoutChunks.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => this.stderrChunks.push(chunk));
    child.stdout.on("error", (err) => log.debug({ err }, "stdout pipe error"));
    child.stderr.on("error", (err) => log.debug({ err }, "stderr pipe error"));

    return new Promise<ChildOutcome>((resolvePromise, rejectPromise) => {
      let settled = false;
      let timedOut = false;
      let timeoutTimer: NodeJS.Timeout | undefined;
      let killTimer: NodeJS.Timeout | undefined;
      let drainTimer: NodeJS.Timeout | undefined;

      const settle = (finish: () => void) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeoutTimer);
        clearTimeout(killTimer);
        clearTimeout(drainTimer);
        this._child = null;
        finish();
      };

      child.onError((err) => {
        if (child.pid !== undefined) {
          log.warn({ pid: child.pid, err }, "Child process reported an error");
          return;
        }
        settle(() =>
          rejectPromise(
            new LaunchError(
              `Failed to launch "${command}": ${err.message}`,
              plan.command,
              getOsErrorCode(err)
            )
          )
        );
      });

      child.onExit((code, signal) => {
        if (settled) return;
        this._pid = child.pid ?? this._pid;
        clearTimeout(timeoutTimer);
        clearTimeout(killTimer);
        // Wine daemons may inherit the pipes and hold them open
        drainTimer = setTimeout(() => {
          child.stdout.destroy();
          child.stderr.destroy();
          settle(() => resolvePromise({ code, signal, timedOut }));
        }, this.drainMs);
      });

      child.onClose((code, signal) => {
        settle(() => resolvePromise({ code, signal, timedOut }));
      });

      if (timeout !== undefined) {
        timeoutTimer = setTimeout(() => {
          timedOut = true;
          killTimer = setTimeout(() => child.kill("SIGKILL"), this.killGraceMs);
          child.kill("SIGTERM");
        }, timeout);
      }
    });
  }

  /**
   * Sends `signal` to the running child. Returns false when nothing is
   * running or the signal could not be delivered.
   */
  terminate(signal: NodeJS.Signals = "SIGTERM"): boolean {
    return this._child ? this._child.kill(signal) : false;
  }

  // -------------------------------------------------------------------------
  // Result
  // -------------------------------------------------------------------------

  get state(): ProcessState {
    return this._state;
  }

  get finished(): boolean {
    return this._state === "finished";
  }

  isRunning(): boolean {
    return this._state === "running";
  }

  get pid(): number | undefined {
    return this._pid;
  }

  /** Null until the child exits on its own or by signal; stays null after a launch failure */
  get exitCode(): number | null {
    return this._exitCode;
  }

  get signal(): NodeJS.Signals | null {
    return this._signal;
  }

  get timedOut(): boolean {
    return this._timedOut;
  }

  /** Error that ended the last run, if any */
  get error(): Error | null {
    return this._error;
  }

  /** The launch used by run(), once it has started */
  get launchPlan(): LaunchPlan | null {
    return this._plan;
  }

  get stdout(): string[] {
    return splitLines(this._stdout.text);
  }

  get stderr(): string[] {
    return splitLines(this._stderr.text);
  }

  get stdoutText(): string {
    return this._stdout.text;
  }

  get stderrText(): string {
    return this._stderr.text;
  }

  get stdoutBytes(): Buffer {
    return Buffer.concat(this.stdoutChunks);
  }

  get stderrBytes(): Buffer {
    return Buffer.concat(this.stderrChunks);
  }

  /** Encodings the decoder settled on for stdout and stderr */
  get encodings(): { stdout: string; stderr: string } {
    return { stdout: this._stdout.encoding, stderr: this._stderr.encoding };
  }

  get durationMs(): number | null {
    if (this._startedAt === null) return null;
    return (this._finishedAt ?? Date.now()) - this._startedAt;
  }

  /**
   * Maps a path printed by the child back to the host. Unknown forms are
   * returned unchanged.
   */
  nativePath(targetPath: string): string {
    const translator = this._plan?.translator ?? new NativePathTranslator(this.platform);
    return translator.fromTarget(targetPath);
  }
}
