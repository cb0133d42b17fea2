/**
 * ArtifactSandbox runs a generated program in a child Node.js process for a
 * bounded smoke run.
 *
 * The artifact is written to a private temporary directory and started as the
 * entry script of a detached process, so it leads its own process group. The
 * process gets an empty environment, a heap limit and scripted stdin. Its
 * whole group is killed, and the directory removed, however the run ends.
 */

import { ChildProcess, spawn } from "child_process";
import { mkdtemp, rm, writeFile } from "fs/promises";
import * as os from "os";
import * as path from "path";
import { Readable } from "stream";

export type ArtifactModuleType = "commonjs" | "module";

/**
 * Options for creating a new sandbox
 */
export interface SandboxOptions {
  timeoutMs: number;
  /** Lines written to the program's stdin before it is closed */
  smokeInput?: string[];
  maxHeapMb?: number;
  /** Cap on captured stdout/stderr characters */
  outputLimit?: number;
  debugMode?: boolean;
}

export interface SandboxRunOptions {
  moduleType?: ArtifactModuleType;
  signal?: AbortSignal;
}

export interface SandboxFault {
  name: string;
  message: string;
  stack?: string;
}

/**
 * Result of a smoke run
 */
export type SandboxRunResult =
  | { status: "exited"; exitCode: number; output: string; executionTime: number }
  | { status: "faulted"; fault: SandboxFault; output: string; executionTime: number }
  | { status: "timed_out"; output: string; executionTime: number }
  | { status: "aborted"; output: string; executionTime: number };

const DEFAULT_OUTPUT_LIMIT = 4000;
const DEFAULT_MAX_HEAP_MB = 64;

const PRELOAD_FILE = "sandbox-preload.cjs";

// Reports the first uncaught error on fd 3 and ends the process
const PRELOAD_SOURCE = `"use strict";
const fs = require("fs");
function report(error) {
  const fault = error instanceof Error
    ? { name: error.name, message: error.message, stack: error.stack }
    : { name: "Error", message: "Uncaught " + String(error) };
  try {
    fs.writeSync(3, JSON.stringify(fault));
  } finally {
    process.exit(1);
  }
}
process.on("uncaughtException", report);
process.on("unhandledRejection", report);
`;

function parseFaultReport(report: string): SandboxFault {
  let parsed: unknown;
  try {
    parsed = JSON.parse(report);
  } catch {
    return { name: "Error", message: report };
  }
  if (typeof parsed === "object" && parsed !== null && "message" in parsed && typeof parsed.message === "string") {
    const name = "name" in parsed && typeof parsed.name === "string" ? parsed.name : "Error";
    const stack = "stack" in parsed && typeof parsed.stack === "string" ? parsed.stack : undefined;
    return { name, message: parsed.message, stack };
  }
  return { name: "Error", message: report };
}

function signalNumber(signal: NodeJS.Signals | null): number {
  const entry = Object.entries(os.constants.signals).find(([name]) => name === signal);
  return entry === undefined ? 0 : entry[1];
}

/**
 * SIGKILL the artifact and everything it started. The group is usually
 * already gone after a clean exit.
 */
function killProcessGroup(child: ChildProcess, debugMode: boolean): void {
  if (child.pid === undefined) return;
  try {
    process.kill(-child.pid, "SIGKILL");
  } catch (error) {
    const code = error instanceof Error && "code" in error ? error.code : undefined;
    if (code !== "ESRCH") {
      console.warn(`[ArtifactSandbox] Could not stop process group ${child.pid}:`, error);
    } else if (debugMode) {
      console.debug(`[ArtifactSandbox] Process group ${child.pid} already exited`);
    }
  }
}

export class ArtifactSandbox {
  private readonly options: Required<Omit<SandboxOptions, "smokeInput">> & { smokeInput: string[] };

  constructor(options: SandboxOptions) {
    this.options = {
      timeoutMs: options.timeoutMs,
      smokeInput: options.smokeInput ?? [],
      maxHeapMb: options.maxHeapMb ?? DEFAULT_MAX_HEAP_MB,
      outputLimit: options.outputLimit ?? DEFAULT_OUTPUT_LIMIT,
      debugMode: options.debugMode ?? false,
    };
  }

  get timeoutMs(): number {
    return this.options.timeoutMs;
  }

  /**
   * Run the artifact to completion, fault, timeout or abort.
   * Never rejects for anything the artifact does.
   */
  async run(source: string, runOptions: SandboxRunOptions = {}): Promise<SandboxRunResult> {
    const moduleType = runOptions.moduleType ?? "commonjs";
    const dir = await mkdtemp(path.join(os.tmpdir(), "game-synth-"));
    const fileName = moduleType === "module" ? "game.mjs" : "game.cjs";
    const filePath = path.join(dir, fileName);
    const preloadPath = path.join(dir, PRELOAD_FILE);

    try {
      await writeFile(preloadPath, PRELOAD_SOURCE, "utf-8");
      await writeFile(filePath, source, "utf-8");
      const result = await this.execute(filePath, preloadPath, runOptions.signal);
      return this.scrubPaths(result, dir);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  }

  private execute(filePath: string, preloadPath: string, signal?: AbortSignal): Promise<SandboxRunResult> {
    const { timeoutMs, smokeInput, maxHeapMb, outputLimit, debugMode } = this.options;
    const startTime = Date.now();
    let output = "";
    let faultReport = "";

    const capture = (chunk: Buffer | string) => {
      if (output.length < outputLimit) {
        output = (output + chunk.toString()).slice(0, outputLimit);
      }
    };

    return new Promise<SandboxRunResult>((resolve, reject) => {
      if (signal?.aborted) {
        resolve({ status: "aborted", output, executionTime: 0 });
        return;
      }

      // fd 3 carries the fault report from the preload script
      const child = spawn(
        process.execPath,
        [`--max-old-space-size=${maxHeapMb}`, "--require", preloadPath, filePath],
        { cwd: path.dirname(filePath), env: {}, stdio: ["pipe", "pipe", "pipe", "pipe"], detached: true }
      );

      let closed = false;
      const whenClosed = new Promise<void>((resolveClosed) => {
        child.once("close", () => {
          closed = true;
          resolveClosed();
        });
      });

      let settled = false;
      // Output is read once every pipe has closed so stdio still in flight is kept
      const settle = (finish: (output: string, faultReport: string) => SandboxRunResult) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
        killProcessGroup(child, debugMode);
        const done = () => {
          const result = finish(output, faultReport);
          if (debugMode) {
            console.debug(`[ArtifactSandbox] Smoke run ${result.status} after ${result.executionTime}ms`);
          }
          resolve(result);
        };
        if (closed) {
          done();
        } else {
          whenClosed.then(done, done);
        }
      };

      const elapsed = () => Date.now() - startTime;

      const timer = setTimeout(() => {
        const executionTime = elapsed();
        settle((out) => ({ status: "timed_out", output: out, executionTime }));
      }, timeoutMs);

      const onAbort = () => {
        const executionTime = elapsed();
        settle((out) => ({ status: "aborted", output: out, executionTime }));
      };
      signal?.addEventListener("abort", onAbort, { once: true });

      child.stdout?.on("data", capture);
      child.stderr?.on("data", capture);
      const faultPipe = child.stdio[3];
      if (faultPipe instanceof Readable) {
        faultPipe.on("data", (chunk: Buffer) => {
          faultReport += chunk.toString();
        });
      }

      child.on("error", (error: Error) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
        reject(error);
      });

      child.once("exit", (code, exitSignal) => {
        const executionTime = elapsed();
        const exitCode = code ?? 128 + signalNumber(exitSignal);
        settle((out, report) =>
          report === ""
            ? { status: "exited", exitCode, output: out, executionTime }
            : { status: "faulted", fault: parseFaultReport(report), output: out, executionTime }
        );
      });

      // The program may exit without reading stdin
      child.stdin?.on("error", (error: Error) => {
        if (debugMode) {
          console.debug(`[ArtifactSandbox] Smoke input not delivered: ${error.message}`);
        }
      });
      for (const line of smokeInput) {
        child.stdin?.write(`${line}\n`);
      }
      child.stdin?.end();
    });
  }

  /**
   * Replace the temporary directory in messages and traces so the same
   * artifact always yields the same text.
   */
  private scrubPaths(result: SandboxRunResult, dir: string): SandboxRunResult {
    const scrub = (text: string) => text.split(`${dir}${path.sep}`).join("").split(dir).join("");
    const output = scrub(result.output);

    if (result.status === "faulted") {
      return {
        ...result,
        output,
        fault: {
          name: result.fault.name,
          message: scrub(result.fault.message),
          stack: result.fault.stack === undefined ? undefined : scrub(result.fault.stack),
        },
      };
    }
    return { ...result, output };
  }
}
