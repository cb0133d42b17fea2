/**
 * CodeValidator decides whether a generated artifact is usable.
 *
 * Stage 1 parses the text with acorn; a parse failure stops there.
 * Stage 2 runs the artifact in the process sandbox for a smoke check.
 * Every failure comes back as a ValidationOutcome; validate() never rejects.
 */

import { parse, Options as AcornOptions } from "acorn";
import { ArtifactModuleType, ArtifactSandbox, SandboxRunResult } from "./sandbox/sandbox.js";
import { ValidationOutcome } from "./types.js";

export interface CodeValidatorOptions {
  sandbox: ArtifactSandbox;
  /** Long-running interactive programs may count a timeout as a clean run */
  treatTimeoutAsSuccess?: boolean;
  debugMode?: boolean;
}

export interface SyntaxErrorDetails {
  message: string;
  line?: number;
  column?: number;
  snippet?: string;
}

export type SyntaxCheckResult =
  | { valid: true; moduleType: ArtifactModuleType }
  | { valid: false; error: SyntaxErrorDetails };

interface AcornSyntaxError extends SyntaxError {
  pos: number;
  loc: { line: number; column: number };
}

const SNIPPET_RADIUS = 2;

const baseParseOptions: AcornOptions = {
  ecmaVersion: "latest",
  allowHashBang: true,
};

function isAcornSyntaxError(error: unknown): error is AcornSyntaxError {
  if (!(error instanceof SyntaxError)) return false;
  if (!("pos" in error) || typeof error.pos !== "number") return false;
  if (!("loc" in error) || typeof error.loc !== "object" || error.loc === null) return false;
  const loc = error.loc;
  return "line" in loc && typeof loc.line === "number" && "column" in loc && typeof loc.column === "number";
}

/**
 * Numbered source lines around the error line, with a marker on the line itself
 */
export function buildCodeContext(source: string, lineNumber: number): string {
  const lines = source.split("\n");
  const start = Math.max(0, lineNumber - 1 - SNIPPET_RADIUS);
  const end = Math.min(lines.length, lineNumber + SNIPPET_RADIUS);
  return lines
    .slice(start, end)
    .map((line, i) => {
      const currentLineNumber = start + i + 1;
      const marker = currentLineNumber === lineNumber ? "> " : "  ";
      return `${marker}${currentLineNumber}: ${line}`;
    })
    .join("\n");
}

function tryParse(source: string, sourceType: "script" | "module"): unknown {
  try {
    parse(source, {
      ...baseParseOptions,
      sourceType,
      allowReturnOutsideFunction: sourceType === "script",
    });
    return null;
  } catch (error) {
    return error;
  }
}

function toSyntaxErrorDetails(error: unknown, source: string): SyntaxErrorDetails {
  if (isAcornSyntaxError(error)) {
    const { line, column } = error.loc;
    return {
      // acorn appends "(line:column)", which is carried separately
      message: error.message.replace(/\s*\(\d+:\d+\)$/, ""),
      line,
      column: column + 1,
      snippet: buildCodeContext(source, line),
    };
  }
  return { message: error instanceof Error ? error.message : String(error) };
}

export class CodeValidator {
  constructor(private readonly options: CodeValidatorOptions) {}

  /**
   * Static check. Tries the artifact as a CommonJS script first, then as an
   * ES module. When both fail, reports the parse that got further.
   */
  checkSyntax(source: string): SyntaxCheckResult {
    const scriptError = tryParse(source, "script");
    if (scriptError === null) {
      return { valid: true, moduleType: "commonjs" };
    }

    const moduleError = tryParse(source, "module");
    if (moduleError === null) {
      return { valid: true, moduleType: "module" };
    }

    const furthest =
      isAcornSyntaxError(moduleError) && isAcornSyntaxError(scriptError) && moduleError.pos > scriptError.pos
        ? moduleError
        : scriptError;
    return { valid: false, error: toSyntaxErrorDetails(furthest, source) };
  }

  async validate(source: string, signal?: AbortSignal): Promise<ValidationOutcome> {
    const syntax = this.checkSyntax(source);
    if (!syntax.valid) {
      this.debug(`Static check failed: ${syntax.error.message}`);
      return { kind: "syntax_error", ...syntax.error };
    }

    try {
      const run = await this.options.sandbox.run(source, {
        moduleType: syntax.moduleType,
        signal,
      });
      return this.classifyRun(run);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[CodeValidator] Sandbox could not run the artifact: ${message}`);
      return { kind: "runtime_error", message: `Sandbox failure: ${message}` };
    }
  }

  private classifyRun(run: SandboxRunResult): ValidationOutcome {
    this.debug(`Smoke run finished with status ${run.status} in ${run.executionTime}ms`);
    const output = run.output === "" ? undefined : run.output;

    switch (run.status) {
      case "exited":
        if (run.exitCode === 0) {
          return { kind: "success" };
        }
        return { kind: "runtime_error", message: `Program exited with code ${run.exitCode}`, output };
      case "faulted":
        return {
          kind: "runtime_error",
          message: `${run.fault.name}: ${run.fault.message}`,
          trace: run.fault.stack,
          output,
        };
      case "timed_out":
        if (this.options.treatTimeoutAsSuccess) {
          return { kind: "success" };
        }
        return {
          kind: "runtime_error",
          message: `Smoke run timed out after ${this.options.sandbox.timeoutMs}ms`,
          output,
        };
      case "aborted":
        return { kind: "runtime_error", message: "Smoke run aborted", output };
    }
  }

  private debug(message: string): void {
    if (this.options.debugMode) {
      console.debug(`[CodeValidator] ${message}`);
    }
  }
}
