import { execa } from 'execa';
import { ConversionTimeoutError, ItemConversionError } from '../errors.js';

export interface ToolRun {
  signal: AbortSignal;
  timeoutMs: number;
  cwd?: string;
}

type ExecaFailure = Error & { shortMessage: string; timedOut?: boolean; isCanceled?: boolean };

const isExecaFailure = (err: unknown): err is ExecaFailure =>
  err instanceof Error && 'shortMessage' in err && typeof err.shortMessage === 'string';

/** Runs an external binary and returns its stdout. */
export async function runTool(bin: string, args: string[], run: ToolRun): Promise<string> {
  try {
    const result = await execa(bin, args, {
      cwd: run.cwd,
      timeout: run.timeoutMs,
      signal: run.signal,
      stripFinalNewline: false,
    });
    return result.stdout;
  } catch (err) {
    if (isExecaFailure(err)) {
      if (err.timedOut) throw new ConversionTimeoutError(run.timeoutMs);
      throw new ItemConversionError(`${bin} failed: ${err.shortMessage}`, { cause: err });
    }
    throw err;
  }
}
