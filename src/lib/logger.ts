import { Console } from "node:console";

/**
 * The subset of the console API the renderer and CLI log through.
 */
export type Logger = Pick<Console, "log" | "warn" | "error">;

/**
 * A console writing every level to stderr, so stdout carries only rendered output.
 */
export function createDiagnosticLogger(stream: NodeJS.WritableStream = process.stderr): Logger {
  return new Console({ stdout: stream, stderr: stream });
}
