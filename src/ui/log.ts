import { getFlags } from "../context/flags";
import { ErrorCode, formatError } from "../errors";

export function logInfo(message: string): void {
  if (!getFlags().verbose) {
    return;
  }
  console.log(message);
}

export function logWarn(message: string): void {
  console.warn(`warning: ${message}`);
}

export function logError(code: ErrorCode, message: string): void {
  console.log(formatError(code, message));
}
