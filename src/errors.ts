export const ErrorCodes = {
  CONFIG_KEY: "REL-1001",
  REGISTRY_READ: "REL-1101",
  REGISTRY_INVALID: "REL-1102",
  PROJECT_NOT_FOUND: "REL-1103",
  PROJECT_EXISTS: "REL-1104",
  UNSUPPORTED_TYPE: "REL-2001",
  VERSION_NOT_FOUND: "REL-2002",
  VERSION_UPDATE_FAILED: "REL-2003",
  STAGE_FAILED: "REL-3001",
  UNEXPECTED: "REL-3999",
  USAGE: "REL-4001",
  ABORTED: "REL-4002"
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export function formatError(code: string, message: string): string {
  return `[${code}] ${message}`;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
