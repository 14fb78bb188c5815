import type { CommandResult, FailureReason } from "../types.js";

// Case-sensitive: "1Password.app" or "Sudo" in an unrelated error is not an auth failure.
const AUTH_PATTERNS: RegExp[] = [
  /authentication failure/,
  /\bsudo\b/,
  /password/,
  /Permission denied/,
  /Incorrect password/,
  /[Ss]orry, try again/
];

const NOT_FOUND_PATTERNS: RegExp[] = [
  /No available formula/i,
  /No available cask/i,
  /No such keg/i,
  /is not installed/i,
  /No formulae or casks found/i,
  /No formulae found/i,
  /No casks found/i
];

export function isAuthFailure(output: string): boolean {
  return AUTH_PATTERNS.some((pattern) => pattern.test(output));
}

export function isNotFound(output: string): boolean {
  return NOT_FOUND_PATTERNS.some((pattern) => pattern.test(output));
}

export function classifyFailure(
  result: CommandResult,
  context: { command: string; credentialSupplied: boolean }
): FailureReason {
  if (result.timedOut) {
    return { code: "timeout", message: `${context.command} timed out` };
  }

  const output = [result.stderr, result.stdout].filter(Boolean).join("\n");

  if (isAuthFailure(output)) {
    return context.credentialSupplied
      ? { code: "authRejected", message: "Incorrect password" }
      : { code: "authRequired", message: `${context.command} requires an administrator password` };
  }

  if (isNotFound(output)) {
    return { code: "notFound", message: firstLine(output) };
  }

  return {
    code: "externalToolError",
    message: firstLine(output) || `${context.command} failed with exit code ${result.code}`
  };
}

function firstLine(output: string): string {
  return (
    output
      .split(/\r?\n/)
      .map((line) => line.replace(/^Error:\s*/, "").trim())
      .find(Boolean) ?? ""
  );
}
